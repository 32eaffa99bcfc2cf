import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
    PORT: z.string().default('3001'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    OPENAI_API_KEY: z.string().optional(),
    SUPABASE_URL: z.string().optional(),
    SUPABASE_KEY: z.string().optional(),
    JWT_SECRET: z.string().optional(),
    VAULT_BUCKET: z.string().default('dispute-vault'),
    VAULT_SECRET: z.string().optional(),
    KB_MATCH_FUNCTION: z.string().default('match_knowledgebase_chunks'),
    KB_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
    KB_MAX_REFERENCES: z.coerce.number().int().min(0).default(3),
    OUTPUT_DIR: z.string().default('outputletter'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
