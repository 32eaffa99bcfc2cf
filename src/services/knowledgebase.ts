import { SupabaseClient } from '@supabase/supabase-js';
import OpenAI from 'openai';
import { z } from 'zod';
import { Env } from '../config/env';
import { ClassifiedAccount } from '../types/account_types';
import { supabase } from './supabase';

export interface KnowledgebaseClient {
    /** Short "source: snippet" citations for one disputed account; [] when nothing matches. */
    findReferences(entry: ClassifiedAccount, roundNumber: number): Promise<string[]>;
}

export class NullKnowledgebaseClient implements KnowledgebaseClient {
    async findReferences(): Promise<string[]> {
        return [];
    }
}

export interface VectorSearchOptions {
    matchFunction: string;
    matchThreshold: number;
    maxReferences: number;
}

const chunkSchema = z.object({
    source: z.string().nullish(),
    title: z.string().nullish(),
    content: z.string(),
    similarity: z.number().optional()
});

const SNIPPET_LENGTH = 200;

export function buildReferenceQuery(entry: ClassifiedAccount, roundNumber: number): string {
    const { account, policy } = entry;
    const issues = [...account.negativeItems, ...account.violations.map(v => v.split(':')[0])];
    return [
        `Creditor: ${account.creditor}.`,
        `Status: ${account.status ?? 'unknown'}.`,
        `Requested action: ${policy}.`,
        `Dispute round ${roundNumber}.`,
        issues.length > 0 ? `Issues: ${[...new Set(issues)].join(', ')}.` : ''
    ].join(' ').trim();
}

function toReference(chunk: z.infer<typeof chunkSchema>): string {
    const snippet = chunk.content.replace(/\s+/g, ' ').trim();
    const short = snippet.length > SNIPPET_LENGTH ? `${snippet.slice(0, SNIPPET_LENGTH - 3)}...` : snippet;
    return `${chunk.source ?? chunk.title ?? 'Knowledgebase'}: ${short}`;
}

/**
 * Embeds the account query with OpenAI and asks a Supabase match function for
 * the closest knowledgebase chunks. Failures degrade to no references.
 */
export class VectorKnowledgebaseClient implements KnowledgebaseClient {
    constructor(
        private readonly openai: OpenAI,
        private readonly db: SupabaseClient,
        private readonly options: VectorSearchOptions
    ) {}

    async findReferences(entry: ClassifiedAccount, roundNumber: number): Promise<string[]> {
        if (this.options.maxReferences === 0) return [];

        try {
            const response = await this.openai.embeddings.create({
                model: 'text-embedding-3-small',
                input: buildReferenceQuery(entry, roundNumber),
                encoding_format: 'float'
            });
            const embedding = response.data[0]?.embedding;
            if (!embedding) return [];

            const { data, error } = await this.db.rpc(this.options.matchFunction, {
                query_embedding: embedding,
                match_threshold: this.options.matchThreshold,
                match_count: this.options.maxReferences
            });
            if (error) {
                console.error(`[Knowledgebase] Match query failed: ${error.message}`);
                return [];
            }

            const chunks = z.array(chunkSchema).safeParse(data);
            if (!chunks.success) {
                console.warn('[Knowledgebase] Unexpected match result shape, ignoring');
                return [];
            }
            return chunks.data.slice(0, this.options.maxReferences).map(toReference);
        } catch (error: unknown) {
            console.error('[Knowledgebase] Lookup failed:', error instanceof Error ? error.message : error);
            return [];
        }
    }
}

export function createKnowledgebaseClient(config: Env): KnowledgebaseClient {
    if (!config.OPENAI_API_KEY || !supabase) {
        console.log('[Knowledgebase] Not configured, letters will carry no references');
        return new NullKnowledgebaseClient();
    }
    return new VectorKnowledgebaseClient(new OpenAI({ apiKey: config.OPENAI_API_KEY }), supabase, {
        matchFunction: config.KB_MATCH_FUNCTION,
        matchThreshold: config.KB_MATCH_THRESHOLD,
        maxReferences: config.KB_MAX_REFERENCES
    });
}
