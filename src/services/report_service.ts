import { z } from 'zod';
import { analysisEngine, AnalyzeReportInput } from '../engine/analysis_engine';
import { ReportAnalysis } from '../types/report_types';
import { KnowledgebaseClient } from './knowledgebase';

/** The part of the vault the report service needs. */
export interface AnalysisStore {
    storeJson(filename: string, value: unknown): Promise<void>;
    retrieveJson(filename: string): Promise<unknown>;
}

export const analyzeRequestSchema = z.object({
    text: z.string().optional(),
    fileName: z.string().min(1).default('report.txt'),
    fullName: z.string().min(1).default('Consumer'),
    address: z.string().default(''),
    phone: z.string().min(1).optional(),
    email: z.string().email().optional(),
    roundNumber: z.coerce.number().int().min(0).default(1)
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

const lateEntrySchema = z.object({
    month: z.number().int().min(1).max(12),
    year: z.number().int().nullable(),
    severity: z.union([z.literal(30), z.literal(60), z.literal(90)])
});

const inquirySchema = z.object({ furnisher: z.string(), date: z.string().nullable(), raw: z.string() });

const identifiersSchema = z.object({
    names: z.array(z.string()),
    addresses: z.array(z.string()),
    employers: z.array(z.string()),
    phones: z.array(z.string()),
    emails: z.array(z.string())
});

const statusSchema = z.enum([
    'Never late', 'Exceptional payment history', 'Paid as agreed', 'Current', 'Paid, Closed', 'Paid', 'Open', 'Closed',
    'Bankruptcy', 'Foreclosure', 'Charge off', 'Repossession', 'Collection', 'Settled', 'Late'
]);

export const reportAnalysisSchema = z.object({
    id: z.string(),
    fileName: z.string(),
    bureau: z.enum(['Experian', 'Equifax', 'TransUnion', 'Unknown Bureau']),
    roundNumber: z.number().int(),
    generatedAt: z.string(),
    accountsTotal: z.number().int(),
    negativeAccounts: z.array(z.object({
        creditor: z.string(),
        displayCreditor: z.string(),
        accountNumber: z.string().nullable(),
        status: statusSchema.nullable(),
        balance: z.string().nullable(),
        policy: z.enum(['delete', 'correct']),
        lateEntries: z.array(lateEntrySchema),
        latePaymentCount: z.number().int(),
        violations: z.array(z.string()),
        references: z.array(z.string())
    })),
    inquiries: z.array(inquirySchema),
    inquiryPatterns: z.object({
        total: z.number().int(),
        suspicious: z.array(inquirySchema),
        findings: z.array(z.string()),
        riskScore: z.number()
    }),
    personalInfo: z.object({ reported: identifiersSchema, toDelete: identifiersSchema }),
    damages: z.object({
        fcraMin: z.number(),
        fcraMax: z.number(),
        fdcpa: z.number(),
        totalMin: z.number(),
        totalMax: z.number()
    }),
    letters: z.array(z.object({
        kind: z.enum(['personal-info', 'bureau', 'furnisher', 'inquiry']),
        recipient: z.string(),
        fileName: z.string(),
        markdown: z.string()
    })),
    warnings: z.array(z.string()),
    message: z.string()
}) satisfies z.ZodType<ReportAnalysis>;

export function analysisFileName(id: string): string {
    return `${id}_ANALYSIS.json`;
}

export function toAnalyzeInput(request: AnalyzeRequest, text: string): AnalyzeReportInput {
    return {
        text,
        fileName: request.fileName,
        consumer: { fullName: request.fullName, address: request.address, phone: request.phone, email: request.email },
        roundNumber: request.roundNumber
    };
}

export const ANALYSIS_CACHE_SIZE = 100;

/**
 * Runs analyses and keeps their artifacts: the most recent ones in memory
 * and all of them encrypted in the vault. A vault failure is logged and the
 * analysis is still returned.
 */
export class ReportService {
    private readonly cache = new Map<string, ReportAnalysis>();

    constructor(
        private readonly store: AnalysisStore,
        private readonly knowledgebase: KnowledgebaseClient,
        private readonly cacheSize: number = ANALYSIS_CACHE_SIZE
    ) {}

    async analyze(input: AnalyzeReportInput): Promise<ReportAnalysis> {
        const analysis = await analysisEngine.analyzeReport(input, { knowledgebase: this.knowledgebase });
        this.remember(analysis);

        try {
            await this.store.storeJson(analysisFileName(analysis.id), analysis);
        } catch (err: unknown) {
            console.error(`[Analysis] Could not persist ${analysis.id}: ${err instanceof Error ? err.message : String(err)}`);
        }
        return analysis;
    }

    async getAnalysis(id: string): Promise<ReportAnalysis | null> {
        const cached = this.cache.get(id);
        if (cached) return cached;

        let stored: unknown;
        try {
            stored = await this.store.retrieveJson(analysisFileName(id));
        } catch (err: unknown) {
            console.warn(`[Analysis] ${id} not found in vault: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }

        const parsed = reportAnalysisSchema.safeParse(stored);
        if (!parsed.success) {
            console.error(`[Analysis] Stored artifact ${id} is malformed`);
            return null;
        }
        this.remember(parsed.data);
        return parsed.data;
    }

    /** Least recently stored entries are evicted first; the vault still holds them. */
    private remember(analysis: ReportAnalysis): void {
        this.cache.delete(analysis.id);
        this.cache.set(analysis.id, analysis);
        while (this.cache.size > this.cacheSize) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }
}
