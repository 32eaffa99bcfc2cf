import { v4 as uuidv4 } from 'uuid';
import { KnowledgebaseClient } from '../services/knowledgebase';
import { AccountRecord, ClassifiedAccount } from '../types/account_types';
import {
    AccountSummary,
    ConsumerDetails,
    DamagesEstimate,
    GeneratedLetter,
    Inquiry,
    PersonalInfoReview,
    ReportAnalysis
} from '../types/report_types';
import { detectBureau } from './bureau_detection';
import { mergeAccountsByKey } from './entity_resolution';
import { extractAccountDetailsWithDiagnostics } from './extraction_engine';
import { analyzeInquiryPatterns, disputableInquiries, extractInquiries } from './inquiry_engine';
import { LetterAccount, letterEngine, maskForLetter } from './letter_engine';
import { filterNegativeAccounts } from './negative_filter';
import { reviewPersonalInfo } from './personal_info_engine';
import { policyEngine } from './policy_engine';

export const FCRA_STATUTORY_MIN = 100;
export const FCRA_STATUTORY_MAX = 1000;
export const FDCPA_STATUTORY = 1000;

export interface AnalyzeReportInput {
    text: string;
    fileName: string;
    consumer: ConsumerDetails;
    /** 0 is the personal-information cleanup; account disputes start at 1. */
    roundNumber: number;
    date?: Date;
}

export interface AnalysisDependencies {
    knowledgebase: KnowledgebaseClient;
}

function isCollection(account: AccountRecord): boolean {
    return account.status === 'Collection' || account.negativeItems.includes('Collection');
}

export function estimateDamages(accounts: AccountRecord[]): DamagesEstimate {
    const fcraMin = accounts.length * FCRA_STATUTORY_MIN;
    const fcraMax = accounts.length * FCRA_STATUTORY_MAX;
    const fdcpa = accounts.some(isCollection) ? FDCPA_STATUTORY : 0;
    return {
        fcraMin,
        fcraMax,
        fdcpa,
        totalMin: fcraMin + fdcpa,
        totalMax: fcraMax + fdcpa
    };
}

function summarize(entry: LetterAccount): AccountSummary {
    const { account, policy, references } = entry;
    return {
        creditor: account.creditor,
        displayCreditor: account.displayCreditor,
        accountNumber: account.accountNumber === null ? null : maskForLetter(account.accountNumber),
        status: account.status,
        balance: account.balance,
        policy,
        lateEntries: account.lateEntries,
        latePaymentCount: account.latePaymentCount,
        violations: account.violations,
        references
    };
}

function fileSlug(value: string): string {
    return value.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'Letter';
}

function round0Letter(input: AnalyzeReportInput, bureau: ReportAnalysis['bureau'], personalInfo: PersonalInfoReview): GeneratedLetter {
    return {
        kind: 'personal-info',
        recipient: bureau,
        fileName: `${fileSlug(bureau)}_Round0_Personal_Info_Cleanup.md`,
        markdown: letterEngine.composeRound0Letter({
            consumer: input.consumer,
            bureau,
            toDelete: personalInfo.toDelete,
            date: input.date
        })
    };
}

function buildLetters(
    input: AnalyzeReportInput,
    bureau: ReportAnalysis['bureau'],
    accounts: LetterAccount[],
    inquiries: Inquiry[]
): GeneratedLetter[] {
    if (accounts.length === 0) return [];

    const letters: GeneratedLetter[] = [{
        kind: 'bureau',
        recipient: bureau,
        fileName: `${fileSlug(bureau)}_Round${input.roundNumber}_Dispute.md`,
        markdown: letterEngine.composeBureauLetter({
            consumer: input.consumer,
            bureau,
            roundNumber: input.roundNumber,
            accounts,
            date: input.date
        })
    }];

    const byFurnisher = new Map<string, LetterAccount[]>();
    for (const entry of accounts) {
        const group = byFurnisher.get(entry.account.creditor) ?? [];
        group.push(entry);
        byFurnisher.set(entry.account.creditor, group);
    }
    for (const [creditor, group] of byFurnisher) {
        const recipient = group[0].account.displayCreditor || creditor;
        letters.push({
            kind: 'furnisher',
            recipient,
            fileName: `${fileSlug(creditor)}_Round${input.roundNumber}_Furnisher_Dispute.md`,
            markdown: letterEngine.composeFurnisherLetter({
                consumer: input.consumer,
                furnisher: recipient,
                roundNumber: input.roundNumber,
                accounts: group,
                date: input.date
            })
        });
    }

    const disputable = disputableInquiries(inquiries);
    if (disputable.length > 0) {
        letters.push({
            kind: 'inquiry',
            recipient: bureau,
            fileName: `${fileSlug(bureau)}_Inquiry_Dispute.md`,
            markdown: letterEngine.composeInquiryLetter({
                consumer: input.consumer,
                bureau,
                inquiries: disputable,
                date: input.date
            })
        });
    }

    return letters;
}

export const analysisEngine = {
    /**
     * Full pipeline for one report: bureau, extraction, merge, filter,
     * classification, references and letters. Round 0 writes only the
     * personal-information letter.
     */
    async analyzeReport(input: AnalyzeReportInput, deps: AnalysisDependencies): Promise<ReportAnalysis> {
        const bureau = detectBureau(input.fileName, input.text);
        const { accounts, warnings } = extractAccountDetailsWithDiagnostics(input.text);
        const merged = mergeAccountsByKey(accounts);
        const negatives = filterNegativeAccounts(merged);
        const classified: ClassifiedAccount[] = policyEngine.classifyAll(negatives);

        const letterAccounts: LetterAccount[] = [];
        for (const entry of classified) {
            const references = await deps.knowledgebase.findReferences(entry, input.roundNumber);
            letterAccounts.push({ ...entry, references });
        }

        const inquiries = extractInquiries(input.text);
        const personalInfo = reviewPersonalInfo(input.text, input.consumer);
        const letters = input.roundNumber === 0
            ? [round0Letter(input, bureau, personalInfo)]
            : buildLetters(input, bureau, letterAccounts, inquiries);

        const message = merged.length === 0
            ? 'No accounts found in report'
            : negatives.length === 0
                ? 'No negative accounts found'
                : `${negatives.length} negative account(s) found`;

        console.log(`[Analysis] ${input.fileName} (${bureau}): ${merged.length} account(s), ${negatives.length} negative`);

        return {
            id: uuidv4(),
            fileName: input.fileName,
            bureau,
            roundNumber: input.roundNumber,
            generatedAt: (input.date ?? new Date()).toISOString(),
            accountsTotal: merged.length,
            negativeAccounts: letterAccounts.map(summarize),
            inquiries,
            inquiryPatterns: analyzeInquiryPatterns(inquiries),
            personalInfo,
            damages: estimateDamages(negatives),
            letters,
            warnings: warnings.map(w => `${w.stage} at line ${w.lineIndex ?? '?'}: ${w.message}`),
            message
        };
    }
};
