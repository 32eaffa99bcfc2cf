import { AccountStatus, LateEntry, PolicyDecision } from './account_types';

export type Bureau = 'Experian' | 'Equifax' | 'TransUnion' | 'Unknown Bureau';

export interface Inquiry {
    furnisher: string;
    /** YYYY-MM, or null when the row carried no readable date. */
    date: string | null;
    raw: string;
}

export interface ConsumerDetails {
    fullName: string;
    /** Street and "City, ST ZIP" lines, newline separated. */
    address: string;
    phone?: string;
    email?: string;
}

/** Personal identifiers as printed on the report, one list per kind. */
export interface PersonalIdentifiers {
    names: string[];
    addresses: string[];
    employers: string[];
    phones: string[];
    emails: string[];
}

export interface PersonalInfoReview {
    reported: PersonalIdentifiers;
    /** Report identifiers that do not match the consumer's own details. */
    toDelete: PersonalIdentifiers;
}

export interface InquiryPatterns {
    total: number;
    suspicious: Inquiry[];
    findings: string[];
    riskScore: number;
}

export interface DamagesEstimate {
    fcraMin: number;
    fcraMax: number;
    fdcpa: number;
    totalMin: number;
    totalMax: number;
}

export type LetterKind = 'personal-info' | 'bureau' | 'furnisher' | 'inquiry';

export interface GeneratedLetter {
    kind: LetterKind;
    /** Bureau name or furnisher label the letter is addressed to. */
    recipient: string;
    fileName: string;
    markdown: string;
}

export interface AccountSummary {
    creditor: string;
    displayCreditor: string;
    accountNumber: string | null;
    status: AccountStatus | null;
    balance: string | null;
    policy: PolicyDecision;
    lateEntries: LateEntry[];
    latePaymentCount: number;
    violations: string[];
    references: string[];
}

export interface ReportAnalysis {
    id: string;
    fileName: string;
    bureau: Bureau;
    roundNumber: number;
    generatedAt: string;
    accountsTotal: number;
    negativeAccounts: AccountSummary[];
    inquiries: Inquiry[];
    inquiryPatterns: InquiryPatterns;
    personalInfo: PersonalInfoReview;
    damages: DamagesEstimate;
    letters: GeneratedLetter[];
    /** Stage failures recorded while parsing; informational only. */
    warnings: string[];
    message: string;
}
