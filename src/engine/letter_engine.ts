import { format } from 'date-fns';
import { AccountRecord, PolicyDecision } from '../types/account_types';
import { Bureau, ConsumerDetails, Inquiry, PersonalIdentifiers } from '../types/report_types';
import { formatMonthYear } from '../utils/date_tokens';
import { getViolationContext } from '../utils/forensicLogic';
import { extractLast4, normalizeAccountNumber, parseCurrency } from '../utils/normalization';
import { getBureauAddress } from './bureau_detection';

export interface LetterAccount {
    account: AccountRecord;
    policy: PolicyDecision;
    references: string[];
}

export interface BureauLetterInput {
    consumer: ConsumerDetails;
    bureau: Bureau;
    roundNumber: number;
    accounts: LetterAccount[];
    date?: Date;
}

export interface FurnisherLetterInput {
    consumer: ConsumerDetails;
    furnisher: string;
    roundNumber: number;
    accounts: LetterAccount[];
    date?: Date;
}

export interface Round0LetterInput {
    consumer: ConsumerDetails;
    bureau: Bureau;
    toDelete: PersonalIdentifiers;
    date?: Date;
}

export interface InquiryLetterInput {
    consumer: ConsumerDetails;
    bureau: Bureau;
    inquiries: Inquiry[];
    date?: Date;
}

/**
 * Account number as it goes into a letter: a mask printed on the report is
 * kept verbatim, a full number is cut down to its last four digits.
 */
export function maskForLetter(accountNumber: string | null): string {
    if (!accountNumber) return 'Not reported';
    const normalized = normalizeAccountNumber(accountNumber);
    if (/[X*]/.test(normalized)) return normalized;
    const last4 = extractLast4(normalized);
    return last4 ? `XXXX-XXXX-XXXX-${last4}` : normalized;
}

export function describeLateEntries(account: AccountRecord): string | null {
    if (account.lateEntries.length > 0) {
        return account.lateEntries
            .map(entry => `${formatMonthYear(entry.month, entry.year)} (${entry.severity} days)`)
            .join(', ');
    }
    if (account.latePaymentCount > 0) return `${account.latePaymentCount} late payment(s) reported`;
    return null;
}

function headerBlock(consumer: ConsumerDetails, recipient: string[], date: Date): string[] {
    return [
        consumer.fullName,
        ...consumer.address.split(/\r?\n/).map(part => part.trim()).filter(Boolean),
        '',
        ...recipient,
        '',
        format(date, 'MMMM d, yyyy'),
        ''
    ];
}

function openingFor(roundNumber: number): string {
    if (roundNumber <= 1) {
        return 'I am writing under Section 611 of the Fair Credit Reporting Act (15 U.S.C. § 1681i) to dispute the accuracy and completeness of the accounts listed below. Please conduct a reasonable reinvestigation of each item and send me the results within 30 days.';
    }
    if (roundNumber === 2) {
        return 'I previously disputed the accounts listed below and you reported them as verified. Under Section 611(a)(7) of the Fair Credit Reporting Act, I request a description of the procedure used to verify each item, including the name, address and telephone number of every furnisher contacted.';
    }
    return 'This is my final notice regarding the accounts listed below. They have been disputed more than once and remain inaccurate or unverified. If they are not corrected or deleted within 30 days I will file a complaint with the Consumer Financial Protection Bureau and pursue my remedies under Sections 616 and 617 of the Fair Credit Reporting Act.';
}

function accountSection(entry: LetterAccount, index: number): string[] {
    const { account, policy, references } = entry;
    const context = getViolationContext(account.status, parseCurrency(account.balance));
    const late = describeLateEntries(account);

    const lines = [
        `### ${index + 1}. ${account.displayCreditor}`,
        `- Account number: ${maskForLetter(account.accountNumber)}`,
        `- Reported status: ${account.statusRaw ?? account.status ?? 'Not reported'}`,
        `- Reported balance: ${account.balance ?? 'Not reported'}`
    ];

    if (late) lines.push(`- Late payments: ${late}`);

    if (account.violations.length > 0) {
        lines.push('- Reporting errors:');
        account.violations.forEach(violation => lines.push(`  - ${violation}`));
    }

    lines.push(`- Legal basis: ${context.law}, ${context.title}. ${context.education}`);

    if (references.length > 0) {
        lines.push('- Supporting references:');
        references.forEach(reference => lines.push(`  - ${reference}`));
    }

    lines.push(policy === 'delete'
        ? '- Requested action: delete this account from my file.'
        : late
            ? '- Requested action: remove the late payment notations and report this account as paid as agreed.'
            : '- Requested action: correct the inaccurate information on this account.');
    lines.push('');
    return lines;
}

function demandSections(accounts: LetterAccount[]): string[] {
    const deletions = accounts.filter(entry => entry.policy === 'delete');
    const corrections = accounts.filter(entry => entry.policy === 'correct');
    const lines: string[] = [];

    if (deletions.length > 0) {
        lines.push('## Demand for deletion', '');
        deletions.forEach((entry, index) => lines.push(...accountSection(entry, index)));
    }
    if (corrections.length > 0) {
        lines.push('## Demand for correction', '');
        corrections.forEach((entry, index) => lines.push(...accountSection(entry, index)));
    }
    return lines;
}

const IDENTIFIER_HEADINGS: Array<{ kind: keyof PersonalIdentifiers; heading: string }> = [
    { kind: 'names', heading: 'Names' },
    { kind: 'addresses', heading: 'Addresses' },
    { kind: 'employers', heading: 'Employers' },
    { kind: 'phones', heading: 'Phone numbers' },
    { kind: 'emails', heading: 'Email addresses' }
];

function correctIdentifiers(consumer: ConsumerDetails): string[] {
    const address = consumer.address.split(/\r?\n/).map(part => part.trim()).filter(Boolean).slice(0, 2);
    const lines = [`- Name: ${consumer.fullName}`];
    if (address.length > 0) lines.push(`- Address: ${address.join('; ')}`);
    if (consumer.phone) lines.push(`- Phone: ${consumer.phone}`);
    if (consumer.email) lines.push(`- Email: ${consumer.email}`);
    return lines;
}

function identifierSections(toDelete: PersonalIdentifiers): string[] {
    const lines: string[] = [];
    for (const { kind, heading } of IDENTIFIER_HEADINGS) {
        if (toDelete[kind].length === 0) continue;
        lines.push(`### ${heading}`, ...toDelete[kind].map(value => `- ${value}`), '');
    }
    if (lines.length === 0) {
        lines.push(
            'No mismatched identifiers appear on the copy of my report I reviewed. Please confirm the identifiers above and purge any earlier variants that are not listed there.',
            ''
        );
    }
    return lines;
}

function closing(consumer: ConsumerDetails): string[] {
    return ['Sincerely,', '', consumer.fullName, ''];
}

export const letterEngine = {
    composeBureauLetter(input: BureauLetterInput): string {
        const date = input.date ?? new Date();
        const recipient = getBureauAddress(input.bureau) ?? [input.bureau];

        return [
            ...headerBlock(input.consumer, recipient, date),
            `Re: Dispute of inaccurate information (round ${input.roundNumber})`,
            '',
            openingFor(input.roundNumber),
            '',
            ...demandSections(input.accounts),
            'Enclosed are copies of my identification and proof of address. Please send me an updated copy of my credit report once your reinvestigation is complete.',
            '',
            ...closing(input.consumer)
        ].join('\n');
    },

    composeFurnisherLetter(input: FurnisherLetterInput): string {
        const date = input.date ?? new Date();
        const hasCollection = input.accounts.some(entry =>
            entry.account.status === 'Collection' || entry.account.negativeItems.includes('Collection')
        );

        const lines = [
            ...headerBlock(input.consumer, [input.furnisher], date),
            `Re: Direct dispute under FCRA § 623(b) (round ${input.roundNumber})`,
            '',
            'I dispute the information you are furnishing to the consumer reporting agencies about the accounts below. Under Section 623 of the Fair Credit Reporting Act you must investigate this dispute, review all relevant information, and correct or delete anything you cannot verify.',
            ''
        ];

        if (hasCollection) {
            lines.push(
                'Under Section 809 of the Fair Debt Collection Practices Act, I also request validation of the debt: the name of the original creditor, the amount claimed with an itemization, and proof that you own or are authorized to collect it. Collection activity and credit reporting must stop until validation is provided.',
                ''
            );
        }

        lines.push(...demandSections(input.accounts), ...closing(input.consumer));
        return lines.join('\n');
    },

    /** Round 0: purge of names, addresses and contact details that are not the consumer's. */
    composeRound0Letter(input: Round0LetterInput): string {
        const date = input.date ?? new Date();
        const recipient = getBureauAddress(input.bureau) ?? [input.bureau];

        return [
            ...headerBlock(input.consumer, recipient, date),
            'Re: Round 0 personal information cleanup',
            '',
            'I request the deletion of every personal identifier in my file that does not match my current, correct information below. Section 607(b) of the Fair Credit Reporting Act (15 U.S.C. § 1681e(b)) requires reasonable procedures to assure maximum possible accuracy, and Section 611 (15 U.S.C. § 1681i) requires you to delete information that is inaccurate.',
            '',
            '## My correct identifiers',
            '',
            ...correctIdentifiers(input.consumer),
            '',
            '## Delete the following identifiers',
            '',
            ...identifierSections(input.toDelete),
            '## Requested actions',
            '',
            '1. Delete every identifier listed above.',
            '2. Confirm in writing the identifiers that remain in my file.',
            '3. Send me an updated copy of my file showing these corrections (15 U.S.C. § 1681g).',
            '4. Do not reinsert a deleted identifier without the certification and notice required by 15 U.S.C. § 1681i(a)(5)(B).',
            '',
            'Enclosed are a copy of my government-issued identification and proof of my current address.',
            '',
            ...closing(input.consumer)
        ].join('\n');
    },

    composeInquiryLetter(input: InquiryLetterInput): string {
        const date = input.date ?? new Date();
        const recipient = getBureauAddress(input.bureau) ?? [input.bureau];

        return [
            ...headerBlock(input.consumer, recipient, date),
            'Re: Unauthorized hard inquiries',
            '',
            'The inquiries listed below appear on my credit file, but I did not authorize them. Section 604 of the Fair Credit Reporting Act allows a report to be furnished only for a permissible purpose. Please provide proof of my written authorization for each inquiry or remove it.',
            '',
            ...input.inquiries.map((inquiry, index) => `${index + 1}. ${inquiry.furnisher} (${inquiry.date ?? 'date not reported'})`),
            '',
            ...closing(input.consumer)
        ].join('\n');
    }
};
