import { AccountRecord, ClassifiedAccount, PolicyDecision } from '../types/account_types';

/** Closed accounts with more late marks than this are disputed for deletion. */
export const LATE_DELETE_THRESHOLD = 4;

const COMENITY_FAMILY = /COMENITY|\bCCB\//i;
const SEVERE_TERMS = /collection|charge[\s-]?off|repossess|foreclos|bankrupt|default|settle/i;

export const policyEngine = {
    classify(account: AccountRecord): PolicyDecision {
        if (COMENITY_FAMILY.test(`${account.creditor} ${account.rawCreditor}`)) return 'delete';

        const statusText = [account.status ?? '', account.statusRaw ?? '', ...account.negativeItems].join(' ');
        if (SEVERE_TERMS.test(statusText)) return 'delete';

        const lateCount = account.lateEntries.length > 0 ? account.lateEntries.length : account.latePaymentCount;
        const state = `${account.status ?? ''} ${account.statusRaw ?? ''}`;

        if (/closed/i.test(state)) return lateCount > LATE_DELETE_THRESHOLD ? 'delete' : 'correct';
        if (/open|current/i.test(state)) return 'correct';

        // Open/closed state unknown.
        return 'correct';
    },

    classifyAll(accounts: AccountRecord[]): ClassifiedAccount[] {
        return accounts.map(account => ({ account, policy: policyEngine.classify(account) }));
    }
};

export const classifyAccountPolicy = (account: AccountRecord): PolicyDecision => policyEngine.classify(account);
