import { AccountRecord, AccountStatus } from '../types/account_types';
import { deduplicateAccounts } from './entity_resolution';
import { isSevereDerogatory } from './status_resolver';

const STRONG_POSITIVE: ReadonlySet<AccountStatus> = new Set<AccountStatus>(['Never late', 'Exceptional payment history']);
const MILD_POSITIVE: ReadonlySet<AccountStatus> = new Set<AccountStatus>(['Paid as agreed', 'Paid, Closed', 'Paid', 'Current', 'Open', 'Closed']);

const NEGATIVE_STATUS_TEXT = /late|past\s+due|delinquen|derogatory|charge|collection|repossess|foreclos|bankrupt|settled|default/i;

function hasLateHistory(account: AccountRecord): boolean {
    return account.lateEntries.length > 0 || account.latePaymentCount > 0;
}

/**
 * Dispute-worthy test for one merged account. Positive labels only survive
 * with late history behind them, or a collection/charge-off style item.
 */
export function isNegativeAccount(account: AccountRecord): boolean {
    const lateHistory = hasLateHistory(account);
    const severeItems = account.negativeItems.some(isSevereDerogatory);

    if (account.status && STRONG_POSITIVE.has(account.status)) {
        return account.lateEntries.length > 0 || severeItems;
    }
    if (account.status && MILD_POSITIVE.has(account.status)) {
        return lateHistory || severeItems;
    }
    if (lateHistory || severeItems) return true;

    return NEGATIVE_STATUS_TEXT.test(`${account.status ?? ''} ${account.statusRaw ?? ''}`);
}

export function filterNegativeAccounts(accounts: AccountRecord[]): AccountRecord[] {
    return deduplicateAccounts(accounts.filter(isNegativeAccount));
}
