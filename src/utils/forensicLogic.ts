import { AccountStatus } from '../types/account_types';

export interface ViolationContext {
    title: string;
    law: string;
    education: string;
}

/**
 * Legal basis quoted under each disputed account, chosen from the resolved status.
 */
export const getViolationContext = (status: AccountStatus | null, balance: number | null): ViolationContext => {
    if (status === 'Charge off' && balance !== null && balance > 0) {
        return {
            title: 'Balance reported on a charged-off account',
            law: 'FCRA § 623(a)(2)',
            education: 'A charged-off account that has been written off or sold cannot keep reporting a live balance owed to the original furnisher. The furnisher must report the balance accurately or delete the tradeline.'
        };
    }

    if (status === 'Charge off') {
        return {
            title: 'Unverified charge-off',
            law: 'FCRA § 623(a)(1)',
            education: 'The furnisher may not report information it knows or has reasonable cause to believe is inaccurate. The charge-off date, balance and delinquency history must all be verifiable.'
        };
    }

    if (status === 'Collection') {
        return {
            title: 'Debt ownership and validation',
            law: 'FDCPA § 809 / FCRA § 611',
            education: 'A collector must be able to show it owns the debt and that the amount is correct. If the chain of assignment from the original creditor cannot be documented, the entry cannot be verified and must be removed.'
        };
    }

    if (status === 'Late') {
        return {
            title: 'Payment history accuracy',
            law: 'FCRA § 623(a)(2)',
            education: 'Each late notation must match the furnisher\'s own records for that month. Late marks that cannot be tied to a specific billing cycle fail the accuracy requirement and must be corrected.'
        };
    }

    if (status === 'Repossession') {
        return {
            title: 'Deficiency balance after repossession',
            law: 'UCC Article 9 § 9-610 / § 9-614',
            education: 'A deficiency may only be reported if the collateral was sold in a commercially reasonable manner after proper notice. Without proof of notice and sale, the reported balance is unverified.'
        };
    }

    if (status === 'Foreclosure') {
        return {
            title: 'Foreclosure reporting',
            law: 'FCRA § 623(a)(1)',
            education: 'Foreclosure dates and any remaining deficiency must match the recorded sale. Conflicting dates or balances across bureaus make the entry unverifiable.'
        };
    }

    if (status === 'Bankruptcy') {
        return {
            title: 'Accounts included in bankruptcy',
            law: 'FCRA § 605(a)(1) / § 623(a)(2)',
            education: 'Accounts discharged or included in bankruptcy must report a zero balance and the correct discharge status. Any balance or collection activity after discharge is inaccurate.'
        };
    }

    if (status === 'Settled') {
        return {
            title: 'Settled account reporting',
            law: 'FCRA § 623(a)(2)',
            education: 'A settled account must report a zero balance and the settlement status. Continuing to report an unpaid balance or new delinquencies after settlement is inaccurate.'
        };
    }

    return {
        title: 'Maximum possible accuracy',
        law: 'FCRA § 607(b)',
        education: 'Consumer reporting agencies must follow reasonable procedures to assure maximum possible accuracy. Any inconsistency in dates, balances or status is a valid basis for reinvestigation, and items that cannot be verified within 30 days must be deleted.'
    };
};
