/** Headings after which creditor names are not tradelines (inquiries, personal data, public records). */
export const NON_ACCOUNT_SECTION = /^\s*(?:(?:regular|hard|soft|credit|promotional|account\s+review)\s+)?inquir(?:y|ies)\b|^\s*requests?\s+for\s+(?:your\s+)?credit|^\s*personal\s+information\b|^\s*public\s+records?\b|^\s*(?:employment|address)\s+history\b/i;

export const ACCOUNT_SECTION = /^\s*(?:(?:credit|adverse|negative|satisfactory|revolving|installment|mortgage|open|closed|other)\s+)?(?:accounts?|tradelines?|trade\s+lines?)(?:\s+(?:information|history|summary|in\s+good\s+standing))?\s*:?\s*$|^\s*(?:collections(?:\s+accounts?)?|collection\s+accounts?)\s*:?\s*$|^\s*potentially\s+negative\s+items\s*:?\s*$|^\s*accounts?\s+with\s+adverse\s+information\s*:?\s*$/i;

export const INQUIRY_SECTION = /^\s*(?:(?:regular|hard|credit)\s+)?inquir(?:y|ies)\b|^\s*requests?\s+for\s+(?:your\s+)?credit/i;

/** Legend and key text that lists every status and late code. */
export const LEGEND_LINE = /legend|key:|24[\s-]*month\s+history|narrative\s+code|how\s+to\s+read/i;

export function isSectionHeading(line: string): boolean {
    return ACCOUNT_SECTION.test(line) || NON_ACCOUNT_SECTION.test(line);
}
