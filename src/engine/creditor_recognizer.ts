import { z } from 'zod';
import creditorPatternData from '../data/creditor_patterns.json';
import { LEGEND_LINE } from './report_sections';

export type AliasResolver = 'fixed' | 'label' | 'creditUnion' | 'slashLabel';

export interface CreditorPattern {
    pattern: RegExp;
    canonical: string;
    resolver: AliasResolver;
}

export interface CreditorMatch {
    /** Canonical, alias-normalized creditor name used by internal logic. */
    canonical: string;
    /** Literal on-report label, kept for letter fidelity. */
    label: string;
    /** True when the hit came from an "Account name:" style field. */
    explicit: boolean;
    /** Extra lines consumed after the header line (value rendered on the next line). */
    consumedLines: number;
}

const patternFileSchema = z.array(z.object({
    pattern: z.string().min(1),
    canonical: z.string().min(1),
    resolver: z.enum(['fixed', 'label', 'creditUnion', 'slashLabel'])
}));

/** Ordered, first match wins. */
export const CREDITOR_PATTERNS: CreditorPattern[] = patternFileSchema.parse(creditorPatternData).map(entry => ({
    pattern: new RegExp(`(?<![A-Za-z0-9])(?:${entry.pattern})(?![A-Za-z0-9])`, 'i'),
    canonical: entry.canonical,
    resolver: entry.resolver
}));

const FIELD_LABEL_PREFIXES = [
    'account\\s+(?:type|status|number|#|no\\.?|description|condition|owner|responsibility|detail)',
    'acct\\s*#',
    'status', 'current\\s+status', 'payment\\s+status', 'pay\\s+status',
    'balance', 'recent\\s+balance', 'current\\s+balance',
    'type', 'loan\\s+type', 'creditor\\s+type', 'kind\\s+of\\s+business',
    'original\\s+creditor', 'orig(?:inal)?\\s+cred(?:itor)?',
    'company\\s+sold\\s+to', 'sold\\s+to', 'purchased\\s+from',
    'high\\s+(?:balance|credit)', 'credit\\s+limit',
    'date', 'dofd', 'remarks?', 'comments?', 'terms', 'responsibility',
    'monthly\\s+payment', 'scheduled\\s+payment', 'past\\s+due', 'amount', 'last\\s+payment',
    'address', 'phone', 'contact',
    'placed\\s+for\\s+collection', 'charged\\s+off', 'account\\s+closed', 'paid\\s+collection',
    'inquir(?:y|ies)', 'legend', 'key'
].join('|');

/** Passes only lines that are not field-label lines ("Status: ...", "Account type: ..."). */
const HEADER_LINE_GUARD = new RegExp(`^(?!\\s*(?:${FIELD_LABEL_PREFIXES})\\b)`, 'i');

const EXPLICIT_CREDITOR_FIELD = /^\s*(?:account|creditor|company|furnisher|subscriber)\s+name\s*[:-]?\s*(.*)$/i;

const LABEL_TERMINATOR = new RegExp([
    '\\s{2,}',
    '\\t',
    ':',
    '\\s(?=\\$)',
    '\\s(?=[Xx*\\d]{4,})',
    '\\s(?=(?:Account|Acct|Balance|Status|Opened|Open|Closed|Date|Type|Charge[\\s-]?off|Charged|Collection|Paid|Current|Late|Reported|Individual|Joint)\\b)'
].join('|'));

const MAX_LABEL_LENGTH = 60;

/**
 * On-report label: the text up to the first metadata token (two or more spaces,
 * a colon, an amount, an account number or a title-case field keyword).
 */
export function captureFullLabel(text: string): string {
    const trimmed = text.trim();
    const cut = trimmed.search(LABEL_TERMINATOR);
    const label = cut === -1 ? trimmed : trimmed.slice(0, cut);
    return label.replace(/[\s,;/-]+$/, '').trim();
}

export function isUpperCaseDominant(label: string): boolean {
    const letters = label.match(/[A-Za-z]/g);
    if (!letters || letters.length < 2) return false;
    const upper = letters.filter(ch => ch >= 'A' && ch <= 'Z').length;
    return upper / letters.length >= 0.8;
}

export function isFieldLabelLine(line: string): boolean {
    return !HEADER_LINE_GUARD.test(line);
}

function normalizeLabel(label: string): string {
    return label.toUpperCase().replace(/\s*\/\s*/g, '/').replace(/\s+/g, ' ').trim();
}

function resolveCreditUnion(label: string): string {
    const collapsed = normalizeLabel(label)
        .replace(/FEDERAL\s+CREDIT\s+UNION/g, 'FCU')
        .replace(/EMPLOYEES\s+CREDIT\s+UNION/g, 'EMPCU')
        .replace(/CREDIT\s+UNION/g, 'CU');
    const suffix = collapsed.match(/^(.*?\b(?:FCU|EMPCU|CU))\b/);
    return suffix ? suffix[1] : collapsed;
}

export function resolveAlias(entry: CreditorPattern, label: string): string {
    switch (entry.resolver) {
        case 'fixed':
            return entry.canonical;
        case 'creditUnion':
            return resolveCreditUnion(label);
        case 'slashLabel':
        case 'label':
            return normalizeLabel(label);
    }
}

/**
 * Canonical name for a label that is already known to be a creditor
 * (explicit "Creditor name:" values, merged records).
 */
export function canonicalizeCreditor(label: string): string {
    for (const entry of CREDITOR_PATTERNS) {
        if (entry.pattern.test(label)) return resolveAlias(entry, label);
    }
    return normalizeLabel(label);
}

/**
 * Matches a line against the ordered creditor table. Field-label lines, legend
 * lines and prose that merely mentions a creditor never open an account.
 */
export function recognizeCreditor(line: string): CreditorMatch | null {
    const trimmed = line.trim();
    if (!trimmed || trimmed.length > 160) return null;
    if (isFieldLabelLine(trimmed) || LEGEND_LINE.test(trimmed)) return null;

    const label = captureFullLabel(trimmed);
    if (!label || label.length > MAX_LABEL_LENGTH || !isUpperCaseDominant(label)) return null;

    for (const entry of CREDITOR_PATTERNS) {
        const match = entry.pattern.exec(trimmed);
        if (!match) continue;

        // The hit has to sit inside the label, and only label text may precede it.
        if (match.index >= label.length) continue;
        const prefix = trimmed.slice(0, match.index);
        if (!/^[A-Z0-9&'.\/ -]*$/.test(prefix)) continue;

        return {
            canonical: resolveAlias(entry, label),
            label,
            explicit: false,
            consumedLines: 0
        };
    }

    return null;
}

/**
 * "Account name: DISCOVER CARD" / "Creditor name:" fields. When the value is
 * rendered on the following line it is taken from there.
 */
export function matchExplicitCreditorField(lines: string[], index: number): CreditorMatch | null {
    const field = lines[index].match(EXPLICIT_CREDITOR_FIELD);
    if (!field) return null;

    let label = captureFullLabel(field[1]);
    let consumedLines = 0;

    if (!label) {
        for (let offset = 1; offset <= 2 && index + offset < lines.length; offset++) {
            const next = lines[index + offset].trim();
            if (!next) continue;
            if (isFieldLabelLine(next)) break;
            label = captureFullLabel(next);
            consumedLines = offset;
            break;
        }
    }

    if (!label) return null;

    return {
        canonical: canonicalizeCreditor(label),
        label,
        explicit: true,
        consumedLines
    };
}

/** Explicit field capture first, then the pattern table. */
export function detectAccountHeader(lines: string[], index: number): CreditorMatch | null {
    return matchExplicitCreditorField(lines, index) ?? recognizeCreditor(lines[index]);
}
