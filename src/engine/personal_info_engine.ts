import { ConsumerDetails, PersonalIdentifiers, PersonalInfoReview } from '../types/report_types';
import { isSectionHeading } from './report_sections';

type ListField = 'names' | 'addresses' | 'employers';

export const IDENTIFIER_KINDS: ReadonlyArray<keyof PersonalIdentifiers> = ['names', 'addresses', 'employers', 'phones', 'emails'];

const PERSONAL_SECTION = /^\s*personal\s+information\b|^\s*(?:employment|address)\s+history\b/i;
const MAX_SECTION_LINES = 150;

/** Ordered; "Name variations" has to be tried before the bare "Name" label. */
const LIST_LABELS: Array<{ field: ListField; pattern: RegExp }> = [
    {
        field: 'names',
        pattern: /^\s*(?:name\s+variations?|also\s+known\s+as|a\.?k\.?a\.?|(?:(?:consumer|full|other|former|previous)\s+)?names?(?:\s*\(s\))?)(?![a-z])/i
    },
    {
        field: 'addresses',
        pattern: /^\s*(?:(?:current|previous|former|other|mailing|reported)\s+)?address(?:es)?(?:\s*\(es\))?(?:\s+history)?(?![a-z])/i
    },
    {
        field: 'employers',
        pattern: /^\s*(?:(?:current|previous|former)\s+)?employ(?:ers?|ment)(?:\s*\(s\))?(?:\s+history)?(?![a-z])/i
    }
];

/** Labels whose values are not list entries; they close the current list. */
const OTHER_LABEL = /^\s*(?:(?:home|work|mobile|cell)\s+)?(?:phone|telephone|tel)(?![a-z])|^\s*e-?mail(?![a-z])|^\s*(?:date\s+of\s+birth|dob|year\s+of\s+birth|birth\s*date|ssn|social\s+security|report\s+(?:date|number)|file\s+number|spouse)\b/i;

const STREET_LINE = /^\d{1,6}\s+[A-Za-z]/;
const CITY_STATE_ZIP = /[A-Za-z][A-Za-z .'-]*,\s*[A-Z]{2}\s*\d{5}(?:-\d{4})?/;
const PHONE = /(?<![\d-])\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?![\d-])/g;
const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

function emptyIdentifiers(): PersonalIdentifiers {
    return { names: [], addresses: [], employers: [], phones: [], emails: [] };
}

function collapse(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

export function normalizeName(name: string): string {
    return collapse(name).toLowerCase();
}

export function normalizeAddress(address: string): string {
    return collapse(address.replace(/[.,;]/g, ' ')).toLowerCase();
}

/** Last ten digits, so a leading country code does not matter. */
export function normalizePhone(phone: string): string {
    return phone.replace(/\D/g, '').slice(-10);
}

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

function dedupe(values: string[]): string[] {
    const seen = new Set<string>();
    return values.filter(value => {
        const key = value.toLowerCase();
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/** Value after a label: "Also known as: JANE SMITH" → "JANE SMITH". */
function labelValue(line: string, label: string): string {
    return collapse(line.slice(label.length).replace(/^\s*[:-]?\s*/, ''));
}

/**
 * Collects list entries for one personal-information section. A street line
 * followed by its "City, ST ZIP" line is kept as one address.
 */
class IdentifierCollector {
    private field: ListField | null = null;
    private pendingStreet: string | null = null;

    constructor(private readonly found: PersonalIdentifiers) {}

    observe(line: string): void {
        for (const match of line.matchAll(PHONE)) this.found.phones.push(collapse(match[0]));
        for (const match of line.matchAll(EMAIL)) this.found.emails.push(match[0]);

        const text = collapse(line);
        if (!text) return;

        if (OTHER_LABEL.test(text)) {
            this.switchTo(null);
            return;
        }

        for (const label of LIST_LABELS) {
            const match = text.match(label.pattern);
            if (!match) continue;
            this.switchTo(label.field);
            const value = labelValue(text, match[0]);
            if (value) this.addValue(value);
            return;
        }

        if (PERSONAL_SECTION.test(text)) {
            this.switchTo(null);
            return;
        }

        this.addValue(text);
    }

    finish(): void {
        this.switchTo(null);
    }

    private switchTo(field: ListField | null): void {
        this.flushStreet();
        this.field = field;
    }

    private flushStreet(): void {
        if (this.pendingStreet !== null) this.found.addresses.push(this.pendingStreet);
        this.pendingStreet = null;
    }

    private addValue(value: string): void {
        switch (this.field) {
            case 'names':
                if (value.length >= 4 && value.length <= 60 && !/[\d@]/.test(value)) this.found.names.push(value);
                return;
            case 'employers':
                if (value.length >= 2 && value.length <= 60 && !/\d{3,}|@/.test(value)) this.found.employers.push(value);
                return;
            case 'addresses':
                this.addAddressLine(value);
                return;
            case null:
                return;
        }
    }

    private addAddressLine(value: string): void {
        const street = STREET_LINE.test(value);
        const city = CITY_STATE_ZIP.test(value);

        if (street && city) {
            this.flushStreet();
            this.found.addresses.push(value);
        } else if (street) {
            this.flushStreet();
            this.pendingStreet = value;
        } else if (city) {
            const pending = this.pendingStreet;
            this.pendingStreet = null;
            this.found.addresses.push(pending === null ? value : `${pending}, ${value}`);
        }
    }
}

/**
 * Names, addresses, employers, phone numbers and email addresses printed in
 * the report's personal-information sections (personal information, address
 * history, employment history). Lists keep report order without repeats.
 */
export function extractPersonalIdentifiers(text: string): PersonalIdentifiers {
    const found = emptyIdentifiers();
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        if (!PERSONAL_SECTION.test(lines[i])) continue;

        const collector = new IdentifierCollector(found);
        collector.observe(lines[i]);
        const end = Math.min(lines.length, i + 1 + MAX_SECTION_LINES);
        let j = i + 1;
        for (; j < end; j++) {
            const line = lines[j];
            if (isSectionHeading(line) && !PERSONAL_SECTION.test(line)) break;
            collector.observe(line);
        }
        collector.finish();
        i = j - 1;
    }

    return {
        names: dedupe(found.names),
        addresses: dedupe(found.addresses),
        employers: dedupe(found.employers),
        phones: dedupe(found.phones),
        emails: dedupe(found.emails)
    };
}

/** "123 Main St, Springfield, IL 62701" from the consumer's street and city lines. */
export function consumerAddressKey(address: string): string {
    const lines = address.split(/\r?\n|;/).map(collapse).filter(Boolean);
    const street = lines.find(line => STREET_LINE.test(line)) ?? '';
    const city = lines.find(line => CITY_STATE_ZIP.test(line)) ?? '';
    const parts = street === city ? [street] : [street, city];
    return normalizeAddress(parts.filter(Boolean).join(', '));
}

/**
 * Report identifiers that do not match what the consumer says is correct.
 * Every employer is listed. Addresses are only compared when the consumer
 * gave one; phones and emails are all listed when the consumer gave none.
 */
export function compareIdentifiers(consumer: ConsumerDetails, reported: PersonalIdentifiers): PersonalIdentifiers {
    const name = normalizeName(consumer.fullName);
    const address = consumerAddressKey(consumer.address);
    const phone = consumer.phone ? normalizePhone(consumer.phone) : '';
    const email = consumer.email ? normalizeEmail(consumer.email) : '';

    return {
        names: reported.names.filter(value => normalizeName(value) !== name),
        addresses: address ? reported.addresses.filter(value => normalizeAddress(value) !== address) : [],
        employers: [...reported.employers],
        phones: reported.phones.filter(value => !phone || normalizePhone(value) !== phone),
        emails: reported.emails.filter(value => !email || normalizeEmail(value) !== email)
    };
}

export function reviewPersonalInfo(text: string, consumer: ConsumerDetails): PersonalInfoReview {
    const reported = extractPersonalIdentifiers(text);
    const toDelete = compareIdentifiers(consumer, reported);
    const flagged = IDENTIFIER_KINDS.reduce((sum, kind) => sum + toDelete[kind].length, 0);
    console.log(`[PersonalInfo] ${flagged} identifier(s) do not match the consumer's details`);
    return { reported, toDelete };
}
