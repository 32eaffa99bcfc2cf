import { Inquiry, InquiryPatterns } from '../types/report_types';
import { parseMonthYear } from '../utils/date_tokens';
import { CREDITOR_PATTERNS, captureFullLabel } from './creditor_recognizer';
import { INQUIRY_SECTION, isSectionHeading } from './report_sections';

const MAX_INQUIRY_LINES = 300;
const COLUMN_HEADER = /^(?:date|inquir|company|creditor|name|type|source|requested|permissible|contact)/i;
const SUSPICIOUS_FURNISHER = /collection|debt|credit\s+repair|credit\s+counseling|loan|mortgage|auto|student/i;
const CREDIT_GRANTOR = /bank|card|auto|financ|credit|loan|capital|lend|mortgage|acceptance|motor/i;

function formatInquiryDate(line: string): string | null {
    const { month, year } = parseMonthYear(line);
    if (month === null || year === null) return null;
    return `${year}-${String(month).padStart(2, '0')}`;
}

/**
 * Reads the inquiries section: one entry per furnisher line that carries a
 * date on the same or the following line.
 */
export function extractInquiries(text: string): Inquiry[] {
    const lines = text.split(/\r?\n/);
    const heading = lines.findIndex(line => INQUIRY_SECTION.test(line));
    if (heading === -1) return [];

    const inquiries: Inquiry[] = [];
    const end = Math.min(lines.length, heading + 1 + MAX_INQUIRY_LINES);

    for (let i = heading + 1; i < end; i++) {
        const line = lines[i].trim();
        if (!line) {
            if (inquiries.length > 0) break;
            continue;
        }
        if (isSectionHeading(line) && !INQUIRY_SECTION.test(line)) break;

        const furnisher = captureFullLabel(line);
        if (!/[A-Za-z]{2}/.test(furnisher) || COLUMN_HEADER.test(furnisher)) continue;

        let date = formatInquiryDate(line);
        let raw = line;
        if (date === null && i + 1 < end) {
            date = formatInquiryDate(lines[i + 1]);
            if (date !== null) {
                raw = `${line} ${lines[i + 1].trim()}`;
                i++;
            }
        }
        if (date === null) continue;

        inquiries.push({ furnisher: furnisher.toUpperCase(), date, raw });
    }

    console.log(`[Ingestion] ${inquiries.length} inquiry row(s) found`);
    return inquiries;
}

/** Inquiries from credit grantors; those are the ones worth an FCRA 604 dispute. */
export function disputableInquiries(inquiries: Inquiry[]): Inquiry[] {
    return inquiries.filter(inquiry =>
        CREDIT_GRANTOR.test(inquiry.furnisher) ||
        CREDITOR_PATTERNS.some(entry => entry.pattern.test(inquiry.furnisher))
    );
}

export const HIGH_INQUIRY_VOLUME = 5;

/**
 * Repeat pulls by one furnisher, pulls by debt-type furnishers and a high
 * number of dated inquiries, scored 10 / 5 / 15 points respectively.
 */
export function analyzeInquiryPatterns(inquiries: Inquiry[]): InquiryPatterns {
    const findings: string[] = [];
    let riskScore = 0;

    const counts = new Map<string, number>();
    for (const inquiry of inquiries) {
        counts.set(inquiry.furnisher, (counts.get(inquiry.furnisher) ?? 0) + 1);
    }
    for (const [furnisher, count] of counts) {
        if (count < 2) continue;
        findings.push(`Multiple inquiries from ${furnisher} (${count} times)`);
        riskScore += 10;
    }

    const suspicious = inquiries.filter(inquiry => SUSPICIOUS_FURNISHER.test(inquiry.furnisher));
    riskScore += suspicious.length * 5;

    const dated = inquiries.filter(inquiry => inquiry.date !== null).length;
    if (dated > HIGH_INQUIRY_VOLUME) {
        findings.push(`High volume of inquiries (${dated})`);
        riskScore += 15;
    }

    return { total: inquiries.length, suspicious, findings, riskScore };
}
