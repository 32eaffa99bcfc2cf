import { Bureau } from '../types/report_types';

const CONTENT_SCAN_CHARS = 5000;

const BUREAUS: Array<{ bureau: Exclude<Bureau, 'Unknown Bureau'>; fileName: RegExp; content: RegExp }> = [
    { bureau: 'Experian', fileName: /experian/i, content: /experian/gi },
    { bureau: 'Equifax', fileName: /equifax/i, content: /equifax/gi },
    { bureau: 'TransUnion', fileName: /trans[\s_-]?union/i, content: /trans\s?union/gi }
];

const ADDRESSES: Record<Exclude<Bureau, 'Unknown Bureau'>, string[]> = {
    Equifax: ['Equifax Information Services LLC', 'P.O. Box 740256', 'Atlanta, GA 30374'],
    Experian: ['Experian', 'P.O. Box 4500', 'Allen, TX 75013'],
    TransUnion: ['TransUnion Consumer Solutions', 'P.O. Box 2000', 'Chester, PA 19016']
};

/** File name first; otherwise the bureau named most often near the top of the report. */
export function detectBureau(fileName: string, text: string): Bureau {
    const byName = BUREAUS.find(entry => entry.fileName.test(fileName));
    if (byName) return byName.bureau;

    const head = text.slice(0, CONTENT_SCAN_CHARS);
    let best: Bureau = 'Unknown Bureau';
    let bestCount = 0;
    for (const entry of BUREAUS) {
        const count = (head.match(entry.content) || []).length;
        if (count > bestCount) {
            best = entry.bureau;
            bestCount = count;
        }
    }
    return best;
}

export function getBureauAddress(bureau: Bureau): string[] | null {
    return bureau === 'Unknown Bureau' ? null : ADDRESSES[bureau];
}
