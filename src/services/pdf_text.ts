import pdfParse from 'pdf-parse';

export class PdfTextError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PdfTextError';
    }
}

/** Flattened text of every page, in page order. OCR is not attempted. */
export async function extractPdfText(buffer: Buffer): Promise<string> {
    let text: string;
    try {
        const parsed = await pdfParse(buffer);
        text = parsed.text;
    } catch (err: unknown) {
        throw new PdfTextError(`Could not read PDF: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!text.trim()) {
        throw new PdfTextError('PDF contains no extractable text (scanned reports need OCR first)');
    }
    console.log(`[Ingestion] Extracted ${text.length} characters of report text`);
    return text;
}
