import { Request } from 'express';
import { AnalyzeReportInput } from '../engine/analysis_engine';
import { PdfTextError, extractPdfText } from '../services/pdf_text';
import { analyzeRequestSchema, toAnalyzeInput } from '../services/report_service';

export type ReportInputResult =
    | { ok: true; input: AnalyzeReportInput }
    | { ok: false; status: number; body: { error: string; issues?: unknown } };

/**
 * Turns an analyze request (multipart PDF upload or JSON text) into engine
 * input. PDF text extraction failures map to 422.
 */
export async function readReportInput(req: Request): Promise<ReportInputResult> {
    const parsed = analyzeRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        return { ok: false, status: 400, body: { error: 'Invalid request', issues: parsed.error.issues } };
    }
    const request = parsed.data;

    if (req.file) {
        console.log(`[Ingestion] Received PDF: ${req.file.originalname} (${req.file.size} bytes)`);
        try {
            const text = await extractPdfText(req.file.buffer);
            return { ok: true, input: toAnalyzeInput({ ...request, fileName: req.file.originalname }, text) };
        } catch (err: unknown) {
            if (err instanceof PdfTextError) {
                return { ok: false, status: 422, body: { error: err.message } };
            }
            throw err;
        }
    }

    if (request.text === undefined) {
        return { ok: false, status: 400, body: { error: "Provide a PDF in the 'file' field or report text in 'text'." } };
    }
    return { ok: true, input: toAnalyzeInput(request, request.text) };
}
