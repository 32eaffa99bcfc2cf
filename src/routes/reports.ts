import express, { RequestHandler } from 'express';
import multer from 'multer';
import { renderLetterPdf } from '../services/letter_pdf';
import { ReportService } from '../services/report_service';
import { readReportInput } from './report_input';

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 25 * 1024 * 1024 } });

export function createReportsRouter(reportService: ReportService, auth: RequestHandler): express.Router {
    const router = express.Router();

    router.post('/analyze', auth, upload.single('file'), async (req, res, next) => {
        try {
            const result = await readReportInput(req);
            if (!result.ok) {
                res.status(result.status).json(result.body);
                return;
            }
            res.json(await reportService.analyze(result.input));
        } catch (error: unknown) {
            next(error);
        }
    });

    router.get('/:id', auth, async (req, res, next) => {
        try {
            const analysis = await reportService.getAnalysis(req.params.id);
            if (!analysis) {
                res.status(404).json({ error: 'Report not found' });
                return;
            }
            res.json(analysis);
        } catch (error: unknown) {
            next(error);
        }
    });

    router.get('/:id/letters/:index/pdf', auth, async (req, res, next) => {
        try {
            const analysis = await reportService.getAnalysis(req.params.id);
            const index = Number.parseInt(req.params.index, 10);
            const letter = analysis && Number.isInteger(index) ? analysis.letters[index] : undefined;
            if (!letter) {
                res.status(404).json({ error: 'Letter not found' });
                return;
            }

            const pdf = await renderLetterPdf(letter.markdown);
            res.setHeader('Content-Type', 'application/pdf');
            res.setHeader('Content-Disposition', `attachment; filename="${letter.fileName.replace(/\.md$/, '.pdf')}"`);
            res.send(pdf);
        } catch (error: unknown) {
            next(error);
        }
    });

    return router;
}
