import express, { RequestHandler } from 'express';
import multer from 'multer';
import { JobService } from '../services/job_service';
import { ReportService } from '../services/report_service';
import { readReportInput } from './report_input';

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 25 * 1024 * 1024 } });

export function createJobsRouter(jobService: JobService, reportService: ReportService, auth: RequestHandler): express.Router {
    const router = express.Router();

    router.post('/analyze', auth, upload.single('file'), async (req, res, next) => {
        try {
            const result = await readReportInput(req);
            if (!result.ok) {
                res.status(result.status).json(result.body);
                return;
            }

            const { input } = result;
            const job = jobService.createJob('ANALYZE_REPORT', { fileName: input.fileName, roundNumber: input.roundNumber });
            jobService.runJob(job.id, () => reportService.analyze(input)).catch((err: unknown) => {
                console.error(`[Jobs] Runner crashed for ${job.id}:`, err);
            });
            res.status(202).json({ jobId: job.id, status: job.status });
        } catch (error: unknown) {
            next(error);
        }
    });

    router.get('/:id', auth, (req, res) => {
        const job = jobService.getJob(req.params.id);
        if (job) {
            res.json(job);
        } else {
            res.status(404).json({ error: 'Job not found' });
        }
    });

    router.get('/', auth, (req, res) => {
        res.json(jobService.listJobs());
    });

    return router;
}
