import express, { NextFunction, Request, Response } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { Env } from './config/env';
import { createAuthMiddleware } from './middleware/auth_middleware';
import { createJobsRouter } from './routes/jobs';
import { createReportsRouter } from './routes/reports';
import { JobService } from './services/job_service';
import { ReportService } from './services/report_service';

export interface AppDependencies {
    config: Env;
    reportService: ReportService;
    jobService: JobService;
}

function corsOrigins(config: Env): CorsOptions['origin'] {
    if (config.CORS_ORIGIN === '*') return true;
    const allowed = config.CORS_ORIGIN.split(',').map(origin => origin.trim()).filter(Boolean);

    return (origin, callback) => {
        // Non-browser clients send no origin.
        if (!origin) return callback(null, true);
        if (allowed.includes(origin)) {
            callback(null, true);
        } else {
            console.warn(`[CORS] Blocked origin: ${origin}`);
            callback(new Error('Not allowed by CORS'));
        }
    };
}

export function createApp({ config, reportService, jobService }: AppDependencies): express.Express {
    const app = express();
    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: 100,
        standardHeaders: 'draft-7',
        legacyHeaders: false
    });

    app.use(helmet());
    app.use(express.json({ limit: '10mb' }));
    app.use(morgan('dev'));
    app.use(cors({ origin: corsOrigins(config), credentials: true }));
    app.use(limiter);

    app.get('/health', (_req, res) => {
        res.json({
            status: 'ok',
            env: config.NODE_ENV,
            knowledgebase: Boolean(config.OPENAI_API_KEY && config.SUPABASE_URL),
            timestamp: new Date().toISOString()
        });
    });

    if (!config.JWT_SECRET) {
        console.warn('[AuthMiddleware] JWT_SECRET not set, report and job routes are open');
    }
    const auth = createAuthMiddleware(config.JWT_SECRET);

    app.use('/api/reports', createReportsRouter(reportService, auth));
    app.use('/api/jobs', createJobsRouter(jobService, reportService, auth));

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        console.error('[Server] Unhandled error:', err instanceof Error ? err.stack : err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}
