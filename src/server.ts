import { createApp } from './app';
import { env } from './config/env';
import { jobService } from './services/job_service';
import { createKnowledgebaseClient } from './services/knowledgebase';
import { ReportService } from './services/report_service';
import { createVaultService } from './services/vault';

if (env.NODE_ENV === 'production') {
    if (!env.JWT_SECRET) throw new Error('JWT_SECRET is required in production');
    if (env.CORS_ORIGIN === '*') console.warn('[Server] CORS_ORIGIN is "*" in production');
}

const reportService = new ReportService(createVaultService(env), createKnowledgebaseClient(env));
const app = createApp({ config: env, reportService, jobService });

app.listen(Number(env.PORT), () => {
    console.log(`Dispute backend running on port ${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
    console.log(`CORS Policy: ${env.CORS_ORIGIN}`);
});
