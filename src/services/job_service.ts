import { v4 as uuidv4 } from 'uuid';

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface Job<TPayload = unknown, TResult = unknown> {
    id: string;
    type: string;
    status: JobStatus;
    payload: TPayload;
    result?: TResult;
    error?: string;
    createdAt: string;
    updatedAt: string;
}

/** In-memory job registry; jobs run in-process and do not survive a restart. */
export class JobService {
    private jobs: Map<string, Job> = new Map();

    public createJob(type: string, payload: unknown): Job {
        const now = new Date().toISOString();
        const job: Job = {
            id: uuidv4(),
            type,
            status: 'PENDING',
            payload,
            createdAt: now,
            updatedAt: now
        };
        this.jobs.set(job.id, job);
        return job;
    }

    public async runJob(jobId: string, task: () => Promise<unknown>): Promise<void> {
        const job = this.jobs.get(jobId);
        if (!job) return;

        job.status = 'RUNNING';
        job.updatedAt = new Date().toISOString();

        try {
            job.result = await task();
            job.status = 'COMPLETED';
        } catch (err: unknown) {
            job.status = 'FAILED';
            job.error = err instanceof Error ? err.message : 'Unknown error';
            console.error(`[Jobs] ${job.type} ${job.id} failed: ${job.error}`);
        } finally {
            job.updatedAt = new Date().toISOString();
        }
    }

    public getJob(jobId: string): Job | undefined {
        return this.jobs.get(jobId);
    }

    public listJobs(): Job[] {
        return Array.from(this.jobs.values());
    }
}

export const jobService = new JobService();
