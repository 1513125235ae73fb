import { randomUUID } from 'crypto';
import { sleep, describeError } from '../helper/helper';
import { syncUserMatches, type SyncDependencies } from './matchSyncService';
import type { SyncJobStatus } from '../models/sync/SyncModels';
import { DEFAULT_SYNC_LIMIT } from '../utils/constant';

export interface SyncJobOptions {
    retryCount: number;
    retryDelayMs: number;
}

export interface SyncJobAck {
    job_id: string;
    user_id: number;
    status: 'queued';
}

/**
 * In-process job runner for user syncs.
 * Enqueueing answers immediately; results are read back through getJobStatus().
 * A sync that throws (e.g. on timeout) is re-run after a fixed delay, up to retryCount times.
 */
export class SyncJobService {
    private readonly jobs = new Map<string, SyncJobStatus>();
    private readonly running = new Set<Promise<void>>();

    constructor(
        private readonly deps: SyncDependencies,
        private readonly options: SyncJobOptions
    ) {}

    enqueueUserSync(user_id: number, limit: number = DEFAULT_SYNC_LIMIT): SyncJobAck {
        const job_id = randomUUID();
        this.jobs.set(job_id, {
            job_id,
            user_id,
            state: 'queued',
            attempts: 0,
            queued_at: new Date().toISOString(),
            finished_at: null,
            result: null,
            error: null
        });

        const run: Promise<void> = this.runJob(job_id, user_id, limit).finally(() => {
            this.running.delete(run);
        });
        this.running.add(run);

        console.log(`(INFO) Queued sync job ${job_id} for user ${user_id}`);
        return { job_id, user_id, status: 'queued' };
    }

    /**
     * Queue a sync for every user with sync enabled
     */
    async syncAllUsers(limit: number = DEFAULT_SYNC_LIMIT): Promise<SyncJobAck[]> {
        const store = this.deps.storeFactory();
        try {
            const users = await store.listSyncEnabledUsers();
            console.log(`(INFO) Queueing sync for ${users.length} users`);
            return users.map(user => this.enqueueUserSync(user.user_id, limit));
        } finally {
            await store.close();
        }
    }

    getJobStatus(job_id: string): SyncJobStatus | null {
        const job = this.jobs.get(job_id);
        return job ? { ...job } : null;
    }

    /**
     * Resolve once every queued job has finished
     */
    async waitForIdle(): Promise<void> {
        while (this.running.size > 0) {
            await Promise.all([...this.running]);
        }
    }

    private update(job_id: string, fields: Partial<SyncJobStatus>): void {
        const job = this.jobs.get(job_id);
        if (job) this.jobs.set(job_id, { ...job, ...fields });
    }

    private async runJob(job_id: string, user_id: number, limit: number): Promise<void> {
        const max_attempts = this.options.retryCount + 1;

        for (let attempt = 1; attempt <= max_attempts; attempt++) {
            this.update(job_id, { state: 'running', attempts: attempt });
            try {
                const result = await syncUserMatches(user_id, limit, this.deps);
                this.update(job_id, { state: 'completed', result, error: null, finished_at: new Date().toISOString() });
                return;
            } catch (error) {
                const message = describeError(error);
                if (attempt === max_attempts) {
                    console.error(`(ERROR) Sync job ${job_id} for user ${user_id} failed after ${attempt} attempts: ${message}`);
                    this.update(job_id, { state: 'failed', error: message, finished_at: new Date().toISOString() });
                    return;
                }
                console.warn(`(WARNING) Sync job ${job_id} failed (Attempt ${attempt}/${max_attempts}): ${message}. Retrying in ${this.options.retryDelayMs / 1000}s...`);
                this.update(job_id, { state: 'retrying', error: message });
                await sleep(this.options.retryDelayMs);
            }
        }
    }
}
