import type { MatchSource } from '../../utils/constant';

export type SourceSyncStatus = 'completed' | 'skipped' | 'error';
export type UserSyncStatus = 'completed' | 'skipped' | 'error';

/**
 * Outcome of one provider sub-task
 */
export interface SourceSyncResult {
    source: MatchSource;
    status: SourceSyncStatus;
    matches_found: number;
    new_matches: number;
    message?: string;
}

/**
 * Sub-task result before aggregation
 */
export interface ProviderSyncResult extends SourceSyncResult {
    /** Newest sharecode up to which every listed match is stored; becomes the Steam watermark */
    latest_share_code?: string;
}

/**
 * Combined outcome of sync_user_matches
 */
export interface UserSyncResult {
    status: UserSyncStatus;
    user_id: number;
    total_matches_found: number;
    total_new_matches: number;
    sources: SourceSyncResult[];
    message?: string;
}

export type SyncJobState = 'queued' | 'running' | 'retrying' | 'completed' | 'failed';

/**
 * Status record exposed to pollers
 */
export interface SyncJobStatus {
    job_id: string;
    user_id: number;
    state: SyncJobState;
    attempts: number;
    queued_at: string;
    finished_at: string | null;
    result: UserSyncResult | null;
    error: string | null;
}
