import { SyncJobService } from './syncJobService';
import { MemoryDatabase, MemoryMatchStore, createMemoryStoreFactory } from '../repository/memoryMatchStore';
import { fakeProviderFactory, matchDetails, player } from '../testing/fakeProvider';
import type { SyncDependencies } from './matchSyncService';
import type { UserDB } from '../models/database/UserDBModel';

const ME = '76561198000000001';

function user(user_id: number, sync_enabled = true): UserDB {
    return {
        user_id,
        steam_id: ME,
        sync_enabled,
        last_sync: null,
        steam_auth_code: null,
        last_match_sharecode: null
    };
}

beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

function createDeps(db: MemoryDatabase, overrides: Partial<SyncDependencies> = {}): SyncDependencies {
    return {
        storeFactory: createMemoryStoreFactory(db),
        providerFactory: fakeProviderFactory({
            leetify: { matches: [matchDetails('m1', [player(ME, 1)])] }
        }).factory,
        sources: ['leetify'],
        timeoutMs: 1000,
        ...overrides
    };
}

describe('SyncJobService', () => {
    it('acknowledges immediately and exposes the result for polling', async () => {
        const db = new MemoryDatabase();
        db.addUser(user(1));
        const jobs = new SyncJobService(createDeps(db), { retryCount: 0, retryDelayMs: 0 });

        const ack = jobs.enqueueUserSync(1, 5);
        expect(ack).toEqual({ job_id: ack.job_id, user_id: 1, status: 'queued' });

        await jobs.waitForIdle();
        const status = jobs.getJobStatus(ack.job_id);

        expect(status).toMatchObject({ job_id: ack.job_id, user_id: 1, state: 'completed', attempts: 1, error: null });
        expect(status?.result?.sources).toEqual([{ source: 'leetify', status: 'completed', matches_found: 1, new_matches: 1 }]);
        expect(status?.finished_at).not.toBeNull();
    });

    it('retries a sync that throws', async () => {
        const db = new MemoryDatabase();
        db.addUser(user(1));
        let calls = 0;
        const deps = createDeps(db, {
            storeFactory: () => {
                calls++;
                if (calls === 1) throw new Error('connection refused');
                return new MemoryMatchStore(db);
            }
        });
        const jobs = new SyncJobService(deps, { retryCount: 2, retryDelayMs: 0 });

        const ack = jobs.enqueueUserSync(1);
        await jobs.waitForIdle();

        expect(jobs.getJobStatus(ack.job_id)).toMatchObject({ state: 'completed', attempts: 2, error: null });
    });

    it('fails the job once retries are used up', async () => {
        const db = new MemoryDatabase();
        db.addUser(user(1));
        const deps = createDeps(db, {
            providerFactory: fakeProviderFactory({ leetify: { hangUntilAborted: true } }).factory,
            timeoutMs: 20
        });
        const jobs = new SyncJobService(deps, { retryCount: 1, retryDelayMs: 0 });

        const ack = jobs.enqueueUserSync(1);
        await jobs.waitForIdle();

        expect(jobs.getJobStatus(ack.job_id)).toMatchObject({
            state: 'failed',
            attempts: 2,
            result: null,
            error: 'Sync for user 1 timed out after 20ms'
        });
    });

    it('queues every sync-enabled user', async () => {
        const db = new MemoryDatabase();
        db.addUser(user(2));
        db.addUser(user(1));
        db.addUser(user(3, false));
        const jobs = new SyncJobService(createDeps(db), { retryCount: 0, retryDelayMs: 0 });

        const acks = await jobs.syncAllUsers(5);
        await jobs.waitForIdle();

        expect(acks.map(ack => ack.user_id)).toEqual([1, 2]);
        expect(acks.map(ack => jobs.getJobStatus(ack.job_id)?.state)).toEqual(['completed', 'completed']);
        expect(db.users.get(3)?.last_sync).toBeNull();
    });

    it('returns null for unknown jobs', () => {
        const jobs = new SyncJobService(createDeps(new MemoryDatabase()), { retryCount: 0, retryDelayMs: 0 });
        expect(jobs.getJobStatus('missing')).toBeNull();
    });
});
