#!/usr/bin/env node
import { setupFileLogging } from './helper/logFile';
import { loadConfig, type AppConfig } from './utils/config';
import { decodeShareCode, encodeShareCode } from './services/sharecodeService';
import { demoUrlFromShareCode } from './services/demoLocatorService';
import { DemoDownloader } from './services/demoDownloadService';
import { SyncJobService } from './services/syncJobService';
import { providerFactoryFor } from './services/providers/providerFactory';
import { createSupabaseStoreFactory } from './repository/supabaseMatchStore';
import { MemoryDatabase, createMemoryStoreFactory } from './repository/memoryMatchStore';
import type { MatchStoreFactory } from './repository/matchStore';
import { DEFAULT_SYNC_LIMIT } from './utils/constant';

// --- CLI ARGUMENTS PARSING ---
/**
 * CLI Usage: npm start <COMMAND> [ARGS...]
 *
 * Examples:
 *   npm start sync 42 10
 *   npm start sync-all 10
 *   npm start decode CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK
 *   npm start encode 3230642215713767580 3230647599455273103 55788
 *   npm start demo-url CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK 124
 *   npm start download-demo CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK
 */
function printUsage(): void {
    console.error('Usage: npm start <COMMAND> [ARGS...]');
    console.error('');
    console.error('Commands:');
    console.error('  sync <USER_ID> [LIMIT]                     Sync one user from every configured provider');
    console.error('  sync-all [LIMIT]                           Sync every user with sync enabled');
    console.error('  decode <SHARECODE>                         Print matchId, outcomeId and tokenId');
    console.error('  encode <MATCH_ID> <OUTCOME_ID> <TOKEN_ID>  Print the sharecode');
    console.error('  demo-url <SHARECODE> [REPLAY_SERVER]       Print the demo download URL');
    console.error('  download-demo <SHARECODE> [REPLAY_SERVER]  Download the demo into DEMO_DOWNLOAD_DIR');
}

function parsePositiveInt(value: string | undefined, name: string, fallback?: number): number {
    if (value === undefined && fallback !== undefined) return fallback;
    const parsed = parseInt(value ?? '', 10);
    if (isNaN(parsed) || parsed <= 0) {
        throw new Error(`(ERROR) ${name} must be a positive number. Got: "${value}"`);
    }
    return parsed;
}

function parseUnsigned(value: string | undefined, name: string): bigint {
    if (!value || !/^\d+$/.test(value)) {
        throw new Error(`(ERROR) ${name} must be an unsigned integer. Got: "${value}"`);
    }
    return BigInt(value);
}

function createStoreFactory(config: AppConfig): MatchStoreFactory {
    if (config.STORE_DRIVER === 'memory') {
        console.warn('(WARNING) Using in-memory store: nothing is persisted');
        return createMemoryStoreFactory(new MemoryDatabase());
    }
    return createSupabaseStoreFactory(config);
}

function createJobService(config: AppConfig): SyncJobService {
    return new SyncJobService({
        storeFactory: createStoreFactory(config),
        providerFactory: providerFactoryFor({ config }),
        sources: config.MATCH_DATA_PROVIDERS,
        timeoutMs: config.SYNC_TIMEOUT_MS
    }, {
        retryCount: config.SYNC_RETRY_COUNT,
        retryDelayMs: config.SYNC_RETRY_DELAY_MS
    });
}

async function runSync(config: AppConfig, user_id: number, limit: number): Promise<void> {
    const job_service = createJobService(config);
    const ack = job_service.enqueueUserSync(user_id, limit);
    await job_service.waitForIdle();
    console.log(JSON.stringify(job_service.getJobStatus(ack.job_id), null, 2));
}

async function runSyncAll(config: AppConfig, limit: number): Promise<void> {
    const job_service = createJobService(config);
    const acks = await job_service.syncAllUsers(limit);
    await job_service.waitForIdle();

    for (const ack of acks) {
        const status = job_service.getJobStatus(ack.job_id);
        console.log(`  - User ${ack.user_id}: ${status?.state} ${status?.result?.status ?? status?.error ?? ''}`);
    }
}

async function main(): Promise<void> {
    const [command, ...args] = process.argv.slice(2);
    const config = loadConfig();

    switch (command) {
        case 'sync':
            await runSync(config, parsePositiveInt(args[0], 'USER_ID'), parsePositiveInt(args[1], 'LIMIT', DEFAULT_SYNC_LIMIT));
            return;
        case 'sync-all':
            await runSyncAll(config, parsePositiveInt(args[0], 'LIMIT', DEFAULT_SYNC_LIMIT));
            return;
        case 'decode': {
            const decoded = decodeShareCode(args[0], config.SHARECODE_BYTE_ORDER);
            if (!decoded) throw new Error(`(ERROR) Invalid sharecode: "${args[0] ?? ''}"`);
            console.log(`matchId=${decoded.matchId} outcomeId=${decoded.outcomeId} tokenId=${decoded.tokenId}`);
            return;
        }
        case 'encode': {
            const token_id = Number(parseUnsigned(args[2], 'TOKEN_ID'));
            console.log(encodeShareCode(parseUnsigned(args[0], 'MATCH_ID'), parseUnsigned(args[1], 'OUTCOME_ID'), token_id, config.SHARECODE_BYTE_ORDER));
            return;
        }
        case 'demo-url': {
            const url = demoUrlFromShareCode(args[0], parsePositiveInt(args[1], 'REPLAY_SERVER', config.REPLAY_SERVER), config.SHARECODE_BYTE_ORDER);
            if (!url) throw new Error(`(ERROR) Invalid sharecode: "${args[0] ?? ''}"`);
            console.log(url);
            return;
        }
        case 'download-demo': {
            const decoded = decodeShareCode(args[0], config.SHARECODE_BYTE_ORDER);
            if (!decoded) throw new Error(`(ERROR) Invalid sharecode: "${args[0] ?? ''}"`);
            const saved = await new DemoDownloader(config.DEMO_DOWNLOAD_DIR).download(decoded, {
                replayServer: parsePositiveInt(args[1], 'REPLAY_SERVER', config.REPLAY_SERVER)
            });
            if (!saved) process.exitCode = 1;
            return;
        }
        default:
            printUsage();
            process.exitCode = 1;
    }
}

const closeLog = setupFileLogging();

void main()
    .catch((error: unknown) => {
        console.error(`(ERROR) ========================================`);
        console.error(error);
        console.error(`(ERROR) ========================================`);
        process.exitCode = 1;
    })
    .finally(() => closeLog());
