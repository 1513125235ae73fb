import fs from 'fs';
import { type AxiosInstance, type CreateAxiosDefaults, isAxiosError } from 'axios';
import { createReplayApi } from '../utils/api';
import { describeError, retryOnRateLimit } from '../helper/helper';
import { demoLocalPath, demoUrl } from './demoLocatorService';
import type { DecodedShareCode } from '../models/sharecode/ShareCodeModels';
import { DEFAULT_REPLAY_SERVER } from '../utils/constant';

export interface DemoDownloadOptions {
    replayServer?: number;
    /** Download again even when the file already exists */
    force?: boolean;
}

function toBuffer(data: unknown): Buffer | null {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data, 'binary');
    return null;
}

/**
 * Downloads .dem.bz2 files from the replay servers into `download_dir`
 */
export class DemoDownloader {
    private readonly api: AxiosInstance;

    constructor(private readonly download_dir: string, http_overrides: CreateAxiosDefaults = {}) {
        this.api = createReplayApi(http_overrides);
    }

    localPath(match: DecodedShareCode): string {
        return demoLocalPath(this.download_dir, match.matchId, match.outcomeId);
    }

    /**
     * @returns Path of the demo file, or null when the replay server does not serve it
     * (expired demos answer 404)
     */
    async download(match: DecodedShareCode, options: DemoDownloadOptions = {}): Promise<string | null> {
        const local_path = this.localPath(match);
        if (!options.force && fs.existsSync(local_path)) {
            console.log(`(INFO) Demo already exists: ${local_path}`);
            return local_path;
        }

        const url = demoUrl(match.matchId, match.outcomeId, match.tokenId, options.replayServer ?? DEFAULT_REPLAY_SERVER);
        console.log(`(INFO) Downloading demo from ${url}`);

        let data: Buffer | null;
        try {
            const response = await retryOnRateLimit(() => this.api.get<unknown>(url), 'Replay');
            data = toBuffer(response.data);
        } catch (error) {
            if (isAxiosError(error)) {
                console.error(`(ERROR) Failed to download demo ${url}: ${describeError(error)}`);
                return null;
            }
            throw error;
        }

        if (!data) {
            throw new Error(`Unexpected demo payload from ${url}`);
        }

        await fs.promises.mkdir(this.download_dir, { recursive: true });
        await fs.promises.writeFile(local_path, data);
        console.log(`(OK) Demo saved to ${local_path} (${(data.length / 1024 / 1024).toFixed(2)} MB)`);
        return local_path;
    }
}
