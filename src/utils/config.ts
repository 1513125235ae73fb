import * as dotenv from 'dotenv'; // For loading environment variables. Docs: https://www.npmjs.com/package/dotenv
import { z } from 'zod';
import { ConfigError } from '../helper/errors';
import {
    MATCH_SOURCES,
    DEFAULT_LEETIFY_API_URL,
    DEFAULT_REPLAY_SERVER,
    STEAM_API_URL,
    SYNC_TIMEOUT_MS,
    SYNC_RETRY_COUNT,
    SYNC_RETRY_DELAY_MS
} from './constant';

dotenv.config();

const MatchSourceSchema = z.enum(['leetify', 'steam']);

const EnvSchema = z.object({
    SUPABASE_PROJECT_URL: z.string().url().optional(),
    SUPABASE_SERVICE_KEY: z.string().min(1).optional(),
    STEAM_API_KEY: z.string().optional(),
    STEAM_API_URL: z.string().url().default(STEAM_API_URL),
    LEETIFY_API_URL: z.string().url().default(DEFAULT_LEETIFY_API_URL),
    LEETIFY_API_KEY: z.string().optional(),
    MATCH_DATA_PROVIDERS: z.string()
        .default(MATCH_SOURCES.join(','))
        .transform(value => value.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0))
        .pipe(z.array(MatchSourceSchema).min(1)),
    SHARECODE_BYTE_ORDER: z.enum(['reversed', 'big-endian']).default('reversed'),
    REPLAY_SERVER: z.coerce.number().int().positive().default(DEFAULT_REPLAY_SERVER),
    SYNC_TIMEOUT_MS: z.coerce.number().int().positive().default(SYNC_TIMEOUT_MS),
    SYNC_RETRY_COUNT: z.coerce.number().int().min(0).default(SYNC_RETRY_COUNT),
    SYNC_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(SYNC_RETRY_DELAY_MS),
    DEMO_DOWNLOAD_DIR: z.string().default('./demos'),
    STORE_DRIVER: z.enum(['supabase', 'memory']).default('supabase')
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Parse and validate configuration from environment variables.
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 * Supabase credentials are checked when the first store session is opened.
 *
 * @param env - Source of variables (process.env by default)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }

    return parsed.data;
}
