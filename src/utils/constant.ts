export type MatchSource = 'leetify' | 'steam';
export type ShareCodeByteOrder = 'reversed' | 'big-endian';
export type StoreDriver = 'supabase' | 'memory';

export const MATCH_SOURCES: readonly MatchSource[] = ['leetify', 'steam'];

export const SHARECODE_PREFIX = 'CSGO-';
export const SHARECODE_ALPHABET = 'ABCDEFGHJKLMNOPQRSTUVWXYZabcdefhijkmnopqrstuvwxyz23456789';
export const SHARECODE_LENGTH = 25; // base-57 digits, without prefix and hyphens
export const SHARECODE_BYTES = 18; // matchId (8) + outcomeId (8) + tokenId (2)

export const DEFAULT_REPLAY_SERVER = 124;
export const CSGO_APP_ID = 730;

export const STEAM_API_URL = 'https://api.steampowered.com';
export const STEAM_API_KEY_PLACEHOLDER = 'your-steam-web-api-key';
export const STEAM_NO_MORE_MATCHES = 'n/a';

export const DEFAULT_LEETIFY_API_URL = 'http://localhost:5001';
export const LEETIFY_PAGE_SIZE = 20; // games per page requested from Leetify

export const DEFAULT_SYNC_LIMIT = 10;
export const SYNC_TIMEOUT_MS = 5 * 60 * 1000;
export const SYNC_RETRY_COUNT = 3;
export const SYNC_RETRY_DELAY_MS = 60 * 1000;
export const HTTP_TIMEOUT_MS = 30 * 1000;
export const DEMO_DOWNLOAD_TIMEOUT_MS = 5 * 60 * 1000;
