import { isAxiosError } from 'axios';

// --- HELPER: Utilities ---
export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// --- HELPER: API Call with Retry Logic ---
/**
 * Retry an API call while the remote answers 429, honouring Retry-After.
 * Any other error is rethrown immediately.
 *
 * @param apiCall - Call to (re)issue
 * @param label - Source tag used in log lines
 * @param maxRetries - Attempts before giving up
 */
export async function retryOnRateLimit<T>(apiCall: () => Promise<T>, label: string, maxRetries = 3): Promise<T> {
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            return await apiCall();
        } catch (error) {
            if (isAxiosError(error) && error.response?.status === 429 && attempt < maxRetries) {
                const retry_after = parseInt(String(error.response.headers['retry-after'] ?? '10'), 10);
                const wait_seconds = isNaN(retry_after) ? 10 : retry_after;
                console.warn(`(WARNING) [${label}] Rate limited! Waiting ${wait_seconds}s... (Attempt ${attempt}/${maxRetries})`);
                await sleep(wait_seconds * 1000);
            } else {
                throw error;
            }
        }
    }
    throw new Error(`[${label}] API call failed after retries`);
}

/**
 * Describe an axios/unknown error in one line for logs
 */
export function describeError(error: unknown): string {
    if (isAxiosError(error)) {
        return error.response ? `HTTP ${error.response.status}` : `${error.code ?? 'network error'}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
}
