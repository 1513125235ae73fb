import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { DEMO_DOWNLOAD_TIMEOUT_MS, HTTP_TIMEOUT_MS } from './constant';

/**
 * HTTP client factories.
 * Every adapter creates its own instance and drops it on close(); nothing here is shared.
 * `overrides` lets callers plug in a custom axios adapter (tests) or extra defaults.
 */

export function createSteamApi(base_url: string, overrides: CreateAxiosDefaults = {}): AxiosInstance {
    return axios.create({
        baseURL: base_url,
        timeout: HTTP_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
        ...overrides
    });
}

export function createLeetifyApi(
    base_url: string,
    api_key: string | undefined,
    overrides: CreateAxiosDefaults = {}
): AxiosInstance {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (api_key) headers['X-Api-Key'] = api_key;

    return axios.create({
        baseURL: base_url,
        timeout: HTTP_TIMEOUT_MS,
        headers,
        ...overrides
    });
}

/**
 * Client for the replay servers; demo URLs are absolute, so there is no baseURL
 */
export function createReplayApi(overrides: CreateAxiosDefaults = {}): AxiosInstance {
    return axios.create({
        timeout: DEMO_DOWNLOAD_TIMEOUT_MS,
        responseType: 'arraybuffer',
        ...overrides
    });
}
