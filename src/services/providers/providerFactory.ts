import type { CreateAxiosDefaults } from 'axios';
import type { AppConfig } from '../../utils/config';
import type { MatchSource } from '../../utils/constant';
import { SteamMatchHistoryClient } from '../steamMatchHistoryService';
import { LeetifyProvider } from './leetifyProvider';
import { SteamProvider } from './steamProvider';
import type { DemoAnalyzer, MatchDataProvider, ProviderContext, ProviderFactory } from './matchDataProvider';

export interface ProviderFactoryOptions {
    config: Pick<AppConfig,
        'STEAM_API_KEY' | 'STEAM_API_URL' | 'LEETIFY_API_URL' | 'LEETIFY_API_KEY' |
        'REPLAY_SERVER' | 'SHARECODE_BYTE_ORDER'>;
    http?: CreateAxiosDefaults;
    demoAnalyzer?: DemoAnalyzer;
}

/**
 * Create a fresh provider for one sub-task
 */
export function createProvider(source: MatchSource, context: ProviderContext, options: ProviderFactoryOptions): MatchDataProvider {
    const { config } = options;

    switch (source) {
        case 'leetify':
            return new LeetifyProvider({
                baseUrl: config.LEETIFY_API_URL,
                apiKey: config.LEETIFY_API_KEY,
                signal: context.signal,
                http: options.http
            });
        case 'steam':
            return new SteamProvider({
                apiKey: config.STEAM_API_KEY,
                authCode: context.user.steam_auth_code,
                startShareCode: context.user.last_match_sharecode,
                store: context.store,
                historyClient: config.STEAM_API_KEY
                    ? new SteamMatchHistoryClient(config.STEAM_API_KEY, config.STEAM_API_URL, options.http)
                    : null,
                replayServer: config.REPLAY_SERVER,
                byteOrder: config.SHARECODE_BYTE_ORDER,
                demoAnalyzer: options.demoAnalyzer,
                signal: context.signal
            });
    }
}

export function providerFactoryFor(options: ProviderFactoryOptions): ProviderFactory {
    return (source, context) => createProvider(source, context, options);
}
