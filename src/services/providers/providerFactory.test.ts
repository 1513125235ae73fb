import { createProvider, providerFactoryFor, type ProviderFactoryOptions } from './providerFactory';
import { MemoryDatabase, MemoryMatchStore } from '../../repository/memoryMatchStore';
import type { ProviderContext } from './matchDataProvider';

const config: ProviderFactoryOptions['config'] = {
    STEAM_API_KEY: undefined,
    STEAM_API_URL: 'https://api.steampowered.com',
    LEETIFY_API_URL: 'http://localhost:5001',
    LEETIFY_API_KEY: undefined,
    REPLAY_SERVER: 124,
    SHARECODE_BYTE_ORDER: 'reversed'
};

function context(): ProviderContext {
    return {
        user: {
            user_id: 1,
            steam_id: '76561198000000001',
            sync_enabled: true,
            last_sync: null,
            steam_auth_code: 'AAAA-BBBBB-CCCC',
            last_match_sharecode: 'CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK'
        },
        store: new MemoryMatchStore(new MemoryDatabase())
    };
}

describe('providerFactoryFor', () => {
    it('creates a fresh provider of the requested source on every call', () => {
        const factory = providerFactoryFor({ config });
        const shared_context = context();

        const first = factory('leetify', shared_context);
        const second = factory('leetify', shared_context);

        expect([first.source, factory('steam', shared_context).source]).toEqual(['leetify', 'steam']);
        expect(first).not.toBe(second);
    });
});

describe('createProvider', () => {
    it('leaves Steam unavailable without an API key', () => {
        expect(createProvider('steam', context(), { config }).unavailableReason()).toBe('Steam API key not configured');
    });

    it('makes Steam available with a key and the user credentials', () => {
        const provider = createProvider('steam', context(), { config: { ...config, STEAM_API_KEY: 'test-secret' } });
        expect(provider.unavailableReason()).toBeUndefined();
    });
});
