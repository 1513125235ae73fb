import { SteamMatchHistoryClient, fetchMatchHistory, walkMatchHistory, type NextShareCodeSource } from './steamMatchHistoryService';
import { encodeShareCode } from './sharecodeService';
import { SteamApiError } from '../helper/errors';
import { stubAdapter, type StubRequest } from '../testing/axiosStub';

beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

const START = encodeShareCode(100n, 200n, 1);
const CHAIN = [1, 2, 3].map(i => encodeShareCode(BigInt(100 + i), BigInt(200 + i), i + 1));

/**
 * Remote that knows START -> CHAIN[0] -> CHAIN[1] -> CHAIN[2] -> nothing
 */
function chainSource(codes: string[] = CHAIN): NextShareCodeSource & { calls: string[] } {
    const order = [START, ...codes];
    const calls: string[] = [];
    return {
        calls,
        async getNextShareCode(_steam_id: string, _auth_code: string, known_code: string) {
            calls.push(known_code);
            const index = order.indexOf(known_code);
            return index >= 0 && index + 1 < order.length ? order[index + 1] : null;
        }
    };
}

const baseParams = {
    steamId: '76561198000000001',
    authCode: 'AAAA-BBBBB-CCCC',
    startShareCode: START
};

describe('walkMatchHistory', () => {
    it('returns every code of a finite chain and stops', async () => {
        const client = chainSource();
        const references = await fetchMatchHistory({ ...baseParams, maxMatches: CHAIN.length + 5, client });

        expect(references.map(ref => ref.shareCode)).toEqual(CHAIN);
        expect(client.calls).toEqual([START, ...CHAIN]);
    });

    it('stops after maxMatches entries', async () => {
        const client = chainSource();
        const references = await fetchMatchHistory({ ...baseParams, maxMatches: 2, client });

        expect(references).toHaveLength(2);
        expect(client.calls).toEqual([START, CHAIN[0]]);
    });

    it('fills in decoded ids and the demo URL', async () => {
        const [first] = await fetchMatchHistory({ ...baseParams, maxMatches: 1, client: chainSource(), replayServer: 130 });

        expect(first).toEqual({
            shareCode: CHAIN[0],
            matchId: 101n,
            outcomeId: 201n,
            tokenId: 2,
            demoUrl: 'http://replay130.valve.net/730/000000000000000000101_0000000201.dem.bz2'
        });
    });

    it('keeps what was collected when the remote fails', async () => {
        let calls = 0;
        const client: NextShareCodeSource = {
            async getNextShareCode() {
                calls++;
                if (calls > 1) throw new Error('socket hang up');
                return CHAIN[0];
            }
        };

        const references = await fetchMatchHistory({ ...baseParams, maxMatches: 10, client });

        expect(references.map(ref => ref.shareCode)).toEqual([CHAIN[0]]);
        expect(console.warn).toHaveBeenCalledWith(`(WARNING) [Steam] Failed to fetch next sharecode after ${CHAIN[0]}: socket hang up`);
    });

    it('stops at a code that does not decode', async () => {
        const references = await fetchMatchHistory({
            ...baseParams,
            maxMatches: 10,
            client: chainSource([CHAIN[0], 'CSGO-bad', CHAIN[2]])
        });

        expect(references.map(ref => ref.shareCode)).toEqual([CHAIN[0]]);
    });

    it('stops when the remote repeats a code', async () => {
        const client: NextShareCodeSource = { getNextShareCode: async () => CHAIN[0] };
        const references = await fetchMatchHistory({ ...baseParams, maxMatches: 10, client });

        expect(references).toHaveLength(1);
    });

    it('is lazy: nothing is requested until the consumer pulls', async () => {
        const client = chainSource();
        const walk = walkMatchHistory({ ...baseParams, maxMatches: 10, client });
        expect(client.calls).toEqual([]);

        const first = await walk.next();
        expect(first.done).toBe(false);
        expect(client.calls).toEqual([START]);
    });

    it('does not call the remote once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const client = chainSource();

        const references = await fetchMatchHistory({ ...baseParams, maxMatches: 10, client, signal: controller.signal });

        expect(references).toEqual([]);
        expect(client.calls).toEqual([]);
    });
});

describe('SteamMatchHistoryClient', () => {
    function clientReplying(status: number, data: unknown, requests: StubRequest[] = []) {
        return new SteamMatchHistoryClient('test-secret', 'https://steam.test', {
            adapter: stubAdapter(() => ({ status, data }), requests)
        });
    }

    it('sends the key, steam id, auth code and known code', async () => {
        const requests: StubRequest[] = [];
        const client = clientReplying(200, { result: { nextcode: CHAIN[0] } }, requests);

        await expect(client.getNextShareCode('76561198000000001', 'AAAA-BBBBB-CCCC', START)).resolves.toEqual(CHAIN[0]);
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toEqual('/ICSGOPlayers_730/GetNextMatchSharingCode/v1');
        expect(requests[0].params).toEqual({
            key: 'test-secret',
            steamid: '76561198000000001',
            steamidkey: 'AAAA-BBBBB-CCCC',
            knowncode: START
        });
    });

    it('maps n/a and a missing nextcode to null', async () => {
        await expect(clientReplying(202, { result: { nextcode: 'n/a' } }).getNextShareCode('1', 'a', START)).resolves.toBeNull();
        await expect(clientReplying(200, { result: {} }).getNextShareCode('1', 'a', START)).resolves.toBeNull();
        await expect(clientReplying(200, { result: { nextcode: null } }).getNextShareCode('1', 'a', START)).resolves.toBeNull();
    });

    it('treats non-200 responses as failures', async () => {
        await expect(clientReplying(403, { error: 'forbidden' }).getNextShareCode('1', 'a', START))
            .rejects.toEqual(new SteamApiError('Steam API returned HTTP 403', 403));
        await expect(clientReplying(202, { result: { nextcode: CHAIN[0] } }).getNextShareCode('1', 'a', START))
            .rejects.toBeInstanceOf(SteamApiError);
    });

    it('rejects calls after close()', async () => {
        const client = clientReplying(200, { result: { nextcode: CHAIN[0] } });
        client.close();

        expect(client.isClosed).toBe(true);
        await expect(client.getNextShareCode('1', 'a', START)).rejects.toBeInstanceOf(SteamApiError);
    });
});
