import {
    decodeShareCode,
    encodeShareCode,
    formatShareCode,
    validateShareCode
} from './sharecodeService';

const UINT64_MAX = (1n << 64n) - 1n;

describe('decodeShareCode', () => {
    it('decodes sharecodes issued by the game client', () => {
        expect(decodeShareCode('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK')).toEqual({
            matchId: 3230642215713767580n,
            outcomeId: 3230647599455273103n,
            tokenId: 55788
        });
        expect(decodeShareCode('CSGO-xzL33-b3hjN-fCXHn-9nRXX-RadFO')).toEqual({
            matchId: 3778909256498020816n,
            outcomeId: 3778913059691561833n,
            tokenId: 13367
        });
        expect(decodeShareCode('CSGO-SYyk8-GEdmP-zvmCT-3NRLz-8pVoN')).toEqual({
            matchId: 3772804503800119497n,
            outcomeId: 3772807033535856704n,
            tokenId: 25629
        });
    });

    it('accepts input without prefix and hyphens', () => {
        const zero = { matchId: 0n, outcomeId: 0n, tokenId: 0 };
        expect(decodeShareCode('CSGO-AAAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toEqual(zero);
        expect(decodeShareCode('AAAAAAAAAAAAAAAAAAAAAAAAA')).toEqual(zero);
        expect(decodeShareCode('GADqfjjyJ8cSP2rsmZRoTO2xK')).toEqual(decodeShareCode('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK'));
    });

    it('returns null for malformed input', () => {
        expect(decodeShareCode('')).toBeNull();
        expect(decodeShareCode(null)).toBeNull();
        expect(decodeShareCode(undefined)).toBeNull();
        expect(decodeShareCode('CSGO-AAAAA-AAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-AAAAA-AAAAA-AAAAA-AAAAA-AAAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-0AAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-1AAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-IAAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-lAAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toBeNull();
        expect(decodeShareCode('CSGO-gAAAA-AAAAA-AAAAA-AAAAA-AAAAA')).toBeNull();
    });

    it('rejects codes containing g, which is outside the alphabet', () => {
        expect(decodeShareCode('CSGO-U6MWi-5cZMJ-VsXtM-yrOwD-g8BJJ')).toBeNull();
        expect(decodeShareCode('CSGO-U6MWi-5cZMJ-VsXtM-yrOwD-g8BJJ', 'big-endian')).toBeNull();
    });

    it('returns null when the digits exceed the 18-byte payload', () => {
        expect(decodeShareCode('CSGO-99999-99999-99999-99999-99999')).toBeNull();
        expect(decodeShareCode('CSGO-xzL33-b3hjN-fCXHn-9nRXX-RadFO', 'big-endian')).toBeNull();
    });

    it('reads the big-endian layout when asked to', () => {
        expect(decodeShareCode('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK', 'big-endian')).toEqual({
            matchId: 6868002009436277773n,
            outcomeId: 10381462426826680713n,
            tokenId: 21257
        });
    });
});

describe('encodeShareCode', () => {
    it('reproduces game client sharecodes', () => {
        expect(encodeShareCode(3230642215713767580n, 3230647599455273103n, 55788))
            .toEqual('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK');
    });

    it('encodes the extremes', () => {
        expect(encodeShareCode(0n, 0n, 0)).toEqual('CSGO-AAAAA-AAAAA-AAAAA-AAAAA-AAAAA');
        expect(encodeShareCode(UINT64_MAX, UINT64_MAX, 0xffff)).toEqual('CSGO-Acc38-83iaN-HmMno-7LBiJ-GwtGR');
        expect(encodeShareCode(UINT64_MAX, UINT64_MAX, 0xffff, 'big-endian')).toEqual('CSGO-RGtwG-JiBL7-onMmH-Nai38-83ccA');
    });

    it('encodes small values per layout', () => {
        expect(encodeShareCode(1n, 2n, 3)).toEqual('CSGO-caMKV-r664Q-ubqq5-XOEhk-OijDA');
        expect(encodeShareCode(1n, 2n, 3, 'big-endian')).toEqual('CSGO-AAAAA-AAAAA-ATBvm-mZUom-vsJDD');
    });

    it('throws on out-of-range values', () => {
        expect(() => encodeShareCode(-1n, 0n, 0)).toThrow(RangeError);
        expect(() => encodeShareCode(0n, UINT64_MAX + 1n, 0)).toThrow(RangeError);
        expect(() => encodeShareCode(0n, 0n, 0x10000)).toThrow(RangeError);
        expect(() => encodeShareCode(0n, 0n, 1.5)).toThrow(RangeError);
    });

    it.each(['reversed', 'big-endian'] as const)('round-trips through decode (%s)', (byte_order) => {
        const cases: Array<[bigint, bigint, number]> = [
            [0n, 0n, 0],
            [UINT64_MAX, UINT64_MAX, 0xffff],
            [1n, 2n, 3],
            [3230642215713767580n, 3230647599455273103n, 55788],
            [UINT64_MAX, 0n, 1]
        ];
        for (const [match_id, outcome_id, token_id] of cases) {
            const sharecode = encodeShareCode(match_id, outcome_id, token_id, byte_order);
            expect(validateShareCode(sharecode)).toBe(true);
            expect(decodeShareCode(sharecode, byte_order)).toEqual({ matchId: match_id, outcomeId: outcome_id, tokenId: token_id });
        }
    });
});

describe('validateShareCode', () => {
    it('checks format only', () => {
        expect(validateShareCode('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK')).toBe(true);
        expect(validateShareCode('CSGO-99999-99999-99999-99999-99999')).toBe(true);
        expect(validateShareCode('CSGO-GADqf-jjyJ8-cSP2r-smZRo')).toBe(false);
        expect(validateShareCode('CSGO-OOOOI-AAAAA-AAAAA-AAAAA-AAAAA')).toBe(false);
        expect(validateShareCode('')).toBe(false);
        expect(validateShareCode(null)).toBe(false);
    });
});

describe('formatShareCode', () => {
    it('groups digits in blocks of five', () => {
        expect(formatShareCode('GADqfjjyJ8cSP2rsmZRoTO2xK')).toEqual('CSGO-GADqf-jjyJ8-cSP2r-smZRo-TO2xK');
    });
});
