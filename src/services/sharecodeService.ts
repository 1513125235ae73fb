import {
    SHARECODE_ALPHABET,
    SHARECODE_BYTES,
    SHARECODE_LENGTH,
    SHARECODE_PREFIX,
    type ShareCodeByteOrder
} from '../utils/constant';
import type { DecodedShareCode } from '../models/sharecode/ShareCodeModels';

/**
 * Match sharecode codec
 *
 * A sharecode is 25 base-57 digits carrying an 18-byte payload:
 * matchId (8 bytes), outcomeId (8 bytes), tokenId (2 bytes).
 *
 * Two byte orders are supported:
 * - 'reversed' (default): first character is the least significant digit and
 *   every field is stored little-endian. Matches sharecodes issued by the game client.
 * - 'big-endian': first character is the most significant digit and every field
 *   is stored big-endian.
 * Encode and decode must be called with the same byte order.
 */

const BASE = BigInt(SHARECODE_ALPHABET.length);
const PAYLOAD_LIMIT = 1n << BigInt(SHARECODE_BYTES * 8);
const UINT64_MAX = (1n << 64n) - 1n;
const UINT16_MAX = 0xffff;

const DIGIT_VALUES = new Map<string, bigint>(
    [...SHARECODE_ALPHABET].map((symbol, index) => [symbol, BigInt(index)])
);

/**
 * Strip the optional prefix and all hyphens, then check length and alphabet.
 *
 * @returns The 25 raw digits, or null when the input is not a well-formed sharecode
 */
function normalizeShareCode(sharecode: string | null | undefined): string | null {
    if (typeof sharecode !== 'string') return null;

    let raw = sharecode.startsWith(SHARECODE_PREFIX) ? sharecode.slice(SHARECODE_PREFIX.length) : sharecode;
    raw = raw.replace(/-/g, '');

    if (raw.length !== SHARECODE_LENGTH) return null;
    for (const symbol of raw) {
        if (!DIGIT_VALUES.has(symbol)) return null;
    }
    return raw;
}

/**
 * Format-only check: prefix/hyphens optional, 25 digits from the alphabet.
 * A valid sharecode is not guaranteed to refer to a real match.
 */
export function validateShareCode(sharecode: string | null | undefined): boolean {
    return normalizeShareCode(sharecode) !== null;
}

/**
 * Group 25 raw digits as CSGO-XXXXX-XXXXX-XXXXX-XXXXX-XXXXX
 */
export function formatShareCode(raw: string): string {
    const groups: string[] = [];
    for (let i = 0; i < raw.length; i += 5) {
        groups.push(raw.slice(i, i + 5));
    }
    return SHARECODE_PREFIX + groups.join('-');
}

function readUnsigned(bytes: number[], little_endian: boolean): bigint {
    const ordered = little_endian ? [...bytes].reverse() : bytes;
    return ordered.reduce((value, byte) => (value << 8n) | BigInt(byte), 0n);
}

function writeUnsigned(value: bigint, size: number, little_endian: boolean): number[] {
    const bytes: number[] = new Array(size).fill(0);
    let remaining = value;
    for (let i = size - 1; i >= 0; i--) {
        bytes[i] = Number(remaining & 0xffn);
        remaining >>= 8n;
    }
    return little_endian ? bytes.reverse() : bytes;
}

/**
 * Decode a sharecode into its match, outcome and token ids.
 * Never throws: malformed input, absent input and digit strings whose value
 * exceeds 18 bytes all return null.
 *
 * @param sharecode - Sharecode with or without the CSGO- prefix and hyphens
 * @param byte_order - Payload layout, 'reversed' unless configured otherwise
 */
export function decodeShareCode(
    sharecode: string | null | undefined,
    byte_order: ShareCodeByteOrder = 'reversed'
): DecodedShareCode | null {
    const raw = normalizeShareCode(sharecode);
    if (raw === null) return null;

    const digits = [...raw];
    if (byte_order === 'reversed') digits.reverse();

    let payload = 0n;
    for (const symbol of digits) {
        const digit = DIGIT_VALUES.get(symbol);
        if (digit === undefined) return null;
        payload = payload * BASE + digit;
    }

    // 57^25 > 2^144, so some well-formed strings carry no valid payload
    if (payload >= PAYLOAD_LIMIT) return null;

    const bytes = writeUnsigned(payload, SHARECODE_BYTES, false);
    const little_endian = byte_order === 'reversed';

    return {
        matchId: readUnsigned(bytes.slice(0, 8), little_endian),
        outcomeId: readUnsigned(bytes.slice(8, 16), little_endian),
        tokenId: Number(readUnsigned(bytes.slice(16, 18), little_endian))
    };
}

/**
 * Encode match, outcome and token ids into a sharecode.
 *
 * @param match_id - uint64
 * @param outcome_id - uint64
 * @param token_id - uint16
 * @param byte_order - Payload layout, must match the one used for decoding
 * @throws RangeError when a value is outside its unsigned range
 */
export function encodeShareCode(
    match_id: bigint,
    outcome_id: bigint,
    token_id: number,
    byte_order: ShareCodeByteOrder = 'reversed'
): string {
    if (match_id < 0n || match_id > UINT64_MAX) {
        throw new RangeError(`matchId out of uint64 range: ${match_id}`);
    }
    if (outcome_id < 0n || outcome_id > UINT64_MAX) {
        throw new RangeError(`outcomeId out of uint64 range: ${outcome_id}`);
    }
    if (!Number.isInteger(token_id) || token_id < 0 || token_id > UINT16_MAX) {
        throw new RangeError(`tokenId out of uint16 range: ${token_id}`);
    }

    const little_endian = byte_order === 'reversed';
    const bytes = [
        ...writeUnsigned(match_id, 8, little_endian),
        ...writeUnsigned(outcome_id, 8, little_endian),
        ...writeUnsigned(BigInt(token_id), 2, little_endian)
    ];

    let payload = readUnsigned(bytes, false);
    const digits: string[] = [];
    for (let i = 0; i < SHARECODE_LENGTH; i++) {
        digits.push(SHARECODE_ALPHABET[Number(payload % BASE)]);
        payload /= BASE;
    }
    // digits are least significant first here
    if (byte_order === 'big-endian') digits.reverse();

    return formatShareCode(digits.join(''));
}
