import path from 'path';
import { decodeShareCode } from './sharecodeService';
import { CSGO_APP_ID, DEFAULT_REPLAY_SERVER, type ShareCodeByteOrder } from '../utils/constant';

/**
 * Demo file name on the replay servers: 21-digit matchId, 10-digit outcomeId
 */
export function demoFileName(match_id: bigint, outcome_id: bigint): string {
    return `${match_id.toString().padStart(21, '0')}_${outcome_id.toString().padStart(10, '0')}.dem.bz2`;
}

/**
 * Build the replay server download URL for a match.
 * tokenId is not part of the URL; it authorizes the download itself.
 *
 * @param match_id - Match id from the sharecode
 * @param outcome_id - Outcome (reservation) id from the sharecode
 * @param _token_id - Token id from the sharecode
 * @param replay_server - Replay server number (replay{N}.valve.net)
 * @returns http://replay{N}.valve.net/730/{file}.dem.bz2
 */
export function demoUrl(
    match_id: bigint,
    outcome_id: bigint,
    _token_id: number,
    replay_server: number = DEFAULT_REPLAY_SERVER
): string {
    return `http://replay${replay_server}.valve.net/${CSGO_APP_ID}/${demoFileName(match_id, outcome_id)}`;
}

/**
 * Decode a sharecode and build its demo URL.
 *
 * @returns Demo URL, or null when the sharecode is invalid
 */
export function demoUrlFromShareCode(
    sharecode: string | null | undefined,
    replay_server: number = DEFAULT_REPLAY_SERVER,
    byte_order: ShareCodeByteOrder = 'reversed'
): string | null {
    const decoded = decodeShareCode(sharecode, byte_order);
    if (!decoded) return null;
    return demoUrl(decoded.matchId, decoded.outcomeId, decoded.tokenId, replay_server);
}

/**
 * Local path a downloaded demo is stored under
 */
export function demoLocalPath(download_dir: string, match_id: bigint, outcome_id: bigint): string {
    return path.join(download_dir, demoFileName(match_id, outcome_id));
}
