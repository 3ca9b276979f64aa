/**
 * A peer as listed by the tracker in a GET_PEERS response.
 */
export interface IPeerSummary {
    peer_id: string;
    ip: string;
    port: number;
}

/**
 * Any reply from the tracker. Which optional fields are present depends on
 * the command that was sent.
 */
export interface ITrackerReply {
    status: 'success' | 'error';
    message?: string;
    peer_count?: number;
    peers?: IPeerSummary[];
}

/**
 * An entry in the client's local peer cache.
 */
export interface IPeerInfo {
    peerId: string;
    ip: string;
    port: number;
}
