/**
 * A peer known to the tracker.
 * Used by PeerManager.
 */
export interface IPeer {
  peerId: string;
  ip: string;
  port: number;
  lastHeartbeat: Date;
  registeredAt: Date;
}

/**
 * The public view of a peer, as sent in a GET_PEERS response.
 */
export interface IPeerSummary {
  peer_id: string;
  ip: string;
  port: number;
}

export interface ISuccessResponse {
  status: 'success';
  message?: string;
  peer_count?: number;
  peers?: IPeerSummary[];
}

export interface IErrorResponse {
  status: 'error';
  message: string;
}

/**
 * Exactly one of these is written back for every tracker connection.
 */
export type TrackerResponse = ISuccessResponse | IErrorResponse;

/**
 * Represents the overall statistics of the tracker.
 * Used by the /stats endpoint in server.ts.
 */
export interface ITrackerStats {
  totalPeers: number;
  commandsHandled: number;
  peersSwept: number;
}

export const toPeerSummary = (peer: IPeer): IPeerSummary => ({
  peer_id: peer.peerId,
  ip: peer.ip,
  port: peer.port,
});
