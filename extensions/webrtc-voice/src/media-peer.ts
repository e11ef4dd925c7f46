/**
 * Media Peer Abstraction
 *
 * Handler interface over the WebRTC engine. The bridge only needs
 * offer/answer, connection-state and remote-track notifications, and a way
 * to write RTP back to the browser. Tests drive state transitions through
 * a fake peer; production uses the werift adapter.
 */

import type { NegotiatedCodec } from "./codecs.js";
import type { AudioCodec, SessionDescription } from "./types.js";

/**
 * Peer connection states (W3C RTCPeerConnectionState).
 */
export type MediaConnectionState =
  | "new"
  | "connecting"
  | "connected"
  | "disconnected"
  | "failed"
  | "closed";

/**
 * Narrow an engine-reported state string.
 */
export function toMediaConnectionState(state: string): MediaConnectionState | undefined {
  switch (state) {
    case "new":
    case "connecting":
    case "connected":
    case "disconnected":
    case "failed":
    case "closed":
      return state;
    default:
      return undefined;
  }
}

/**
 * States that end the media side of a session.
 */
export function isTerminalMediaState(state: MediaConnectionState): boolean {
  return state === "disconnected" || state === "failed" || state === "closed";
}

/**
 * One received RTP packet, already parsed.
 */
export interface InboundRtpPacket {
  payloadType: number;
  sequenceNumber: number;
  timestamp: number;
  payload: Buffer;
}

/**
 * Remote audio track from the browser.
 */
export interface RemoteAudioTrack {
  readonly id: string;
  /** MIME type of the negotiated codec, when the engine reports it */
  readonly mimeType?: string;
  /** Codecs and payload types the remote negotiated for this track */
  negotiatedCodecs(): readonly NegotiatedCodec[];
  /**
   * Subscribe to packets in arrival order.
   *
   * @returns Function that ends the subscription
   */
  onPacket(handler: (packet: InboundRtpPacket) => void): () => void;
}

/**
 * Callbacks a peer delivers to its owner.
 */
export interface MediaPeerHandlers {
  onConnectionStateChange(state: MediaConnectionState): void;
  onTrack(track: RemoteAudioTrack): void;
}

/**
 * One browser peer connection.
 */
export interface MediaPeer {
  readonly id: string;
  /**
   * Apply the remote offer and produce a complete (non-trickle) answer.
   */
  accept(offer: SessionDescription): Promise<SessionDescription>;
  /** Write one serialized RTP packet to the outbound track */
  writeRtp(packet: Buffer): void;
  close(): Promise<void>;
}

export interface MediaPeerOptions {
  /** Codecs the peer accepts; PCMU is sent whatever the offer order */
  codecs: readonly AudioCodec[];
  /** STUN/TURN server URLs */
  iceServers: readonly string[];
  /** Max time to wait for ICE gathering in ms */
  iceGatheringTimeoutMs: number;
}

export type MediaPeerFactory = (
  options: MediaPeerOptions,
  handlers: MediaPeerHandlers,
) => MediaPeer;
