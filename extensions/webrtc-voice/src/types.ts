/**
 * WebRTC Voice Bridge Types
 *
 * Type definitions shared between the media side (browser WebRTC peer),
 * the voice side (voice-AI WebSocket) and the signaling surface.
 */

/**
 * Codecs the bridge knows how to decode.
 */
export type CodecName = "PCMU" | "PCMA" | "opus";

/**
 * One entry of the negotiated codec table.
 */
export interface AudioCodec {
  name: CodecName;
  /** e.g. "audio/PCMU" */
  mimeType: string;
  /** RTP payload type this codec is negotiated under */
  payloadType: number;
  clockRate: number;
  channels: number;
}

/**
 * Bridge session lifecycle.
 */
export type BridgeSessionState = "negotiating" | "connected" | "closed";

/**
 * Voice connection (control channel) lifecycle. "closed" is terminal.
 */
export type VoiceConnectionState = "dialing" | "connected" | "closed";

/**
 * Why a bridge session ended.
 */
export type EndReason = "media-closed" | "call-failed" | "shutdown";

/**
 * Snapshot of a bridge session for status reporting and tests.
 */
export interface BridgeSessionInfo {
  sessionId: string;
  state: BridgeSessionState;
  /** Negotiated inbound codec, once the remote track has arrived */
  inboundCodec?: CodecName;
  outboundCodec: CodecName;
  /** Next sequence number to be assigned */
  sequenceNumber: number;
  /** Timestamp carried by the most recent packet */
  timestamp: number;
  ssrc: number;
  packetsSent: number;
  startedAt: number;
  /** Voice API call ID, once the call is created */
  callId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Signaling (browser ↔ bridge)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A session description as exchanged with the browser.
 */
export interface SessionDescription {
  type: "offer" | "answer";
  sdp: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Control events (voice service → bridge)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Speech transcript. `text` is cumulative, `delta` is the increment.
 */
export interface TranscriptEvent {
  type: "transcript";
  role: string;
  final: boolean;
  text: string;
  delta: string;
}

/**
 * Error reported by the voice service.
 */
export interface VoiceErrorEvent {
  type: "error";
  error: string;
}

/**
 * Voice service state change (e.g. "listening", "thinking", "speaking").
 */
export interface VoiceStateEvent {
  type: "state";
  state: string;
}

/**
 * Any other message kind. Still mirrored to the observer.
 */
export interface UnknownControlEvent {
  type: "unknown";
  messageType: string;
  raw: Record<string, unknown>;
}

export type ControlEvent =
  | TranscriptEvent
  | VoiceErrorEvent
  | VoiceStateEvent
  | UnknownControlEvent;

/**
 * A text frame that carried a readable `type`.
 */
export interface ControlEnvelope {
  /** The frame text, forwarded verbatim to the observer */
  raw: string;
  messageType: string;
  message: Record<string, unknown>;
}
