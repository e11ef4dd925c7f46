/**
 * Bridge Session
 *
 * One pairing of a browser peer connection and a voice-service connection.
 * Owns its packetizer counters, its outbound RTP sink and the lifetime
 * token of its voice connection. Counters start at zero for every session.
 */

import { randomUUID } from "crypto";
import { CancellationToken } from "./cancellation-token.js";
import { OUTBOUND_CODEC } from "./codecs.js";
import { SendFailureError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { OutboundPacketizer, type OutboundPacket } from "./packetizer.js";
import type { BridgeSessionInfo, BridgeSessionState, CodecName } from "./types.js";
import type { VoiceConnection } from "./voice-connection.js";

/**
 * Where packetized audio goes (the session's own peer).
 */
export interface RtpSink {
  writeRtp(packet: Buffer): void;
}

export interface BridgeSessionParams {
  /** Session identifier (default: random UUID) */
  sessionId?: string;
  /** Synchronization source stamped on outbound packets */
  ssrc: number;
  /** Outbound RTP sink */
  output: RtpSink;
  logger?: Logger;
}

export class BridgeSession {
  public readonly sessionId: string;
  public readonly startedAt: number;
  public readonly lifetime = new CancellationToken();
  public inboundCodec?: CodecName;
  public callId?: string;
  private currentState: BridgeSessionState = "negotiating";
  private readonly packetizer: OutboundPacketizer;
  private readonly output: RtpSink;
  private voice: VoiceConnection | null = null;
  private logger?: Logger;

  constructor(params: BridgeSessionParams) {
    this.sessionId = params.sessionId ?? randomUUID();
    this.startedAt = Date.now();
    this.packetizer = new OutboundPacketizer({ ssrc: params.ssrc });
    this.output = params.output;
    this.logger = params.logger;
  }

  get state(): BridgeSessionState {
    return this.currentState;
  }

  /**
   * Bind the voice connection dialed for this session.
   */
  attachVoice(connection: VoiceConnection): void {
    this.voice = connection;
  }

  /**
   * Voice connection is open; audio may flow.
   */
  markConnected(): void {
    if (this.currentState === "negotiating") {
      this.currentState = "connected";
    }
  }

  /**
   * Forward decoded browser audio to the voice service. Best-effort:
   * dropped silently unless the session and its voice connection are up.
   */
  forwardToVoice(pcm: Buffer): boolean {
    if (this.currentState !== "connected" || !this.voice) {
      return false;
    }
    return this.voice.sendAudio(pcm);
  }

  /**
   * Packetize one PCM message from the voice service and write it to this
   * session's peer. Encode, serialize and write happen in one synchronous
   * step, so concurrent producers cannot interleave partial writes.
   *
   * @returns The packet written, or null if nothing was written
   */
  writeFromVoice(pcm: Buffer): OutboundPacket | null {
    if (this.currentState === "closed") {
      this.logger?.debug(
        `[BridgeSession] Dropping ${pcm.length} bytes for closed session ${this.sessionId}`
      );
      return null;
    }

    const packet = this.packetizer.packetize(pcm);
    try {
      this.output.writeRtp(packet.serialized);
    } catch (err) {
      const failure = new SendFailureError(`RTP write failed: ${errorMessage(err)}`, { cause: err });
      this.logger?.warn(`[BridgeSession] ${failure.message}`);
      return null;
    }
    return packet;
  }

  /**
   * End the session: cancel the voice connection's lifetime and stop
   * accepting audio. Idempotent.
   */
  close(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.lifetime.abort();
    this.voice?.close();
  }

  getInfo(): BridgeSessionInfo {
    return {
      sessionId: this.sessionId,
      state: this.currentState,
      inboundCodec: this.inboundCodec,
      outboundCodec: OUTBOUND_CODEC.name,
      sequenceNumber: this.packetizer.nextSequenceNumber,
      timestamp: this.packetizer.currentTimestamp,
      ssrc: this.packetizer.streamId,
      packetsSent: this.packetizer.count,
      startedAt: this.startedAt,
      callId: this.callId,
    };
  }
}
