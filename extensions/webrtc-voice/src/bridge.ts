/**
 * Voice Bridge
 *
 * Wires browser peers to voice-service calls:
 *
 *   offer ──▶ MediaNegotiator ──▶ answer
 *   peer connected ──▶ BridgeSession (registered) ──▶ create call ──▶ dial
 *   remote track ──▶ InboundStream ──▶ active session ──▶ voice service
 *   voice frames ──▶ EventRelay ──▶ packetizer / observer / events
 *   peer terminal ──▶ session closed, token cancelled, peer closed
 *
 * Events:
 *   sessionStarted  { sessionId, peerId }
 *   sessionEnded    { sessionId, reason }
 *   transcript      { sessionId, role, text, final, delta }
 *   voiceError      { sessionId, error }
 *   voiceState      { sessionId, state }
 */

import { EventEmitter } from "events";
import { BridgeSession } from "./bridge-session.js";
import type { CallOption } from "./call-request.js";
import { CancellationError } from "./cancellation-token.js";
import { findCodecByMimeType } from "./codecs.js";
import { errorMessage } from "./errors.js";
import { EventRelay } from "./event-relay.js";
import { InboundStream, type StatefulDecoderFactory } from "./inbound-transcoder.js";
import type { Logger } from "./logger.js";
import type { MediaNegotiator } from "./media-negotiation.js";
import type { MediaConnectionState, MediaPeer, RemoteAudioTrack } from "./media-peer.js";
import type { CallCreator } from "./providers/voice-api.js";
import type { SessionRegistry } from "./session-registry.js";
import type {
  AudioCodec,
  BridgeSessionInfo,
  CodecName,
  ControlEvent,
  EndReason,
  SessionDescription,
} from "./types.js";
import { VoiceConnection } from "./voice-connection.js";

/**
 * Bridge configuration.
 */
export interface VoiceBridgeOptions {
  negotiator: MediaNegotiator;
  registry: SessionRegistry;
  callCreator: CallCreator;
  /** Negotiated codec table (inbound decoding) */
  codecs: readonly AudioCodec[];
  /** PCM sample rate on both sides (Hz) */
  sampleRate: number;
  /** Synchronization source for outbound packets */
  ssrc: number;
  /** Options applied to every call request */
  callOptions?: readonly CallOption[];
  /** Voice connection dial timeout in ms */
  connectTimeoutMs?: number;
  /** Time an answered peer has to connect before it is closed (default: 30000) */
  peerConnectTimeoutMs?: number;
  /** Override for stateful decoder construction (tests) */
  createStatefulDecoder?: StatefulDecoderFactory;
  logger?: Logger;
}

export interface SessionStartedEvent {
  sessionId: string;
  peerId: string;
}

export interface SessionEndedEvent {
  sessionId: string;
  reason: EndReason;
}

/**
 * Bridge-side state of one negotiated peer.
 */
interface PeerEntry {
  peer: MediaPeer;
  session?: BridgeSession;
  streams: InboundStream[];
  inboundCodec?: CodecName;
  /** Pending until the peer connects */
  connectTimer?: ReturnType<typeof setTimeout>;
}

const DEFAULT_PEER_CONNECT_TIMEOUT_MS = 30000;

export class VoiceBridge extends EventEmitter {
  private readonly config: VoiceBridgeOptions;
  private readonly peers = new Map<string, PeerEntry>();
  private logger?: Logger;

  constructor(config: VoiceBridgeOptions) {
    super();
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Answer a browser offer. The session starts later, once the peer
   * reports "connected".
   *
   * @throws NegotiationError if the offer cannot be answered
   */
  async handleOffer(offer: SessionDescription): Promise<SessionDescription> {
    const { answer, peer } = await this.config.negotiator.accept(offer, {
      onConnected: (connectedPeer) => this.startSession(connectedPeer),
      onClosed: (closedPeer, state) => this.handlePeerClosed(closedPeer, state),
      onTrack: (trackPeer, track) => this.handleTrack(trackPeer, track),
    });
    this.entryFor(peer);
    this.logger?.info(`[VoiceBridge] Answered offer for peer ${peer.id}`);
    return answer;
  }

  /**
   * Snapshot of the registered session, if any.
   */
  getActiveSession(): BridgeSessionInfo | undefined {
    return this.config.registry.getActive()?.getInfo();
  }

  /** Number of peers not yet torn down */
  getPeerCount(): number {
    return this.peers.size;
  }

  /**
   * Tear down every session and peer.
   */
  async stop(): Promise<void> {
    const entries = [...this.peers.values()];
    this.peers.clear();
    await Promise.all(
      entries.map(async (entry) => {
        this.clearConnectTimer(entry);
        this.closeStreams(entry);
        if (entry.session) {
          this.endSession(entry.session, "shutdown");
        }
        await this.closePeer(entry.peer);
      }),
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Peer lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  private entryFor(peer: MediaPeer): PeerEntry {
    let entry = this.peers.get(peer.id);
    if (!entry) {
      entry = { peer, streams: [] };
      this.peers.set(peer.id, entry);
      this.armConnectTimer(entry);
    }
    return entry;
  }

  /**
   * A peer that never reports a state would otherwise stay in the table.
   */
  private armConnectTimer(entry: PeerEntry): void {
    const timeoutMs = this.config.peerConnectTimeoutMs ?? DEFAULT_PEER_CONNECT_TIMEOUT_MS;
    entry.connectTimer = setTimeout(() => {
      entry.connectTimer = undefined;
      if (this.peers.get(entry.peer.id) !== entry || entry.session) return;
      this.logger?.warn(
        `[VoiceBridge] Peer ${entry.peer.id} did not connect within ${timeoutMs}ms, closing`
      );
      this.peers.delete(entry.peer.id);
      this.closeStreams(entry);
      void this.closePeer(entry.peer);
    }, timeoutMs);
  }

  private clearConnectTimer(entry: PeerEntry): void {
    if (entry.connectTimer) {
      clearTimeout(entry.connectTimer);
      entry.connectTimer = undefined;
    }
  }

  private handleTrack(peer: MediaPeer, track: RemoteAudioTrack): void {
    const entry = this.entryFor(peer);

    const codec = track.mimeType ? findCodecByMimeType(this.config.codecs, track.mimeType) : undefined;
    if (codec) {
      entry.inboundCodec = codec.name;
      if (entry.session) {
        entry.session.inboundCodec = codec.name;
      }
    }

    const stream = new InboundStream({
      track,
      codecs: this.config.codecs,
      sampleRate: this.config.sampleRate,
      createStatefulDecoder: this.config.createStatefulDecoder,
      logger: this.logger,
      forward: (pcm) => {
        this.config.registry.getActive()?.forwardToVoice(pcm);
      },
    });
    entry.streams.push(stream);
  }

  private startSession(peer: MediaPeer): void {
    const entry = this.entryFor(peer);
    if (entry.session) {
      return;
    }
    this.clearConnectTimer(entry);

    const session = new BridgeSession({
      ssrc: this.config.ssrc,
      output: peer,
      logger: this.logger,
    });
    session.inboundCodec = entry.inboundCodec;
    entry.session = session;

    const replaced = this.config.registry.setActive(session);
    if (replaced) {
      this.logger?.info(
        `[VoiceBridge] Session ${session.sessionId} replaced ${replaced.sessionId} as active`
      );
    }

    this.logger?.info(`[VoiceBridge] Session ${session.sessionId} started for peer ${peer.id}`);
    const started: SessionStartedEvent = { sessionId: session.sessionId, peerId: peer.id };
    this.emit("sessionStarted", started);

    this.dial(session, peer).catch((err: unknown) => {
      this.logger?.error(`[VoiceBridge] Unexpected dial failure for ${session.sessionId}:`, err);
    });
  }

  /**
   * Create the call and open its voice connection.
   */
  private async dial(session: BridgeSession, peer: MediaPeer): Promise<void> {
    const token = session.lifetime;
    try {
      const call = await this.config.callCreator.createCall(this.config.callOptions, token.signal);
      token.throwIfCancelled();
      session.callId = call.callId;

      const relay = new EventRelay({
        session,
        registry: this.config.registry,
        onControlEvent: (event) => this.emitControlEvent(session.sessionId, event),
        logger: this.logger,
      });

      const connection = new VoiceConnection({
        joinUrl: call.joinUrl,
        token,
        connectTimeoutMs: this.config.connectTimeoutMs,
        logger: this.logger,
      });
      session.attachVoice(connection);
      await connection.connect(relay.events());
      session.markConnected();
      this.logger?.info(
        `[VoiceBridge] Session ${session.sessionId} joined call ${call.callId}`
      );
    } catch (err) {
      if (CancellationError.isCancellation(err) || token.isCancelled()) {
        this.logger?.debug(`[VoiceBridge] Dial cancelled for session ${session.sessionId}`);
        return;
      }
      this.logger?.error(
        `[VoiceBridge] Failed to start call for session ${session.sessionId}: ${errorMessage(err)}`
      );
      this.endSession(session, "call-failed");
      await this.closePeer(peer);
    }
  }

  private handlePeerClosed(peer: MediaPeer, state: MediaConnectionState): void {
    this.logger?.info(`[VoiceBridge] Peer ${peer.id} ended (${state})`);
    const entry = this.peers.get(peer.id);
    this.peers.delete(peer.id);

    if (entry) {
      this.clearConnectTimer(entry);
      this.closeStreams(entry);
      if (entry.session) {
        this.endSession(entry.session, "media-closed");
      }
    }

    void this.closePeer(peer);
  }

  private endSession(session: BridgeSession, reason: EndReason): void {
    if (session.state === "closed") return;
    session.close();
    this.config.registry.clearActive(session);
    this.logger?.info(`[VoiceBridge] Session ${session.sessionId} ended (${reason})`);
    const ended: SessionEndedEvent = { sessionId: session.sessionId, reason };
    this.emit("sessionEnded", ended);
  }

  private closeStreams(entry: PeerEntry): void {
    for (const stream of entry.streams.splice(0)) {
      stream.close();
    }
  }

  private async closePeer(peer: MediaPeer): Promise<void> {
    try {
      await peer.close();
    } catch (err) {
      this.logger?.warn(`[VoiceBridge] Failed to close peer ${peer.id}: ${errorMessage(err)}`);
    }
  }

  private emitControlEvent(sessionId: string, event: ControlEvent): void {
    switch (event.type) {
      case "transcript":
        this.emit("transcript", {
          sessionId,
          role: event.role,
          text: event.text,
          final: event.final,
          delta: event.delta,
        });
        break;
      case "error":
        this.emit("voiceError", { sessionId, error: event.error });
        break;
      case "state":
        this.emit("voiceState", { sessionId, state: event.state });
        break;
      case "unknown":
        break;
    }
  }
}
