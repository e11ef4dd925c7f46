/**
 * In-process stand-ins for tests: a MediaPeer and RemoteAudioTrack whose
 * state changes and packets are driven by the test, and a recording logger.
 */

import type { NegotiatedCodec } from "../codecs.js";
import type { Logger } from "../logger.js";
import type {
  InboundRtpPacket,
  MediaConnectionState,
  MediaPeer,
  MediaPeerFactory,
  MediaPeerHandlers,
  MediaPeerOptions,
  RemoteAudioTrack,
} from "../media-peer.js";
import type { SessionDescription } from "../types.js";

export class FakeRemoteTrack implements RemoteAudioTrack {
  private handlers = new Set<(packet: InboundRtpPacket) => void>();

  constructor(
    public readonly id: string,
    public readonly mimeType?: string,
    private readonly negotiated: readonly NegotiatedCodec[] = [],
  ) {}

  negotiatedCodecs(): readonly NegotiatedCodec[] {
    return this.negotiated;
  }

  onPacket(handler: (packet: InboundRtpPacket) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }

  push(payloadType: number, payload: Buffer, sequenceNumber = 0): void {
    for (const handler of this.handlers) {
      handler({ payloadType, sequenceNumber, timestamp: sequenceNumber * 160, payload });
    }
  }
}

export class FakeMediaPeer implements MediaPeer {
  public written: Buffer[] = [];
  public offers: SessionDescription[] = [];
  public closed = false;
  public acceptError?: Error;
  public writeError?: Error;

  constructor(
    public readonly id: string,
    public readonly options: MediaPeerOptions,
    private readonly handlers: MediaPeerHandlers,
  ) {}

  async accept(offer: SessionDescription): Promise<SessionDescription> {
    this.offers.push(offer);
    if (this.acceptError) {
      throw this.acceptError;
    }
    return { type: "answer", sdp: `answer-for:${offer.sdp}` };
  }

  writeRtp(packet: Buffer): void {
    if (this.writeError) {
      throw this.writeError;
    }
    if (this.closed) {
      throw new Error("Peer closed");
    }
    this.written.push(Buffer.from(packet));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers.onConnectionStateChange("closed");
  }

  setState(state: MediaConnectionState): void {
    this.handlers.onConnectionStateChange(state);
  }

  addTrack(track: RemoteAudioTrack): void {
    this.handlers.onTrack(track);
  }
}

/**
 * Factory that records every peer it creates.
 */
export function createFakePeerFactory(
  setup?: (peer: FakeMediaPeer) => void,
): { factory: MediaPeerFactory; peers: FakeMediaPeer[] } {
  const peers: FakeMediaPeer[] = [];
  const factory: MediaPeerFactory = (options, handlers) => {
    const peer = new FakeMediaPeer(`peer-${peers.length + 1}`, options, handlers);
    setup?.(peer);
    peers.push(peer);
    return peer;
  };
  return { factory, peers };
}

/**
 * Test logger that records lines per level.
 */
export function createRecordingLogger(): {
  logger: Logger;
  lines: Record<keyof Logger, string[]>;
} {
  const lines: Record<keyof Logger, string[]> = { debug: [], info: [], warn: [], error: [] };
  return {
    lines,
    logger: {
      debug: (msg) => lines.debug.push(msg),
      info: (msg) => lines.info.push(msg),
      warn: (msg) => lines.warn.push(msg),
      error: (msg) => lines.error.push(msg),
    },
  };
}
