/**
 * Inbound Transcoder
 *
 * Turns RTP payloads received from the browser into 16-bit LE PCM at the
 * session sample rate.
 *
 * Codec classes:
 * - waveform (PCMU, PCMA): stateless per-sample expansion, no decoder
 * - stateful (Opus): one persistent decoder per stream, created on the
 *   first packet of that payload type and kept until the stream ends
 */

import OpusScript from "opusscript";
import { decodeAlaw, decodeMulaw } from "./audio-utils.js";
import { bindNegotiatedCodecs, findCodecByPayloadType, type NegotiatedCodec } from "./codecs.js";
import { UnsupportedCodecError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { InboundRtpPacket, RemoteAudioTrack } from "./media-peer.js";
import type { AudioCodec } from "./types.js";

/**
 * A decoder that carries state across packets.
 */
export interface StatefulDecoder {
  decode(payload: Buffer): Buffer;
  /** Free native/wasm resources */
  release(): void;
}

/**
 * Decoder resolved for one payload type of one stream.
 */
export type StreamDecoder =
  | { kind: "none" }
  | { kind: "waveform"; law: "mulaw" | "alaw" }
  | { kind: "stateful"; decoder: StatefulDecoder };

export type StatefulDecoderFactory = (codec: AudioCodec, sampleRate: number) => StatefulDecoder;

type OpusSampleRate = 8000 | 12000 | 16000 | 24000 | 48000;

function toOpusSampleRate(sampleRate: number): OpusSampleRate {
  switch (sampleRate) {
    case 8000:
    case 12000:
    case 16000:
    case 24000:
    case 48000:
      return sampleRate;
    default:
      throw new Error(`Opus cannot decode to ${sampleRate}Hz`);
  }
}

/**
 * Opus decoder producing mono PCM at `sampleRate`.
 */
export function createOpusDecoder(sampleRate: number): StatefulDecoder {
  const decoder = new OpusScript(toOpusSampleRate(sampleRate), 1, OpusScript.Application.VOIP);
  return {
    decode(payload: Buffer): Buffer {
      const pcm = decoder.decode(payload);
      return Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
    },
    release(): void {
      decoder.delete();
    },
  };
}

const defaultStatefulDecoderFactory: StatefulDecoderFactory = (codec, sampleRate) => {
  if (codec.name !== "opus") {
    throw new Error(`No stateful decoder for ${codec.mimeType}`);
  }
  return createOpusDecoder(sampleRate);
};

export interface InboundTranscoderOptions {
  /** Codecs the bridge can decode */
  codecs: readonly AudioCodec[];
  /**
   * Payload types the remote negotiated, read when a payload type is first
   * seen. Without it the local table's payload types apply.
   */
  negotiated?: () => readonly NegotiatedCodec[];
  /** Output sample rate (Hz) */
  sampleRate: number;
  /** Override for stateful decoder construction (tests) */
  createStatefulDecoder?: StatefulDecoderFactory;
  logger?: Logger;
}

/**
 * Per-stream inbound transcoder. Create one for each remote track.
 */
export class InboundTranscoder {
  private readonly codecs: readonly AudioCodec[];
  private readonly sampleRate: number;
  private readonly createStatefulDecoder: StatefulDecoderFactory;
  private readonly negotiated?: () => readonly NegotiatedCodec[];
  private readonly decoders = new Map<number, StreamDecoder>();
  private logger?: Logger;
  private closed = false;

  constructor(options: InboundTranscoderOptions) {
    this.codecs = options.codecs;
    this.sampleRate = options.sampleRate;
    this.createStatefulDecoder = options.createStatefulDecoder ?? defaultStatefulDecoderFactory;
    this.negotiated = options.negotiated;
    this.logger = options.logger;
  }

  /**
   * Resolve the decoder for a payload type. Resolution happens once per
   * payload type; later calls return the cached variant.
   */
  resolve(payloadType: number): StreamDecoder {
    const cached = this.decoders.get(payloadType);
    if (cached) {
      return cached;
    }

    const table = this.negotiated
      ? bindNegotiatedCodecs(this.codecs, this.negotiated())
      : this.codecs;
    const codec = findCodecByPayloadType(table, payloadType);
    if (!codec) {
      return { kind: "none" };
    }

    let resolved: StreamDecoder;
    switch (codec.name) {
      case "PCMU":
        resolved = { kind: "waveform", law: "mulaw" };
        break;
      case "PCMA":
        resolved = { kind: "waveform", law: "alaw" };
        break;
      case "opus":
        resolved = {
          kind: "stateful",
          decoder: this.createStatefulDecoder(codec, this.sampleRate),
        };
        this.logger?.debug(
          `[InboundTranscoder] Created ${codec.mimeType} decoder at ${this.sampleRate}Hz`
        );
        break;
    }

    this.decoders.set(payloadType, resolved);
    return resolved;
  }

  /**
   * Decode one payload to PCM.
   *
   * @throws UnsupportedCodecError if the payload type was not negotiated
   */
  decode(payloadType: number, payload: Buffer): Buffer {
    if (this.closed) {
      throw new Error("Transcoder closed");
    }

    const decoder = this.resolve(payloadType);
    switch (decoder.kind) {
      case "none":
        throw new UnsupportedCodecError(payloadType);
      case "waveform":
        return decoder.law === "mulaw" ? decodeMulaw(payload) : decodeAlaw(payload);
      case "stateful":
        return decoder.decoder.decode(payload);
    }
  }

  /**
   * Release stateful decoders. Further decode() calls throw.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const decoder of this.decoders.values()) {
      if (decoder.kind === "stateful") {
        decoder.decoder.release();
      }
    }
    this.decoders.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Track reader
// ─────────────────────────────────────────────────────────────────────────────

export interface InboundStreamOptions extends InboundTranscoderOptions {
  track: RemoteAudioTrack;
  /** Receives each decoded PCM message, in packet order */
  forward: (pcm: Buffer) => void;
}

/**
 * Reads one remote track until it ends: decode every packet, hand the PCM
 * to `forward`. A packet of an unsupported codec is logged and skipped;
 * the stream keeps reading.
 */
export class InboundStream {
  private readonly transcoder: InboundTranscoder;
  private readonly forward: (pcm: Buffer) => void;
  private readonly trackId: string;
  private unsubscribe: () => void;
  private logger?: Logger;
  private packetsDecoded = 0;
  private packetsDropped = 0;

  constructor(options: InboundStreamOptions) {
    const { track } = options;
    this.transcoder = new InboundTranscoder({
      ...options,
      negotiated: options.negotiated ?? (() => track.negotiatedCodecs()),
    });
    this.forward = options.forward;
    this.trackId = options.track.id;
    this.logger = options.logger;
    this.unsubscribe = options.track.onPacket((packet) => this.handlePacket(packet));
  }

  get decoded(): number {
    return this.packetsDecoded;
  }

  get dropped(): number {
    return this.packetsDropped;
  }

  handlePacket(packet: InboundRtpPacket): void {
    let pcm: Buffer;
    try {
      pcm = this.transcoder.decode(packet.payloadType, packet.payload);
    } catch (err) {
      this.packetsDropped++;
      if (err instanceof UnsupportedCodecError) {
        this.logger?.warn(`[InboundStream] ${err.message} on track ${this.trackId}, skipping`);
      } else {
        this.logger?.error(
          `[InboundStream] Failed to decode packet ${packet.sequenceNumber} on track ${this.trackId}:`,
          err,
        );
      }
      return;
    }

    this.packetsDecoded++;
    if (pcm.length > 0) {
      this.forward(pcm);
    }
  }

  /**
   * Stop reading and release the decoders.
   */
  close(): void {
    this.unsubscribe();
    this.unsubscribe = () => {};
    this.transcoder.close();
  }
}
