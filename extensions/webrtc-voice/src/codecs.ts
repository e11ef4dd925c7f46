/**
 * Codec Table
 *
 * The bridge always sends PCMU and accepts PCMU, PCMA or Opus from the
 * browser. Payload types here are the defaults offered locally (RFC 3551
 * for G.711, 111 for Opus); inbound packets are matched against the
 * payload types the remote actually negotiated.
 */

import type { AudioCodec, CodecName } from "./types.js";

export const PCMU: AudioCodec = {
  name: "PCMU",
  mimeType: "audio/PCMU",
  payloadType: 0,
  clockRate: 8000,
  channels: 1,
};

export const PCMA: AudioCodec = {
  name: "PCMA",
  mimeType: "audio/PCMA",
  payloadType: 8,
  clockRate: 8000,
  channels: 1,
};

export const OPUS: AudioCodec = {
  name: "opus",
  mimeType: "audio/opus",
  payloadType: 111,
  clockRate: 48000,
  channels: 2,
};

const CODECS_BY_NAME: Record<CodecName, AudioCodec> = {
  PCMU,
  PCMA,
  opus: OPUS,
};

/** Codec used for every outbound packet */
export const OUTBOUND_CODEC = PCMU;

/**
 * Build the negotiated codec table in preference order.
 * The outbound codec is always present and always first. Answers follow
 * the offer's order, so the peer moves it to the front again there.
 */
export function resolveNegotiatedCodecs(names: readonly CodecName[]): AudioCodec[] {
  const ordered: AudioCodec[] = [OUTBOUND_CODEC];
  for (const name of names) {
    const codec = CODECS_BY_NAME[name];
    if (!ordered.includes(codec)) {
      ordered.push(codec);
    }
  }
  return ordered;
}

/**
 * Find a codec by RTP payload type.
 */
export function findCodecByPayloadType(
  codecs: readonly AudioCodec[],
  payloadType: number,
): AudioCodec | undefined {
  return codecs.find((codec) => codec.payloadType === payloadType);
}

/**
 * Find a codec by MIME type (case-insensitive, as SDP allows).
 */
export function findCodecByMimeType(
  codecs: readonly AudioCodec[],
  mimeType: string,
): AudioCodec | undefined {
  const wanted = mimeType.toLowerCase();
  return codecs.find((codec) => codec.mimeType.toLowerCase() === wanted);
}

/**
 * A codec as it appears in a negotiated session description.
 */
export interface NegotiatedCodec {
  mimeType: string;
  payloadType: number;
}

/**
 * Rebind the supported codecs to the remote's payload types. Negotiated
 * entries the bridge cannot decode are left out; an empty negotiation
 * keeps the local table.
 */
export function bindNegotiatedCodecs(
  supported: readonly AudioCodec[],
  negotiated: readonly NegotiatedCodec[],
): AudioCodec[] {
  if (negotiated.length === 0) {
    return [...supported];
  }

  const bound: AudioCodec[] = [];
  for (const entry of negotiated) {
    const codec = findCodecByMimeType(supported, entry.mimeType);
    if (codec && !bound.some((b) => b.payloadType === entry.payloadType)) {
      bound.push({ ...codec, payloadType: entry.payloadType });
    }
  }
  return bound;
}
