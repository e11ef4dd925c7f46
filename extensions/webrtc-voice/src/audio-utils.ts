/**
 * Audio Format Utilities for WebRTC ↔ Voice Service
 *
 * Handles conversion between:
 * - WebRTC G.711 payloads: 8kHz μ-law (PCMU) or A-law (PCMA), 1 byte per sample
 * - Voice service: 8kHz PCM, 16-bit mono, little-endian
 *
 * G.711 is a stateless per-sample companding transform, so every function
 * here is pure. Decoding goes through 256-entry lookup tables built once.
 */

/** Added to the magnitude before μ-law segment search */
const MULAW_BIAS = 0x84;
/** Largest magnitude μ-law can represent once biased */
const MULAW_CLIP = 32635;
/** Upper bounds of the A-law segments (13-bit magnitudes) */
const ALAW_SEGMENT_END = [0x1f, 0x3f, 0x7f, 0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff];

/**
 * Compand one 16-bit linear sample to a μ-law byte.
 */
export function linearToMulaw(sample: number): number {
  let magnitude = clamp16(Math.round(sample));
  const sign = (magnitude >> 8) & 0x80;
  if (sign !== 0) {
    magnitude = -magnitude;
  }
  if (magnitude > MULAW_CLIP) {
    magnitude = MULAW_CLIP;
  }
  magnitude += MULAW_BIAS;

  let exponent = 7;
  let mask = 0x4000;
  while ((magnitude & mask) === 0 && exponent > 0) {
    exponent--;
    mask >>= 1;
  }
  const mantissa = (magnitude >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

/**
 * Expand one μ-law byte to a 16-bit linear sample.
 */
export function mulawToLinear(byte: number): number {
  const u = ~byte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;
  return sign !== 0 ? -magnitude : magnitude;
}

/**
 * Compand one 16-bit linear sample to an A-law byte.
 */
export function linearToAlaw(sample: number): number {
  // A-law works on 13-bit magnitudes
  let pcm = clamp16(Math.round(sample)) >> 3;
  let mask: number;
  if (pcm >= 0) {
    mask = 0xd5;
  } else {
    mask = 0x55;
    pcm = -pcm - 1;
  }

  const segment = ALAW_SEGMENT_END.findIndex((end) => pcm <= end);
  if (segment === -1) {
    return 0x7f ^ mask;
  }

  let aval = segment << 4;
  aval |= segment < 2 ? (pcm >> 1) & 0x0f : (pcm >> segment) & 0x0f;
  return aval ^ mask;
}

/**
 * Expand one A-law byte to a 16-bit linear sample.
 */
export function alawToLinear(byte: number): number {
  const a = (byte ^ 0x55) & 0xff;
  let magnitude = (a & 0x0f) << 4;
  const segment = (a & 0x70) >> 4;
  switch (segment) {
    case 0:
      magnitude += 8;
      break;
    case 1:
      magnitude += 0x108;
      break;
    default:
      magnitude += 0x108;
      magnitude <<= segment - 1;
  }
  return (a & 0x80) !== 0 ? magnitude : -magnitude;
}

const MULAW_DECODE_TABLE = Int16Array.from({ length: 256 }, (_, i) => mulawToLinear(i));
const ALAW_DECODE_TABLE = Int16Array.from({ length: 256 }, (_, i) => alawToLinear(i));

/**
 * Decode a μ-law payload to PCM.
 *
 * Input: 8-bit μ-law, one byte per sample
 * Output: 16-bit signed LE PCM, twice the input length
 */
export function decodeMulaw(payload: Buffer): Buffer {
  return expand(payload, MULAW_DECODE_TABLE);
}

/**
 * Decode an A-law payload to PCM.
 */
export function decodeAlaw(payload: Buffer): Buffer {
  return expand(payload, ALAW_DECODE_TABLE);
}

/**
 * Encode PCM to μ-law. A trailing odd byte is ignored.
 *
 * Input: 16-bit signed LE PCM
 * Output: 8-bit μ-law, half the input length
 */
export function encodeMulaw(pcm: Buffer): Buffer {
  return compress(pcm, linearToMulaw);
}

/**
 * Encode PCM to A-law. A trailing odd byte is ignored.
 */
export function encodeAlaw(pcm: Buffer): Buffer {
  return compress(pcm, linearToAlaw);
}

function expand(payload: Buffer, table: Int16Array): Buffer {
  const output = Buffer.alloc(payload.length * 2);
  for (let i = 0; i < payload.length; i++) {
    output.writeInt16LE(table[payload[i]], i * 2);
  }
  return output;
}

function compress(pcm: Buffer, companding: (sample: number) => number): Buffer {
  const samples = getSampleCount(pcm);
  const output = Buffer.alloc(samples);
  for (let i = 0; i < samples; i++) {
    output[i] = companding(pcm.readInt16LE(i * 2));
  }
  return output;
}

/**
 * Number of whole 16-bit samples in a PCM buffer.
 */
export function getSampleCount(pcm: Buffer): number {
  return Math.floor(pcm.length / 2);
}

/**
 * Clamp value to 16-bit signed integer range.
 */
function clamp16(value: number): number {
  return Math.max(-32768, Math.min(32767, value));
}

/**
 * Split audio buffer into fixed-size chunks.
 *
 * @param audio Audio buffer to chunk
 * @param chunkSize Bytes per chunk (default: 320 for 20ms @ 8kHz PCM)
 * @returns Generator yielding audio chunks
 */
export function* chunkAudio(
  audio: Buffer,
  chunkSize = 320,
): Generator<Buffer, void, unknown> {
  for (let i = 0; i < audio.length; i += chunkSize) {
    yield audio.subarray(i, Math.min(i + chunkSize, audio.length));
  }
}

/**
 * Calculate correlation coefficient between two audio buffers.
 * Used for testing to verify audio quality after a codec round trip.
 *
 * @returns Correlation coefficient between -1 and 1
 */
export function calculateCorrelation(a: Buffer, b: Buffer): number {
  // Use the shorter buffer length
  const samples = Math.min(getSampleCount(a), getSampleCount(b));

  if (samples === 0) return 0;

  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < samples; i++) {
    sumA += a.readInt16LE(i * 2);
    sumB += b.readInt16LE(i * 2);
  }
  const meanA = sumA / samples;
  const meanB = sumB / samples;

  let numerator = 0;
  let denomA = 0;
  let denomB = 0;
  for (let i = 0; i < samples; i++) {
    const diffA = a.readInt16LE(i * 2) - meanA;
    const diffB = b.readInt16LE(i * 2) - meanB;
    numerator += diffA * diffB;
    denomA += diffA * diffA;
    denomB += diffB * diffB;
  }

  const denominator = Math.sqrt(denomA * denomB);
  if (denominator === 0) return 0;

  return numerator / denominator;
}

/**
 * Generate a sine wave tone for testing.
 *
 * @param sampleRate Sample rate in Hz (e.g., 8000)
 * @param durationMs Duration in milliseconds
 * @param frequency Tone frequency in Hz (default: 440Hz, A4)
 * @param amplitude Amplitude 0-1 (default: 0.5)
 * @returns Buffer containing PCM audio
 */
export function generateTone(
  sampleRate: number,
  durationMs: number,
  frequency = 440,
  amplitude = 0.5,
): Buffer {
  const samples = Math.floor((sampleRate * durationMs) / 1000);
  const buffer = Buffer.alloc(samples * 2);

  for (let i = 0; i < samples; i++) {
    const t = i / sampleRate;
    const sample = Math.sin(2 * Math.PI * frequency * t) * 0x7fff * amplitude;
    buffer.writeInt16LE(Math.round(sample), i * 2);
  }

  return buffer;
}
