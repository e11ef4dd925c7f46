/**
 * Outbound Packetizer
 *
 * One PCM message from the voice service becomes exactly one RTP packet:
 * μ-law payload, sequence number assigned then incremented (wraps at 2^16),
 * timestamp advanced by the sample count then assigned (wraps at 2^32).
 * The clock rate equals the sample rate, so one sample is one tick.
 * A message with no whole sample still takes a sequence number and goes
 * out with an empty payload and an unchanged timestamp.
 */

import { RtpHeader, RtpPacket } from "werift";
import { encodeMulaw } from "./audio-utils.js";
import { OUTBOUND_CODEC } from "./codecs.js";

export interface PacketizerOptions {
  /** Synchronization source identifier stamped on every packet */
  ssrc: number;
  /** Payload type (default: PCMU, 0) */
  payloadType?: number;
  /** First sequence number (default: 0) */
  initialSequenceNumber?: number;
  /** Timestamp before the first packet (default: 0) */
  initialTimestamp?: number;
}

/**
 * Packet produced for one PCM message.
 */
export interface OutboundPacket {
  sequenceNumber: number;
  timestamp: number;
  /** μ-law payload */
  payload: Buffer;
  /** Serialized RTP packet, ready for the track */
  serialized: Buffer;
}

export class OutboundPacketizer {
  private readonly ssrc: number;
  private readonly payloadType: number;
  private sequenceNumber: number;
  private timestamp: number;
  private packetsSent = 0;

  constructor(options: PacketizerOptions) {
    this.ssrc = options.ssrc >>> 0;
    this.payloadType = options.payloadType ?? OUTBOUND_CODEC.payloadType;
    this.sequenceNumber = (options.initialSequenceNumber ?? 0) & 0xffff;
    this.timestamp = (options.initialTimestamp ?? 0) >>> 0;
  }

  /**
   * Encode a PCM message into one RTP packet.
   *
   * @param pcm 16-bit signed LE PCM; a trailing odd byte is ignored
   */
  packetize(pcm: Buffer): OutboundPacket {
    const payload = encodeMulaw(pcm);
    const sequenceNumber = this.sequenceNumber;
    this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff;
    this.timestamp = (this.timestamp + payload.length) >>> 0;
    this.packetsSent++;

    const header = new RtpHeader({
      version: 2,
      payloadType: this.payloadType,
      sequenceNumber,
      timestamp: this.timestamp,
      ssrc: this.ssrc,
    });

    return {
      sequenceNumber,
      timestamp: this.timestamp,
      payload,
      serialized: new RtpPacket(header, payload).serialize(),
    };
  }

  /** Sequence number the next packet will carry */
  get nextSequenceNumber(): number {
    return this.sequenceNumber;
  }

  /** Timestamp carried by the most recent packet (the initial value before the first) */
  get currentTimestamp(): number {
    return this.timestamp;
  }

  get count(): number {
    return this.packetsSent;
  }

  get streamId(): number {
    return this.ssrc;
  }
}
