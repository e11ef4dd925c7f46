import { describe, it, expect } from "vitest";
import { RtpPacket } from "werift";
import { decodeMulaw } from "../audio-utils.js";
import { OutboundPacketizer } from "../packetizer.js";

function pcmOfSamples(samples: number, value = 0): Buffer {
  const pcm = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    pcm.writeInt16LE(value, i * 2);
  }
  return pcm;
}

describe("OutboundPacketizer", () => {
  it("starts at zero", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    expect(packetizer.nextSequenceNumber).toBe(0);
    expect(packetizer.currentTimestamp).toBe(0);
    expect(packetizer.count).toBe(0);
  });

  it("assigns the sequence number before incrementing it", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const first = packetizer.packetize(pcmOfSamples(160));
    const second = packetizer.packetize(pcmOfSamples(160));

    expect(first.sequenceNumber).toBe(0);
    expect(second.sequenceNumber).toBe(1);
    expect(packetizer.nextSequenceNumber).toBe(2);
  });

  it("advances the timestamp by the sample count before stamping", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const first = packetizer.packetize(pcmOfSamples(160));
    const second = packetizer.packetize(pcmOfSamples(80));

    expect(first.timestamp).toBe(160);
    expect(second.timestamp).toBe(240);
  });

  it("writes an RTP v2 header with PCMU payload type and the fixed SSRC", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const packet = packetizer.packetize(pcmOfSamples(160, 1000));

    expect(packet.serialized.length).toBe(12 + 160);
    expect(packet.serialized[0]).toBe(0x80);
    expect(packet.serialized[1]).toBe(0);

    const parsed = RtpPacket.deSerialize(packet.serialized);
    expect(parsed.header.version).toBe(2);
    expect(parsed.header.payloadType).toBe(0);
    expect(parsed.header.sequenceNumber).toBe(0);
    expect(parsed.header.timestamp).toBe(160);
    expect(parsed.header.ssrc).toBe(12345);
    expect(parsed.payload.length).toBe(160);
    expect(parsed.payload[0]).toBe(0xce);
  });

  it("produces exactly one packet per PCM message", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    // 100ms of audio in one message is still one packet
    const packet = packetizer.packetize(pcmOfSamples(800));
    expect(packet.payload.length).toBe(800);
    expect(packetizer.count).toBe(1);
  });

  it("emits an empty packet for a message with no whole sample", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    packetizer.packetize(pcmOfSamples(160));
    const empty = packetizer.packetize(Buffer.alloc(0));
    const odd = packetizer.packetize(Buffer.from([0x01]));

    expect(empty.sequenceNumber).toBe(1);
    expect(empty.timestamp).toBe(160);
    expect(empty.payload.length).toBe(0);
    expect(empty.serialized.length).toBe(12);
    expect(odd.sequenceNumber).toBe(2);
    expect(odd.timestamp).toBe(160);
    expect(packetizer.nextSequenceNumber).toBe(3);
    expect(packetizer.count).toBe(3);
  });

  it("ignores a trailing odd byte", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const packet = packetizer.packetize(Buffer.concat([pcmOfSamples(3), Buffer.from([0x7f])]));
    expect(packet.payload.length).toBe(3);
    expect(packet.timestamp).toBe(3);
  });

  it("wraps the sequence number at 2^16", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345, initialSequenceNumber: 65535 });
    const last = packetizer.packetize(pcmOfSamples(1));
    const wrapped = packetizer.packetize(pcmOfSamples(1));
    expect(last.sequenceNumber).toBe(65535);
    expect(wrapped.sequenceNumber).toBe(0);
    expect(packetizer.nextSequenceNumber).toBe(1);
  });

  it("wraps the timestamp at 2^32", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345, initialTimestamp: 2 ** 32 - 100 });
    const packet = packetizer.packetize(pcmOfSamples(160));
    expect(packet.timestamp).toBe(60);

    const parsed = RtpPacket.deSerialize(packet.serialized);
    expect(parsed.header.timestamp).toBe(60);
  });

  it("keeps sequence == N mod 2^16 and timestamp == total samples after N packets", () => {
    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const sizes = [1, 2, 3];
    const n = 65540;
    let total = 0;
    for (let i = 0; i < n; i++) {
      const samples = sizes[i % sizes.length];
      total += samples;
      packetizer.packetize(pcmOfSamples(samples));
    }

    expect(packetizer.nextSequenceNumber).toBe(n % 65536);
    expect(packetizer.currentTimestamp).toBe(total % 2 ** 32);
    expect(packetizer.count).toBe(n);
  });

  it("re-encodes a decoded 160-byte PCMU packet to 160 bytes and advances 160 ticks", () => {
    const inbound = Buffer.alloc(160, 0xf2);
    const pcm = decodeMulaw(inbound);
    expect(pcm.length).toBe(320);

    const packetizer = new OutboundPacketizer({ ssrc: 12345 });
    const before = packetizer.currentTimestamp;
    const packet = packetizer.packetize(pcm);

    expect(packet.payload.length).toBe(160);
    expect(packet.timestamp - before).toBe(160);
    expect(packet.payload.equals(inbound)).toBe(true);
  });
});
