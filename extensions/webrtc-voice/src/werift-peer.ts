/**
 * werift Media Peer
 *
 * MediaPeer backed by werift's RTCPeerConnection. One sendrecv audio
 * transceiver: the local track carries PCMU written by the packetizer,
 * the remote track delivers whatever codec the browser picked from the
 * negotiated set.
 *
 * werift sends with the first codec of the transceiver and copies the
 * offer's codec order, so PCMU is moved to the front before answering.
 */

import { randomUUID } from "crypto";
import {
  MediaStreamTrack,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  type RtpPacket,
} from "werift";
import type { NegotiatedCodec } from "./codecs.js";
import type { Logger } from "./logger.js";
import {
  toMediaConnectionState,
  type InboundRtpPacket,
  type MediaPeer,
  type MediaPeerFactory,
  type MediaPeerHandlers,
  type MediaPeerOptions,
  type RemoteAudioTrack,
} from "./media-peer.js";
import type { SessionDescription } from "./types.js";

const PCMU_MIME_TYPE = "audio/pcmu";

function isPcmu(codec: RTCRtpCodecParameters): boolean {
  return codec.mimeType.toLowerCase() === PCMU_MIME_TYPE;
}

class WeriftRemoteTrack implements RemoteAudioTrack {
  constructor(
    private readonly track: MediaStreamTrack,
    private readonly negotiated: () => readonly NegotiatedCodec[],
  ) {}

  get id(): string {
    return this.track.id;
  }

  get mimeType(): string | undefined {
    return this.track.codec?.mimeType;
  }

  negotiatedCodecs(): readonly NegotiatedCodec[] {
    return this.negotiated();
  }

  onPacket(handler: (packet: InboundRtpPacket) => void): () => void {
    const subscription = this.track.onReceiveRtp.subscribe((rtp: RtpPacket) => {
      handler({
        payloadType: rtp.header.payloadType,
        sequenceNumber: rtp.header.sequenceNumber,
        timestamp: rtp.header.timestamp,
        payload: rtp.payload,
      });
    });
    return () => subscription.unSubscribe();
  }
}

export class WeriftMediaPeer implements MediaPeer {
  public readonly id = randomUUID();
  private readonly pc: RTCPeerConnection;
  private readonly outbound = new MediaStreamTrack({ kind: "audio" });
  private readonly iceGatheringTimeoutMs: number;
  private logger?: Logger;
  private closed = false;

  constructor(options: MediaPeerOptions, handlers: MediaPeerHandlers, logger?: Logger) {
    this.iceGatheringTimeoutMs = options.iceGatheringTimeoutMs;
    this.logger = logger;
    this.pc = new RTCPeerConnection({
      codecs: {
        audio: options.codecs.map(
          (codec) =>
            new RTCRtpCodecParameters({
              mimeType: codec.mimeType,
              clockRate: codec.clockRate,
              channels: codec.channels,
              payloadType: codec.payloadType,
            }),
        ),
      },
      iceServers: options.iceServers.map((urls) => ({ urls })),
    });

    this.pc.addTransceiver(this.outbound, { direction: "sendrecv" });

    this.pc.connectionStateChange.subscribe((state) => {
      const mapped = toMediaConnectionState(state);
      if (mapped) {
        handlers.onConnectionStateChange(mapped);
      }
    });

    this.pc.onTrack.subscribe((track) => {
      if (track.kind !== "audio") return;
      handlers.onTrack(new WeriftRemoteTrack(track, () => this.negotiatedAudioCodecs()));
    });
  }

  async accept(offer: SessionDescription): Promise<SessionDescription> {
    await this.pc.setRemoteDescription(offer);
    this.preferPcmu();
    const answer = await this.pc.createAnswer();
    await this.pc.setLocalDescription(answer);
    await this.waitForIceGathering();

    const local = this.pc.localDescription;
    if (!local) {
      throw new Error("No local description after answering");
    }
    return { type: "answer", sdp: local.sdp };
  }

  /**
   * Audio codecs of the current negotiation with the remote's payload types,
   * in the order the answer lists them.
   */
  negotiatedAudioCodecs(): NegotiatedCodec[] {
    const negotiated: NegotiatedCodec[] = [];
    for (const transceiver of this.pc.getTransceivers()) {
      if (transceiver.kind !== "audio") continue;
      for (const codec of transceiver.codecs) {
        negotiated.push({ mimeType: codec.mimeType, payloadType: codec.payloadType });
      }
    }
    return negotiated;
  }

  writeRtp(packet: Buffer): void {
    if (this.closed) {
      throw new Error("Peer closed");
    }
    this.outbound.writeRtp(packet);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pc.close();
  }

  private preferPcmu(): void {
    for (const transceiver of this.pc.getTransceivers()) {
      if (transceiver.kind !== "audio") continue;
      const pcmu = transceiver.codecs.filter(isPcmu);
      if (pcmu.length === 0) {
        this.logger?.warn("[WeriftMediaPeer] Offer has no PCMU, outbound audio will not decode");
        continue;
      }
      transceiver.codecs = [...pcmu, ...transceiver.codecs.filter((codec) => !isPcmu(codec))];
    }
  }

  /**
   * The answer must carry all candidates (no trickle ICE on the signaling
   * endpoint). Gives up after the timeout with whatever was gathered.
   */
  private async waitForIceGathering(): Promise<void> {
    if (this.pc.iceGatheringState === "complete") return;

    await new Promise<void>((resolve) => {
      let unsubscribe: () => void = () => {};
      const timer = setTimeout(() => {
        this.logger?.warn(
          `[WeriftMediaPeer] ICE gathering incomplete after ${this.iceGatheringTimeoutMs}ms`
        );
        unsubscribe();
        resolve();
      }, this.iceGatheringTimeoutMs);

      const subscription = this.pc.iceGatheringStateChange.subscribe((state) => {
        if (state === "complete") {
          clearTimeout(timer);
          unsubscribe();
          resolve();
        }
      });
      unsubscribe = () => subscription.unSubscribe();

      if (this.pc.iceGatheringState === "complete") {
        clearTimeout(timer);
        unsubscribe();
        resolve();
      }
    });
  }
}

/**
 * Factory for werift-backed peers.
 */
export function createWeriftPeerFactory(logger?: Logger): MediaPeerFactory {
  return (options, handlers) => new WeriftMediaPeer(options, handlers, logger);
}
