/**
 * Media Negotiation
 *
 * Creates a peer per browser offer, produces the answer and turns the
 * peer's state changes into two one-shot notifications:
 *   onConnected: transport reached "connected" (start a session)
 *   onClosed:    transport hit disconnected/failed/closed (tear down)
 */

import { NegotiationError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  isTerminalMediaState,
  type MediaConnectionState,
  type MediaPeer,
  type MediaPeerFactory,
  type MediaPeerOptions,
  type RemoteAudioTrack,
} from "./media-peer.js";
import type { SessionDescription } from "./types.js";

/**
 * Lifecycle notifications for one negotiated peer.
 */
export interface NegotiationEvents {
  onConnected(peer: MediaPeer): void;
  onClosed(peer: MediaPeer, state: MediaConnectionState): void;
  onTrack(peer: MediaPeer, track: RemoteAudioTrack): void;
}

export interface MediaNegotiatorConfig extends MediaPeerOptions {
  createPeer: MediaPeerFactory;
  logger?: Logger;
}

export interface NegotiationResult {
  answer: SessionDescription;
  peer: MediaPeer;
}

export class MediaNegotiator {
  private readonly config: MediaNegotiatorConfig;
  private logger?: Logger;

  constructor(config: MediaNegotiatorConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Accept a remote offer.
   *
   * @throws NegotiationError if the offer cannot be applied or answered
   */
  async accept(offer: SessionDescription, events: NegotiationEvents): Promise<NegotiationResult> {
    if (offer.type !== "offer") {
      throw new NegotiationError(`Expected an offer, got ${offer.type}`);
    }

    let connected = false;
    let closed = false;
    let peerRef: MediaPeer | null = null;
    const pendingTracks: RemoteAudioTrack[] = [];

    const peer = this.config.createPeer(
      {
        codecs: this.config.codecs,
        iceServers: this.config.iceServers,
        iceGatheringTimeoutMs: this.config.iceGatheringTimeoutMs,
      },
      {
        onConnectionStateChange: (state) => {
          this.logger?.info(`[MediaNegotiator] Connection state has changed: ${state}`);
          if (!peerRef || closed) return;
          if (state === "connected" && !connected) {
            connected = true;
            events.onConnected(peerRef);
          } else if (isTerminalMediaState(state)) {
            closed = true;
            events.onClosed(peerRef, state);
          }
        },
        onTrack: (track) => {
          this.logger?.info(
            `[MediaNegotiator] Track has started: ${track.id} (${track.mimeType ?? "codec pending"})`
          );
          // Engines may report tracks while the offer is still being applied
          if (!peerRef) {
            pendingTracks.push(track);
            return;
          }
          events.onTrack(peerRef, track);
        },
      },
    );

    peerRef = peer;
    for (const track of pendingTracks.splice(0)) {
      events.onTrack(peer, track);
    }

    try {
      const answer = await peer.accept(offer);
      this.logger?.debug(`[MediaNegotiator] Answer ready for peer ${peer.id}`);
      return { answer, peer };
    } catch (err) {
      closed = true;
      await peer.close().catch((closeErr: unknown) => {
        this.logger?.warn(`[MediaNegotiator] Failed to close peer ${peer.id}: ${errorMessage(closeErr)}`);
      });
      throw new NegotiationError(`Negotiation failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
