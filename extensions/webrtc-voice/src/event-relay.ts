/**
 * Event Relay
 *
 * Consumes the frames of one session's voice connection, in arrival order:
 * - binary: one PCM message → the session's packetizer → its peer
 * - text: envelope → verbatim mirror to the observer → typed ControlEvent
 *
 * Malformed frames are logged and dropped; the connection keeps reading.
 */

import type { BridgeSession } from "./bridge-session.js";
import { decodeControlEvent, parseControlEnvelope } from "./control-messages.js";
import {
  MalformedControlMessageError,
  SendFailureError,
  errorMessage,
  type TransportReadError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { SessionRegistry } from "./session-registry.js";
import type { ControlEvent, ControlEnvelope, VoiceConnectionState } from "./types.js";
import type { VoiceConnectionEvents } from "./voice-connection.js";

export interface EventRelayOptions {
  /** Session whose peer receives the audio */
  session: BridgeSession;
  /** Registry holding the observer */
  registry: SessionRegistry;
  /** Receives every decoded control event */
  onControlEvent?: (event: ControlEvent) => void;
  /** Receives voice connection state transitions */
  onConnectionState?: (state: VoiceConnectionState) => void;
  logger?: Logger;
}

/**
 * Per-session frame dispatcher for a voice connection.
 */
export class EventRelay {
  private readonly session: BridgeSession;
  private readonly registry: SessionRegistry;
  private readonly options: EventRelayOptions;
  private logger?: Logger;
  private malformedFrames = 0;

  constructor(options: EventRelayOptions) {
    this.session = options.session;
    this.registry = options.registry;
    this.options = options;
    this.logger = options.logger;
  }

  /** Text frames dropped as malformed so far */
  get droppedFrames(): number {
    return this.malformedFrames;
  }

  /**
   * Handlers to pass to VoiceConnection.connect().
   */
  events(): VoiceConnectionEvents {
    return {
      onAudio: (pcm) => this.handleAudio(pcm),
      onText: (text) => this.handleText(text),
      onStateChange: (state) => this.options.onConnectionState?.(state),
      onClose: (error) => this.handleClose(error),
    };
  }

  handleAudio(pcm: Buffer): void {
    this.session.writeFromVoice(pcm);
  }

  handleText(text: string): void {
    let envelope: ControlEnvelope;
    try {
      envelope = parseControlEnvelope(text);
    } catch (err) {
      this.reportMalformed(err, text);
      return;
    }

    this.mirror(envelope);

    let event: ControlEvent;
    try {
      event = decodeControlEvent(envelope);
    } catch (err) {
      this.reportMalformed(err, text);
      return;
    }

    this.handleEvent(event);
    this.options.onControlEvent?.(event);
  }

  private handleClose(error?: TransportReadError): void {
    if (error) {
      this.logger?.warn(
        `[EventRelay] Voice read loop ended for session ${this.session.sessionId}: ${error.message}`
      );
    } else {
      this.logger?.info(`[EventRelay] Voice connection closed for session ${this.session.sessionId}`);
    }
  }

  /**
   * Forward the frame verbatim to the observer, if one is attached.
   */
  private mirror(envelope: ControlEnvelope): void {
    const observer = this.registry.getObserver();
    if (!observer) return;

    try {
      observer.send(envelope.raw);
    } catch (err) {
      const failure =
        err instanceof SendFailureError
          ? err
          : new SendFailureError(errorMessage(err), { cause: err });
      this.logger?.warn(
        `[EventRelay] Failed to forward ${envelope.messageType} to observer ${observer.id}: ${failure.message}`
      );
    }
  }

  private handleEvent(event: ControlEvent): void {
    switch (event.type) {
      case "transcript":
        // Partial transcripts are mirrored but not logged
        if (event.final) {
          this.logger?.info(`[EventRelay] Transcript [${event.role}]: ${event.text}`);
        }
        break;
      case "error":
        this.logger?.error(`[EventRelay] Voice service error: ${event.error}`);
        break;
      case "state":
        this.logger?.info(`[EventRelay] Voice service state: ${event.state}`);
        break;
      case "unknown":
        this.logger?.debug(`[EventRelay] Unhandled event type: ${event.messageType}`);
        break;
    }
  }

  private reportMalformed(err: unknown, text: string): void {
    this.malformedFrames++;
    if (err instanceof MalformedControlMessageError) {
      this.logger?.warn(
        `[EventRelay] Dropping malformed control frame (${err.message}): ${text.slice(0, 200)}`
      );
      return;
    }
    this.logger?.error("[EventRelay] Unexpected control frame failure:", err);
  }
}
