/**
 * Voice Service Connection
 *
 * WebSocket client for the voice-AI control channel. One connection per
 * bridge session, dialed at the call's join URL.
 *
 * Frames:
 *   binary → 16-bit LE PCM from the voice service (onAudio)
 *   text   → JSON control messages (onText)
 *
 * State machine:
 *   dialing ──open──▶ connected ──close/error/cancel──▶ closed
 *      └──────────error/timeout/cancel───────────────────┘
 * "closed" is terminal; recovery means a new session.
 */

import WebSocket, { type RawData } from "ws";
import { CancellationError, type CancellationToken } from "./cancellation-token.js";
import { SendFailureError, TransportReadError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { VoiceConnectionState } from "./types.js";

/**
 * Configuration for a voice connection.
 */
export interface VoiceConnectionConfig {
  /** WebSocket URL returned by call creation */
  joinUrl: string;
  /** Lifetime token; cancelling it closes the connection */
  token: CancellationToken;
  /** Dial timeout in ms (default: 15000) */
  connectTimeoutMs?: number;
  /** Logger for debug output */
  logger?: Logger;
}

/**
 * Events emitted by the voice connection, in arrival order.
 */
export interface VoiceConnectionEvents {
  /** Binary frame (one PCM message) */
  onAudio?: (pcm: Buffer) => void;
  /** Text frame */
  onText?: (text: string) => void;
  /** State transition */
  onStateChange?: (state: VoiceConnectionState) => void;
  /** Connection closed; `error` is set when the read loop failed */
  onClose?: (error?: TransportReadError) => void;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Voice service control-channel connection.
 *
 * Usage:
 * 1. Create with the join URL and the session's lifetime token
 * 2. connect() with event handlers
 * 3. sendAudio() for PCM from the browser
 * 4. Cancel the token (or close()) when the session ends
 */
export class VoiceConnection {
  private ws: WebSocket | null = null;
  private currentState: VoiceConnectionState = "dialing";
  private config: Required<Omit<VoiceConnectionConfig, "logger">>;
  private events: VoiceConnectionEvents = {};
  private logger?: Logger;
  private readError?: TransportReadError;
  private removeCancelListener: () => void = () => {};
  private audioFramesSent = 0;
  private audioFramesReceived = 0;

  constructor(config: VoiceConnectionConfig) {
    if (!config.joinUrl) {
      throw new Error("Join URL required for voice connection");
    }
    this.config = {
      joinUrl: config.joinUrl,
      token: config.token,
      connectTimeoutMs: config.connectTimeoutMs ?? 15000,
    };
    this.logger = config.logger;
  }

  get state(): VoiceConnectionState {
    return this.currentState;
  }

  get framesSent(): number {
    return this.audioFramesSent;
  }

  get framesReceived(): number {
    return this.audioFramesReceived;
  }

  /**
   * Dial the voice service. Resolves once the socket is open.
   *
   * @throws TransportReadError on dial failure or timeout
   * @throws CancellationError if the token is cancelled while dialing
   */
  async connect(events: VoiceConnectionEvents = {}): Promise<void> {
    if (this.ws || this.currentState !== "dialing") {
      throw new Error(`Cannot connect from state ${this.currentState}`);
    }

    this.events = events;
    const { token } = this.config;

    if (token.isCancelled()) {
      this.transition("closed");
      throw new CancellationError("Voice connection cancelled before dialing");
    }

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.joinUrl);
      this.ws = ws;

      const connectionTimeout = setTimeout(() => {
        if (this.currentState === "dialing") {
          this.logger?.warn("[VoiceConnection] Dial timed out");
          reject(new TransportReadError("Voice connection timeout"));
          ws.terminate();
        }
      }, this.config.connectTimeoutMs);

      this.removeCancelListener = token.onCancel(() => {
        if (this.currentState === "dialing") {
          clearTimeout(connectionTimeout);
          reject(new CancellationError("Voice connection cancelled while dialing"));
          ws.terminate();
          return;
        }
        this.logger?.debug("[VoiceConnection] Lifetime cancelled, closing");
        ws.close(1000, "session ended");
      });

      ws.on("open", () => {
        clearTimeout(connectionTimeout);
        if (this.currentState !== "dialing") {
          return;
        }
        this.transition("connected");
        this.logger?.debug("[VoiceConnection] Connected to voice service");
        resolve();
      });

      ws.on("message", (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          this.audioFramesReceived++;
          this.events.onAudio?.(toBuffer(data));
        } else {
          this.events.onText?.(toBuffer(data).toString("utf8"));
        }
      });

      ws.on("error", (error) => {
        clearTimeout(connectionTimeout);
        this.logger?.error("[VoiceConnection] WebSocket error:", error);
        if (this.currentState === "dialing") {
          reject(new TransportReadError(`Voice dial failed: ${error.message}`, { cause: error }));
          return;
        }
        this.readError = new TransportReadError(
          `Voice connection read failed: ${error.message}`,
          { cause: error },
        );
      });

      ws.on("close", (code, reason) => {
        clearTimeout(connectionTimeout);
        this.removeCancelListener();
        const reasonStr = reason.toString() || "none";
        this.logger?.debug(
          `[VoiceConnection] WebSocket closed (code: ${code}, reason: ${reasonStr})`
        );
        const wasDialing = this.currentState === "dialing";
        this.transition("closed");
        if (wasDialing) {
          reject(new TransportReadError(`Voice connection closed while dialing (code: ${code})`));
          return;
        }
        this.events.onClose?.(this.readError);
      });
    });
  }

  /**
   * Send PCM to the voice service. Best-effort: failures are logged and
   * never retried.
   *
   * @returns false if the frame was not handed to the socket
   */
  sendAudio(pcm: Buffer): boolean {
    const ws = this.ws;
    if (this.currentState !== "connected" || !ws || ws.readyState !== WebSocket.OPEN) {
      return false;
    }

    this.audioFramesSent++;
    ws.send(pcm, { binary: true }, (err) => {
      if (err) {
        const failure = new SendFailureError(`Voice audio send failed: ${errorMessage(err)}`, {
          cause: err,
        });
        this.logger?.warn(`[VoiceConnection] ${failure.message}`);
      }
    });
    return true;
  }

  /**
   * Close the connection. Safe to call in any state.
   */
  close(): void {
    if (!this.ws) {
      this.transition("closed");
      return;
    }
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    } else if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(1000, "session ended");
    }
  }

  private transition(next: VoiceConnectionState): void {
    if (this.currentState === next || this.currentState === "closed") {
      return;
    }
    this.currentState = next;
    this.events.onStateChange?.(next);
  }
}
