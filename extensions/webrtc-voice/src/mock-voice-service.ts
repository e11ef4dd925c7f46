/**
 * Mock Voice Service for Testing
 *
 * Simulates the voice-AI service's call WebSocket: accepts the bridge's
 * connection at its join URL, records the PCM it receives and lets tests
 * push PCM and control frames back.
 */

import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { chunkAudio } from "./audio-utils.js";
import type { Call } from "./call-request.js";
import type { CallCreator } from "./providers/voice-api.js";

/**
 * Configuration for the mock service.
 */
export interface MockVoiceServiceConfig {
  /** Host to bind (default: 127.0.0.1) */
  host?: string;
  /** Port to bind (default: 0, a free port) */
  port?: number;
  /** Simulate network latency in ms (default: 0) */
  responseDelay?: number;
}

/**
 * Recorded frame for test assertions.
 */
export interface RecordedFrame {
  kind: "binary" | "text";
  data: Buffer;
  timestamp: number;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Mock voice service accepting bridge connections.
 */
export class MockVoiceService {
  private config: Required<MockVoiceServiceConfig>;
  private wss: WebSocketServer | null = null;
  private client: WebSocket | null = null;
  private callCounter = 0;

  /** Frames received from the bridge */
  public receivedFrames: RecordedFrame[] = [];
  /** Frames sent to the bridge */
  public sentFrames: RecordedFrame[] = [];
  /** Number of connections accepted */
  public connectionCount = 0;

  constructor(config: MockVoiceServiceConfig = {}) {
    this.config = {
      host: config.host ?? "127.0.0.1",
      port: config.port ?? 0,
      responseDelay: config.responseDelay ?? 0,
    };
  }

  /**
   * Start listening.
   */
  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({ host: this.config.host, port: this.config.port });
      this.wss = wss;

      wss.on("connection", (ws) => {
        this.connectionCount++;
        this.client = ws;

        ws.on("message", (data: RawData, isBinary: boolean) => {
          this.receivedFrames.push({
            kind: isBinary ? "binary" : "text",
            data: toBuffer(data),
            timestamp: Date.now(),
          });
        });

        ws.on("close", () => {
          if (this.client === ws) {
            this.client = null;
          }
        });
      });

      wss.once("listening", () => resolve());
      wss.once("error", reject);
    });
  }

  /**
   * Stop the server and drop the connection.
   */
  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    for (const ws of wss.clients) {
      ws.terminate();
    }
    this.client = null;
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }

  /**
   * URL the bridge dials.
   */
  get joinUrl(): string {
    const address = this.wss?.address();
    if (!address || typeof address === "string") {
      throw new Error("Mock voice service is not listening");
    }
    return `ws://${this.config.host}:${address.port}/call`;
  }

  /**
   * Call creator whose calls join this service.
   */
  createCallCreator(): CallCreator & { calls: number } {
    const creator = {
      calls: 0,
      createCall: async (): Promise<Call> => {
        creator.calls++;
        this.callCounter++;
        return {
          callId: `mock-call-${this.callCounter}`,
          joinUrl: this.joinUrl,
          recordingEnabled: false,
          errorCount: 0,
        };
      },
    };
    return creator;
  }

  /**
   * Check if a bridge is connected.
   */
  isConnected(): boolean {
    return this.client?.readyState === 1;
  }

  /**
   * Close the bridge's connection from the service side.
   */
  hangup(code = 1000): void {
    this.client?.close(code, "call ended");
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Simulation methods (what the voice service would send)
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Send one PCM message as a binary frame.
   */
  async sendAudio(pcm: Buffer): Promise<void> {
    await this.applyDelay();
    this.send(pcm, true);
  }

  /**
   * Stream PCM as a series of binary frames (320 bytes = 20ms @ 8kHz).
   */
  async streamAudio(pcm: Buffer, frameSize = 320): Promise<void> {
    for (const chunk of chunkAudio(pcm, frameSize)) {
      await this.sendAudio(chunk);
    }
  }

  /**
   * Send a raw text frame.
   */
  async sendText(text: string): Promise<void> {
    await this.applyDelay();
    this.send(Buffer.from(text, "utf8"), false);
  }

  async sendTranscript(
    role: string,
    text: string,
    options: { final?: boolean; delta?: string } = {},
  ): Promise<void> {
    await this.sendText(
      JSON.stringify({
        type: "transcript",
        role,
        text,
        final: options.final ?? true,
        delta: options.delta ?? "",
      }),
    );
  }

  async sendState(state: string): Promise<void> {
    await this.sendText(JSON.stringify({ type: "state", state }));
  }

  async sendError(error: string): Promise<void> {
    await this.sendText(JSON.stringify({ type: "error", error }));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Assertion helpers
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Binary frames received from the bridge.
   */
  getReceivedAudio(): Buffer[] {
    return this.receivedFrames.filter((f) => f.kind === "binary").map((f) => f.data);
  }

  /**
   * Wait until the bridge has connected.
   */
  async waitForConnection(timeoutMs = 5000): Promise<void> {
    await this.waitFor(() => this.isConnected(), timeoutMs, "bridge connection");
  }

  /**
   * Wait until at least `count` binary frames have arrived.
   */
  async waitForAudio(count: number, timeoutMs = 5000): Promise<Buffer[]> {
    await this.waitFor(() => this.getReceivedAudio().length >= count, timeoutMs, `${count} audio frames`);
    return this.getReceivedAudio();
  }

  /**
   * Wait until the bridge's connection is gone.
   */
  async waitForDisconnect(timeoutMs = 5000): Promise<void> {
    await this.waitFor(() => !this.isConnected(), timeoutMs, "bridge disconnect");
  }

  /**
   * Clear all recorded frames.
   */
  clearFrames(): void {
    this.receivedFrames = [];
    this.sentFrames = [];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private send(data: Buffer, binary: boolean): void {
    const client = this.client;
    if (!client || client.readyState !== 1) {
      throw new Error("No bridge connected to mock voice service");
    }
    client.send(data, { binary });
    this.sentFrames.push({ kind: binary ? "binary" : "text", data, timestamp: Date.now() });
  }

  private async waitFor(check: () => boolean, timeoutMs: number, what: string): Promise<void> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
      if (check()) return;
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    throw new Error(`Timeout waiting for ${what}`);
  }

  private async applyDelay(): Promise<void> {
    if (this.config.responseDelay > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.config.responseDelay));
    }
  }
}
