/**
 * Signaling Server
 *
 * HTTP endpoint for the browser's SDP offer, plus the observer WebSocket
 * that mirrors control frames to a browser client.
 *
 *   POST {offerPath}      { type: "offer", sdp: { type, sdp } } → answer
 *   GET  /health          { ok: true }
 *   GET  {observerPath}   WebSocket upgrade (observer)
 */

import { randomUUID } from "crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import type { Duplex } from "stream";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import { z } from "zod";
import { NegotiationError, SendFailureError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Observer, SessionRegistry } from "./session-registry.js";
import type { SessionDescription } from "./types.js";

/** Max accepted request body (bytes) */
const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Offer request body.
 */
export const SdpOfferRequestSchema = z.object({
  type: z.literal("offer"),
  sdp: z.object({
    type: z.literal("offer"),
    sdp: z.string().min(1),
  }),
});

export type SdpOfferRequest = z.infer<typeof SdpOfferRequestSchema>;

/**
 * Produces an answer for a browser offer.
 */
export interface OfferHandler {
  handleOffer(offer: SessionDescription): Promise<SessionDescription>;
}

export interface SignalingServerConfig {
  /** Port to listen on (0 picks a free port) */
  port: number;
  /** Bind address */
  bind: string;
  offerPath: string;
  observerPath: string;
  offerHandler: OfferHandler;
  /** Registry holding the observer slot */
  registry: SessionRegistry;
  logger?: Logger;
}

class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "BodyTooLargeError";
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyTooLargeError();
    }
    chunks.push(buf);
  }
  if (!chunks.length) return {};
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
}

function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

/**
 * Observer backed by a WebSocket.
 */
class WebSocketObserver implements Observer {
  public readonly id = randomUUID();

  constructor(
    private readonly ws: WebSocket,
    private readonly logger?: Logger,
  ) {}

  send(text: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new SendFailureError(`Observer ${this.id} is not open`);
    }
    this.ws.send(text, (err) => {
      if (err) {
        this.logger?.warn(`[SignalingServer] Observer ${this.id} send failed: ${err.message}`);
      }
    });
  }
}

export class SignalingServer {
  private readonly config: SignalingServerConfig;
  private readonly observers: WebSocketServer;
  private server: Server | null = null;
  private logger?: Logger;

  constructor(config: SignalingServerConfig) {
    this.config = config;
    this.logger = config.logger;
    this.observers = new WebSocketServer({ noServer: true });
    this.observers.on("connection", (ws) => this.handleObserver(ws));
  }

  /**
   * Port the server is bound to (after start()).
   */
  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      throw new Error("Signaling server is not listening");
    }
    return address.port;
  }

  /**
   * Start listening.
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error("Signaling server already started");
    }

    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(this.config.port, this.config.bind, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", (err) => {
      this.logger?.error("[SignalingServer] Server error:", err);
    });

    this.logger?.info(
      `[SignalingServer] Listening on ${this.config.bind}:${this.port} ` +
        `(offer: ${this.config.offerPath}, observer: ${this.config.observerPath})`
    );
  }

  /**
   * Stop accepting requests and drop observer connections.
   */
  async stop(): Promise<void> {
    for (const ws of this.observers.clients) {
      ws.terminate();
    }

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // HTTP
  // ─────────────────────────────────────────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const method = req.method ?? "GET";
      const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

      if (method === "GET" && pathname === "/health") {
        return writeJson(res, 200, { ok: true });
      }

      if (method === "POST" && pathname === this.config.offerPath) {
        return await this.handleOffer(req, res);
      }

      writeJson(res, 404, { error: "not_found" });
    } catch (err) {
      this.logger?.error("[SignalingServer] Request failed:", err);
      if (!res.headersSent) {
        writeJson(res, 500, { error: "internal_error" });
      }
    }
  }

  private async handleOffer(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let payload: unknown;
    try {
      payload = await readJsonBody(req);
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        return writeJson(res, 413, { error: "payload_too_large" });
      }
      this.logger?.warn(`[SignalingServer] Unreadable offer body: ${errorMessage(err)}`);
      return writeJson(res, 400, { error: "invalid_offer" });
    }

    const parsed = SdpOfferRequestSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger?.warn("[SignalingServer] Rejected malformed offer");
      return writeJson(res, 400, { error: "invalid_offer" });
    }

    try {
      const answer = await this.config.offerHandler.handleOffer(parsed.data.sdp);
      writeJson(res, 200, { type: "answer", sdp: answer });
    } catch (err) {
      if (err instanceof NegotiationError) {
        this.logger?.error(`[SignalingServer] ${err.message}`);
        return writeJson(res, 500, { error: "negotiation_failed", message: err.message });
      }
      throw err;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Observer
  // ─────────────────────────────────────────────────────────────────────────

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== this.config.observerPath) {
      socket.destroy();
      return;
    }

    this.observers.handleUpgrade(req, socket, head, (ws) => {
      this.observers.emit("connection", ws, req);
    });
  }

  private handleObserver(ws: WebSocket): void {
    const observer = new WebSocketObserver(ws, this.logger);
    const previous = this.config.registry.attachObserver(observer);
    if (previous) {
      this.logger?.info(`[SignalingServer] Observer ${observer.id} replaced ${previous.id}`);
    } else {
      this.logger?.info(`[SignalingServer] Observer ${observer.id} attached`);
    }

    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        this.logger?.debug(`[SignalingServer] Ignoring binary frame from observer ${observer.id}`);
        return;
      }
      this.logger?.info(`[SignalingServer] Observer ${observer.id} says: ${rawDataToText(data)}`);
    });

    ws.on("error", (err) => {
      this.logger?.warn(`[SignalingServer] Observer ${observer.id} error: ${err.message}`);
    });

    ws.on("close", () => {
      if (this.config.registry.detachObserver(observer)) {
        this.logger?.info(`[SignalingServer] Observer ${observer.id} detached`);
      }
    });
  }
}
