/**
 * Voice API Provider
 *
 * Creates voice-AI calls over the service's REST API. The returned call
 * carries the join URL the bridge dials for its control channel.
 */

import { CancellationError } from "../cancellation-token.js";
import {
  CallSchema,
  applyCallOptions,
  serializeCallRequest,
  type Call,
  type CallOption,
  type CallRequest,
} from "../call-request.js";
import { VoiceApiError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export const DEFAULT_API_BASE_URL = "https://api.ultravox.ai/api";

/**
 * Anything that can open a call for a session.
 */
export interface CallCreator {
  /**
   * @param options Applied over the creator's default request
   * @param signal Aborts the request when the session ends
   */
  createCall(options?: readonly CallOption[], signal?: AbortSignal): Promise<Call>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Voice API client configuration.
 */
export interface VoiceApiConfig {
  /** API key (uses VOICE_API_KEY env if not set) */
  apiKey?: string;
  /** API base URL without trailing slash */
  baseUrl?: string;
  /** Request defaults applied to every call */
  defaults?: CallRequest;
  /** Request timeout in ms (default: 15000) */
  timeoutMs?: number;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Request defaults for a server WebSocket call at the given PCM rate.
 */
export function defaultCallRequest(sampleRate = 8000): CallRequest {
  return {
    systemPrompt: "You are a helpful AI assistant that provides clear and concise information.",
    model: "fixie-ai/ultravox",
    voice: "Mark",
    firstSpeaker: "FIRST_SPEAKER_AGENT",
    initialOutputMedium: "MESSAGE_MEDIUM_VOICE",
    joinTimeoutMs: 30_000,
    maxDurationMs: 600_000,
    medium: { serverWebSocket: { inputSampleRate: sampleRate, outputSampleRate: sampleRate } },
  };
}

export class VoiceApiClient implements CallCreator {
  private apiKey: string;
  private baseUrl: string;
  private defaults: CallRequest;
  private timeoutMs: number;
  private fetchFn: FetchFn;
  private logger?: Logger;

  constructor(config: VoiceApiConfig = {}) {
    this.apiKey = config.apiKey || process.env.VOICE_API_KEY || "";
    this.baseUrl = (config.baseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.defaults = config.defaults ?? defaultCallRequest();
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger;

    if (!this.apiKey) {
      throw new VoiceApiError("Voice API key required (set VOICE_API_KEY or pass apiKey)");
    }
  }

  /**
   * URL for a request: agent calls go under /agents/{id}/calls, and the
   * routing flags become query parameters.
   */
  buildUrl(request: CallRequest): string {
    const path = request.agentId
      ? `/agents/${encodeURIComponent(request.agentId)}/calls`
      : "/calls";
    const url = new URL(`${this.baseUrl}${path}`);
    if (request.enableGreetingPrompt) {
      url.searchParams.set("enableGreetingPrompt", "true");
    }
    if (request.priorCallId) {
      url.searchParams.set("priorCallId", request.priorCallId);
    }
    return url.toString();
  }

  /**
   * Create a call.
   *
   * @throws VoiceApiError on transport, HTTP or response failures
   * @throws CancellationError if `signal` aborts first
   */
  async createCall(options: readonly CallOption[] = [], signal?: AbortSignal): Promise<Call> {
    const request = applyCallOptions(this.defaults, options);
    const url = this.buildUrl(request);

    const { response, text } = await this.post(url, request, signal);

    if (!response.ok) {
      throw new VoiceApiError(
        `Voice API call creation failed: ${response.status} - ${text}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new VoiceApiError("Failed to decode call response", response.status, { cause: err });
    }

    const parsed = CallSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new VoiceApiError(`Invalid call response: ${issues}`, response.status);
    }

    const call = parsed.data;
    if (!call.joinUrl) {
      throw new VoiceApiError("API did not return a valid join URL", response.status);
    }

    this.logger?.info(`[VoiceApiClient] Created call ${call.callId}`);
    return call;
  }

  /**
   * POST the request body, bounded by the client timeout and the caller's
   * signal.
   */
  private async post(
    url: string,
    request: CallRequest,
    signal?: AbortSignal,
  ): Promise<{ response: Response; text: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "X-API-Key": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(serializeCallRequest(request)),
        signal: controller.signal,
      });
      const text = await response.text();
      return { response, text };
    } catch (err) {
      if (signal?.aborted) {
        throw new CancellationError("Call creation cancelled");
      }
      if (controller.signal.aborted) {
        throw new VoiceApiError(`Voice API request timed out after ${this.timeoutMs}ms`, undefined, {
          cause: err,
        });
      }
      throw new VoiceApiError(`Voice API request failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
