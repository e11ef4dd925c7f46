import { afterEach, describe, it, expect, vi } from "vitest";
import { withAgent, withGreetingPrompt, withPriorCall, withRecording } from "../call-request.js";
import { CancellationError } from "../cancellation-token.js";
import { VoiceApiError } from "../errors.js";
import { VoiceApiClient, defaultCallRequest, type FetchFn } from "../providers/voice-api.js";
import { createRecordingLogger } from "./test-helpers.js";

const CALL_RESPONSE = {
  callId: "call-1",
  joinUrl: "wss://voice.example.test/calls/call-1",
  created: "2026-01-01T00:00:00Z",
  maxDuration: "600s",
  joinTimeout: "30s",
};

function respondWith(body: string, status = 201) {
  return vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response(body, { status }));
}

/** Fetch that never settles until its signal aborts */
const hangingFetch: FetchFn = (_input, init) =>
  new Promise((_resolve, reject) => {
    const abort = () => reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
    if (init.signal?.aborted) {
      abort();
      return;
    }
    init.signal?.addEventListener("abort", abort);
  });

function createClient(fetchFn: FetchFn, timeoutMs?: number) {
  return new VoiceApiClient({
    apiKey: "test-secret",
    baseUrl: "https://api.example.test/api/",
    fetch: fetchFn,
    timeoutMs,
  });
}

describe("VoiceApiClient", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("requires an API key", () => {
    vi.stubEnv("VOICE_API_KEY", "");
    expect(() => new VoiceApiClient({ fetch: respondWith("{}") })).toThrow(
      "Voice API key required (set VOICE_API_KEY or pass apiKey)"
    );
  });

  it("falls back to the VOICE_API_KEY variable", async () => {
    vi.stubEnv("VOICE_API_KEY", "test-secret-from-env");
    const fetchMock = respondWith(JSON.stringify(CALL_RESPONSE));
    await new VoiceApiClient({ fetch: fetchMock }).createCall();

    const init = fetchMock.mock.calls[0][1];
    expect(init.headers).toEqual({ "X-API-Key": "test-secret-from-env", "Content-Type": "application/json" });
  });

  it("posts the default request and parses the call", async () => {
    const fetchMock = respondWith(JSON.stringify(CALL_RESPONSE));
    const { logger, lines } = createRecordingLogger();
    const client = new VoiceApiClient({
      apiKey: "test-secret",
      baseUrl: "https://api.example.test/api/",
      fetch: fetchMock,
      logger,
    });

    const call = await client.createCall();

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.example.test/api/calls");
    expect(init.method).toBe("POST");
    expect(JSON.parse(String(init.body))).toEqual({
      systemPrompt: "You are a helpful AI assistant that provides clear and concise information.",
      model: "fixie-ai/ultravox",
      voice: "Mark",
      firstSpeaker: "FIRST_SPEAKER_AGENT",
      initialOutputMedium: "MESSAGE_MEDIUM_VOICE",
      joinTimeout: "30s",
      maxDuration: "600s",
      medium: { serverWebSocket: { inputSampleRate: 8000, outputSampleRate: 8000 } },
    });
    expect(call).toMatchObject({
      callId: "call-1",
      joinUrl: "wss://voice.example.test/calls/call-1",
      maxDuration: 600000,
      joinTimeout: 30000,
      recordingEnabled: false,
      errorCount: 0,
    });
    expect(lines.info).toEqual(["[VoiceApiClient] Created call call-1"]);
  });

  it("applies options over the defaults", async () => {
    const fetchMock = respondWith(JSON.stringify(CALL_RESPONSE));
    await createClient(fetchMock).createCall([withRecording(true)]);

    const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body.recordingEnabled).toBe(true);
    expect(body.voice).toBe("Mark");
  });

  it("routes agent calls and query flags", async () => {
    const fetchMock = respondWith(JSON.stringify(CALL_RESPONSE));
    await createClient(fetchMock).createCall([withAgent("agent 1"), withPriorCall("call-0"), withGreetingPrompt()]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      "https://api.example.test/api/agents/agent%201/calls?enableGreetingPrompt=true&priorCallId=call-0"
    );
    const body = JSON.parse(String(init.body));
    expect(body).not.toHaveProperty("agentId");
    expect(body).not.toHaveProperty("priorCallId");
  });

  it("reports HTTP failures with the status and body", async () => {
    const client = createClient(respondWith("quota exceeded", 429));

    const result = client.createCall();

    await expect(result).rejects.toBeInstanceOf(VoiceApiError);
    await expect(result).rejects.toThrow("Voice API call creation failed: 429 - quota exceeded");
    await expect(result).rejects.toHaveProperty("status", 429);
  });

  it("reports an undecodable body", async () => {
    await expect(createClient(respondWith("<html>")).createCall()).rejects.toThrow(
      "Failed to decode call response"
    );
  });

  it("reports a response missing required fields", async () => {
    await expect(createClient(respondWith(JSON.stringify({ joinUrl: "wss://x" }))).createCall()).rejects.toThrow(
      "Invalid call response: callId: Required"
    );
  });

  it("requires a join URL", async () => {
    await expect(createClient(respondWith(JSON.stringify({ callId: "call-1" }))).createCall()).rejects.toThrow(
      "API did not return a valid join URL"
    );
  });

  it("wraps transport failures", async () => {
    const failing: FetchFn = async () => {
      throw new TypeError("fetch failed");
    };
    await expect(createClient(failing).createCall()).rejects.toThrow("Voice API request failed: fetch failed");
  });

  it("times out", async () => {
    await expect(createClient(hangingFetch, 20).createCall()).rejects.toThrow(
      "Voice API request timed out after 20ms"
    );
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    const result = createClient(hangingFetch).createCall([], controller.signal);

    controller.abort();

    await expect(result).rejects.toBeInstanceOf(CancellationError);
    await expect(result).rejects.toThrow("Call creation cancelled");
  });

  it("does not send when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(createClient(hangingFetch).createCall([], controller.signal)).rejects.toThrow(
      "Call creation cancelled"
    );
  });
});

describe("defaultCallRequest", () => {
  it("uses the sample rate for both directions", () => {
    expect(defaultCallRequest(16000).medium).toEqual({
      serverWebSocket: { inputSampleRate: 16000, outputSampleRate: 16000 },
    });
  });
});
