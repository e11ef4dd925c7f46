import { describe, it, expect } from "vitest";
import { loadConfigFromEnv, parseVoiceBridgeConfig } from "../config.js";

describe("parseVoiceBridgeConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseVoiceBridgeConfig({});

    expect(config.serve).toEqual({
      port: 8080,
      bind: "0.0.0.0",
      offerPath: "/api/sdp/offer",
      observerPath: "/ws",
    });
    expect(config.media).toEqual({
      sampleRate: 8000,
      ssrc: 12345,
      iceServers: ["stun:stun.l.google.com:19302"],
      inboundCodecs: ["PCMU", "PCMA", "opus"],
      iceGatheringTimeoutMs: 30000,
      peerConnectTimeoutMs: 30000,
    });
    expect(config.voice.apiBaseUrl).toBe("https://api.ultravox.ai/api");
    expect(config.voice.greeting).toBe("Hello! How can I assist you today?");
    expect(config.voice.turnEndpointDelayMs).toBe(400);
    expect(config.logLevel).toBe("info");
  });

  it("fills inactivity message end behaviors", () => {
    const { inactivityMessages } = parseVoiceBridgeConfig({}).voice;

    expect(inactivityMessages.map((m) => [m.durationMs, m.endBehavior])).toEqual([
      [5000, "END_BEHAVIOR_UNSPECIFIED"],
      [15000, "END_BEHAVIOR_UNSPECIFIED"],
      [20000, "END_BEHAVIOR_HANG_UP_SOFT"],
    ]);
  });

  it("only accepts the 8 kHz G.711 rate", () => {
    expect(() => parseVoiceBridgeConfig({ media: { sampleRate: 16000 } })).toThrow();
  });

  it("rejects an SSRC outside 32 bits", () => {
    expect(() => parseVoiceBridgeConfig({ media: { ssrc: 2 ** 32 } })).toThrow();
    expect(parseVoiceBridgeConfig({ media: { ssrc: 0xffffffff } }).media.ssrc).toBe(0xffffffff);
  });

  it("requires at least one inbound codec", () => {
    expect(() => parseVoiceBridgeConfig({ media: { inboundCodecs: [] } })).toThrow();
    expect(() => parseVoiceBridgeConfig({ media: { inboundCodecs: ["G722"] } })).toThrow();
  });

  it("rejects paths without a leading slash", () => {
    expect(() => parseVoiceBridgeConfig({ serve: { offerPath: "offer" } })).toThrow();
  });
});

describe("loadConfigFromEnv", () => {
  it("uses defaults when nothing is set", () => {
    const config = loadConfigFromEnv({});
    expect(config.serve.port).toBe(8080);
    expect(config.voice.apiKey).toBeUndefined();
  });

  it("reads the environment", () => {
    const config = loadConfigFromEnv({
      PORT: "9000",
      BIND: "127.0.0.1",
      VOICE_API_KEY: "test-secret",
      VOICE_API_BASE_URL: "https://voice.example.test/api",
      VOICE_MODEL: "test-model",
      VOICE_NAME: "Jessica",
      VOICE_SYSTEM_PROMPT: "Answer in one sentence.",
      VOICE_GREETING: "Hi there.",
      LOG_LEVEL: "DEBUG",
    });

    expect(config.serve.port).toBe(9000);
    expect(config.serve.bind).toBe("127.0.0.1");
    expect(config.voice).toMatchObject({
      apiKey: "test-secret",
      apiBaseUrl: "https://voice.example.test/api",
      model: "test-model",
      voice: "Jessica",
      systemPrompt: "Answer in one sentence.",
      greeting: "Hi there.",
    });
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty values as unset", () => {
    const config = loadConfigFromEnv({ PORT: "", VOICE_GREETING: "  ", BIND: "" });
    expect(config.serve.port).toBe(8080);
    expect(config.serve.bind).toBe("0.0.0.0");
    expect(config.voice.greeting).toBe("Hello! How can I assist you today?");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfigFromEnv({ PORT: "eighty" })).toThrow('PORT must be an integer, got "eighty"');
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfigFromEnv({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
