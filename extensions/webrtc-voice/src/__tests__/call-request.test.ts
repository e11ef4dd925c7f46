import { describe, it, expect } from "vitest";
import {
  CallSchema,
  applyCallOptions,
  defaultVadSettings,
  serializeCallRequest,
  withAgent,
  withAgentFirstSpeaker,
  withDataConnection,
  withGreetingPrompt,
  withMaxDuration,
  withPriorCall,
  withRecording,
  withTimedMessage,
  withUserFirstSpeaker,
  withVadSettings,
  withWebSocketMedium,
  type CallRequest,
} from "../call-request.js";

describe("call options", () => {
  it("apply in order without touching the base request", () => {
    const base: CallRequest = { systemPrompt: "Be brief.", maxDurationMs: 600000 };

    const request = applyCallOptions(base, [
      withMaxDuration(120000),
      withRecording(true),
      withWebSocketMedium(8000, 8000),
      withMaxDuration(60000),
    ]);

    expect(request).toEqual({
      systemPrompt: "Be brief.",
      maxDurationMs: 60000,
      recordingEnabled: true,
      medium: { serverWebSocket: { inputSampleRate: 8000, outputSampleRate: 8000 } },
    });
    expect(base).toEqual({ systemPrompt: "Be brief.", maxDurationMs: 600000 });
  });

  it("append timed messages", () => {
    const request = applyCallOptions({}, [
      withTimedMessage(5000, "Still there?"),
      withTimedMessage(20000, "Goodbye.", "END_BEHAVIOR_HANG_UP_SOFT"),
    ]);

    expect(request.inactivityMessages).toEqual([
      { durationMs: 5000, message: "Still there?", endBehavior: "END_BEHAVIOR_UNSPECIFIED" },
      { durationMs: 20000, message: "Goodbye.", endBehavior: "END_BEHAVIOR_HANG_UP_SOFT" },
    ]);
  });

  it("merge VAD settings", () => {
    const request = applyCallOptions({}, [
      withVadSettings(defaultVadSettings()),
      withVadSettings({ turnEndpointDelayMs: 400 }),
    ]);

    expect(request.vadSettings).toEqual({
      turnEndpointDelayMs: 400,
      minimumTurnDurationMs: 0,
      minimumInterruptionDurationMs: 90,
      frameActivationThreshold: 0.1,
    });
  });

  it("set the first speaker", () => {
    expect(applyCallOptions({}, [withAgentFirstSpeaker("Hello!")]).firstSpeakerSettings).toEqual({
      agent: { text: "Hello!" },
    });
    expect(
      applyCallOptions({}, [withAgentFirstSpeaker("Hello!"), withUserFirstSpeaker({ delayMs: 2000 })])
        .firstSpeakerSettings
    ).toEqual({ user: { fallback: { delayMs: 2000 } } });
  });

  it("set routing fields", () => {
    const request = applyCallOptions({}, [withAgent("agent-1"), withPriorCall("call-0"), withGreetingPrompt()]);
    expect(request).toEqual({ agentId: "agent-1", priorCallId: "call-0", enableGreetingPrompt: true });
  });

  it("add a data connection", () => {
    expect(applyCallOptions({}, [withDataConnection("wss://data.example.test")]).dataConnection).toEqual({
      websocketUrl: "wss://data.example.test",
    });
    expect(applyCallOptions({}, [withDataConnection("wss://data.example.test", 8000)]).dataConnection).toEqual({
      websocketUrl: "wss://data.example.test",
      audioConfig: { sampleRate: 8000 },
    });
  });
});

describe("serializeCallRequest", () => {
  it("writes durations as seconds and leaves routing fields out", () => {
    const body = serializeCallRequest({
      systemPrompt: "Be brief.",
      model: "fixie-ai/ultravox",
      voice: "Mark",
      joinTimeoutMs: 30000,
      maxDurationMs: 600000,
      medium: { serverWebSocket: { inputSampleRate: 8000, outputSampleRate: 8000 } },
      inactivityMessages: [{ durationMs: 5000, message: "Still there?", endBehavior: "END_BEHAVIOR_UNSPECIFIED" }],
      firstSpeakerSettings: { agent: { text: "Hello!", delayMs: 1500 } },
      vadSettings: defaultVadSettings(),
      agentId: "agent-1",
      priorCallId: "call-0",
      enableGreetingPrompt: true,
    });

    expect(body).toEqual({
      systemPrompt: "Be brief.",
      model: "fixie-ai/ultravox",
      voice: "Mark",
      joinTimeout: "30s",
      maxDuration: "600s",
      medium: { serverWebSocket: { inputSampleRate: 8000, outputSampleRate: 8000 } },
      inactivityMessages: [{ duration: "5s", message: "Still there?", endBehavior: "END_BEHAVIOR_UNSPECIFIED" }],
      firstSpeakerSettings: { agent: { text: "Hello!", delay: "1.5s" } },
      vadSettings: {
        turnEndpointDelay: "0.384s",
        minimumTurnDuration: "0s",
        minimumInterruptionDuration: "0.09s",
        frameActivationThreshold: 0.1,
      },
    });
  });

  it("omits unset fields entirely", () => {
    const body = serializeCallRequest({ systemPrompt: "Be brief.", temperature: undefined });
    expect(Object.keys(body)).toEqual(["systemPrompt"]);
  });

  it("writes a user-first fallback greeting", () => {
    const body = serializeCallRequest(
      applyCallOptions({}, [withUserFirstSpeaker({ delayMs: 2000, text: "Anyone there?" })])
    );
    expect(body).toEqual({
      firstSpeakerSettings: { user: { fallback: { text: "Anyone there?", delay: "2s" } } },
    });
  });
});

describe("CallSchema", () => {
  it("reads API durations as milliseconds and fills defaults", () => {
    const call = CallSchema.parse({
      callId: "call-1",
      joinUrl: "wss://voice.example.test/calls/call-1",
      created: "2026-01-01T00:00:00Z",
      maxDuration: "600s",
      joinTimeout: "30s",
      firstSpeaker: "FIRST_SPEAKER_AGENT",
      joined: null,
    });

    expect(call).toEqual({
      callId: "call-1",
      joinUrl: "wss://voice.example.test/calls/call-1",
      created: "2026-01-01T00:00:00Z",
      maxDuration: 600000,
      joinTimeout: 30000,
      firstSpeaker: "FIRST_SPEAKER_AGENT",
      joined: null,
      recordingEnabled: false,
      errorCount: 0,
    });
  });

  it("reports an unreadable duration", () => {
    const result = CallSchema.safeParse({ callId: "call-1", maxDuration: "soon" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["maxDuration"]);
      expect(result.error.issues[0].message).toBe('Invalid duration format: "soon"');
    }
  });
});
