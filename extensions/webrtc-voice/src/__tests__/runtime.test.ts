import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import WebSocket from "ws";
import { RtpPacket } from "werift";
import { applyCallOptions } from "../call-request.js";
import { parseVoiceBridgeConfig } from "../config.js";
import { MockVoiceService } from "../mock-voice-service.js";
import { buildCallOptions, createVoiceBridgeRuntime, type VoiceBridgeRuntime } from "../runtime.js";
import { createFakePeerFactory, createRecordingLogger } from "./test-helpers.js";

describe("buildCallOptions", () => {
  it("asks for 8 kHz PCM over a server WebSocket with the configured greeting", () => {
    const { voice } = parseVoiceBridgeConfig({ voice: { greeting: "Hi!", agentId: "agent-1" } });

    const request = applyCallOptions({}, buildCallOptions(voice, 8000));

    expect(request.medium).toEqual({ serverWebSocket: { inputSampleRate: 8000, outputSampleRate: 8000 } });
    expect(request.firstSpeakerSettings).toEqual({ agent: { text: "Hi!" } });
    expect(request.vadSettings?.turnEndpointDelayMs).toBe(400);
    expect(request.inactivityMessages?.map((m) => m.durationMs)).toEqual([5000, 15000, 20000]);
    expect(request.agentId).toBe("agent-1");
  });

  it("leaves the agent unset by default", () => {
    const { voice } = parseVoiceBridgeConfig({});
    expect(applyCallOptions({}, buildCallOptions(voice, 8000)).agentId).toBeUndefined();
  });
});

describe("createVoiceBridgeRuntime", () => {
  let service: MockVoiceService;
  let runtime: VoiceBridgeRuntime;
  let peers: ReturnType<typeof createFakePeerFactory>["peers"];
  let lines: ReturnType<typeof createRecordingLogger>["lines"];

  beforeEach(async () => {
    service = new MockVoiceService();
    await service.start();

    const fake = createFakePeerFactory();
    peers = fake.peers;
    const recording = createRecordingLogger();
    lines = recording.lines;

    runtime = createVoiceBridgeRuntime({
      config: parseVoiceBridgeConfig({
        serve: { port: 0, bind: "127.0.0.1" },
        media: { inboundCodecs: ["PCMA", "PCMU"] },
      }),
      logger: recording.logger,
      createPeer: fake.factory,
      callCreator: service.createCallCreator(),
    });
    await runtime.start();
  });

  afterEach(async () => {
    await runtime.stop();
    await service.stop();
  });

  it("logs the negotiated codec table with PCMU first", () => {
    expect(lines.info[0]).toBe("[webrtc-voice] Negotiated codecs: audio/PCMU, audio/PCMA");
  });

  it("bridges a browser offer to the voice service end to end", async () => {
    const observer = new WebSocket(`ws://127.0.0.1:${runtime.server.port}/ws`);
    const mirrored: string[] = [];
    observer.on("message", (data) => mirrored.push(data.toString()));
    await new Promise((resolve) => observer.once("open", resolve));

    const res = await fetch(`http://127.0.0.1:${runtime.server.port}/api/sdp/offer`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ type: "offer", sdp: { type: "offer", sdp: "v=0 browser" } }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ type: "answer", sdp: { type: "answer", sdp: "answer-for:v=0 browser" } });

    peers[0].setState("connected");
    await vi.waitFor(() => expect(runtime.bridge.getActiveSession()?.state).toBe("connected"));

    await service.sendAudio(Buffer.alloc(320));
    await service.sendState("listening");

    await vi.waitFor(() => expect(peers[0].written).toHaveLength(1));
    expect(RtpPacket.deSerialize(peers[0].written[0]).header.ssrc).toBe(12345);
    await vi.waitFor(() => expect(mirrored).toEqual(['{"type":"state","state":"listening"}']));

    observer.close();
  });

  it("ends the session on stop", async () => {
    const ended: unknown[] = [];
    runtime.bridge.on("sessionEnded", (event) => ended.push(event));
    await runtime.bridge.handleOffer({ type: "offer", sdp: "v=0" });
    peers[0].setState("connected");
    const sessionId = runtime.registry.getActive()?.sessionId;

    await runtime.stop();

    expect(ended).toEqual([{ sessionId, reason: "shutdown" }]);
    expect(runtime.registry.getActive()).toBeUndefined();
  });
});
