/**
 * WebRTC Voice Bridge Runtime
 *
 * Creates and wires the bridge components:
 * - SessionRegistry (active session + observer slots)
 * - MediaNegotiator over werift peers
 * - VoiceApiClient (call creation)
 * - VoiceBridge (session lifecycle)
 * - SignalingServer (offer endpoint + observer WebSocket)
 */

import { VoiceBridge } from "./bridge.js";
import {
  defaultVadSettings,
  withAgent,
  withAgentFirstSpeaker,
  withTimedMessage,
  withVadSettings,
  withWebSocketMedium,
  type CallOption,
} from "./call-request.js";
import { resolveNegotiatedCodecs } from "./codecs.js";
import type { VoiceBridgeConfig, VoiceConfig } from "./config.js";
import type { StatefulDecoderFactory } from "./inbound-transcoder.js";
import type { Logger } from "./logger.js";
import { MediaNegotiator } from "./media-negotiation.js";
import type { MediaPeerFactory } from "./media-peer.js";
import {
  VoiceApiClient,
  defaultCallRequest,
  type CallCreator,
  type FetchFn,
} from "./providers/voice-api.js";
import { SessionRegistry } from "./session-registry.js";
import { SignalingServer } from "./signaling-server.js";
import { createWeriftPeerFactory } from "./werift-peer.js";

/**
 * Runtime initialization parameters.
 */
export interface VoiceBridgeRuntimeParams {
  config: VoiceBridgeConfig;
  logger?: Logger;
  /** Peer engine (default: werift) */
  createPeer?: MediaPeerFactory;
  /** Call creation (default: VoiceApiClient from config.voice) */
  callCreator?: CallCreator;
  /** HTTP implementation for the default VoiceApiClient */
  fetch?: FetchFn;
  /** Override for stateful decoder construction */
  createStatefulDecoder?: StatefulDecoderFactory;
}

/**
 * Runtime instance containing all components.
 */
export interface VoiceBridgeRuntime {
  config: VoiceBridgeConfig;
  registry: SessionRegistry;
  bridge: VoiceBridge;
  server: SignalingServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Per-call options derived from the voice config.
 */
export function buildCallOptions(voice: VoiceConfig, sampleRate: number): CallOption[] {
  const options: CallOption[] = [
    withWebSocketMedium(sampleRate, sampleRate),
    withAgentFirstSpeaker(voice.greeting),
    withVadSettings({ ...defaultVadSettings(), turnEndpointDelayMs: voice.turnEndpointDelayMs }),
    ...voice.inactivityMessages.map((m) => withTimedMessage(m.durationMs, m.message, m.endBehavior)),
  ];
  if (voice.agentId) {
    options.push(withAgent(voice.agentId));
  }
  return options;
}

/**
 * Create the voice bridge runtime.
 */
export function createVoiceBridgeRuntime(params: VoiceBridgeRuntimeParams): VoiceBridgeRuntime {
  const { config, logger } = params;
  const { sampleRate } = config.media;

  const codecs = resolveNegotiatedCodecs(config.media.inboundCodecs);
  logger?.info(
    `[webrtc-voice] Negotiated codecs: ${codecs.map((c) => c.mimeType).join(", ")}`
  );

  const registry = new SessionRegistry();

  const negotiator = new MediaNegotiator({
    createPeer: params.createPeer ?? createWeriftPeerFactory(logger),
    codecs,
    iceServers: config.media.iceServers,
    iceGatheringTimeoutMs: config.media.iceGatheringTimeoutMs,
    logger,
  });

  const callCreator =
    params.callCreator ??
    new VoiceApiClient({
      apiKey: config.voice.apiKey,
      baseUrl: config.voice.apiBaseUrl,
      defaults: {
        ...defaultCallRequest(sampleRate),
        systemPrompt: config.voice.systemPrompt,
        model: config.voice.model,
        voice: config.voice.voice,
        temperature: config.voice.temperature,
        languageHint: config.voice.languageHint,
        joinTimeoutMs: config.voice.joinTimeoutSeconds * 1000,
        maxDurationMs: config.voice.maxDurationSeconds * 1000,
        recordingEnabled: config.voice.recordingEnabled,
      },
      timeoutMs: config.voice.httpTimeoutMs,
      fetch: params.fetch,
      logger,
    });

  const bridge = new VoiceBridge({
    negotiator,
    registry,
    callCreator,
    codecs,
    sampleRate,
    ssrc: config.media.ssrc,
    callOptions: buildCallOptions(config.voice, sampleRate),
    connectTimeoutMs: config.voice.connectTimeoutMs,
    peerConnectTimeoutMs: config.media.peerConnectTimeoutMs,
    createStatefulDecoder: params.createStatefulDecoder,
    logger,
  });

  const server = new SignalingServer({
    port: config.serve.port,
    bind: config.serve.bind,
    offerPath: config.serve.offerPath,
    observerPath: config.serve.observerPath,
    offerHandler: bridge,
    registry,
    logger,
  });

  return {
    config,
    registry,
    bridge,
    server,
    async start() {
      await server.start();
    },
    async stop() {
      await bridge.stop();
      await server.stop();
    },
  };
}
