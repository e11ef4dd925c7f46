/**
 * WebRTC Voice Bridge Configuration
 *
 * Defines Zod schemas for the bridge configuration.
 */

import { z } from "zod";
import { DEFAULT_API_BASE_URL } from "./providers/voice-api.js";

/**
 * HTTP server configuration.
 */
export const ServeConfigSchema = z.object({
  /** Port to listen on (default: 8080, 0 picks a free port) */
  port: z.number().int().min(0).max(65535).default(8080),
  /** Bind address (default: 0.0.0.0) */
  bind: z.string().default("0.0.0.0"),
  /** Offer endpoint path (default: /api/sdp/offer) */
  offerPath: z.string().startsWith("/").default("/api/sdp/offer"),
  /** Observer WebSocket path (default: /ws) */
  observerPath: z.string().startsWith("/").default("/ws"),
});

/**
 * Media (WebRTC) configuration.
 */
export const MediaConfigSchema = z.object({
  /** PCM sample rate in Hz. G.711 runs at 8 kHz, so this is fixed. */
  sampleRate: z.literal(8000).default(8000),

  /** Synchronization source stamped on outbound packets */
  ssrc: z
    .number()
    .int()
    .min(0)
    .max(0xffffffff)
    .default(12345)
    .describe("RTP SSRC for audio sent to the browser"),

  /** STUN/TURN server URLs */
  iceServers: z.array(z.string()).default(["stun:stun.l.google.com:19302"]),

  /** Codecs accepted from the browser, in preference order. PCMU is always included. */
  inboundCodecs: z
    .array(z.enum(["PCMU", "PCMA", "opus"]))
    .min(1)
    .default(["PCMU", "PCMA", "opus"])
    .describe("Codecs offered for browser → bridge audio"),

  /** Max time to wait for ICE gathering before answering (default: 30000) */
  iceGatheringTimeoutMs: z.number().int().min(100).max(120000).default(30000),

  /** Time an answered peer has to reach "connected" before it is closed (default: 30000) */
  peerConnectTimeoutMs: z.number().int().min(100).max(600000).default(30000),
});

/**
 * Inactivity message spoken when the user goes quiet.
 */
export const InactivityMessageSchema = z.object({
  durationMs: z.number().min(0),
  message: z.string().min(1),
  endBehavior: z
    .enum(["END_BEHAVIOR_UNSPECIFIED", "END_BEHAVIOR_HANG_UP_SOFT", "END_BEHAVIOR_HANG_UP_STRICT"])
    .default("END_BEHAVIOR_UNSPECIFIED"),
});

const DEFAULT_INACTIVITY_MESSAGES: z.input<typeof InactivityMessageSchema>[] = [
  {
    durationMs: 5000,
    message: "Are you still there? I'm here to help if you need anything.",
  },
  {
    durationMs: 15000,
    message: "I'll wait a bit longer in case you want to continue our conversation.",
  },
  {
    durationMs: 20000,
    message:
      "Since I haven't heard from you, I'll be ending our call now. Feel free to call back anytime if you need assistance!",
    endBehavior: "END_BEHAVIOR_HANG_UP_SOFT",
  },
];

/**
 * Voice service (call creation) configuration.
 */
export const VoiceConfigSchema = z.object({
  /** API key (uses VOICE_API_KEY env if not set) */
  apiKey: z.string().optional(),
  /** REST API base URL */
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  /** Create calls against a saved agent instead of an ad-hoc prompt */
  agentId: z.string().optional(),
  /** Model (default: fixie-ai/ultravox) */
  model: z.string().default("fixie-ai/ultravox"),
  /** Voice name (default: Mark) */
  voice: z.string().default("Mark"),
  /** System prompt for the call */
  systemPrompt: z
    .string()
    .default("You are a helpful AI assistant that provides clear and concise information."),
  /** First thing the agent says */
  greeting: z.string().default("Hello! How can I assist you today?"),
  /** Sampling temperature 0-1 */
  temperature: z.number().min(0).max(1).optional(),
  /** BCP-47 language hint */
  languageHint: z.string().optional(),
  /** Max call duration in seconds (default: 300) */
  maxDurationSeconds: z.number().min(10).max(3600).default(300),
  /** Time allowed for the bridge to join the call in seconds (default: 30) */
  joinTimeoutSeconds: z.number().min(1).max(300).default(30),
  /** Silence after speech before the turn ends in ms (default: 400) */
  turnEndpointDelayMs: z.number().min(0).max(5000).default(400),
  /** Record the call (default: false) */
  recordingEnabled: z.boolean().default(false),
  /** Prompts spoken during user inactivity */
  inactivityMessages: z.array(InactivityMessageSchema).default(DEFAULT_INACTIVITY_MESSAGES),
  /** Call-creation request timeout in ms (default: 15000) */
  httpTimeoutMs: z.number().int().min(1000).max(120000).default(15000),
  /** Voice WebSocket dial timeout in ms (default: 15000) */
  connectTimeoutMs: z.number().int().min(1000).max(120000).default(15000),
});

/**
 * Complete bridge configuration.
 */
export const VoiceBridgeConfigSchema = z.object({
  /** HTTP and observer endpoint settings */
  serve: ServeConfigSchema.default({}),

  /** WebRTC settings */
  media: MediaConfigSchema.default({}),

  /** Voice service settings */
  voice: VoiceConfigSchema.default({}),

  /** Minimum log level (default: info) */
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Inferred TypeScript type for the config.
 */
export type VoiceBridgeConfig = z.infer<typeof VoiceBridgeConfigSchema>;
export type VoiceConfig = z.infer<typeof VoiceConfigSchema>;

/**
 * Validate and parse a raw config object.
 */
export function parseVoiceBridgeConfig(raw: unknown): VoiceBridgeConfig {
  return VoiceBridgeConfigSchema.parse(raw);
}

function optionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * Build the config from environment variables. Unset variables fall back
 * to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VoiceBridgeConfig {
  return parseVoiceBridgeConfig({
    serve: {
      port: optionalInt(env.PORT, "PORT"),
      bind: nonEmpty(env.BIND),
    },
    voice: {
      apiKey: nonEmpty(env.VOICE_API_KEY),
      apiBaseUrl: nonEmpty(env.VOICE_API_BASE_URL),
      model: nonEmpty(env.VOICE_MODEL),
      voice: nonEmpty(env.VOICE_NAME),
      systemPrompt: nonEmpty(env.VOICE_SYSTEM_PROMPT),
      greeting: nonEmpty(env.VOICE_GREETING),
    },
    logLevel: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
  });
}
