/**
 * Voice API Call Model
 *
 * Request and response shapes for creating a voice-AI call. Durations are
 * milliseconds here and become "<seconds>s" strings on the wire.
 */

import { z } from "zod";
import { formatDuration, parseDuration } from "./duration.js";
import { errorMessage } from "./errors.js";

export type OutputMedium = "MESSAGE_MEDIUM_VOICE" | "MESSAGE_MEDIUM_TEXT";

/** @deprecated Use firstSpeakerSettings */
export type FirstSpeaker = "FIRST_SPEAKER_AGENT" | "FIRST_SPEAKER_USER";

export type EndBehavior =
  | "END_BEHAVIOR_UNSPECIFIED"
  | "END_BEHAVIOR_HANG_UP_SOFT"
  | "END_BEHAVIOR_HANG_UP_STRICT";

/**
 * Message spoken after a period of user inactivity.
 */
export interface TimedMessage {
  durationMs: number;
  message: string;
  endBehavior?: EndBehavior;
}

export interface AgentGreeting {
  uninterruptible?: boolean;
  text?: string;
  prompt?: string;
  delayMs?: number;
}

export interface FallbackAgentGreeting {
  delayMs?: number;
  text?: string;
  prompt?: string;
}

export interface FirstSpeakerSettings {
  user?: { fallback?: FallbackAgentGreeting };
  agent?: AgentGreeting;
}

/**
 * Voice activity detection tuning.
 */
export interface VadSettings {
  turnEndpointDelayMs?: number;
  minimumTurnDurationMs?: number;
  minimumInterruptionDurationMs?: number;
  frameActivationThreshold?: number;
}

/**
 * Raw PCM over a server-side WebSocket (what this bridge uses).
 */
export interface WebSocketMedium {
  inputSampleRate: number;
  outputSampleRate?: number;
  clientBufferSizeMs?: number;
}

export interface SipOutgoing {
  to: string;
  from: string;
  username?: string;
  password?: string;
}

/**
 * Exactly one member should be set.
 */
export interface CallMedium {
  webRtc?: Record<string, never>;
  twilio?: Record<string, never>;
  serverWebSocket?: WebSocketMedium;
  telnyx?: Record<string, never>;
  plivo?: Record<string, never>;
  exotel?: Record<string, never>;
  sip?: { incoming?: Record<string, never>; outgoing?: SipOutgoing };
}

/**
 * Third-party TTS voice. Exactly one member should be set.
 */
export interface ExternalVoice {
  elevenLabs?: { voiceId: string; model?: string; speed?: number; stability?: number };
  cartesia?: { voiceId: string; model?: string; speed?: number; emotion?: string };
  playHt?: { userId: string; voiceId: string; model?: string; speed?: number };
  lmnt?: { voiceId: string; model?: string; speed?: number; conversational?: boolean };
  generic?: { url: string; headers?: Record<string, string>; body?: unknown };
}

export interface InitialMessage {
  role?: string;
  text?: string;
  invocationId?: string;
  toolName?: string;
  errorDetails?: string;
  medium?: OutputMedium;
}

export interface DataConnectionConfig {
  websocketUrl: string;
  audioConfig?: { sampleRate?: number; channelMode?: string };
}

export interface TemplateContext {
  userFirstname?: string;
  lastCallTranscript?: string;
}

/**
 * Call creation request.
 */
export interface CallRequest {
  systemPrompt?: string;
  temperature?: number;
  model?: string;
  voice?: string;
  externalVoice?: ExternalVoice;
  languageHint?: string;
  initialMessages?: InitialMessage[];
  joinTimeoutMs?: number;
  maxDurationMs?: number;
  timeExceededMessage?: string;
  inactivityMessages?: TimedMessage[];
  medium?: CallMedium;
  recordingEnabled?: boolean;
  firstSpeaker?: FirstSpeaker;
  initialOutputMedium?: OutputMedium;
  firstSpeakerSettings?: FirstSpeakerSettings;
  vadSettings?: VadSettings;
  experimentalSettings?: unknown;
  metadata?: Record<string, string>;
  initialState?: unknown;
  dataConnection?: DataConnectionConfig;
  templateContext?: TemplateContext;
  /** Continue from a previous call (query parameter, not body) */
  priorCallId?: string;
  /** Ask the agent to greet (query parameter, not body) */
  enableGreetingPrompt?: boolean;
  /** Create the call against an agent (path segment, not body) */
  agentId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Request option, applied over the client defaults in order.
 */
export type CallOption = (request: CallRequest) => CallRequest;

/**
 * Apply options to a base request without mutating it.
 */
export function applyCallOptions(base: CallRequest, options: readonly CallOption[]): CallRequest {
  return options.reduce<CallRequest>((request, option) => option(request), { ...base });
}

export function withWebSocketMedium(inputSampleRate: number, outputSampleRate: number): CallOption {
  return (request) => ({
    ...request,
    medium: { serverWebSocket: { inputSampleRate, outputSampleRate } },
  });
}

/**
 * The agent speaks first with `text`.
 */
export function withAgentFirstSpeaker(
  text: string,
  options: { uninterruptible?: boolean; prompt?: string; delayMs?: number } = {},
): CallOption {
  return (request) => ({
    ...request,
    firstSpeakerSettings: { agent: { text, ...options } },
  });
}

/**
 * The user speaks first; the agent falls back to a greeting after a delay.
 */
export function withUserFirstSpeaker(fallback: FallbackAgentGreeting = {}): CallOption {
  return (request) => ({ ...request, firstSpeakerSettings: { user: { fallback } } });
}

/**
 * Add an inactivity message.
 */
export function withTimedMessage(
  durationMs: number,
  message: string,
  endBehavior: EndBehavior = "END_BEHAVIOR_UNSPECIFIED",
): CallOption {
  return (request) => ({
    ...request,
    inactivityMessages: [...(request.inactivityMessages ?? []), { durationMs, message, endBehavior }],
  });
}

export function withVadSettings(vadSettings: VadSettings): CallOption {
  return (request) => ({ ...request, vadSettings: { ...request.vadSettings, ...vadSettings } });
}

export function withMaxDuration(maxDurationMs: number): CallOption {
  return (request) => ({ ...request, maxDurationMs });
}

export function withRecording(recordingEnabled: boolean): CallOption {
  return (request) => ({ ...request, recordingEnabled });
}

export function withAgent(agentId: string): CallOption {
  return (request) => ({ ...request, agentId });
}

/**
 * Continue the conversation of an earlier call.
 */
export function withPriorCall(priorCallId: string): CallOption {
  return (request) => ({ ...request, priorCallId });
}

/**
 * Mirror call events and audio to a second WebSocket.
 */
export function withDataConnection(websocketUrl: string, sampleRate?: number): CallOption {
  return (request) => ({
    ...request,
    dataConnection: { websocketUrl, ...(sampleRate !== undefined && { audioConfig: { sampleRate } }) },
  });
}

export function withGreetingPrompt(): CallOption {
  return (request) => ({ ...request, enableGreetingPrompt: true });
}

/**
 * VAD settings the voice service recommends as a starting point.
 */
export function defaultVadSettings(): VadSettings {
  return {
    turnEndpointDelayMs: 384,
    minimumTurnDurationMs: 0,
    minimumInterruptionDurationMs: 90,
    frameActivationThreshold: 0.1,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Wire format
// ─────────────────────────────────────────────────────────────────────────────

function optionalDuration(ms: number | undefined): string | undefined {
  return ms === undefined ? undefined : formatDuration(ms);
}

/**
 * Drop undefined members so they are omitted, not sent as null.
 */
function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

function serializeGreeting(greeting: AgentGreeting | FallbackAgentGreeting): Record<string, unknown> {
  const { delayMs, ...rest } = greeting;
  return compact({ ...rest, delay: optionalDuration(delayMs) });
}

/**
 * Build the JSON body for a call request. Routing fields (agentId,
 * priorCallId, enableGreetingPrompt) are not part of the body.
 */
export function serializeCallRequest(request: CallRequest): Record<string, unknown> {
  const {
    joinTimeoutMs,
    maxDurationMs,
    inactivityMessages,
    firstSpeakerSettings,
    vadSettings,
    priorCallId: _priorCallId,
    enableGreetingPrompt: _enableGreetingPrompt,
    agentId: _agentId,
    ...rest
  } = request;

  let firstSpeaker: Record<string, unknown> | undefined;
  if (firstSpeakerSettings) {
    firstSpeaker = compact({
      agent: firstSpeakerSettings.agent && serializeGreeting(firstSpeakerSettings.agent),
      user: firstSpeakerSettings.user && {
        ...(firstSpeakerSettings.user.fallback && {
          fallback: serializeGreeting(firstSpeakerSettings.user.fallback),
        }),
      },
    });
  }

  return compact({
    ...rest,
    joinTimeout: optionalDuration(joinTimeoutMs),
    maxDuration: optionalDuration(maxDurationMs),
    inactivityMessages: inactivityMessages?.map((m) =>
      compact({ duration: formatDuration(m.durationMs), message: m.message, endBehavior: m.endBehavior }),
    ),
    firstSpeakerSettings: firstSpeaker,
    vadSettings:
      vadSettings &&
      compact({
        turnEndpointDelay: optionalDuration(vadSettings.turnEndpointDelayMs),
        minimumTurnDuration: optionalDuration(vadSettings.minimumTurnDurationMs),
        minimumInterruptionDuration: optionalDuration(vadSettings.minimumInterruptionDurationMs),
        frameActivationThreshold: vadSettings.frameActivationThreshold,
      }),
  });
}

const DurationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
    return z.NEVER;
  }
});

/**
 * Call creation response.
 */
export const CallSchema = z.object({
  callId: z.string(),
  clientVersion: z.string().optional(),
  joinUrl: z.string().default(""),
  created: z.string().optional(),
  joined: z.string().nullish(),
  ended: z.string().nullish(),
  endReason: z.string().nullish(),
  maxDuration: DurationSchema.optional(),
  joinTimeout: DurationSchema.optional(),
  firstSpeaker: z.enum(["FIRST_SPEAKER_AGENT", "FIRST_SPEAKER_USER"]).optional(),
  initialOutputMedium: z.enum(["MESSAGE_MEDIUM_VOICE", "MESSAGE_MEDIUM_TEXT"]).optional(),
  firstSpeakerSettings: z.record(z.unknown()).nullish(),
  medium: z.record(z.unknown()).nullish(),
  recordingEnabled: z.boolean().default(false),
  errorCount: z.number().default(0),
  shortSummary: z.string().nullish(),
  summary: z.string().nullish(),
});

/**
 * Call as returned by the API. `maxDuration`/`joinTimeout` are in ms.
 */
export type Call = z.infer<typeof CallSchema>;
