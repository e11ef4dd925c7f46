/**
 * Control Message Parsing
 *
 * Handles JSON decoding of the text frames the voice service sends on the
 * control channel. Parsing happens in two steps so a frame can be mirrored
 * to the observer before its fields are checked:
 *   1. parseControlEnvelope(): JSON object with a string `type`
 *   2. decodeControlEvent(): typed event for local handling
 */

import { MalformedControlMessageError } from "./errors.js";
import type {
  ControlEnvelope,
  ControlEvent,
  TranscriptEvent,
  VoiceErrorEvent,
  VoiceStateEvent,
} from "./types.js";

/** Max control frame size in bytes (1MB) */
const MAX_MESSAGE_SIZE = 1024 * 1024;

/**
 * Parse a text frame into an envelope.
 *
 * @param raw Frame text from the voice WebSocket
 * @throws MalformedControlMessageError on invalid JSON, a non-object, or a missing `type`
 */
export function parseControlEnvelope(raw: string): ControlEnvelope {
  if (raw.length > MAX_MESSAGE_SIZE) {
    throw new MalformedControlMessageError("Message too large", undefined);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new MalformedControlMessageError("Invalid JSON", raw);
  }

  if (!isRecord(json)) {
    throw new MalformedControlMessageError("Message must be an object", raw);
  }

  const messageType = json.type;
  if (typeof messageType !== "string" || messageType.length === 0) {
    throw new MalformedControlMessageError("Message missing 'type' field", raw);
  }

  return { raw, messageType, message: json };
}

/**
 * Decode an envelope into a typed control event.
 * Unrecognized kinds decode to an "unknown" event rather than failing.
 *
 * @throws MalformedControlMessageError if a known kind has mistyped fields
 */
export function decodeControlEvent(envelope: ControlEnvelope): ControlEvent {
  const { message, raw } = envelope;

  switch (envelope.messageType) {
    case "transcript":
      return parseTranscript(message, raw);
    case "error":
      return parseError(message, raw);
    case "state":
      return parseState(message, raw);
    default:
      return { type: "unknown", messageType: envelope.messageType, raw: message };
  }
}

/**
 * Parse and decode in one step.
 */
export function parseControlMessage(raw: string): ControlEvent {
  return decodeControlEvent(parseControlEnvelope(raw));
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual event parsers
// ─────────────────────────────────────────────────────────────────────────────

function parseTranscript(
  msg: Record<string, unknown>,
  raw: string,
): TranscriptEvent {
  return {
    type: "transcript",
    role: optionalString(msg, "role", raw),
    final: optionalBoolean(msg, "final", raw),
    text: optionalString(msg, "text", raw),
    delta: optionalString(msg, "delta", raw),
  };
}

function parseError(
  msg: Record<string, unknown>,
  raw: string,
): VoiceErrorEvent {
  return { type: "error", error: optionalString(msg, "error", raw) };
}

function parseState(
  msg: Record<string, unknown>,
  raw: string,
): VoiceStateEvent {
  return { type: "state", state: optionalString(msg, "state", raw) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation helpers
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Absent or null reads as "", any other non-string is an error.
 */
function optionalString(
  msg: Record<string, unknown>,
  field: string,
  raw: string,
): string {
  const value = msg[field];
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value !== "string") {
    throw new MalformedControlMessageError(`Field '${field}' must be a string`, raw);
  }
  return value;
}

function optionalBoolean(
  msg: Record<string, unknown>,
  field: string,
  raw: string,
): boolean {
  const value = msg[field];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw new MalformedControlMessageError(`Field '${field}' must be a boolean`, raw);
  }
  return value;
}
