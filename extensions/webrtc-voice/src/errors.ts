/**
 * Bridge Error Taxonomy
 *
 * Every failure in the relay stays local to the loop or operation that
 * raised it. These classes let callers tell them apart.
 */

/**
 * Base class for bridge errors.
 */
export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
  }
}

/**
 * Offer/answer exchange failed. Surfaced to the signaling caller.
 */
export class NegotiationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NegotiationError";
  }
}

/**
 * Packet carried a payload type outside the negotiated codec set.
 */
export class UnsupportedCodecError extends BridgeError {
  constructor(
    public readonly payloadType: number,
    public readonly mimeType?: string,
  ) {
    super(
      mimeType
        ? `Unsupported codec: ${mimeType} (payload type ${payloadType})`
        : `Unsupported codec: payload type ${payloadType}`,
    );
    this.name = "UnsupportedCodecError";
  }
}

/**
 * A read loop ended because its transport failed.
 */
export class TransportReadError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportReadError";
  }
}

/**
 * Text control frame could not be understood.
 */
export class MalformedControlMessageError extends BridgeError {
  constructor(
    message: string,
    public readonly rawMessage?: string,
  ) {
    super(message);
    this.name = "MalformedControlMessageError";
  }
}

/**
 * Best-effort write did not go out.
 */
export class SendFailureError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SendFailureError";
  }
}

/**
 * Call-creation request to the voice API failed.
 */
export class VoiceApiError extends BridgeError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VoiceApiError";
  }
}

/**
 * Describe an unknown thrown value for logs.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
