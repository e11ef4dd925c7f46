/**
 * Cancellation Token with AbortController
 *
 * Binds the lifetime of a bridge session's voice connection. Aborting the
 * token cancels an in-flight call-creation request (through its signal)
 * and closes the voice WebSocket, which ends its read loop.
 */

/**
 * Cancellation token shared by the call-creation request and the voice
 * connection of one session.
 */
export class CancellationToken {
  private readonly abortController = new AbortController();

  /**
   * Get the AbortSignal for use with fetch() and other abort-aware APIs.
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Cancel all operations using this token.
   */
  abort(): void {
    this.abortController.abort();
  }

  isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Register a callback for cancellation. Runs immediately if the token is
   * already cancelled.
   *
   * @returns Function that removes the callback
   */
  onCancel(callback: () => void): () => void {
    const signal = this.abortController.signal;
    if (signal.aborted) {
      callback();
      return () => {};
    }
    signal.addEventListener("abort", callback, { once: true });
    return () => signal.removeEventListener("abort", callback);
  }

  /**
   * Throw if cancelled (for checkpoint-style cancellation).
   * Use this at checkpoints between async operations.
   */
  throwIfCancelled(): void {
    if (this.isCancelled()) {
      throw new CancellationError("Operation cancelled");
    }
  }
}

/**
 * Error thrown when an operation is cancelled.
 */
export class CancellationError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancellationError";
  }

  /**
   * Check if an error is an AbortError (from fetch abort).
   */
  static isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === "AbortError";
  }

  /**
   * Check if an error is a cancellation (either CancellationError or AbortError).
   */
  static isCancellation(err: unknown): boolean {
    return err instanceof CancellationError || CancellationError.isAbortError(err);
  }
}
