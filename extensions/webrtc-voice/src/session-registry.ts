/**
 * Session Registry
 *
 * Single slot for the active bridge session, plus the single observer
 * connection. Replacement is unconditional: a new session overwrites the
 * previous reference and nothing is queued or merged.
 *
 * Every method is synchronous, so on Node's single event loop each call
 * runs to completion before any other callback can observe the slot.
 * Sessions are fully constructed before setActive() publishes them.
 */

import type { BridgeSession } from "./bridge-session.js";

/**
 * Observer that mirrors control frames to a browser client.
 */
export interface Observer {
  readonly id: string;
  /**
   * Send one text frame.
   *
   * @throws SendFailureError if the connection is not open
   */
  send(text: string): void;
}

export class SessionRegistry {
  private active: BridgeSession | undefined;
  private observer: Observer | undefined;

  /**
   * Publish a session, replacing any previous one.
   *
   * @returns The replaced session, if any
   */
  setActive(session: BridgeSession): BridgeSession | undefined {
    const previous = this.active;
    this.active = session;
    return previous;
  }

  getActive(): BridgeSession | undefined {
    return this.active;
  }

  /**
   * Clear the slot only if it still holds `session`.
   *
   * @returns true if the slot was cleared
   */
  clearActive(session: BridgeSession): boolean {
    if (this.active !== session) {
      return false;
    }
    this.active = undefined;
    return true;
  }

  /**
   * Attach the observer, replacing any previous one.
   */
  attachObserver(observer: Observer): Observer | undefined {
    const previous = this.observer;
    this.observer = observer;
    return previous;
  }

  getObserver(): Observer | undefined {
    return this.observer;
  }

  /**
   * Detach the observer only if it is still the attached one.
   */
  detachObserver(observer: Observer): boolean {
    if (this.observer !== observer) {
      return false;
    }
    this.observer = undefined;
    return true;
  }
}
