/**
 * Playhost Kernel — Messaging Bridge
 *
 * Publish/subscribe channel between the host and running game modules.
 * The host constructs one bridge and passes it by reference to whatever needs
 * to publish or subscribe; there is no process-wide instance.
 *
 * Properties:
 * - Ordered: one publish call invokes consumers in subscription order
 * - Isolated: a throwing consumer is logged and skipped; the rest still receive
 * - Mutation-safe: the consumer list is copy-on-write, so a consumer may
 *   subscribe or unsubscribe (itself or another) from inside its callback
 * - Synchronous: every consumer runs on the publisher's stack; nothing is queued
 *
 * Besides the broadcast list, the bridge holds at most one lobby-return
 * callback: a one-target control signal a running module uses to ask the host
 * to tear it down and show the module picker again.
 */

import { createLogger, describeError, type Logger } from '../logging/logger.js';
import type { Message } from '../types/message.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Callback that receives every published message. */
export type MessageConsumer = (message: Message) => void;

/** Callback invoked by {@link MessagingBridge.triggerReturn}. */
export type ReturnCallback = () => void;

/**
 * Handle returned by {@link MessagingBridge.subscribe}.
 *
 * Once unsubscribed it stays inactive; a second unsubscribe does nothing.
 */
export interface Subscription {
  readonly isActive: boolean;
  unsubscribe(): void;
}

export interface MessagingBridgeOptions {
  readonly log?: Logger | undefined;
}

// ---------------------------------------------------------------------------
// Subscription handle
// ---------------------------------------------------------------------------

class BridgeSubscription implements Subscription {
  private active: boolean;

  constructor(
    private readonly detach: ((sub: BridgeSubscription) => void) | null,
    active: boolean,
  ) {
    this.active = active;
  }

  get isActive(): boolean {
    return this.active;
  }

  unsubscribe(): void {
    if (!this.active) return;
    this.active = false;
    this.detach?.(this);
  }
}

interface ConsumerEntry {
  readonly consumer: MessageConsumer;
  readonly subscription: BridgeSubscription;
}

// ---------------------------------------------------------------------------
// Bridge
// ---------------------------------------------------------------------------

export class MessagingBridge {
  /**
   * Replaced, never mutated in place. A publish iterates the array it read at
   * the start of the call, so changes made during delivery only affect later
   * publishes.
   */
  private consumers: ReadonlyArray<ConsumerEntry> = [];
  private returnCallback: ReturnCallback | null = null;
  private readonly log: Logger;

  constructor(options?: MessagingBridgeOptions) {
    this.log = options?.log ?? createLogger('bridge');
  }

  // ── Consumers ───────────────────────────────────────────────────

  /**
   * Register a consumer for every subsequent publish.
   *
   * A value that is not a function, or a consumer already registered by
   * reference, is rejected with a warning and an inactive subscription.
   */
  subscribe(consumer: MessageConsumer): Subscription {
    if (typeof consumer !== 'function') {
      this.log.warn('Rejected subscription: consumer is not a function');
      return new BridgeSubscription(null, false);
    }

    if (this.consumers.some((e) => e.consumer === consumer)) {
      this.log.warn('Rejected subscription: consumer is already registered');
      return new BridgeSubscription(null, false);
    }

    const subscription = new BridgeSubscription((sub) => this.detach(sub), true);
    this.consumers = [...this.consumers, { consumer, subscription }];
    this.log.debug('Consumer added', { consumers: this.consumers.length });
    return subscription;
  }

  /** Same as `subscription.unsubscribe()`. */
  unsubscribe(subscription: Subscription): void {
    subscription.unsubscribe();
  }

  getConsumerCount(): number {
    return this.consumers.length;
  }

  // ── Publishing ──────────────────────────────────────────────────

  /**
   * Deliver a message to every consumer registered when the call starts.
   * With no consumers the message is dropped; that is a normal state (for
   * example before a UI attaches its mirror consumer).
   */
  publish(message: Message): void {
    if (message === null || typeof message !== 'object' || Array.isArray(message)) {
      this.log.warn('Dropped publish: message is not a mapping');
      return;
    }

    const snapshot = this.consumers;
    if (snapshot.length === 0) {
      this.log.info('No consumers registered; message dropped', {
        function: message['function'] ?? null,
      });
      return;
    }

    for (const entry of snapshot) {
      try {
        entry.consumer(message);
      } catch (err: unknown) {
        this.log.error('Consumer threw during publish', {
          function: message['function'] ?? null,
          error: describeError(err),
        });
      }
    }
  }

  /**
   * True when every required field is present on the message. Missing fields
   * are logged individually.
   */
  validateMessage(message: Message, ...requiredFields: string[]): boolean {
    let valid = true;
    for (const field of requiredFields) {
      if (!Object.prototype.hasOwnProperty.call(message, field)) {
        this.log.warn(`Message missing required field '${field}'`);
        valid = false;
      }
    }
    return valid;
  }

  // ── Lobby return ────────────────────────────────────────────────

  /** Install (or, with null, clear) the single lobby-return callback. */
  setReturnCallback(callback: ReturnCallback | null): void {
    this.returnCallback = callback;
    this.log.info(`Lobby return callback ${callback !== null ? 'registered' : 'cleared'}`);
  }

  hasReturnCallback(): boolean {
    return this.returnCallback !== null;
  }

  /**
   * Invoke the lobby-return callback. Without one this is a logged no-op;
   * a throwing callback is logged and not rethrown.
   */
  triggerReturn(): void {
    const callback = this.returnCallback;
    if (callback === null) {
      this.log.warn('triggerReturn() called but no callback is set');
      return;
    }
    try {
      callback();
    } catch (err: unknown) {
      this.log.error('Lobby return callback threw', { error: describeError(err) });
    }
  }

  // ── Internal ────────────────────────────────────────────────────

  private detach(subscription: BridgeSubscription): void {
    const next = this.consumers.filter((e) => e.subscription !== subscription);
    if (next.length !== this.consumers.length) {
      this.consumers = next;
      this.log.debug('Consumer removed', { consumers: next.length });
    }
  }
}
