/**
 * Playhost Kernel — Session Transcript
 *
 * In-memory record of one game session: a `meta` entry when the session
 * starts, then every message sent to the module (`outbound`) and every
 * message received from it (`inbound`), in the order they happened.
 * Persisting a transcript is the runtime host's job.
 */

import type { Message } from '../types/message.js';
import { isEndMessage } from './start-message.js';

export type TranscriptDirection = 'meta' | 'outbound' | 'inbound';

export interface TranscriptEntry {
  readonly direction: TranscriptDirection;
  /** ISO-8601. */
  readonly timestamp: string;
  readonly message: Message;
}

/** Source of timestamps; injectable so tests get stable values. */
export type Clock = () => Date;

export class Transcript {
  private readonly log: TranscriptEntry[] = [];
  private gameName = 'unknown';
  private ended = false;

  constructor(private readonly clock: Clock = () => new Date()) {}

  /** Clear previous entries and record the session header. */
  startSession(gameName: string, gameVersion: string): void {
    this.log.length = 0;
    this.ended = false;
    this.gameName = gameName;
    this.push('meta', { gameName, gameVersion });
  }

  /** Record a message the host sent to the module. */
  recordToGame(message: Message): void {
    this.push('outbound', message);
  }

  /** Record a message the module produced (reply or publish). */
  recordFromGame(message: Message): void {
    this.push('inbound', message);
  }

  entries(): ReadonlyArray<TranscriptEntry> {
    return [...this.log];
  }

  get name(): string {
    return this.gameName;
  }

  /** True once an `end` message has been recorded in either direction. */
  get isEnded(): boolean {
    return this.ended;
  }

  private push(direction: TranscriptDirection, message: Message): void {
    this.log.push({ direction, timestamp: this.clock().toISOString(), message });
    if (direction !== 'meta' && isEndMessage(message)) {
      this.ended = true;
    }
  }
}
