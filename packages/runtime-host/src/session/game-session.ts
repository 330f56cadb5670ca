/**
 * Playhost Runtime Host — Game Session
 *
 * Drives one running module from launch to stop:
 *
 *   start(msg)  validate msg → launch({ bridge, log }) → attach mirror
 *               consumer + lobby-return callback → send msg → record reply
 *   send(msg)   request/response through handleMessage, recorded
 *   stop()      module.stop() once, detach mirror, clear return callback
 *
 * Every message crossing the boundary is recorded in the session transcript:
 * replies and bridge publishes as inbound, host requests as outbound.
 */

import {
  checkIfMessageIsStartMessage,
  createLogger,
  isEndMessage,
  Transcript,
  type DisplaySurface,
  type GameModule,
  type Logger,
  type Message,
  type MessagingBridge,
  type Subscription,
} from '@playhost/kernel';

export type SessionState = 'idle' | 'running' | 'stopped';

export interface GameSessionOptions {
  readonly module: GameModule;
  readonly bridge: MessagingBridge;
  readonly log?: Logger | undefined;
  readonly transcript?: Transcript | undefined;
  /** Called with each `end` message the module publishes or replies with. */
  readonly onEnd?: ((message: Message) => void) | undefined;
  /** Called after the module asked to go back to the lobby and was stopped. */
  readonly onReturn?: (() => void) | undefined;
}

export class GameSession {
  private readonly module: GameModule;
  private readonly bridge: MessagingBridge;
  private readonly log: Logger;
  private readonly onEnd: ((message: Message) => void) | undefined;
  private readonly onReturn: (() => void) | undefined;
  private mirror: Subscription | null = null;
  private current: SessionState = 'idle';

  readonly transcript: Transcript;

  constructor(options: GameSessionOptions) {
    this.module = options.module;
    this.bridge = options.bridge;
    this.log = options.log ?? createLogger('session');
    this.transcript = options.transcript ?? new Transcript();
    this.onEnd = options.onEnd;
    this.onReturn = options.onReturn;
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * Launch the module and hand it the start message.
   *
   * @throws {MessageValidationError} If the message is not a start message;
   *   the module is not launched.
   * @throws {Error} If the session was already started.
   */
  start(startMessage: unknown): DisplaySurface {
    if (this.current !== 'idle') {
      throw new Error(`Cannot start a session that is ${this.current}`);
    }
    checkIfMessageIsStartMessage(startMessage);

    const meta = this.module.metadata();
    this.transcript.startSession(meta.name, meta.version);

    const surface = this.module.launch({ bridge: this.bridge, log: this.log.child(meta.name) });
    this.current = 'running';
    this.log.info('Module launched', { module: meta.name, surface: surface.kind });

    this.mirror = this.bridge.subscribe((message) => {
      this.transcript.recordFromGame(message);
      this.noticeEnd(message);
    });
    this.bridge.setReturnCallback(() => {
      this.log.info('Module requested return to lobby', { module: meta.name });
      this.stop();
      this.onReturn?.();
    });

    try {
      this.send(startMessage);
    } catch (err: unknown) {
      this.stop();
      throw err;
    }
    return surface;
  }

  /**
   * Deliver a message to the running module and return its reply.
   *
   * @throws {Error} If the session is not running
   */
  send(message: Message): Message | null {
    if (this.current !== 'running') {
      throw new Error(`Cannot send to a session that is ${this.current}`);
    }
    this.transcript.recordToGame(message);
    const reply = this.module.handleMessage(message);
    if (reply !== null) {
      this.transcript.recordFromGame(reply);
      this.noticeEnd(reply);
    }
    return reply;
  }

  /** Stop the module. Only the first call has any effect. */
  stop(): void {
    if (this.current !== 'running') return;
    this.current = 'stopped';
    try {
      this.module.stop();
    } finally {
      this.mirror?.unsubscribe();
      this.mirror = null;
      this.bridge.setReturnCallback(null);
      this.log.info('Module stopped');
    }
  }

  private noticeEnd(message: Message): void {
    if (isEndMessage(message)) {
      this.onEnd?.(message);
    }
  }
}
