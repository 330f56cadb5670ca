/**
 * Playhost Kernel — Session Message Protocol
 *
 * Discriminator helpers and the start-message check. The host validates
 * only the discriminator; payloads are otherwise passed through untouched.
 */

import { MessageValidationError } from '../errors.js';
import {
  FUNCTION_KEY,
  MessageFunction,
  START_FUNCTIONS,
  type Message,
  type MessageValue,
} from '../types/message.js';

/** The discriminator value, or undefined when absent or not a string. */
export function messageFunction(message: Message): string | undefined {
  const value = message[FUNCTION_KEY];
  return typeof value === 'string' ? value : undefined;
}

export function isStartMessage(message: Message): boolean {
  const fn = messageFunction(message);
  return fn !== undefined && START_FUNCTIONS.includes(fn);
}

export function isEndMessage(message: Message): boolean {
  return messageFunction(message) === MessageFunction.End;
}

export function isMetadataRequest(message: Message): boolean {
  return messageFunction(message) === MessageFunction.Metadata;
}

/** True for values that can travel inside a message (JSON-shaped data). */
export function isMessageValue(value: unknown): value is MessageValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isMessageValue) : isMessage(value);
    default:
      return false;
  }
}

/** True for a plain string-keyed mapping whose values are all message values. */
export function isMessage(value: unknown): value is Message {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.keys(value).every((key) => isMessageValue(Reflect.get(value, key)));
}

/**
 * Reject anything that is not a session start message.
 *
 * Accepted discriminators are `"start"` and `"init"`.
 *
 * @throws {MessageValidationError} naming the accepted values
 */
export function checkIfMessageIsStartMessage(message: unknown): asserts message is Message {
  if (message === null || typeof message !== 'object' || Array.isArray(message)) {
    throw new MessageValidationError('Start message is required', START_FUNCTIONS, message);
  }

  const fn: unknown = Reflect.get(message, FUNCTION_KEY);
  if (typeof fn !== 'string') {
    throw new MessageValidationError(
      `Start message must have a '${FUNCTION_KEY}' field ` +
        `(allowed: ${START_FUNCTIONS.map((f) => `"${f}"`).join(', ')})`,
      START_FUNCTIONS,
      fn,
    );
  }

  if (!START_FUNCTIONS.includes(fn)) {
    throw new MessageValidationError(
      `Start message must have ${FUNCTION_KEY}="start" or ${FUNCTION_KEY}="init", got: "${fn}"`,
      START_FUNCTIONS,
      fn,
    );
  }
}

// ---------------------------------------------------------------------------
// Default start message
// ---------------------------------------------------------------------------

/**
 * The start message used when the operator does not supply one:
 * a two-player session with p1 as the local host.
 */
export function createDefaultStartMessage(): Message {
  return {
    [FUNCTION_KEY]: MessageFunction.Init,
    gameMode: 'multi_player',
    localPlayerId: 'p1',
    players: [
      { id: 'p1', name: 'Player1', role: 'host' },
      { id: 'p2', name: 'Player2', role: 'guest' },
    ],
  };
}

/**
 * Fill in `localPlayerId` from the first entry of `players` when the message
 * does not already carry one. Returns the message unchanged otherwise.
 */
export function withLocalPlayerId(message: Message): Message {
  if (message['localPlayerId'] !== undefined) return message;

  const players: MessageValue | undefined = message['players'];
  if (!Array.isArray(players) || players.length === 0) return message;

  const first: unknown = players[0];
  if (first === null || typeof first !== 'object' || Array.isArray(first)) return message;

  const id: unknown = Reflect.get(first, 'id');
  if (id === undefined || id === null) return message;

  return { ...message, localPlayerId: String(id) };
}
