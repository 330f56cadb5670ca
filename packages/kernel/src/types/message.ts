/**
 * Playhost Kernel — Message Types
 *
 * Messages are the only payload that crosses between the host and a running
 * game module. A message is a string-keyed mapping; the single conventionally
 * load-bearing key is `function`, used as a discriminator.
 *
 * The vocabulary is open. Only the values in {@link MessageFunction} carry
 * meaning for the host; everything else passes through untouched.
 */

// ---------------------------------------------------------------------------
// Message Values
// ---------------------------------------------------------------------------

/**
 * A value that may appear inside a message.
 * Mirrors what survives a JSON round-trip.
 */
export type MessageValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<MessageValue>
  | { readonly [key: string]: MessageValue };

/**
 * A structured message exchanged over the bridge or through
 * `GameModule.handleMessage`.
 */
export type Message = { readonly [key: string]: MessageValue };

// ---------------------------------------------------------------------------
// Discriminator
// ---------------------------------------------------------------------------

/** Key of the discriminator field. */
export const FUNCTION_KEY = 'function';

/**
 * Discriminator values recognized by the host.
 *
 * - Start / Init: session beginning (either spelling is accepted)
 * - End: session ending; the host mirrors the final payload
 * - Metadata: request for the module's metadata as a plain mapping
 */
export const MessageFunction = {
  Start: 'start',
  Init: 'init',
  End: 'end',
  Metadata: 'metadata',
} as const;

export type MessageFunction = (typeof MessageFunction)[keyof typeof MessageFunction];

/** The accepted spellings of a start message discriminator. */
export const START_FUNCTIONS: ReadonlyArray<string> = [
  MessageFunction.Start,
  MessageFunction.Init,
];
