/**
 * The host contract as this module sees it. Declared structurally so the
 * module builds on its own; the host checks the shape when it loads us.
 */

export type MessageValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<MessageValue>
  | { readonly [key: string]: MessageValue };

export type Message = { readonly [key: string]: MessageValue };

export interface Bridge {
  publish(message: Message): void;
  triggerReturn(): void;
}

export interface LaunchContext {
  readonly bridge: Bridge;
}

export interface TextSurface {
  readonly kind: 'text';
  render(): string;
}

export interface Metadata {
  readonly name: string;
  readonly version: string;
  readonly author: string;
  readonly description: string;
  readonly minPlayers: number;
  readonly maxPlayers: number;
  readonly estimatedDurationMinutes: number;
  readonly supportedModes: ReadonlySet<string>;
  readonly supportedDifficulties: ReadonlySet<string>;
}
