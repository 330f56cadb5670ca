/**
 * Tic Tac Toe — sample Playhost game module
 *
 * Messages handled:
 *   start | init   reset the board; `players[0]` plays X, `players[1]` plays O
 *   move           { cell: 0-8, playerId? }; playerId defaults to whoever is next
 *   state          current board and whose turn it is
 *   leave          ask the host to go back to the lobby
 *   metadata       flat metadata mapping
 *
 * When a move ends the game, `{ function: "end", winner, result, board }` is
 * published on the bridge before the move's reply is returned.
 */

import { applyMove, emptyBoard, renderBoard, statusOf, type Board, type Mark } from './game.cjs';
import { createMetadata, metadataMessage } from './metadata.cjs';
import type { Bridge, LaunchContext, Message, Metadata, TextSurface } from './protocol.cjs';

const DEFAULT_PLAYERS: Readonly<Record<Mark, string>> = { X: 'p1', O: 'p2' };

export class TicTacToeModule {
  private board: Board = emptyBoard();
  private players: Readonly<Record<Mark, string>> = DEFAULT_PLAYERS;
  private bridge: Bridge | null = null;

  launch(context?: LaunchContext): TextSurface {
    this.bridge = context?.bridge ?? null;
    return { kind: 'text', render: () => this.render() };
  }

  stop(): void {
    this.bridge = null;
  }

  metadata(): Metadata {
    return createMetadata();
  }

  handleMessage(message: Message): Message | null {
    switch (message['function']) {
      case 'start':
      case 'init':
        return this.start(message);
      case 'move':
        return this.move(message);
      case 'state':
        return { function: 'state', ...this.snapshot() };
      case 'leave':
        this.bridge?.triggerReturn();
        return null;
      case 'metadata':
        return metadataMessage();
      default:
        return null;
    }
  }

  private start(message: Message): Message {
    this.board = emptyBoard();
    this.players = playersFrom(message['players']);
    return { function: 'ready', players: { ...this.players }, ...this.snapshot() };
  }

  private move(message: Message): Message {
    const cell = message['cell'];
    if (typeof cell !== 'number') return failure('cell must be a number');

    const status = statusOf(this.board);
    const playerId = message['playerId'];
    let mark: Mark;
    if (playerId === undefined) {
      if (status.kind !== 'playing') return failure('game is over');
      mark = status.next;
    } else if (playerId === this.players.X) {
      mark = 'X';
    } else if (playerId === this.players.O) {
      mark = 'O';
    } else {
      return failure(`unknown player: ${String(playerId)}`);
    }

    const result = applyMove(this.board, cell, mark);
    if (!result.ok) return failure(result.reason);
    this.board = result.board;

    if (result.status.kind === 'won') {
      this.publish({ function: 'end', winner: this.players[result.status.winner], result: 'win', board: [...this.board] });
    } else if (result.status.kind === 'draw') {
      this.publish({ function: 'end', winner: null, result: 'draw', board: [...this.board] });
    }
    return { function: 'moved', cell, mark, ...this.snapshot() };
  }

  private snapshot(): Message {
    const status = statusOf(this.board);
    return {
      board: [...this.board],
      next: status.kind === 'playing' ? this.players[status.next] : null,
      over: status.kind !== 'playing',
    };
  }

  private publish(message: Message): void {
    this.bridge?.publish(message);
  }

  private render(): string {
    return `${renderBoard(this.board)}\n${this.statusLine()}`;
  }

  private statusLine(): string {
    const status = statusOf(this.board);
    switch (status.kind) {
      case 'playing':
        return `${this.players[status.next]} (${status.next}) to move`;
      case 'won':
        return `${this.players[status.winner]} (${status.winner}) wins`;
      case 'draw':
        return 'Draw';
    }
  }
}

function failure(reason: string): Message {
  return { function: 'error', reason };
}

function playersFrom(value: Message[string] | undefined): Readonly<Record<Mark, string>> {
  if (!Array.isArray(value)) return DEFAULT_PLAYERS;
  const ids = value.map((player: unknown) => {
    if (player === null || typeof player !== 'object') return undefined;
    const id: unknown = Reflect.get(player, 'id');
    return typeof id === 'string' && id !== '' ? id : undefined;
  });
  const [x, o] = ids;
  if (x === undefined || o === undefined || x === o) return DEFAULT_PLAYERS;
  return { X: x, O: o };
}
