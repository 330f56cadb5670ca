/**
 * Tic Tac Toe sample module — Tests
 *
 * Coverage:
 *   TT1: start assigns X and O from the players list
 *   TT2: a winning move publishes `end` before returning its reply
 *   TT3: illegal moves are answered with an error message
 *   TT4: a full board without a line is a draw
 *   TT5: the text surface renders the board and whose turn it is
 *   TT6: the module runs under a GameSession; `leave` returns to the lobby
 *   TT7: metadata() hands out an independent copy on every call
 */

import { describe, it, expect } from 'vitest';
import { createDefaultStartMessage, MessagingBridge, type Message } from '@playhost/kernel';
import { isGameModule } from '@playhost/module-loader';
import { GameSession } from '@playhost/runtime-host';
import { TicTacToeModule } from '../src/index.cjs';

const ALICE_AND_BOB: Message = {
  function: 'start',
  players: [{ id: 'alice' }, { id: 'bob' }],
};

interface Recorded {
  readonly game: TicTacToeModule;
  readonly events: string[];
  readonly published: Message[];
  play(...cells: number[]): Message | null;
}

function launched(): Recorded {
  const events: string[] = [];
  const published: Message[] = [];
  const game = new TicTacToeModule();
  game.launch({
    bridge: {
      publish: (message) => {
        events.push('publish');
        published.push(message);
      },
      triggerReturn: () => { events.push('return'); },
    },
  });
  game.handleMessage(ALICE_AND_BOB);

  const play = (...cells: number[]): Message | null => {
    let reply: Message | null = null;
    for (const cell of cells) {
      reply = game.handleMessage({ function: 'move', cell });
      events.push('reply');
    }
    return reply;
  };
  return { game, events, published, play };
}

describe('TicTacToeModule', () => {
  it('TT1: start assigns X and O from the players list', () => {
    const game = new TicTacToeModule();

    expect(game.handleMessage(ALICE_AND_BOB)).toEqual({
      function: 'ready',
      players: { X: 'alice', O: 'bob' },
      board: [null, null, null, null, null, null, null, null, null],
      next: 'alice',
      over: false,
    });
  });

  it('TT2: a winning move publishes end before its reply', () => {
    const { events, published, play } = launched();

    const reply = play(0, 3, 1, 4, 2);

    const board = ['X', 'X', 'X', 'O', 'O', null, null, null, null];
    expect(reply).toEqual({ function: 'moved', cell: 2, mark: 'X', board, next: null, over: true });
    expect(published).toEqual([{ function: 'end', winner: 'alice', result: 'win', board }]);
    expect(events.slice(-2)).toEqual(['publish', 'reply']);
  });

  it('TT3: illegal moves are answered with an error', () => {
    const { game, play } = launched();
    play(0);

    expect(game.handleMessage({ function: 'move', cell: 0 })).toEqual({ function: 'error', reason: 'cell 0 is taken' });
    expect(game.handleMessage({ function: 'move', cell: 5, playerId: 'alice' })).toEqual({
      function: 'error',
      reason: "it is O's turn",
    });
    expect(game.handleMessage({ function: 'move', cell: 5, playerId: 'carol' })).toEqual({
      function: 'error',
      reason: 'unknown player: carol',
    });
    expect(game.handleMessage({ function: 'move', cell: 'a' })).toEqual({
      function: 'error',
      reason: 'cell must be a number',
    });
    expect(game.handleMessage({ function: 'move', cell: 9 })).toEqual({
      function: 'error',
      reason: 'cell must be an integer from 0 to 8',
    });
  });

  it('TT4: a full board without a line is a draw', () => {
    const { published, play } = launched();

    play(0, 1, 2, 4, 3, 5, 7, 6, 8);

    expect(published).toEqual([
      {
        function: 'end',
        winner: null,
        result: 'draw',
        board: ['X', 'O', 'X', 'X', 'O', 'O', 'O', 'X', 'X'],
      },
    ]);
    expect(play(8)).toEqual({ function: 'error', reason: 'game is over' });
  });

  it('TT5: the surface renders the board and the next player', () => {
    const game = new TicTacToeModule();
    const surface = game.launch();

    expect(surface.render()).toBe('. . .\n. . .\n. . .\np1 (X) to move');

    game.handleMessage({ function: 'move', cell: 4 });
    expect(surface.render()).toBe('. . .\n. X .\n. . .\np2 (O) to move');
  });

  it('TT6: runs under a GameSession and returns to the lobby on leave', () => {
    const candidate: unknown = new TicTacToeModule();
    if (!isGameModule(candidate)) throw new Error('TicTacToeModule does not satisfy GameModule');

    let returned = 0;
    const ends: Message[] = [];
    const session = new GameSession({
      module: candidate,
      bridge: new MessagingBridge(),
      onEnd: (message) => { ends.push(message); },
      onReturn: () => { returned += 1; },
    });

    session.start(createDefaultStartMessage());
    for (const cell of [4, 0, 2, 6, 3, 5, 1, 7]) {
      session.send({ function: 'move', cell });
    }
    expect(session.send({ function: 'move', cell: 8 })).toEqual({
      function: 'moved',
      cell: 8,
      mark: 'X',
      board: ['O', 'X', 'X', 'X', 'X', 'O', 'O', 'O', 'X'],
      next: null,
      over: true,
    });
    expect(ends).toEqual([
      { function: 'end', winner: null, result: 'draw', board: ['O', 'X', 'X', 'X', 'X', 'O', 'O', 'O', 'X'] },
    ]);
    expect(session.transcript.isEnded).toBe(true);

    session.send({ function: 'leave' });
    expect(returned).toBe(1);
    expect(session.state).toBe('stopped');
  });

  it('TT7: metadata() hands out an independent copy on every call', () => {
    const game = new TicTacToeModule();
    const first = game.metadata();
    const modes = first.supportedModes;
    if (!(modes instanceof Set)) throw new Error('supportedModes is not a Set');

    modes.add('online');

    expect(first).not.toBe(game.metadata());
    expect([...game.metadata().supportedModes]).toEqual(['local_multiplayer', 'hot_seat']);
    expect(new TicTacToeModule().metadata().supportedModes.has('online')).toBe(false);
  });
});
