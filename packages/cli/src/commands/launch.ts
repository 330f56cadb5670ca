/**
 * playhost launch <module> — Run one game session from the terminal
 *
 *   start message  --start <file>, or the default two-player init message
 *   moves          --send <json>, repeatable, delivered in order
 *
 * The surface's text rendering is printed after the start and after every
 * move. The session is always stopped and its transcript saved under
 * <home>/transcripts/, including when the module fails mid-game.
 */

import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Command } from 'commander';
import {
  createDefaultStartMessage,
  describeError,
  isMessage,
  MessageValidationError,
  MessagingBridge,
  withLocalPlayerId,
  type DisplaySurface,
  type Message,
} from '@playhost/kernel';
import { GameSession } from '@playhost/runtime-host';
import { parseMessageArg } from './parse-message.js';
import { buildRuntime, findModule, globalsOf, loadModules, type CliIO } from './runtime.js';

interface LaunchOptions {
  start?: string;
  send: string[];
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export function launchCommand(io: CliIO): Command {
  return new Command('launch')
    .description('Launch a module, play the given moves, then stop and save the transcript')
    .argument('<module>', 'Module name')
    .option('--start <file>', 'JSON file holding the start message')
    .option('--send <json>', 'Message to send after the start (repeatable)', collect, [])
    .action(async (name: string, options: LaunchOptions, command: Command) => {
      const startMessage = options.start !== undefined ? readStartMessage(resolve(io.cwd, options.start), io) : createDefaultStartMessage();
      if (startMessage === undefined) return;

      const moves: Message[] = [];
      for (const raw of options.send) {
        const move = parseMessageArg(raw);
        if (!isMessage(move)) {
          io.err(io.theme.error(`--send must be a JSON object: ${raw}`));
          io.setExitCode(1);
          return;
        }
        moves.push(move);
      }

      const runtime = buildRuntime(globalsOf(command), io);
      const pass = await loadModules(runtime, io);
      if (pass === null) return;
      const module = findModule(pass, name, io);
      if (module === null) return;

      const session = new GameSession({
        module,
        bridge: new MessagingBridge({ log: runtime.log.child('bridge') }),
        log: runtime.log.child('session'),
        onEnd: (message) => { io.out(io.theme.ok(`Game over: ${JSON.stringify(message)}`)); },
        onReturn: () => { io.out(io.theme.muted('Module returned to the lobby')); },
      });

      try {
        const surface = session.start(startMessage);
        printSurface(surface, io);
        for (const move of moves) {
          if (session.state !== 'running') break;
          const reply = session.send(move);
          if (reply !== null) io.out(JSON.stringify(reply));
          printSurface(surface, io);
        }
      } catch (err: unknown) {
        const prefix = err instanceof MessageValidationError ? 'Invalid start message' : `Module ${name} failed`;
        io.err(io.theme.error(`${prefix}: ${describeError(err)}`));
        io.setExitCode(1);
      } finally {
        session.stop();
      }

      if (session.transcript.entries().length > 0) {
        const saved = runtime.transcripts.save(session.transcript);
        io.out(io.theme.muted(`Transcript: ${join(runtime.home, saved.textPath)}`));
      }
    });
}

/** Undefined after reporting a read or parse problem. */
function readStartMessage(path: string, io: CliIO): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    io.err(io.theme.error(`Cannot read start message file: ${describeError(err)}`));
    io.setExitCode(1);
    return undefined;
  }
  const parsed = parseMessageArg(text);
  if (parsed === undefined) {
    io.err(io.theme.error(`Start message file is not valid JSON: ${path}`));
    io.setExitCode(1);
    return undefined;
  }
  return isMessage(parsed) ? withLocalPlayerId(parsed) : parsed;
}

function printSurface(surface: DisplaySurface, io: CliIO): void {
  if (surface.render !== undefined) io.out(surface.render());
}
