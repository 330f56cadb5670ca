/**
 * playhost message <module> <json> — Send one message, print the reply
 *
 * The module is not launched; this is a direct request/response through
 * handleMessage(). A module that has nothing to say replies `null`.
 */

import { Command } from 'commander';
import { describeError, isMessage } from '@playhost/kernel';
import { buildRuntime, findModule, globalsOf, loadModules, type CliIO } from './runtime.js';
import { parseMessageArg } from './parse-message.js';

export function messageCommand(io: CliIO): Command {
  return new Command('message')
    .description('Send a JSON message to a loaded module and print its reply')
    .argument('<module>', 'Module name')
    .argument('<json>', 'Message as a JSON object, e.g. \'{"function":"metadata"}\'')
    .action(async (name: string, json: string, _options: unknown, command: Command) => {
      const message = parseMessageArg(json);
      if (!isMessage(message)) {
        io.err(io.theme.error(`Message must be a JSON object: ${json}`));
        io.setExitCode(1);
        return;
      }

      const runtime = buildRuntime(globalsOf(command), io);
      const pass = await loadModules(runtime, io);
      if (pass === null) return;
      const module = findModule(pass, name, io);
      if (module === null) return;

      try {
        io.out(JSON.stringify(module.handleMessage(message), null, 2));
      } catch (err: unknown) {
        io.err(io.theme.error(`Module ${name} failed to handle the message: ${describeError(err)}`));
        io.setExitCode(1);
      }
    });
}
