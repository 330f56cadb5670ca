/**
 * playhost metadata <module> — Print a module's metadata as a flat mapping
 *
 * Asks the module itself with `{ function: "metadata" }`. A module that does
 * not answer that request gets its metadata() converted instead.
 */

import { Command } from 'commander';
import { describeError, metadataToMessage, MessageFunction, type Message } from '@playhost/kernel';
import { buildRuntime, findModule, globalsOf, loadModules, type CliIO } from './runtime.js';

export function metadataCommand(io: CliIO): Command {
  return new Command('metadata')
    .description('Print the metadata of a loaded module')
    .argument('<module>', 'Module name')
    .action(async (name: string, _options: unknown, command: Command) => {
      const runtime = buildRuntime(globalsOf(command), io);
      const pass = await loadModules(runtime, io);
      if (pass === null) return;
      const module = findModule(pass, name, io);
      if (module === null) return;

      let metadata: Message;
      try {
        metadata = module.handleMessage({ function: MessageFunction.Metadata }) ?? metadataToMessage(module.metadata());
      } catch (err: unknown) {
        io.err(io.theme.error(`Module ${name} failed to report metadata: ${describeError(err)}`));
        io.setExitCode(1);
        return;
      }
      io.out(JSON.stringify(metadata, null, 2));
    });
}
