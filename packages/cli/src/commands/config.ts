/**
 * playhost config — Show the effective host configuration
 *
 *   --json     machine-readable output
 *   --write    save the effective configuration to <home>/state/config.json
 *              so it can be edited in place
 *   --persist  remember --home in the OS config file for later invocations
 */

import { Command } from 'commander';
import { HOST_CONFIG_FILE, saveHostConfig } from '@playhost/runtime-host';
import { formatConfig } from '../output/report.js';
import { buildRuntime, globalsOf, type CliIO } from './runtime.js';

export function configCommand(io: CliIO): Command {
  return new Command('config')
    .description('Show the effective home, modules roots and build settings')
    .option('--json', 'Output as JSON')
    .option('--write', `Write the effective configuration to state/${HOST_CONFIG_FILE}`)
    .option('--persist', 'Remember the --home directory for later invocations')
    .action((options: { json?: boolean; write?: boolean; persist?: boolean }, command: Command) => {
      const globals = globalsOf(command);
      if (options.persist === true && globals.home === undefined) {
        io.err(io.theme.error('--persist needs --home <dir>'));
        io.setExitCode(1);
        return;
      }

      const runtime = buildRuntime(globals, io, { persistHome: options.persist === true });
      if (options.write === true) {
        saveHostConfig(runtime.stateIO, runtime.config);
      }

      const view = { home: runtime.home, modulesRoots: runtime.modulesRoots, config: runtime.config };
      if (options.json === true) {
        io.out(JSON.stringify(view, null, 2));
        return;
      }
      for (const line of formatConfig(view, io.theme)) io.out(line);
    });
}
