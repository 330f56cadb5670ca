/**
 * playhost list — Load every module and show what came up
 *
 * Runs one load pass (discover → build → load → instantiate) and prints the
 * loaded modules followed by the failures of that pass. Exit code 2 when no
 * modules root could be read.
 */

import { Command } from 'commander';
import { describeModules, formatFailures, formatModuleList, listReport } from '../output/report.js';
import { buildRuntime, globalsOf, loadModules, type CliIO } from './runtime.js';

export function listCommand(io: CliIO): Command {
  return new Command('list')
    .description('Discover, build and load game modules; show loaded modules and failures')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const runtime = buildRuntime(globalsOf(command), io);
      const pass = await loadModules(runtime, io);
      if (pass === null) return;

      const rows = describeModules(pass.result.loadedModules);
      if (options.json === true) {
        io.out(JSON.stringify(listReport(rows, pass.result.failures), null, 2));
        return;
      }

      for (const line of formatModuleList(rows, io.theme)) io.out(line);
      const failures = formatFailures(pass.result.failures, io.theme);
      if (failures.length > 0) {
        io.out('');
        for (const line of failures) io.out(line);
      }
    });
}
