/**
 * commands/index.ts — Commander program, configured and returned without parsing.
 *
 * Imported by:
 *   src/bin/playhost.ts   (process entry point)
 *   test/commands.test.ts (driven with a captured CliIO)
 */

import { Command } from 'commander'
import { configCommand } from './config.js'
import { launchCommand } from './launch.js'
import { listCommand } from './list.js'
import { messageCommand } from './message.js'
import { metadataCommand } from './metadata.js'
import { processIO, type CliIO } from './runtime.js'

const collect = (value: string, previous: string[] | undefined): string[] => [...(previous ?? []), value]

export function createProgram(io: CliIO = processIO()): Command {
  const program = new Command('playhost')
    .description(
      'Discover, build, load and launch Playhost game modules.\n' +
      'Modules live in subdirectories of the modules roots (--modules-dir, PLAYHOST_MODULES_DIR, or ./modules).',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Playhost home directory (config, logs, transcripts)')
    .option('--modules-dir <dir>', 'Modules root to scan (repeatable; earlier roots win name clashes)', collect)
    .option('--verbose', 'Log pipeline progress to stderr')
    .configureOutput({
      writeOut: (text) => { io.out(text.trimEnd()) },
      writeErr: (text) => { io.err(text.trimEnd()) },
    })

  program.addCommand(listCommand(io))
  program.addCommand(metadataCommand(io))
  program.addCommand(messageCommand(io))
  program.addCommand(launchCommand(io))
  program.addCommand(configCommand(io))

  return program
}
