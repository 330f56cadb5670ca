#!/usr/bin/env node
/**
 * bin/playhost.ts — entry point for the `playhost` command.
 *
 * playhost list --modules-dir ./modules
 * playhost launch tictactoe --send '{"function":"move","cell":4}'
 */

import { createProgram } from '../commands/index.js'

await createProgram().parseAsync()
