/**
 * Playhost CLI — Report Formatting
 *
 * Pure line builders for command output. Nothing here writes; commands
 * decide where the lines go. Module metadata is read once per module
 * through describeModules() so a module whose metadata() throws shows up
 * as a row with an error instead of aborting the listing.
 */

import {
  describeError,
  difficultyRank,
  metadataToMessage,
  type LoadedModule,
  type LoadFailure,
  type Message,
  type ModuleMetadata,
} from '@playhost/kernel';
import type { HostConfig } from '@playhost/runtime-host';
import { stageColor, type Theme } from './theme.js';

// ---------------------------------------------------------------------------
// Module rows
// ---------------------------------------------------------------------------

export type ModuleRow =
  | { readonly name: string; readonly ok: true; readonly metadata: ModuleMetadata }
  | { readonly name: string; readonly ok: false; readonly error: string };

export function describeModules(modules: ReadonlyArray<LoadedModule>): ModuleRow[] {
  return modules.map(({ name, module }): ModuleRow => {
    try {
      return { name, ok: true, metadata: module.metadata() };
    } catch (err: unknown) {
      return { name, ok: false, error: `metadata() threw: ${describeError(err)}` };
    }
  });
}

export function playersLabel(min: number, max: number): string {
  if (min === max) return min === 1 ? '1 player' : `${min} players`;
  return `${min}-${max} players`;
}

export function formatModuleList(rows: ReadonlyArray<ModuleRow>, theme: Theme): string[] {
  const lines = [theme.heading(`Loaded modules (${rows.length}):`)];
  if (rows.length === 0) {
    lines.push(theme.muted('  (none)'));
    return lines;
  }
  for (const row of rows) {
    if (!row.ok) {
      lines.push(`  ${theme.accent(row.name)}  ${theme.error(row.error)}`);
      continue;
    }
    const meta = row.metadata;
    lines.push(
      `  ${theme.accent(row.name)}  v${meta.version}  ` +
        `${playersLabel(meta.minPlayers, meta.maxPlayers)}  ~${meta.estimatedDurationMinutes} min`,
    );
    if (meta.description !== '') {
      lines.push(`    ${theme.text(meta.description)}`);
    }
    const modes = [...meta.supportedModes].sort();
    const difficulties = [...meta.supportedDifficulties].sort(
      (a, b) => (difficultyRank(a) ?? 0) - (difficultyRank(b) ?? 0),
    );
    lines.push(theme.muted(`    modes: ${modes.join(', ') || '-'}  difficulties: ${difficulties.join(', ') || '-'}`));
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

/** Empty when nothing failed; the list is printed once per pass. */
export function formatFailures(failures: ReadonlyArray<LoadFailure>, theme: Theme): string[] {
  if (failures.length === 0) return [];
  const lines = [theme.heading(`Failed modules (${failures.length}):`)];
  for (const failure of failures) {
    lines.push(`  ${theme.accent(failure.name)}  ${stageColor(theme, failure.stage)(`[${failure.stage}]`)}  ${failure.reason}`);
    if (failure.details !== undefined) {
      for (const detail of failure.details.split('\n')) {
        lines.push(theme.muted(`      ${detail}`));
      }
    }
  }
  return lines;
}

// ---------------------------------------------------------------------------
// JSON shapes
// ---------------------------------------------------------------------------

export interface ListReport {
  readonly modules: ReadonlyArray<{ readonly name: string; readonly metadata?: Message; readonly error?: string }>;
  readonly failures: ReadonlyArray<LoadFailure>;
}

export function listReport(rows: ReadonlyArray<ModuleRow>, failures: ReadonlyArray<LoadFailure>): ListReport {
  return {
    modules: rows.map((row) =>
      row.ok ? { name: row.name, metadata: metadataToMessage(row.metadata) } : { name: row.name, error: row.error },
    ),
    failures,
  };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ConfigView {
  readonly home: string;
  readonly modulesRoots: ReadonlyArray<string>;
  readonly config: HostConfig;
}

export function formatConfig(view: ConfigView, theme: Theme): string[] {
  const label = (name: string): string => theme.muted(name.padEnd(15));
  const { build, layout } = view.config;
  const [firstRoot, ...otherRoots] = view.modulesRoots;
  return [
    `${label('home:')}${view.home}`,
    `${label('modules roots:')}${firstRoot ?? '(none)'}`,
    ...otherRoots.map((root) => `${' '.repeat(15)}${root}`),
    `${label('build:')}${[build.command, ...build.args].join(' ')}  (timeout ${build.timeoutMs} ms)`,
    `${label('layout:')}${layout.sourceDir} -> ${layout.outputDir}/${layout.outputEntry}`,
  ];
}
