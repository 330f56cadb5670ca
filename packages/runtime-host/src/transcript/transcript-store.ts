/**
 * Playhost Runtime Host — Transcript Persistence
 *
 * Writes a finished (or abandoned) session transcript under
 * `<PLAYHOST_HOME>/transcripts/` in two forms:
 *
 *   <slug>-<stamp>.json   the entries array, for tooling
 *   <slug>-<stamp>.txt    one line per entry, for people:
 *                         [2026-01-01T12:00:00.000Z] OUTBOUND function=start {"function":"start"}
 */

import { messageFunction, type Clock, type Transcript, type TranscriptEntry } from '@playhost/kernel';
import type { StateIO } from '../state/state-io.js';

export const TRANSCRIPTS_DIR = 'transcripts';

export interface SavedTranscript {
  /** Paths relative to the home directory. */
  readonly jsonPath: string;
  readonly textPath: string;
}

export class TranscriptStore {
  constructor(
    private readonly stateIO: StateIO,
    private readonly clock: Clock = () => new Date(),
  ) {}

  save(transcript: Transcript): SavedTranscript {
    const base = `${TRANSCRIPTS_DIR}/${slugify(transcript.name)}-${fileStamp(this.clock())}`;
    const entries = transcript.entries();

    const jsonPath = this.stateIO.writeText(`${base}.json`, JSON.stringify(entries, null, 2) + '\n');
    const textPath = this.stateIO.writeText(`${base}.txt`, entries.map(formatTranscriptLine).join('\n') + '\n');
    return { jsonPath, textPath };
  }
}

export function formatTranscriptLine(entry: TranscriptEntry): string {
  const fn = messageFunction(entry.message) ?? '-';
  return `[${entry.timestamp}] ${entry.direction.toUpperCase()} function=${fn} ${JSON.stringify(entry.message)}`;
}

/** `Tic Tac Toe!` → `tic-tac-toe`; empty results become `session`. */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug === '' ? 'session' : slug;
}

/** UTC `YYYYMMDD-HHmmss`. */
function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}
