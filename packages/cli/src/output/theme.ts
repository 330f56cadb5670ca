import chalk from 'chalk'
import type { FailureStage, LogLevel } from '@playhost/kernel'

export type Paint = (text: string) => string

export interface Theme {
  readonly accent:  Paint
  readonly heading: Paint
  readonly text:    Paint
  readonly muted:   Paint
  readonly ok:      Paint
  readonly warn:    Paint
  readonly error:   Paint
}

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

export const colorTheme: Theme = {
  accent:  (s) => t.blue(s),
  heading: (s) => t.white.bold(s),
  text:    (s) => t.text(s),
  muted:   (s) => t.muted(s),
  ok:      (s) => t.green(s),
  warn:    (s) => t.amber(s),
  error:   (s) => t.red(s),
}

const same: Paint = (s) => s

export const plainTheme: Theme = {
  accent:  same,
  heading: same,
  text:    same,
  muted:   same,
  ok:      same,
  warn:    same,
  error:   same,
}

/** Color when chalk found a color-capable stdout, plain otherwise. */
export const defaultTheme = (): Theme =>
  chalk.level > 0 ? colorTheme : plainTheme

export const levelColor = (theme: Theme, level: LogLevel): Paint => {
  switch (level) {
    case 'debug': return theme.muted
    case 'info':  return theme.accent
    case 'warn':  return theme.warn
    case 'error': return theme.error
  }
}

export const stageColor = (theme: Theme, stage: FailureStage): Paint =>
  stage === 'build' ? theme.warn : theme.error
