import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _levelColors: Record<string, ChalkInstance> = {
  debug: t.muted,
  info:  t.text,
  warn:  t.amber,
  error: t.red,
}

export const levelColor = (level: string): ChalkInstance =>
  _levelColors[level] ?? t.muted
