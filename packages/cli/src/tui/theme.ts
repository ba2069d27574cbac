import chalk from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  red:        chalk.hex('#CF6679'),
} as const
