import chalk from 'chalk';

// Catppuccin Frappé
const palette = {
  blue: '#8caaee',
  lavender: '#babbf1',
  mauve: '#ca9ee6',
  red: '#e78284',
  sapphire: '#85c1dc',
  subtext1: '#b5bfe2',
  surface2: '#626880',
  text: '#c6d0f5'
} as const;

export const frappe = {
  subtext1: chalk.hex(palette.subtext1),
  surface2: chalk.hex(palette.surface2),
  text: chalk.hex(palette.text)
};

export const theme = {
  error: chalk.hex(palette.red)
};

export const boxColors = {
  analysis: palette.blue,
  primary: palette.mauve
} as const;

export const gradientColors = {
  banner: [palette.mauve, palette.lavender, palette.sapphire]
} as const;
