import chalk from 'chalk';
import { isTestEnv } from '../util/env.js';

export type Palette = {
  gradient: [string, string];
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  red: (s: string) => string;
  black: (s: string) => string;
  bold: (s: string) => string;
};

export function colorEnabled(): boolean {
  return !process.env.NO_COLOR && !process.argv.includes('--no-color') && !isTestEnv();
}

export function getPalette(noColor = !colorEnabled()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      gradient: ['#777777', '#bbbbbb'],
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      red: c.white,
      black: c.white,
      bold: c.bold,
    };
  }
  if (theme === 'solarized') {
    return {
      gradient: ['#268bd2', '#2aa198'],
      info: c.cyan,
      success: c.green,
      warn: c.yellow,
      error: c.red,
      dim: c.gray,
      red: c.red,
      black: c.whiteBright,
      bold: c.bold,
    };
  }
  // neo (default): felt green/gold
  return {
    gradient: ['#2f9e44', '#f59f00'],
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    red: c.redBright,
    black: c.whiteBright,
    bold: c.bold,
  };
}
