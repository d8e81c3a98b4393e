import fs from 'node:fs';
import path from 'node:path';
import boxen from 'boxen';
import gradient from 'gradient-string';
import figlet from 'figlet';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isInteractive, isTestEnv } from '../util/env.js';

export type SayStyle = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

function quiet() {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

let bannerPrinted = false;

function banner() {
  if (process.argv.includes('--banner=off') || process.env.CLI_BANNER === 'off' || process.env.CLI_BANNER === '0') return;
  if (bannerPrinted || !isInteractive() || isTestEnv()) return;
  bannerPrinted = true;
  const text = figlet.textSync('Blackjack', { font: 'Standard' });
  const palette = getPalette();
  const title = gradient(palette.gradient).multiline(text);
  const body = `${title}\n\n${palette.dim('v' + safeReadPkgVersion())}  ${palette.dim(process.version)}`;
  console.log(boxen(body, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

function safeReadPkgVersion(): string {
  const file = path.resolve('package.json');
  if (!fs.existsSync(file)) return '0.0.0';
  const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  return '0.0.0';
}

function format(msg: string, style: SayStyle): string {
  const palette = getPalette();
  switch (style) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return palette.bold(palette.info(msg));
    default: return `${logSymbols.info} ${palette.info(msg)}`;
  }
}

function say(msg: string, style: SayStyle = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (quiet() && style !== 'error' && style !== 'warn') return;
  console.log(format(msg, style));
}

export const ui = { banner, say, format };
export default ui;
