import type { Invocation, InvocationFlag, PlacementState } from '@/types/stamp';
import { foldPosition } from '@/store/placementStore';
import { DEFAULT_CONFIG, type StampConfig } from './config';

export type InvocationConfig = Pick<StampConfig, 'input' | 'stamp' | 'stampDpi' | 'page' | 'output'>;

/**
 * Minimal flag list that reproduces the current session. Input and stamp are always
 * present; everything else only when it differs from its default.
 */
export function serializeInvocation(config: InvocationConfig, placement: PlacementState): Invocation {
  const pairs: Array<readonly [InvocationFlag, string]> = [
    ['--input', config.input],
    ['--stamp', config.stamp],
  ];
  const position = foldPosition(placement);

  if (config.stampDpi !== DEFAULT_CONFIG.stampDpi) pairs.push(['--stamp-dpi', config.stampDpi.toFixed(1)]);
  if (config.page !== DEFAULT_CONFIG.page) pairs.push(['--page', String(config.page)]);
  if (position.x !== DEFAULT_CONFIG.x) pairs.push(['--x', position.x.toFixed(1)]);
  if (position.y !== DEFAULT_CONFIG.y) pairs.push(['--y', position.y.toFixed(1)]);
  if (placement.scale !== DEFAULT_CONFIG.scale) pairs.push(['--scale', placement.scale.toFixed(3)]);
  if (config.output) pairs.push(['--output', config.output]);

  return pairs;
}

function quoteToken(token: string): string {
  if (!/\s/.test(token)) return token;
  return `'${token.replace(/'/g, `'\\''`)}'`;
}

/**
 * One shell-ready line; tokens with whitespace are single-quoted. Values starting with
 * a dash are attached as `--flag=value`, or the argument parser would read them as flags.
 */
export function formatInvocation(invocation: Invocation, command: string = 'pdf-stamp'): string {
  const tokens = invocation.flatMap(([flag, value]) => (value.startsWith('-') ? [`${flag}=${value}`] : [flag, value]));
  return [command, ...tokens].map(quoteToken).join(' ');
}
