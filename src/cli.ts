/**
 * Command line flags
 */

import type { PipelineOptions } from './pipeline.js';

/**
 * Read a `--name=N` flag as a non-negative integer
 */
export function parseCountFlag(args: readonly string[], name: string): number | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  if (!arg) {
    return undefined;
  }

  const value = Number(arg.slice(prefix.length));
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid value for --${name}: ${arg.slice(prefix.length)}`);
  }
  return value;
}

export function parseArgs(args: readonly string[]): PipelineOptions {
  return {
    targetCount: parseCountFlag(args, 'limit'),
    maxClicks: parseCountFlag(args, 'max-clicks'),
    stallLimit: parseCountFlag(args, 'stall-limit'),
    dryRun: args.includes('--dry-run'),
  };
}
