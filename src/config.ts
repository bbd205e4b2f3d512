import { ConfigError } from './errors.js';
import { parseIntList } from './utils.js';
import type { ExportConfig } from './types.js';

export type Env = Record<string, string | undefined>;

export type CliArgs = {
  seedUrl?: string;
  help: boolean;
  config: ExportConfig;
};

function flagOn(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

function positiveInt(name: string, raw: string | undefined, fallback: number, min = 1): number {
  if (raw === undefined || raw === '') return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || String(n) !== raw.trim() || n < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

/**
 * Builds the run configuration from `argv` (without node and script) and the
 * environment. Flags win over environment variables.
 */
export function parseArgs(argv: string[], env: Env = process.env): CliArgs {
  const flags = new Map<string, string | true>();
  const positional: string[] = [];
  const valued = new Set(['--savedir', '--limit', '--batchsize', '--namespace']);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    const name = eq < 0 ? arg : arg.slice(0, eq);
    if (valued.has(name)) {
      const value = eq < 0 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined) throw new ConfigError(`${name} needs a value`);
      flags.set(name, value);
    } else if (name === '--history' || name === '--debug' || name === '--help') {
      flags.set(name, true);
    } else {
      throw new ConfigError(`unknown option ${name}`);
    }
  }
  if (positional.length > 1) throw new ConfigError(`expected one page url, got ${positional.length}`);

  const str = (flag: string, envName: string): string | undefined => {
    const v = flags.get(flag);
    return typeof v === 'string' ? v : env[envName];
  };

  const namespaces = str('--namespace', 'NAMESPACES');
  const config: ExportConfig = {
    history: flags.has('--history') || flagOn(env.HISTORY),
    saveDir: str('--savedir', 'SAVE_DIR') || undefined,
    connections: positiveInt('--limit', str('--limit', 'CONCURRENCY'), 4),
    batchSize: positiveInt('--batchsize', str('--batchsize', 'BATCH_SIZE'), 300),
    namespaces: namespaces ? parseIntList(namespaces) : undefined,
    strict: flags.has('--debug') || flagOn(env.DEBUG),
    timeoutMs: positiveInt('TIMEOUT_MS', env.TIMEOUT_MS, 30000),
    delayMs: positiveInt('DELAY_MS', env.DELAY_MS, 0, 0),
    retries: positiveInt('RETRIES', env.RETRIES, 2, 0),
    userAgent: env.USER_AGENT || undefined
  };

  const seedUrl = positional[0];
  if (seedUrl !== undefined && !/^https?:\/\//i.test(seedUrl)) {
    throw new ConfigError(`not an http(s) url: ${seedUrl}`);
  }
  return { seedUrl, help: flags.has('--help'), config };
}

export const USAGE = [
  'Usage:',
  '  wikidump [options] <page-url>   # print every page of the wiki as XML export',
  'Options:',
  '  --history            include full page history',
  '  --savedir <dir>      save File: media to <dir>',
  '  --limit <n>          maximum simultaneous connections (default 4)',
  '  --batchsize <n>      pages per export request (default 300)',
  '  --namespace <ids>    only these namespace ids, comma separated',
  '  --debug              abort on the first error and print stack traces',
  'Env:',
  '  SAVE_DIR CONCURRENCY BATCH_SIZE NAMESPACES HISTORY=1 DEBUG=1',
  '  TIMEOUT_MS=30000 DELAY_MS=0 RETRIES=2 USER_AGENT=...'
].join('\n');
