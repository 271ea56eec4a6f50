import { parseSeed } from '@/lib/random';

export type CliArgs = {
  id?: bigint;
  output: string;
  config?: string;
  help?: boolean;
};

export const USAGE = `Usage: pavage [--id <u64>] [--output <base>] [--config <path>]

  --id <u64>        seed of the image (default: current time as HHMM)
  --output <base>   writes <base>.output.png and <base>.blur.png (default: output.png)
  --config <path>   TOML configuration document`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const needValue = (args: readonly string[], i: number, flag: string): string => {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} expects a value`);
  return value;
};

export const parseArgs = (args: readonly string[]): CliArgs => {
  const out: CliArgs = { output: 'output.png' };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === '--id') {
      const raw = needValue(args, i, token);
      const id = parseSeed(raw);
      if (id === null) throw new UsageError(`invalid id ${JSON.stringify(raw)}, expected an unsigned 64-bit integer`);
      out.id = id;
      i += 1;
    } else if (token === '--output') {
      out.output = needValue(args, i, token);
      i += 1;
    } else if (token === '--config') {
      out.config = needValue(args, i, token);
      i += 1;
    } else if (token === '--help' || token === '-h') {
      out.help = true;
    } else {
      throw new UsageError(`unknown argument ${JSON.stringify(token)}`);
    }
  }
  return out;
};

/** Graine par défaut: heure locale au format HHMM */
export function clockSeed(now: Date = new Date()): bigint {
  return BigInt(now.getHours() * 100 + now.getMinutes());
}

export function outputPaths(base: string): { genDest: string; blurDest: string } {
  return { genDest: `${base}.output.png`, blurDest: `${base}.blur.png` };
}
