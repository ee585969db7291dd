import {
  createUxid,
  isUxidError,
  isUxidSize,
  type DecodedUxid,
  type UxidFacade,
  type UxidOptions
} from '@uxid/core';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'generate'; options: UxidOptions; count: number }
  | { kind: 'decode'; uxids: string[] };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const HELP_TEXT = `
Usage: uxid <command> [options]

Generate and decode UXIDs.

Commands:
  generate             Print new UXIDs
  decode <uxid>...     Print the fields encoded in each UXID

Generate options:
  --prefix <prefix>    Prefix joined to the id with "_"
  --size <preset>      Random size preset: xs, s, m, l, xl
  --rand-size <n>      Random byte count (default: 10)
  --time <ms>          Timestamp in milliseconds (default: now)
  --count <n>          Number of ids to print (default: 1)
  --help               Show this help message
`;

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n)) {
    throw new CliUsageError(`Invalid ${flag} value: ${value}`);
  }
  return n;
}

function parseGenerate(args: string[]): CliCommand {
  const options: UxidOptions = {};
  let count = 1;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--prefix') {
      const prefix = args[++i];
      if (prefix === undefined) {
        throw new CliUsageError('Missing value for --prefix');
      }
      options.prefix = prefix;
    } else if (arg === '--size') {
      const size = args[++i];
      if (!isUxidSize(size)) {
        throw new CliUsageError(`Invalid --size value: ${size ?? ''}`);
      }
      options.size = size;
    } else if (arg === '--rand-size') {
      options.randSize = parseInteger(arg, args[++i]);
    } else if (arg === '--time') {
      options.time = parseInteger(arg, args[++i]);
    } else if (arg === '--count') {
      count = parseInteger(arg, args[++i]);
      if (count < 1) {
        throw new CliUsageError('Invalid --count value: must be at least 1');
      }
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return { kind: 'generate', options, count };
}

export function parseArgs(args: string[]): CliCommand {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }

  const [command, ...rest] = args;
  if (command === 'generate') {
    return parseGenerate(rest);
  }
  if (command === 'decode') {
    if (rest.length === 0) {
      throw new CliUsageError('decode needs at least one uxid');
    }
    return { kind: 'decode', uxids: rest };
  }
  throw new CliUsageError(`Unknown command: ${command}`);
}

export function formatDecoded(uxid: DecodedUxid): string[] {
  const rows: [string, string][] = [
    ['uxid', uxid.string],
    ['prefix', uxid.prefix ?? '(none)'],
    ['time', String(uxid.time)],
    ['timestamp', new Date(uxid.time).toISOString()],
    ['time_encoded', uxid.timeEncoded],
    ['rand_encoded', uxid.randEncoded]
  ];
  return rows.map(([key, value]) => `${key.padEnd(13)}${value}`);
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export function runCli(args: string[], io: CliIo = consoleIo, uxid: UxidFacade = createUxid()): number {
  try {
    const command = parseArgs(args);

    switch (command.kind) {
      case 'help':
        io.out(HELP_TEXT);
        return 0;

      case 'generate':
        for (let i = 0; i < command.count; i++) {
          io.out(uxid.generateOrThrow(command.options));
        }
        return 0;

      case 'decode': {
        let status = 0;
        command.uxids.forEach((input, index) => {
          if (index > 0) io.out('');
          const result = uxid.decode(input);
          if (result.success) {
            formatDecoded(result.data).forEach((line) => io.out(line));
          } else {
            io.err(`${input}: ${result.error.message}`);
            status = 1;
          }
        });
        return status;
      }
    }
  } catch (error) {
    if (error instanceof CliUsageError || isUxidError(error)) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}
