export {
  runCli,
  parseArgs,
  formatDecoded,
  consoleIo,
  CliUsageError,
  HELP_TEXT,
  type CliIo,
  type CliCommand
} from './cli.js';
