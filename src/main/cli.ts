import { CatalogError, ErrorContext, errorCode, formatErrorMessage, toError } from '../common/errors';
import { createLogger, stderrWriter, stdoutWriter } from '../utils/logger';
import { loadSettings } from './settings';
import { COMMANDS, usageLines, type CommandContext, type CommandIO } from './commands';

const logger = createLogger('cli');

export const PROGRAM = 'nanopore-catalog';

const defaultIO: CommandIO = { stdout: stdoutWriter, stderr: stderrWriter };

interface GlobalOptions {
  configFile?: string;
  help: boolean;
  command?: string;
  rest: string[];
}

const parseGlobalOptions = (argv: string[]): GlobalOptions => {
  const options: GlobalOptions = { help: false, rest: [] };
  let index = 0;
  while (index < argv.length) {
    const arg = argv[index];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      index += 1;
    } else if (arg === '--config') {
      const value = argv[index + 1];
      if (!value) {
        throw new CatalogError("option '--config' needs a file name", ErrorContext.CONFIG_LOAD);
      }
      options.configFile = value;
      index += 2;
    } else if (arg.startsWith('--config=')) {
      options.configFile = arg.slice('--config='.length);
      index += 1;
    } else {
      break;
    }
  }
  options.command = argv[index];
  options.rest = argv.slice(index + 1);
  return options;
};

const isUsageError = (error: unknown) => (errorCode(error) ?? '').startsWith('ERR_PARSE_ARGS');

/**
 * Run one command line. Returns the exit status: 0 on success, 1 when the
 * command fails and 2 for usage errors.
 */
export const runCli = async (
  argv: string[],
  io: CommandIO = defaultIO,
  overrides: Partial<Pick<CommandContext, 'executors'>> & { env?: NodeJS.ProcessEnv; cwd?: string } = {},
): Promise<number> => {
  let context = ErrorContext.CONFIG_LOAD;
  try {
    const options = parseGlobalOptions(argv);
    if (options.help || !options.command) {
      usageLines(PROGRAM).forEach((line) => io.stdout(line));
      return options.help ? 0 : 2;
    }
    const command = COMMANDS[options.command];
    if (!command) {
      io.stderr(`${PROGRAM}: unknown command '${options.command}'`);
      usageLines(PROGRAM).forEach((line) => io.stderr(line));
      return 2;
    }

    const settings = await loadSettings({ configFile: options.configFile, env: overrides.env, cwd: overrides.cwd });
    context = command.context;
    logger.debug(`Running '${options.command}' with settings from ${settings.source ?? 'defaults'}`);
    return await command.handler(options.rest, { settings, io, executors: overrides.executors });
  } catch (error: unknown) {
    if (isUsageError(error)) {
      io.stderr(`${PROGRAM}: ${toError(error).message}`);
      return 2;
    }
    io.stderr(formatErrorMessage(error, context));
    logger.debug(toError(error).stack ?? String(error));
    return 1;
  }
};
