import { Command, CommanderError } from 'commander';
import { text } from 'stream/consumers';
import { EXIT_CODE, STDIO_PATH, VERSION } from './constants.js';
import { ConfigurationManager } from './config/configurationManager.js';
import { MockMaker } from './generator/MockMaker.js';
import { FileSystemService } from './utils/FileSystemService.js';
import { LoggerService, LogLevel, LogSink } from './utils/Logger.js';
import { UsageError, isUsageError } from './utils/errors.js';

/**
 * Everything the CLI touches outside of itself.
 */
export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  readStdin(): Promise<string>;
  fs: FileSystemService;
}

interface ProgramOptions {
  output: string;
  targetClass?: string;
  delegate?: boolean;
  real?: string;
  verbose?: boolean;
}

const OPEN_FAILURE_REASONS: Record<string, string> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EISDIR: 'Is a directory'
};

export function createDefaultIO(): CliIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    readStdin: () => text(process.stdin),
    fs: new FileSystemService()
  };
}

function createProgram(io: CliIO): Command {
  return new Command('makemock')
    .description(
      'Process a C++ header file and generate googletest MOCK_METHOD lines for its virtual methods.\n\n' +
      'The tool is regex based and does not handle all of C++, notably operators.'
    )
    .version(VERSION)
    .argument('[input]', `C++ header or snippet, ${STDIO_PATH} for standard input`)
    .option('-o, --output <path>', 'output file', STDIO_PATH)
    .option('-c, --target-class <name>', 'target class name')
    .option('-d, --delegate', 'also generate ON_CALL statements delegating to a real instance')
    .option('--real <name>', 'name of the real instance pointer used with --delegate')
    .option('-v, --verbose', 'log debug information on standard error')
    .exitOverride()
    .configureOutput({
      writeOut: (chunk) => { io.stdout.write(chunk); },
      writeErr: (chunk) => { io.stderr.write(chunk); }
    });
}

function describeOpenFailure(error: unknown): string {
  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string' && error.code in OPEN_FAILURE_REASONS) {
      return OPEN_FAILURE_REASONS[error.code];
    }
    return error.message;
  }
  return String(error);
}

async function readInput(input: string, io: CliIO): Promise<string> {
  try {
    return input === STDIO_PATH ? await io.readStdin() : await io.fs.readFile(input);
  } catch (error: unknown) {
    throw new UsageError(`Invalid value for "INPUT": Could not open file: ${input}: ${describeOpenFailure(error)}`);
  }
}

/**
 * Run makemock with `argv` (without the node and script entries).
 * Resolves to the process exit code; never exits the process itself.
 */
export async function runCli(argv: string[], io: CliIO = createDefaultIO()): Promise<number> {
  const program = createProgram(io);
  const logger = new LoggerService(io.stderr, LogLevel.WARN);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === EXIT_CODE.SUCCESS ? EXIT_CODE.SUCCESS : EXIT_CODE.USAGE;
    }
    throw error;
  }

  try {
    const input: string | undefined = program.args[0];
    if (input === undefined) {
      throw new UsageError('Missing argument "INPUT".');
    }

    const options = program.opts<ProgramOptions>();
    const configuration = new ConfigurationManager();
    configuration.updateFromCliOptions({
      targetClass: options.targetClass,
      delegate: options.delegate,
      real: options.real,
      verbose: options.verbose
    });
    const config = configuration.getConfig();
    logger.setLevel(config.logLevel);

    const content = await readInput(input, io);
    logger.debug(`[Cli] Read ${content.length} characters from ${input}`);

    const maker = new MockMaker(config, logger);
    const generated = await logger.measure('MockMaker', 'Generate mock', async () => maker.makeMock(content));

    if (options.output === STDIO_PATH) {
      io.stdout.write(generated);
    } else {
      await io.fs.writeFile(options.output, generated);
      logger.debug(`[Cli] Wrote ${options.output}`);
    }
    return EXIT_CODE.SUCCESS;
  } catch (error: unknown) {
    if (isUsageError(error)) {
      io.stderr.write(
        `Usage: ${program.name()} ${program.usage()}\n` +
        `Try '${program.name()} --help' for help.\n\n` +
        `Error: ${error.message}\n`
      );
      return error.exitCode;
    }
    logger.error('[Cli] makemock failed', error);
    return EXIT_CODE.FAILURE;
  }
}
