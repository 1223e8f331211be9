import fs from 'fs';
import path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { green, red } from 'colorette';
import { describeError } from '../common/fsErrors';
import { getLogger, setupLogger } from '../utils/logger';
import { getDirTree } from './dirTreeBuilder';
import { DEFAULT_INDENT, dirTreeToJson, writeDirTree } from './serialize';
import { resolveTreeConfig } from './treeConfig';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

interface CliOptions {
  depth?: number;
  humanReadable?: boolean;
  mime?: boolean;
  logfile?: string;
  output?: string;
  indent: number;
  followSymlinks: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const cliLogger = getLogger('cli');

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const readVersion = (): string => {
  try {
    const raw = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    cliLogger.debug(`Cannot read package version: ${describeError(error)}`);
  }
  return '0.0.0';
};

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
};

const parseIndent = (value: string): number => {
  const parsed = parseInteger(value);
  if (parsed < 0 || parsed > 10) {
    throw new InvalidArgumentError('Expected an integer between 0 and 10.');
  }
  return parsed;
};

export const createProgram = (io: CliIo = defaultIo, onExitCode: (code: number) => void = () => {}) => {
  const program = new Command();

  program
    .name('dir-tree')
    .description('Build and print a directory tree in JSON format.')
    .version(readVersion())
    .argument('<path>', 'Path to the directory or file to inspect.')
    .option('-d, --depth <n>', 'Recursion depth (-1 for unlimited). Default: 3', parseInteger)
    .option('-H, --human-readable', 'Show human-readable sizes and timestamps.')
    .option('-m, --mime', 'Include the MIME type inferred from each file extension.')
    .option('-l, --logfile <file>', 'Optional log file path.')
    .option('-o, --output <file>', 'Write the JSON tree to a file instead of stdout.')
    .option('--indent <n>', 'JSON indentation width.', parseIndent, DEFAULT_INDENT)
    .option('--no-follow-symlinks', 'Skip symbolic links instead of resolving them.')
    .option('--verbose', 'Log skipped entries and other debug detail.')
    .option('--quiet', 'Suppress console logging.')
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .exitOverride()
    .action(async (targetPath: string, options: CliOptions) => {
      const config = resolveTreeConfig(
        {
          depth: options.depth,
          humanReadable: options.humanReadable,
          includeMimeType: options.mime,
          followSymlinks: options.followSymlinks ? undefined : false,
          logfile: options.logfile,
          verbose: options.verbose,
        },
        io.env ?? process.env,
      );

      const logger = setupLogger({
        logfile: config.logfile,
        level: config.verbose ? 'debug' : 'info',
        console: !options.quiet,
      });
      logger.info(
        `Building directory tree for ${targetPath} ` +
          `(depth=${config.depth}, human_readable=${config.humanReadable})`,
      );

      try {
        const tree = await getDirTree(targetPath, {
          depth: config.depth,
          humanReadable: config.humanReadable,
          includeMimeType: config.includeMimeType,
          followSymlinks: config.followSymlinks,
          logger,
        });

        if (options.output) {
          const { filePath, bytes } = await writeDirTree(tree, options.output, options.indent);
          logger.info(`Wrote ${bytes} bytes to ${filePath}`);
          io.stderr(`${green('✔')} Tree written to ${filePath}\n`);
        } else {
          io.stdout(`${dirTreeToJson(tree, options.indent)}\n`);
        }

        logger.info('Directory tree successfully generated.');
        onExitCode(0);
      } catch (error) {
        logger.error(`Error while building directory tree: ${describeError(error)}`);
        io.stderr(`${red('✖')} ${describeError(error)}\n`);
        onExitCode(1);
      }
    });

  return program;
};

/** Parses `argv` (including the node and script entries) and resolves to an exit code. */
export const runCli = async (argv: string[], io: CliIo = defaultIo): Promise<number> => {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
};
