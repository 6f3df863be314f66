import * as path from 'path';
import { Command, CommanderError } from 'commander';
import yaml from 'js-yaml';
import { SolConf } from '@api/SolConf';
import { ConfigLoader } from '@core/config/loader';
import { ConstructionError } from '@core/errors';
import { isPlainMapping } from '@core/types/native';
import { cliLogger as logger } from '@core/utils/logger';
import { version } from '@core/version';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { formatError } from './error/ErrorHandler';

export type OutputFormat = 'json' | 'yaml';

export interface CLIOutput {
  stdout(text: string): void;
  stderr(text: string): void;
  color?: boolean;
}

export interface MainOptions {
  io?: CLIOutput;
  fileSystem?: IFileSystemService;
  /** Environment consulted for configuration (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

interface ResolveCommandOptions {
  address?: string;
  format: string;
}

const processOutput: CLIOutput = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
  color: Boolean(process.stderr.isTTY)
};

function parseFormat(format: string): OutputFormat {
  if (format !== 'json' && format !== 'yaml') {
    throw new ConstructionError(`Unknown output format '${format}' (expected json or yaml)`);
  }
  return format;
}

/**
 * Resolved values may hold sets; emit them as lists.
 */
export function toSerializable(value: unknown): unknown {
  if (value instanceof Set || Array.isArray(value)) {
    return [...value].map(toSerializable);
  }
  if (isPlainMapping(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toSerializable(item)]));
  }
  return value;
}

export function formatOutput(value: unknown, format: OutputFormat): string {
  const plain = toSerializable(value);
  return format === 'json' ? `${JSON.stringify(plain, null, 2)}\n` : yaml.dump(plain, { noRefs: true });
}

/**
 * Run the command line and return the process exit code.
 */
export function main(argv: string[], options: MainOptions = {}): number {
  const io = options.io ?? processOutput;
  const program = new Command();

  program
    .name('solconf')
    .description('Resolve hierarchical configuration files')
    .version(version)
    .option('--debug', 'Show stack traces on errors')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text)
    });

  const open = (file: string, overrides: string[]): SolConf =>
    SolConf.fromFile(file, {
      overrides,
      fileSystem: options.fileSystem,
      config: new ConfigLoader(path.dirname(path.resolve(file)), options.env).load()
    });

  program
    .command('resolve')
    .description('Resolve a configuration file and print the result')
    .argument('<file>', 'YAML or JSON configuration file')
    .argument('[overrides...]', "Overrides such as a.b=1 or name='resnet'")
    .option('-a, --address <ref>', 'Print only the value at this address')
    .option('-f, --format <format>', 'Output format: json or yaml', 'json')
    .action((file: string, overrides: string[], opts: ResolveCommandOptions) => {
      const format = parseFormat(opts.format);
      const conf = open(file, overrides);
      const value = opts.address ? conf.get(opts.address).resolve() : conf.resolve();
      io.stdout(formatOutput(value, format));
    });

  program
    .command('tree')
    .description('Print the configuration tree after overrides and modifiers')
    .argument('<file>', 'YAML or JSON configuration file')
    .argument('[overrides...]', 'Overrides applied before printing')
    .action((file: string, overrides: string[]) => {
      io.stdout(`${open(file, overrides).describe()}\n`);
    });

  try {
    program.parse(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.debug('Command failed', { error });
    const debug = program.opts<{ debug?: boolean }>().debug === true;
    io.stderr(`${formatError(error, { color: io.color, debug })}\n`);
    return 1;
  }
}
