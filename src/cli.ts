// Command line entry: render a markup file as an indented text tree

import { readFile } from 'node:fs/promises';
import { Chalk, type ChalkInstance } from 'chalk';
import {
  generateConfigHelp,
  generateEnvVarHelp,
  generateFlagHelp,
  parseCliFlags,
  QuireConfig,
} from './config/mod.ts';
import { Document } from './document.ts';
import { ensureError, QuireError } from './errors.ts';
import { createLogger, getGlobalLogger, getLogger, setGlobalLogger } from './logging.ts';
import { renderToText, type RenderNode } from './render.ts';

export const VERSION = '0.1.0';

const logger = getLogger('CLI');

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Color depth of stdout: 0 none, 1 basic, 2 ansi256, 3 truecolor */
  colorLevel: 0 | 1 | 2 | 3;
}

function detectColorLevel(): 0 | 1 | 2 | 3 {
  if (!process.stdout.isTTY) {
    return 0;
  }
  const depth = process.stdout.getColorDepth();
  if (depth >= 24) return 3;
  if (depth >= 8) return 2;
  if (depth >= 4) return 1;
  return 0;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  colorLevel: detectColorLevel(),
};

interface CliOptions {
  help: boolean;
  helpConfig: boolean;
  helpEnv: boolean;
  version: boolean;
  tree: boolean;
  stats: boolean;
  files: string[];
}

function parseLauncherOptions(args: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    helpConfig: false,
    helpEnv: false,
    version: false,
    tree: false,
    stats: false,
    files: [],
  };

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--help-config':
        options.helpConfig = true;
        break;
      case '--help-env':
        options.helpEnv = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '--tree':
        options.tree = true;
        break;
      case '--stats':
        options.stats = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new QuireError('config', `Unknown option: ${arg}`);
        }
        options.files.push(arg);
    }
  }

  return options;
}

export function usage(): string {
  return [
    `quire ${VERSION}`,
    '',
    'Usage: quire [options] <file>',
    '',
    'Parses a markup file and prints its element tree.',
    '',
    '  --tree                 Print a compact debug tree instead of the text rendering',
    '  --stats                Print document statistics to stderr',
    '  --help-config          List every configuration option',
    '  --help-env             List environment variables',
    '  -v, --version          Print the version',
    '  -h, --help             Show this help',
    '',
    generateFlagHelp(),
    '',
  ].join('\n');
}

function headerDecorator(chalk: ChalkInstance): (header: string, node: RenderNode) => string {
  return (header, node) => {
    const color = node.textColor;
    return color ? chalk.rgb(color.r, color.g, color.b)(header) : header;
  };
}

/**
 * Run the command line. Resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  let options: CliOptions;
  let flags: Record<string, unknown>;
  try {
    const parsed = parseCliFlags(args);
    flags = parsed.flags;
    options = parseLauncherOptions(parsed.remaining);
  } catch (error) {
    io.stderr(`Error: ${ensureError(error).message}\n\n${usage()}`);
    return 2;
  }

  if (options.help) {
    io.stdout(usage());
    return 0;
  }
  if (options.helpConfig) {
    io.stdout(generateConfigHelp() + '\n');
    return 0;
  }
  if (options.helpEnv) {
    io.stdout(generateEnvVarHelp() + '\n');
    return 0;
  }
  if (options.version) {
    io.stdout(`quire ${VERSION}\n`);
    return 0;
  }
  if (options.files.length !== 1) {
    io.stderr(`Error: expected exactly one markup file\n\n${usage()}`);
    return 2;
  }

  QuireConfig.reset();
  const config = QuireConfig.init({ cliFlags: flags });
  if (config.logFile) {
    setGlobalLogger(createLogger({
      logFile: config.logFile,
      level: config.logLevel,
      format: config.logFormat,
    }));
  }

  const [file] = options.files;
  let markup: string;
  try {
    markup = await readFile(file, 'utf8');
  } catch (error) {
    const err = ensureError(error);
    logger.error('Could not read markup file', err, { file });
    io.stderr(`Error: cannot read ${file}: ${err.message}\n`);
    return 1;
  }

  const document = new Document();
  document.ingestMarkup(document.root, markup);
  logger.info('Rendered markup file', { file, elements: document.elementCount });

  if (options.tree) {
    io.stdout(document.asTree());
  } else {
    const chalk = new Chalk({ level: config.renderColor ? io.colorLevel : 0 });
    io.stdout(renderToText(document.root, {
      indent: config.renderIndent,
      decorateHeader: headerDecorator(chalk),
    }));
  }

  if (options.stats) {
    io.stderr(document.toDebugString() + '\n');
  }

  if (config.parserLogDiagnostics) {
    for (const [target, diagnostics] of document.allDiagnostics()) {
      for (const diagnostic of diagnostics) {
        io.stderr(`${target}: ${diagnostic.code}: ${diagnostic.message}\n`);
      }
    }
  }

  getGlobalLogger().flush();
  return 0;
}
