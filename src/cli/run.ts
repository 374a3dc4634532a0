/**
 * Command dispatch for the `chat-to-evernote` binary.
 *
 * Everything the commands touch (I/O, configuration, the connector) comes
 * in through {@link CliDeps}, so `run` can be exercised in-process.
 */

import { parseArgs } from 'node:util';

import type { Chalk } from 'chalk';

import type { AppConfig } from '../config';
import type { EvernoteConnector } from '../evernote/connector';
import { EvernoteConnectionError, EvernoteError } from '../evernote/types';
import type { LogLevel, LogSink, Logger } from '../logger';
import { createLogger } from '../logger';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** The parts of the connector the commands use. */
export type CliConnector = Pick<EvernoteConnector, 'saveChat' | 'listNotebooks' | 'verify'>;

export interface CliDeps {
  /** Write one line to stdout. */
  stdout: (line: string) => void;
  /** Write one line to stderr. */
  stderr: (line: string) => void;
  logSink: LogSink;
  readStdin: () => Promise<string>;
  stdinIsTTY: boolean;
  readFile: (path: string) => Promise<string>;
  loadConfig: () => AppConfig;
  createConnector: (options: { token: string; sandbox: boolean; logger: Logger }) => CliConnector;
  colors: Chalk;
  version: string;
}

// ---------------------------------------------------------------------------
// Option tables
// ---------------------------------------------------------------------------

const GLOBAL_OPTIONS = {
  verbose: { type: 'boolean', short: 'v' },
  version: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const CONNECTION_OPTIONS = {
  token: { type: 'string' },
  sandbox: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const SAVE_OPTIONS = {
  ...CONNECTION_OPTIONS,
  title: { type: 'string', short: 't' },
  notebook: { type: 'string', short: 'n' },
  tags: { type: 'string', short: 'g', multiple: true },
  file: { type: 'string', short: 'f' },
} as const;

const TOKEN_URL = 'https://www.evernote.com/api/DeveloperToken.action';

export const USAGE = `Usage: chat-to-evernote [-v] <command> [options]

Save chat transcripts as Evernote notes.

Commands:
  save        Save a chat (from --file, a pipe, or typed input)
  notebooks   List notebooks in the account
  verify      Check the connection and credentials

Global options:
  -v, --verbose   Enable verbose logging
      --version   Print the version
  -h, --help      Show this help

save options:
  -t, --title <title>        Note title (generated when omitted)
  -n, --notebook <name>      Target notebook (created when missing)
  -g, --tags <tag>           Tag to apply; repeat for several
  -f, --file <path>          Read the chat from a file

Connection options (all commands):
      --token <token>        Developer token (default: EVERNOTE_DEV_TOKEN)
      --sandbox              Use the Evernote sandbox

Examples:
  chat-to-evernote save --file chat.txt --title "My Chat"
  cat conversation.md | chat-to-evernote save -n "Claude Chats"
  chat-to-evernote save -t "Quick Note" -g claude -g ai`;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Bad command line; reported with the usage text and exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parse<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (
      error instanceof TypeError &&
      'code' in error &&
      typeof error.code === 'string' &&
      error.code.startsWith('ERR_PARSE_ARGS')
    ) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Run the CLI with the given arguments (without `node` and the script).
 *
 * @returns Process exit code.
 */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const commandIndex = argv.findIndex((arg) => !arg.startsWith('-'));
  const globalArgs = commandIndex === -1 ? argv : argv.slice(0, commandIndex);
  const command = commandIndex === -1 ? undefined : argv[commandIndex];
  const commandArgs = commandIndex === -1 ? [] : argv.slice(commandIndex + 1);

  try {
    const { values: globals } = parse(() =>
      parseArgs({ args: globalArgs, options: GLOBAL_OPTIONS, strict: true }),
    );

    if (globals.version) {
      deps.stdout(deps.version);
      return 0;
    }
    if (globals.help || command === undefined) {
      deps.stdout(USAGE);
      return globals.help ? 0 : 2;
    }

    const level: LogLevel = globals.verbose ? 'debug' : 'warn';
    const logger = createLogger('chat-to-evernote', level, deps.logSink);

    switch (command) {
      case 'save':
        return await saveCommand(commandArgs, deps, logger);
      case 'notebooks':
        return await notebooksCommand(commandArgs, deps, logger);
      case 'verify':
        return await verifyCommand(commandArgs, deps, logger);
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      deps.stderr(deps.colors.red(`Error: ${error.message}`));
      deps.stderr('');
      deps.stderr(USAGE);
      return 2;
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function saveCommand(args: string[], deps: CliDeps, logger: Logger): Promise<number> {
  const { values } = parse(() => parseArgs({ args, options: SAVE_OPTIONS, strict: true }));
  if (values.help) {
    deps.stdout(USAGE);
    return 0;
  }

  const config = deps.loadConfig();
  const token = values.token ?? config.token;
  if (!token) {
    deps.stderr(deps.colors.red('Error: No Evernote developer token provided.'));
    deps.stderr('Set EVERNOTE_DEV_TOKEN environment variable or use --token');
    deps.stderr(`\nGet a token at: ${TOKEN_URL}`);
    return 1;
  }
  const sandbox = values.sandbox === true || config.sandbox;
  const notebook = values.notebook || config.notebook;

  let chatContent: string;
  if (values.file !== undefined) {
    logger.debug('Reading content from file: %s', values.file);
    try {
      chatContent = await deps.readFile(values.file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      deps.stderr(deps.colors.red(`Error: Cannot read '${values.file}': ${reason}`));
      return 1;
    }
  } else {
    if (deps.stdinIsTTY) {
      deps.stdout('Enter chat content (Ctrl+D when done):');
    } else {
      logger.debug('Reading content from stdin pipe');
    }
    chatContent = await deps.readStdin();
  }

  if (!chatContent.trim()) {
    deps.stderr(deps.colors.red('Error: No content provided.'));
    return 1;
  }

  return reportServiceErrors(deps, logger, '', async () => {
    logger.info('Connecting to Evernote (sandbox=%s)', sandbox);
    const connector = deps.createConnector({ token, sandbox, logger });
    const guid = await connector.saveChat({
      chatContent,
      title: values.title,
      notebookName: notebook,
      tags: values.tags,
    });
    deps.stdout(deps.colors.green('Note saved successfully!'));
    deps.stdout(`  GUID: ${guid}`);
    if (notebook) deps.stdout(`  Notebook: ${notebook}`);
    logger.info('Note saved with GUID: %s', guid);
    return 0;
  });
}

async function notebooksCommand(args: string[], deps: CliDeps, logger: Logger): Promise<number> {
  const { values } = parse(() => parseArgs({ args, options: CONNECTION_OPTIONS, strict: true }));
  if (values.help) {
    deps.stdout(USAGE);
    return 0;
  }

  const config = deps.loadConfig();
  const token = values.token ?? config.token;
  if (!token) {
    deps.stderr(deps.colors.red('Error: No Evernote developer token provided.'));
    return 1;
  }
  const sandbox = values.sandbox === true || config.sandbox;

  return reportServiceErrors(deps, logger, '', async () => {
    logger.info('Connecting to Evernote to list notebooks');
    const connector = deps.createConnector({ token, sandbox, logger });
    const notebooks = await connector.listNotebooks();

    deps.stdout(`Found ${notebooks.length} notebooks:\n`);
    for (const notebook of notebooks) {
      const marker = notebook.defaultNotebook ? ' (default)' : '';
      deps.stdout(`  - ${notebook.name}${marker}`);
    }
    return 0;
  });
}

async function verifyCommand(args: string[], deps: CliDeps, logger: Logger): Promise<number> {
  const { values } = parse(() => parseArgs({ args, options: CONNECTION_OPTIONS, strict: true }));
  if (values.help) {
    deps.stdout(USAGE);
    return 0;
  }

  const config = deps.loadConfig();
  const token = values.token ?? config.token;
  if (!token) {
    deps.stderr(deps.colors.red('No Evernote developer token found.'));
    deps.stdout('\nTo set up:');
    deps.stdout(`1. Get a token at: ${TOKEN_URL}`);
    deps.stdout('2. Set EVERNOTE_DEV_TOKEN environment variable');
    deps.stdout('   Or create a .env file with: EVERNOTE_DEV_TOKEN=your_token');
    return 1;
  }
  const sandbox = values.sandbox === true || config.sandbox;

  deps.stdout(`Verifying connection to Evernote (${sandbox ? 'sandbox' : 'production'})...`);

  return reportServiceErrors(deps, logger, '\nConnection failed: ', async () => {
    logger.info('Verifying Evernote connection');
    const connector = deps.createConnector({ token, sandbox, logger });
    const { user, notebookCount } = await connector.verify();

    deps.stdout(deps.colors.green('\nConnection successful!'));
    deps.stdout(`  Username: ${user.username}`);
    deps.stdout(`  Email: ${user.email}`);
    deps.stdout(`  Notebooks: ${notebookCount}`);
    return 0;
  });
}

/**
 * Run a command body, turning Evernote failures into a message and exit
 * code 1. `prefix` replaces the default `Error: ` / `Connection error: `
 * lead-in when given.
 */
async function reportServiceErrors(
  deps: CliDeps,
  logger: Logger,
  prefix: string,
  body: () => Promise<number>,
): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof EvernoteConnectionError) {
      logger.error('Connection error: %s', error.message);
      deps.stderr(deps.colors.red(`${prefix || 'Connection error: '}${error.message}`));
      return 1;
    }
    if (error instanceof EvernoteError) {
      logger.error('Evernote error: %s', error.message);
      deps.stderr(deps.colors.red(`${prefix || 'Error: '}${error.message}`));
      return 1;
    }
    throw error;
  }
}
