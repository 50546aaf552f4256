#!/usr/bin/env node
/**
 * note2gdocs command line.
 *
 * Usage:
 *   note2gdocs convert <note.md> [--title <title>] [--body]
 *   note2gdocs publish <note.md> [--doc <documentId>] [--title <title>] [--body]
 *   note2gdocs login
 *   note2gdocs logout
 *
 * See src/config.ts for the environment variables.
 */

import { loadConfig, requireCredentials } from './config.js';
import type { NoteConfig } from './config.js';
import { convertNoteFile } from './converter.js';
import { DocsClient } from './gdocs-api/client.js';
import type { OpenUrl } from './gdocs-api/client.js';
import { publishNote } from './gdocs-api/document-service.js';
import type { DocsApi } from './gdocs-api/document-service.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ConvertArgs {
  kind: 'convert';
  file: string;
  title?: string;
  emitBodyText: boolean;
}

interface PublishArgs {
  kind: 'publish';
  file: string;
  documentId?: string;
  title?: string;
  emitBodyText: boolean;
}

interface LoginArgs {
  kind: 'login';
}

interface LogoutArgs {
  kind: 'logout';
}

export type ParsedArgs = ConvertArgs | PublishArgs | LoginArgs | LogoutArgs;

export const USAGE = [
  'Usage:',
  '  note2gdocs convert <note.md> [--title <title>] [--body]',
  '  note2gdocs publish <note.md> [--doc <documentId>] [--title <title>] [--body]',
  '  note2gdocs login',
  '  note2gdocs logout',
].join('\n');

/** Error thrown for invalid command line usage. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface Flags {
  positional: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

const VALUE_FLAGS = new Set(['--doc', '--title']);
const SWITCH_FLAGS = new Set(['--body']);

function splitFlags(args: string[]): Flags {
  const flags: Flags = { positional: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      flags.values.set(arg, value);
      i++;
    } else if (SWITCH_FLAGS.has(arg)) {
      flags.switches.add(arg);
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      flags.positional.push(arg);
    }
  }

  return flags;
}

function requireFile(flags: Flags, command: string): string {
  const [file, ...extra] = flags.positional;
  if (!file) throw new UsageError(`${command}: missing note file`);
  if (extra.length > 0) throw new UsageError(`${command}: unexpected argument ${extra[0]}`);
  return file;
}

/**
 * Parse `process.argv`-style arguments.
 *
 * argv[0] = node, argv[1] = script path, argv[2+] = user args
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv.slice(2);
  if (!command) throw new UsageError('Missing command');

  const flags = splitFlags(rest);

  switch (command) {
    case 'convert':
      if (flags.values.has('--doc')) throw new UsageError('convert: --doc is not accepted');
      return {
        kind: 'convert',
        file: requireFile(flags, command),
        title: flags.values.get('--title'),
        emitBodyText: flags.switches.has('--body'),
      };

    case 'publish':
      return {
        kind: 'publish',
        file: requireFile(flags, command),
        documentId: flags.values.get('--doc'),
        title: flags.values.get('--title'),
        emitBodyText: flags.switches.has('--body'),
      };

    case 'login':
      if (rest.length > 0) throw new UsageError('login: takes no arguments');
      return { kind: 'login' };

    case 'logout':
      if (rest.length > 0) throw new UsageError('logout: takes no arguments');
      return { kind: 'logout' };

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/** The client surface the commands use. */
export interface CliClient extends DocsApi {
  authenticate(openUrl: OpenUrl): Promise<void>;
  logout(): Promise<void>;
}

/** Collaborators the commands use; replaced in tests. */
export interface CliContext {
  config: NoteConfig;
  logger: Logger;
  createClient: (config: NoteConfig, logger: Logger) => CliClient;
  write: (text: string) => void;
}

function defaultClient(config: NoteConfig, logger: Logger): CliClient {
  const { clientId, clientSecret } = requireCredentials(config);
  return new DocsClient({
    clientId,
    clientSecret,
    tokenFile: config.tokenFile,
    requestsPerSecond: config.requestsPerSecond,
    logger,
  });
}

async function runConvert(args: ConvertArgs, ctx: CliContext): Promise<void> {
  const result = convertNoteFile(args.file, {
    title: args.title,
    emitBodyText: args.emitBodyText,
  });
  ctx.logger.debug(`Translated ${result.operations.length} operations`);
  ctx.write(JSON.stringify({ requests: result.requests, footer: result.footer }, null, 2) + '\n');
}

async function runPublish(args: PublishArgs, ctx: CliContext): Promise<void> {
  const note = convertNoteFile(args.file, {
    title: args.title,
    emitBodyText: args.emitBodyText,
  });
  const client = ctx.createClient(ctx.config, ctx.logger);

  const result = await publishNote(client, note, {
    documentId: args.documentId,
    title: note.metadata.title,
    onProgress: (progress) => ctx.logger.debug(progress.message),
  });

  ctx.logger.info(`Published ${args.file} to ${result.documentUrl}`);
}

async function runLogin(ctx: CliContext): Promise<void> {
  const client = ctx.createClient(ctx.config, ctx.logger);
  await client.authenticate((url) => {
    ctx.logger.info('Open this URL in a browser to authorize access:');
    ctx.write(url + '\n');
  });
  ctx.logger.info('Login complete');
}

async function runLogout(ctx: CliContext): Promise<void> {
  const client = ctx.createClient(ctx.config, ctx.logger);
  await client.logout();
  ctx.logger.info('Stored tokens removed');
}

/**
 * Run a parsed command.
 */
export async function runCommand(args: ParsedArgs, ctx: CliContext): Promise<void> {
  switch (args.kind) {
    case 'convert':
      await runConvert(args, ctx);
      break;
    case 'publish':
      await runPublish(args, ctx);
      break;
    case 'login':
      await runLogin(ctx);
      break;
    case 'logout':
      await runLogout(ctx);
      break;
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Entry point. Returns the process exit code.
 */
export async function main(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let logger = createLogger('info');

  try {
    const args = parseArgs(argv);
    const config = loadConfig(env);
    logger = createLogger(config.logLevel);

    await runCommand(args, {
      config,
      logger,
      createClient: defaultClient,
      write: (text) => {
        process.stdout.write(text);
      },
    });
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(err.message);
      logger.error(USAGE);
      return 2;
    }
    logger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('Fatal error in note2gdocs:', err);
      process.exitCode = 1;
    },
  );
}
