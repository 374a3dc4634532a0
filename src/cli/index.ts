#!/usr/bin/env node
/**
 * `chat-to-evernote` binary entry point. Wires the real process I/O into
 * {@link run}.
 */

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import chalk from 'chalk';

import { loadConfig } from '../config';
import { EvernoteNoteStore } from '../evernote/client';
import { EvernoteConnector } from '../evernote/connector';
import { run } from './run';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return 'unknown';
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

run(process.argv.slice(2), {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  logSink: (line) => process.stderr.write(`${line}\n`),
  readStdin,
  stdinIsTTY: process.stdin.isTTY === true,
  readFile: (path) => readFile(path, 'utf8'),
  loadConfig: () => loadConfig(),
  createConnector: ({ token, sandbox, logger }) =>
    new EvernoteConnector(new EvernoteNoteStore({ token, sandbox }), { logger }),
  colors: chalk,
  version: readVersion(),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(chalk.red(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`) + '\n');
    process.exitCode = 1;
  },
);
