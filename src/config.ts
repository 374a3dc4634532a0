/**
 * Configuration loading from the environment and `.env` files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import { parse } from 'dotenv';

/** Resolved settings for talking to Evernote. */
export interface AppConfig {
  /** Developer token (`EVERNOTE_DEV_TOKEN`). */
  token?: string;
  /** Use the sandbox service (`EVERNOTE_SANDBOX=true`). */
  sandbox: boolean;
  /** Default target notebook name (`EVERNOTE_NOTEBOOK`). */
  notebook?: string;
  /** The `.env` file that was loaded, if any. */
  envFile?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  /** Environment to read and merge `.env` values into. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/** Directory containing package.json, both from `src/` and from `dist/`. */
const PACKAGE_ROOT = resolve(__dirname, '..');

/**
 * Candidate `.env` files, most specific first.
 */
export function envFileCandidates(cwd: string, homeDir: string): string[] {
  return [join(cwd, '.env'), join(homeDir, '.claude-evernote.env'), join(PACKAGE_ROOT, '.env')];
}

/**
 * Load configuration.
 *
 * The first existing `.env` candidate is parsed and merged into `env`.
 * Variables that are already set win over the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const candidates = envFileCandidates(options.cwd ?? process.cwd(), options.homeDir ?? homedir());

  const envFile = candidates.find((candidate) => existsSync(candidate));
  if (envFile) {
    const parsed = parse(readFileSync(envFile));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
  }

  return {
    token: env.EVERNOTE_DEV_TOKEN || undefined,
    sandbox: (env.EVERNOTE_SANDBOX ?? 'false').toLowerCase() === 'true',
    notebook: env.EVERNOTE_NOTEBOOK || undefined,
    envFile,
  };
}
