#!/usr/bin/env node

/**
 * ctxmirror CLI entry point.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CommanderError } from 'commander';
import chalk from 'chalk';
import { isErrnoException } from '@ctxmirror/core';
import { createProgram } from './program.js';

/**
 * Load KEY=value pairs from `<dir>/.env` (IDE_ENV usually) without
 * overriding variables already set.
 */
function loadDotenv(dir: string): void {
  const envPath = path.resolve(dir, '.env');
  let content: string;
  try {
    content = fs.readFileSync(envPath, 'utf-8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

async function main(): Promise<void> {
  const program = createProgram();
  program.exitOverride();

  try {
    loadDotenv(process.cwd());
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    // --help and --version surface as CommanderErrors with exit code 0
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}`));
    if (process.env.CTXMIRROR_DEBUG && error instanceof Error) {
      console.error(chalk.gray(error.stack ?? ''));
    }
    process.exit(1);
  }
}

void main();
