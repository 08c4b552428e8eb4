#!/usr/bin/env node

/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore CLI - read and write repository entries from the shell
 *
 * Every command takes `-r, --repository <url>`; a bare path means a
 * filesystem repository rooted there.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { catCommand } from './commands/cat.js';
import { putCommand } from './commands/put.js';
import { lsCommand } from './commands/ls.js';
import { existsCommand } from './commands/exists.js';
import { REPOSITORY_ENV } from './utils.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

/** Add the options every command shares */
function withRepository(command: Command): Command {
  return command
    .option('-r, --repository <url>', `Repository URL or path (default: $${REPOSITORY_ENV} or .)`)
    .option('--atomic', 'Stage writes and rename them into place')
    .option('--no-create', 'Fail if the repository root does not exist')
    .option('--chunk-size <bytes>', 'Bytes per chunk when reading');
}

const program = new Command();

program
  .name('feedstore')
  .description('Key-addressed storage for feed documents')
  .version(packageJson.version);

program.addCommand(
  withRepository(new Command('cat'))
    .description('Write the content stored under a key to stdout')
    .argument('<key>', 'Entry key, e.g. feeds/abc.xml')
    .action(catCommand)
);

program.addCommand(
  withRepository(new Command('put'))
    .description('Store a file, or stdin, under a key')
    .argument('<key>', 'Entry key')
    .argument('[file]', 'File to store (default: stdin)')
    .action(putCommand)
);

program.addCommand(
  withRepository(new Command('ls'))
    .description('List the children of a key (default: the top level)')
    .argument('[key]', 'Directory key')
    .action(lsCommand)
);

program.addCommand(
  withRepository(new Command('exists'))
    .description('Print whether a key exists; exit status 1 if not')
    .argument('<key>', 'Entry or directory key')
    .action(existsCommand)
);

await program.parseAsync();
