#!/usr/bin/env node

/**
 * cloudmirror CLI - mirror a remote drive and photo library locally
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerPullCommand } from './commands/pull.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('cloudmirror')
  .description('Mirror a remote drive and photo library, skipping and resuming by size')
  .version(pkg.version);

registerPullCommand(program);

await program.parseAsync();
