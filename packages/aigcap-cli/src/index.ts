#!/usr/bin/env node

/**
 * aigcap CLI - AI code coverage scan, CI gate and agent hook adapter
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { registerScanCommand } from './commands/scan.js';
import { registerHookCommand } from './commands/hook.js';
import { registerCheckCommand } from './commands/check.js';
import { registerReviewCommand } from './commands/review.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
  .name('aigcap')
  .description('AI-Generated Code Annotation Protocol: headers, hooks and coverage')
  .version(pkg.version);

// Project-wide coverage (aigcap scan [path])
registerScanCommand(program);

// Agent host integration (aigcap hook < payload.json)
registerHookCommand(program);

// Single files (aigcap check|review <files...>)
registerCheckCommand(program);
registerReviewCommand(program);

program.parse();
