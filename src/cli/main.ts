#!/usr/bin/env node

import 'dotenv/config';
import { Command, Option } from 'commander';

import { registerAttackCommand, registerBatchCommand, registerGoalsCommand } from './run.js';

const program = new Command('redloop')
  .description('Plan, execute and observe shell commands against an authorized target, then report findings.')
  .version('0.1.0')
  .addOption(
    new Option('--log-level <level>', 'stderr verbosity')
      .choices(['debug', 'info', 'warn', 'error', 'silent'])
      .env('REDLOOP_LOG_LEVEL'),
  )
  .hook('preAction', (command) => {
    const level: unknown = command.opts()['logLevel'];
    if (typeof level === 'string') process.env['REDLOOP_LOG_LEVEL'] = level;
  });

registerAttackCommand(program);
registerBatchCommand(program);
registerGoalsCommand(program);

await program.parseAsync();
