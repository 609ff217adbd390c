#!/usr/bin/env node

import { Command } from 'commander';
import { registerPipelineCommands } from './commands/pipeline.js';
import { registerRegistrationCommands } from './commands/registrations.js';

const program = new Command();

program
  .name('regverify')
  .description('Registration verification pipeline: daemon and one-off operations')
  .version('1.0.0');

registerPipelineCommands(program);
registerRegistrationCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
