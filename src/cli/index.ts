#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from './commands/run.js';

const program = new Command()
  .name('tooleval')
  .description('Tool-use evaluation runner for conversational agents')
  .version('0.1.0');

program.addCommand(runCommand);

await program.parseAsync();
