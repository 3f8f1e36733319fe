#!/usr/bin/env node
import { Command } from 'commander';
import { invokeCommand } from '../src/commands/invoke.js';
import { typedCommand } from '../src/commands/typed.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('tollgate')
  .description('Tollgate - rate-limited, budgeted calls to language-model endpoints')
  .version('0.3.0');

program.addCommand(invokeCommand);
program.addCommand(typedCommand);
program.addCommand(configCommand);

await program.parseAsync();
