#!/usr/bin/env node
import { Command } from 'commander';
import { BudgetlineError } from '@budgetline/shared';
import { createRunCommand } from '../src/commands/run.js';
import { createConfigCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('budgetline')
  .description('budgetline - budgeted task execution with structured results')
  .version('0.1.0');

program.addCommand(createRunCommand());
program.addCommand(createConfigCommand());

try {
  await program.parseAsync();
} catch (err) {
  if (!(err instanceof BudgetlineError)) throw err;
  console.error(err.message);
  process.exitCode = 1;
}
