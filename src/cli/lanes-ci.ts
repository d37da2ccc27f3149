#!/usr/bin/env node
/**
 * lanes-ci - run build-verification pipelines locally
 */

import 'reflect-metadata';
import { Command } from 'commander';
import { runCommand } from './run.command';

const program = new Command();

program
  .name('lanes-ci')
  .description('Fan a pipeline matrix out into lanes and run the stages fail-fast in each')
  .version('0.1.0');

program.addCommand(runCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
