#!/usr/bin/env node

import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';

// Build the CLI program
const program = new Command()
  .name('taskd')
  .description('Task tracking service with background instruction enrichment')
  .version('1.0.0');

// Register commands
program.addCommand(createServeCommand());

await program.parseAsync();
