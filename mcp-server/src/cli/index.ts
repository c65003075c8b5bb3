#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { matchCommand } from './commands/match.js';
import { providersCommand } from './commands/providers.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('colmatch')
  .description('AI-assisted column header matching')
  .version('1.0.0')
  .enablePositionalOptions();

program.addCommand(matchCommand);
program.addCommand(providersCommand);
program.addCommand(serveCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
