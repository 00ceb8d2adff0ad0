#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

const program = new Command();

program
  .name('catnip')
  .description('Pull data out of ticketing, marketing and CRM APIs into JSONL files')
  .version('0.1.0');

registerCommands(program);

await program.parseAsync();
