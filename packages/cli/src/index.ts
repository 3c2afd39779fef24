#!/usr/bin/env node
import { Command } from 'commander';
import { registerInit } from './commands/init.js';
import { registerExtract } from './commands/extract.js';
import { registerConfig } from './commands/config.js';

export const program = new Command();

program
  .name('parlance')
  .description('Extract translation keys and reconcile locale catalogs')
  .version('0.1.0');

registerInit(program);
registerExtract(program);
registerConfig(program);

program.parse();
