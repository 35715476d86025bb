import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createPrintCommand } from './commands/print.js';
import { createLinksCommand } from './commands/links.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('polytree')
    .description('Syntax trees that span language boundaries in polyglot programs')
    .version(VERSION);
  [createPrintCommand, createLinksCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
