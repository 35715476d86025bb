import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { TreePrinter } from '../../core/polyglot/tree-printer.js';
import { logger as log } from '../../utils/logger.js';
import { buildTreeForCommand, type TreeCommandOptions } from './shared.js';

/**
 * Create the print command.
 */
export function createPrintCommand(): Command {
  return new Command('print')
    .description('Print the syntax tree of a polyglot program, across language boundaries')
    .argument('<file>', 'Program to parse')
    .option('-l, --lang <language>', 'Language of the file (inferred from the extension if omitted)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (file: string, options: TreeCommandOptions) => {
      try {
        await runPrint(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runPrint(file: string, options: TreeCommandOptions): Promise<void> {
  const { tree } = await buildTreeForCommand(file, options);
  const printer = new TreePrinter();
  tree.apply(printer);
  console.log(printer.getResult());
}
