import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import {
  InteropSiteCollector,
  type InteropSite,
} from '../../core/polyglot/interop-sites.js';
import { logger as log } from '../../utils/logger.js';
import { truncateString } from '../../utils/string.js';
import { buildTreeForCommand, type TreeCommandOptions } from './shared.js';

interface LinksOptions extends TreeCommandOptions {
  json?: boolean;
}

/**
 * Create the links command.
 */
export function createLinksCommand(): Command {
  return new Command('links')
    .description('List the eval, import and export calls of a polyglot program')
    .argument('<file>', 'Program to parse')
    .option('-l, --lang <language>', 'Language of the file (inferred from the extension if omitted)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: LinksOptions) => {
      try {
        await runLinks(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runLinks(file: string, options: LinksOptions): Promise<void> {
  const { tree } = await buildTreeForCommand(file, options);
  const collector = new InteropSiteCollector();
  tree.apply(collector);
  const sites = collector.getResult();

  if (options.json) {
    console.log(JSON.stringify(sites, null, 2));
    return;
  }

  if (sites.length === 0) {
    console.log(chalk.dim('No polyglot calls found.'));
    return;
  }

  for (const site of sites) {
    console.log(formatSite(site));
  }
}

export function formatSite(site: InteropSite): string {
  const indent = '  '.repeat(site.depth);
  const where = `${site.file ?? `<inline ${site.language}>`}:${site.location.line}:${site.location.column}`;
  const detail =
    site.kind === 'eval'
      ? site.target
        ? `-> ${site.target}`
        : 'unlinked'
      : (site.bindingName ?? '<dynamic>');
  return `${indent}${site.kind.padEnd(6)} ${detail.padEnd(12)} ${where}  ${truncateString(site.code, 60)}`;
}
