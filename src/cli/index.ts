#!/usr/bin/env node
import process from 'process';
import path from 'path';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  Analysis,
  CategoryColorAnalysis,
  HubNodeAnalysis,
  NodeReferencedAnalysis,
} from '../analyses';
import { AssemblyError } from '../graph/errors';
import { TypeScriptTypeExtractor } from '../parsers/typescript-type-extractor';
import { DgmlWriter } from '../serialization';
import { visualizeTypes } from '../visualizers';
import { config, discoverSourceFiles, flushLogs, logger } from '../utils';
import { parsePositiveInteger } from './options';

interface TypesCommandOptions {
  output: string;
  root?: string;
  title?: string;
  hubAnalysis: boolean;
  unreferenced?: boolean;
  categoryColors?: boolean;
  maxFiles: number;
  verbose?: boolean;
}

// Check for Unicode support and provide fallbacks
const getEmoji = (emoji: string, fallback: string): string => {
  const supportsUnicode =
    process.env.TERM !== 'dumb' &&
    (!process.env.CI || process.env.CI === 'false') &&
    process.platform !== 'win32';

  return supportsUnicode ? emoji : fallback;
};

function selectAnalyses(options: TypesCommandOptions): Analysis[] {
  const analyses: Analysis[] = [];
  if (options.hubAnalysis) analyses.push(new HubNodeAnalysis());
  if (options.unreferenced) analyses.push(new NodeReferencedAnalysis());
  if (options.categoryColors) analyses.push(new CategoryColorAnalysis());
  return analyses;
}

const program = new Command();

program
  .name('dgml-builder')
  .description('Build DGML directed graph documents from source code')
  .version('0.1.0');

program
  .command('types')
  .description('Visualize TypeScript classes and interfaces as a DGML type diagram')
  .argument('<paths...>', 'Files or directories to scan for .ts sources')
  .option('-o, --output <file>', 'Output DGML file', config.output.file)
  .option('--root <dir>', 'Directory module names are relative to (default: current directory)')
  .option('--title <title>', 'Graph title')
  .option('--no-hub-analysis', 'Do not flag the most connected types')
  .option('--unreferenced', 'Flag types nothing refers to')
  .option('--category-colors', 'Colour module categories')
  .option(
    '--max-files <count>',
    'Maximum number of files to process',
    parsePositiveInteger,
    config.output.maxFiles
  )
  .option('--verbose', 'Enable verbose logging')
  .action(async (paths: string[], options: TypesCommandOptions) => {
    if (options.verbose) {
      logger.level = 'debug';
    }

    const rootDir = path.resolve(options.root ?? process.cwd());
    const outputPath = path.resolve(options.output);
    const spinner = ora('Discovering source files...').start();
    const startTime = Date.now();

    try {
      const files = await discoverSourceFiles(
        paths.map(p => path.resolve(p)),
        { maxFiles: options.maxFiles }
      );

      spinner.text = `Extracting types from ${files.length} files...`;
      const extractor = new TypeScriptTypeExtractor();
      const types = await extractor.extractFromFiles(files, rootDir);

      spinner.text = 'Building graph...';
      const graph = visualizeTypes(types, {
        analyses: selectAnalyses(options),
        title: options.title,
      });

      spinner.text = 'Writing DGML...';
      await new DgmlWriter().writeToFile(graph, outputPath);
      spinner.succeed('Type diagram written');

      console.log(chalk.blue(`${getEmoji('📁', 'Files:')} Files processed: ${files.length}`));
      console.log(chalk.blue(`${getEmoji('🔍', 'Types:')} Types extracted: ${types.length}`));
      console.log(
        chalk.blue(
          `${getEmoji('🔗', 'Graph:')} ${graph.nodes.length} nodes, ${graph.links.length} links, ${graph.categories.length} categories`
        )
      );
      console.log(
        chalk.blue(`${getEmoji('⏱️', 'Time:')}  Duration: ${((Date.now() - startTime) / 1000).toFixed(2)}s`)
      );
      console.log(chalk.green(`${getEmoji('✅', '[OK]')} ${outputPath}`));

      await flushLogs();
    } catch (error) {
      spinner.fail('Type diagram failed');
      logger.error('types command failed', {
        error: error instanceof Error ? error.message : String(error),
        kind: error instanceof AssemblyError ? error.kind : undefined,
      });
      console.error(chalk.red(`\n${getEmoji('❌', '[ERROR]')} Error:`));
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      await flushLogs();
      process.exit(1);
    }
  });

program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  console.error(chalk.red('\nUnhandled promise rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
