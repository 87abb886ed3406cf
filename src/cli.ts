#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { createErrorHandler, setupGlobalErrorHandlers } from './utils/error-handler';
import { createGlobalLogger, withEnvironment } from './cli/cli-wrapper';
import { assessCommand, AssessCommandOptions } from './cli/commands/assess';
import { complexityCommand, ComplexityCommandOptions } from './cli/commands/complexity';

const program = new Command();

program
  .name('repo-readiness')
  .description('Static readiness assessment of a source repository')
  .version('0.1.0');

// Global options
program
  .option('--config <path>', 'specify config file path')
  .option('--verbose', 'enable verbose output')
  .option('--quiet', 'suppress output')
  .option('--no-color', 'disable colored output');

// Commands
program
  .command('assess')
  .description('Score a repository across every readiness category and write a Markdown report')
  .argument('<path>', 'repository directory to assess')
  .option('--json', 'print the assessment result as JSON')
  .option('-o, --output <dir>', 'directory for the Markdown report')
  .option('--no-report', 'skip writing the Markdown report')
  .action(withEnvironment<AssessCommandOptions>(assessCommand))
  .addHelpText('after', `
Examples:
  # Assess the current directory
  $ repo-readiness assess .

  # Machine-readable result, no report file
  $ repo-readiness assess ./service --json --no-report

  # Write the report somewhere else
  $ repo-readiness assess ./service -o ./reports
`);

program
  .command('complexity')
  .description('Run the complexity & dependency analysis alone and print its metrics')
  .argument('<path>', 'repository directory to analyze')
  .addOption(
    new Option('--format <format>', 'output format').choices(['table', 'json', 'dot']).default('table')
  )
  .option('--json', 'shorthand for --format json')
  .action(withEnvironment<ComplexityCommandOptions>(complexityCommand))
  .addHelpText('after', `
Examples:
  # Metrics and banded score
  $ repo-readiness complexity ./service

  # Dependency graph for Graphviz, cycle edges in red
  $ repo-readiness complexity ./service --format dot | dot -Tsvg > deps.svg
`);

// Pre-action hook for all commands; global options are parsed by now
program.hook('preAction', () => {
  const options = program.opts();
  if (options['color'] === false) {
    chalk.level = 0;
  }
  setupGlobalErrorHandlers(createErrorHandler(createGlobalLogger(options)));
});

// Handle help display for no arguments
function handleHelpDisplay(): void {
  if (process.argv.slice(2).length) return;

  program.outputHelp();
  process.exit(0);
}

async function main(): Promise<void> {
  handleHelpDisplay();

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
