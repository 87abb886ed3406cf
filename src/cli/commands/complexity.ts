import chalk from 'chalk';
import ora from 'ora';
import { cycleEdgeKeys } from '../../analyzers/cycle-detector';
import { deepestChain } from '../../analyzers/depth-analyzer';
import { scoreComplexityAnalysis } from '../../assessors/code-complexity-assessor';
import { ComplexityEngine } from '../../core/complexity-engine';
import { AssessmentError } from '../../errors/assessment-error';
import { ErrorCode } from '../../utils/error-handler';
import { directoryExists } from '../../utils/file-utils';
import { formatDuration } from '../../utils/format-utils';
import { CategoryResult, ComplexityAnalysis } from '../../types';
import { BaseCommandOptions, VoidCommand, WithRepository } from '../../types/command';
import { CommandEnvironment } from '../../types/environment';

export type ComplexityOutputFormat = 'table' | 'json' | 'dot';

export interface ComplexityCommandOptions extends BaseCommandOptions {
  format?: ComplexityOutputFormat;
}

const TABLE_LIMIT = 10;

/**
 * Run the complexity & dependency engine alone and print its raw metrics
 */
export const complexityCommand: VoidCommand<WithRepository<ComplexityCommandOptions>> = options =>
  async (env: CommandEnvironment): Promise<void> => {
    if (!(await directoryExists(options.repositoryPath))) {
      throw new AssessmentError(
        ErrorCode.DIRECTORY_NOT_FOUND,
        `Directory not found: ${options.repositoryPath}`,
        { path: options.repositoryPath }
      );
    }

    const format = options.json ? 'json' : (options.format ?? 'table');
    const spinner = ora({
      text: 'Analyzing code complexity and dependencies...',
      isEnabled: format === 'table' && !env.commandLogger.isQuiet,
    }).start();
    const started = Date.now();

    const analysis = await new ComplexityEngine(env.config, env.commandLogger)
      .analyze(options.repositoryPath)
      .then(
        result => {
          spinner.succeed(`Complexity analysis complete (${formatDuration(Date.now() - started)})`);
          return result;
        },
        (error: unknown) => {
          spinner.fail('Complexity analysis failed');
          throw error;
        }
      );
    const score = scoreComplexityAnalysis(analysis, env.config.thresholds);

    if (format === 'json') {
      console.log(formatComplexityJson(analysis, score));
    } else if (format === 'dot') {
      console.log(formatComplexityDot(analysis));
    } else {
      console.log(formatComplexityTable(analysis, score, env.commandLogger.isVerbose));
    }
  };

/**
 * JSON document of the analysis; graph and depth maps become plain objects
 */
export function formatComplexityJson(analysis: ComplexityAnalysis, score: CategoryResult): string {
  const { dependencies } = analysis;
  const result = {
    rootPath: analysis.rootPath,
    fileCount: analysis.fileCount,
    complexity: analysis.complexity,
    coupling: analysis.coupling,
    dependencies: {
      graph: Object.fromEntries(dependencies.graph),
      cycles: dependencies.cycles,
      depths: Object.fromEntries(dependencies.depths),
      maxDepth: dependencies.maxDepth,
      averageDepth: dependencies.averageDepth,
    },
    score,
  };

  return JSON.stringify(result, null, 2);
}

/**
 * Graphviz digraph of the sampled dependency graph; edges on a cycle are drawn red
 */
export function formatComplexityDot(analysis: ComplexityAnalysis): string {
  const { graph, cycles } = analysis.dependencies;
  const onCycle = cycleEdgeKeys(cycles);
  const lines: string[] = [];

  lines.push('digraph Dependencies {');
  lines.push('  rankdir=LR;');
  lines.push('  node [shape=box, style=filled, fillcolor=lightblue];');
  lines.push('');

  for (const node of graph.keys()) {
    lines.push(`  "${escapeDot(node)}";`);
  }

  lines.push('');

  for (const [from, targets] of graph) {
    for (const to of targets) {
      const attributes = onCycle.has(`${from}->${to}`) ? ' [color=red, penwidth=2]' : '';
      lines.push(`  "${escapeDot(from)}" -> "${escapeDot(to)}"${attributes};`);
    }
  }

  lines.push('}');
  return lines.join('\n');
}

/**
 * Human-readable report of the raw metrics followed by the banded score
 */
export function formatComplexityTable(
  analysis: ComplexityAnalysis,
  score: CategoryResult,
  verbose = false
): string {
  const lines: string[] = [];
  const { complexity, coupling, dependencies } = analysis;

  lines.push(chalk.bold('\nCode Complexity & Dependency Analysis\n'));
  lines.push(`Source files found: ${analysis.fileCount}`);

  if (analysis.fileCount === 0) {
    lines.push(chalk.yellow('No code files found to analyze'));
    return lines.join('\n');
  }

  lines.push('');
  lines.push(chalk.bold('Complexity'));
  if (complexity) {
    lines.push(`  Units analyzed:  ${complexity.unitCount} in ${complexity.analyzedFiles} files`);
    lines.push(`  Average:         ${complexity.average.toFixed(1)}`);
    lines.push(`  Max:             ${complexity.max}`);
  } else {
    lines.push(chalk.dim('  No functions or methods found'));
  }

  lines.push('');
  lines.push(chalk.bold('Coupling'));
  if (coupling) {
    lines.push(`  Files analyzed:  ${coupling.files.length}`);
    lines.push(`  Average imports: ${coupling.average.toFixed(1)}`);
    lines.push(`  Max imports:     ${coupling.max}`);
    const busiest = [...coupling.files]
      .sort((a, b) => b.imports - a.imports)
      .slice(0, verbose ? coupling.files.length : 5)
      .filter(entry => entry.imports > 0);
    for (const entry of busiest) {
      lines.push(chalk.dim(`    ${entry.file}: ${entry.imports}`));
    }
  } else {
    lines.push(chalk.dim('  No readable files'));
  }

  lines.push('');
  lines.push(chalk.bold('Dependencies'));
  lines.push(`  Graph nodes:     ${dependencies.graph.size}`);
  lines.push(`  Cycles:          ${dependencies.cycles.length}`);
  if (dependencies.maxDepth !== null && dependencies.averageDepth !== null) {
    lines.push(`  Max depth:       ${dependencies.maxDepth}`);
    lines.push(`  Average depth:   ${dependencies.averageDepth.toFixed(1)}`);
  }

  const displayCycles = verbose ? dependencies.cycles : dependencies.cycles.slice(0, TABLE_LIMIT);
  displayCycles.forEach((cycle, index) => {
    const first = cycle[0] ?? '';
    const walk = cycle.length === 1 ? `${first} ${chalk.gray('(self-import)')}` : [...cycle, first].join(' → ');
    lines.push(`  ${chalk.red(`Cycle ${index + 1}:`)} ${walk}`);
  });
  if (displayCycles.length < dependencies.cycles.length) {
    lines.push(chalk.dim(`  ... and ${dependencies.cycles.length - displayCycles.length} more (use --verbose)`));
  }

  if (dependencies.maxDepth !== null && dependencies.maxDepth > 0) {
    const deepest = [...dependencies.depths].find(([, depth]) => depth === dependencies.maxDepth);
    const chain = deepest ? deepestChain(deepest[0], dependencies.graph, dependencies.depths) : [];
    // Inside a cycle no successor is one hop shallower, so the walk can stop at its start
    if (chain.length > 1) {
      lines.push(`  Deepest chain:   ${chain.join(' → ')}`);
    }
  }

  lines.push('');
  lines.push(chalk.bold(`${score.title}: ${score.score}/${score.maxScore}`));
  for (const item of score.findings.strengths) {
    lines.push(`  ${chalk.green('✓')} ${item}`);
  }
  for (const item of score.findings.weaknesses) {
    lines.push(`  ${chalk.red('✗')} ${item}`);
  }
  for (const item of score.findings.recommendations) {
    lines.push(`  ${chalk.yellow('→')} ${item}`);
  }

  return lines.join('\n');
}

function escapeDot(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
