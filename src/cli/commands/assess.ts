import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { ReadinessEngine } from '../../core/readiness-engine';
import { formatAssessmentSummary, formatFindingsDigest } from '../../reporting/console-summary';
import { writeMarkdownReport } from '../../reporting/markdown-report';
import { BaseCommandOptions, VoidCommand, WithRepository } from '../../types/command';
import { CommandEnvironment } from '../../types/environment';
import { formatDuration } from '../../utils/format-utils';

export interface AssessCommandOptions extends BaseCommandOptions {
  output?: string;
  report?: boolean; // false with --no-report
}

/**
 * Run every readiness assessor over a repository, print the summary and write the report
 */
export const assessCommand: VoidCommand<WithRepository<AssessCommandOptions>> = options =>
  async (env: CommandEnvironment): Promise<void> => {
    const showProgress = !options.json && !env.commandLogger.isQuiet;
    const spinner = ora({ text: 'Assessing repository readiness...', isEnabled: showProgress }).start();
    const engine = new ReadinessEngine(env.config, env.commandLogger);
    const started = Date.now();

    const result = await engine.assess(options.repositoryPath).then(
      assessment => {
        spinner.succeed(`Assessment complete (${formatDuration(Date.now() - started)})`);
        return assessment;
      },
      (error: unknown) => {
        spinner.fail('Assessment failed');
        throw error;
      }
    );

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log();
      console.log(formatAssessmentSummary(result));
      const digest = formatFindingsDigest(result);
      if (digest && env.commandLogger.isVerbose) {
        console.log();
        console.log(digest);
      }
    }

    if (options.report === false) {
      return;
    }

    const outputDir = path.resolve(options.output ?? env.config.report.outputDir);
    const reportPath = await writeMarkdownReport(result, outputDir);
    env.commandLogger.success(`Report written to ${chalk.cyan(reportPath)}`);
  };
