import chalk from 'chalk';
import type { Command } from 'commander';
import { RunDriver } from '../../orchestrator/driver.js';
import { formatPlan, MarkdownReportWriter } from '../../orchestrator/report.js';
import { filePlanSource, parsePlan } from '../../plan/plan.js';
import {
  agentUnit,
  epicSettings,
  loadContext,
  printProgress,
  runToCompletion,
  type GlobalOptions,
  type SchedulingFlags,
} from '../shared.js';

export interface RunOptions extends SchedulingFlags {
  plan: string;
  fresh?: boolean;
  force?: boolean;
  dryRun?: boolean;
}

/**
 * Start a new epic-level run from a plan file.
 */
export async function runCommand(runId: string, options: RunOptions, command: Command): Promise<void> {
  const context = await loadContext(command.optsWithGlobals<GlobalOptions>());
  const settings = epicSettings(context.config, options);
  const planSource = filePlanSource(options.plan);

  if (options.dryRun) {
    console.log(chalk.cyan(`\nDry run: ${runId}\n`));
    console.log(formatPlan(parsePlan(await planSource.read()), { maxParallel: settings.maxParallel }));
  }

  const driver = new RunDriver({
    runId,
    stateDir: context.stateDir,
    unit: agentUnit(context, runId),
    planSource,
    mode: 'start',
    kind: 'epic',
    fresh: options.fresh,
    force: options.force,
    dryRun: options.dryRun,
    settings,
    finalizers: [new MarkdownReportWriter()],
  });
  printProgress(driver);

  await runToCompletion(driver);
}
