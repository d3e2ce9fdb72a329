import { join, resolve } from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { errorMessage, InvalidPlanError } from '../../errors/errors.js';
import { RunDriver } from '../../orchestrator/driver.js';
import { formatPlan, MarkdownReportWriter } from '../../orchestrator/report.js';
import type { SchedulerSettings } from '../../orchestrator/scheduler.js';
import { ShutdownSignal } from '../../orchestrator/shutdown.js';
import { filePlanSource, parsePlan, planItemIds, type ExecutionPlan, type PlanSource } from '../../plan/plan.js';
import type { WorkItem } from '../../types.js';
import { NestedRunUnit } from '../../work/nested-run.js';
import {
  agentUnit,
  epicSettings,
  loadContext,
  printProgress,
  runToCompletion,
  type GlobalOptions,
  type SchedulingFlags,
} from '../shared.js';

export interface ProjectOptions extends SchedulingFlags {
  plan: string;
  /** Directory holding one `<epicId>.json` plan per epic. */
  epicPlans: string;
  force?: boolean;
  dryRun?: boolean;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

/**
 * Print the project plan and every epic plan; fail if any epic plan is
 * missing or invalid.
 */
async function previewEpicPlans(plan: ExecutionPlan, sourceFor: (id: string) => PlanSource): Promise<void> {
  const problems: string[] = [];
  for (const id of planItemIds(plan)) {
    try {
      const epicPlan = parsePlan(await sourceFor(id).read());
      console.log(chalk.cyan(`\nEpic #${id}`));
      console.log(indent(formatPlan(epicPlan)));
    } catch (err) {
      problems.push(`epic ${id}: ${errorMessage(err)}`);
    }
  }
  if (problems.length > 0) {
    throw new InvalidPlanError(problems);
  }
}

/**
 * Run a project: the outer plan's items are epics, each executed as a whole
 * nested epic-level run. Resumes automatically when state exists.
 */
export async function projectCommand(runId: string, options: ProjectOptions, command: Command): Promise<void> {
  const context = await loadContext(command.optsWithGlobals<GlobalOptions>());
  const { config } = context;
  const epicPlansDir = resolve(options.epicPlans);
  const epicPlanSource = (id: string): PlanSource => filePlanSource(join(epicPlansDir, `${id}.json`));

  const outerSettings: SchedulerSettings = {
    maxParallel: options.maxParallel ?? config.project.maxParallel,
    maxRetries: options.maxRetries ?? config.project.maxRetries,
    itemTimeoutMs: options.timeout ?? config.project.itemTimeoutMs,
    backoff: config.backoff,
  };
  const planSource = filePlanSource(options.plan);

  if (options.dryRun) {
    const plan = parsePlan(await planSource.read());
    console.log(chalk.cyan(`\nDry run: project ${runId}\n`));
    console.log(formatPlan(plan, { maxParallel: outerSettings.maxParallel }));
    await previewEpicPlans(plan, epicPlanSource);
  }

  const shutdown = new ShutdownSignal();
  const reportWriter = new MarkdownReportWriter();

  const unit = new NestedRunUnit({
    stateDir: context.stateDir,
    innerRunPrefix: config.project.innerRunPrefix,
    shutdown,
    planSourceFor: (item: WorkItem) => epicPlanSource(item.id),
    unitFor: (item: WorkItem) => agentUnit(context, `${config.project.innerRunPrefix}${item.id}`),
    settings: epicSettings(config, {}),
    finalizers: [reportWriter],
    force: options.force,
    onDriver: (driver) => printProgress(driver, driver.runId),
  });

  const driver = new RunDriver({
    runId,
    stateDir: context.stateDir,
    unit,
    planSource,
    mode: 'auto',
    kind: 'project',
    force: options.force,
    dryRun: options.dryRun,
    settings: outerSettings,
    shutdown,
    finalizers: [reportWriter],
  });
  printProgress(driver);

  await runToCompletion(driver);
}
