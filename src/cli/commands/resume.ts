import chalk from 'chalk';
import type { Command } from 'commander';
import { RunDriver } from '../../orchestrator/driver.js';
import { EXIT_FATAL, MarkdownReportWriter } from '../../orchestrator/report.js';
import { filePlanSource } from '../../plan/plan.js';
import { StateStore } from '../../state/store.js';
import {
  agentUnit,
  epicSettings,
  loadContext,
  printProgress,
  runToCompletion,
  type GlobalOptions,
  type SchedulingFlags,
} from '../shared.js';

export interface ResumeOptions extends SchedulingFlags {
  /** Only read when the run has no stored plan. */
  plan?: string;
  force?: boolean;
}

/**
 * Resume an existing run from its persisted state and stored plan.
 * Completed items and waves are not dispatched again.
 */
export async function resumeCommand(runId: string, options: ResumeOptions, command: Command): Promise<void> {
  const context = await loadContext(command.optsWithGlobals<GlobalOptions>());

  const state = await new StateStore(context.stateDir).load(runId);
  if (state.kind === 'project') {
    console.error(chalk.yellow(`Run ${runId} is a project run; continue it with \`conductor project ${runId}\`.`));
    process.exitCode = EXIT_FATAL;
    return;
  }

  const driver = new RunDriver({
    runId,
    stateDir: context.stateDir,
    unit: agentUnit(context, runId),
    planSource: options.plan ? filePlanSource(options.plan) : undefined,
    mode: 'resume',
    kind: 'epic',
    force: options.force,
    settings: epicSettings(context.config, options),
    finalizers: [new MarkdownReportWriter()],
  });
  printProgress(driver);

  await runToCompletion(driver);
}
