/**
 * Run summaries: counting, plain-text and markdown rendering, exit codes.
 * Everything here is derived from the run state; nothing is stored twice.
 */

import { join } from 'node:path';
import { errorKindLabel, isFatal } from '../errors/classifier.js';
import type { RunState } from '../state/schema.js';
import { itemState } from '../state/transitions.js';
import { planItemIds, type ExecutionPlan } from '../plan/plan.js';
import type { Finalizer, FinalizerContext, ItemCounts, RunSummary } from '../types.js';
import { writeFileAtomic } from '../utils/atomic-file.js';
import { logger } from '../utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;
export const EXIT_INTERRUPTED = 130;

export function summarize(state: RunState, plan: ExecutionPlan, options: { dryRun?: boolean } = {}): RunSummary {
  const counts: ItemCounts = { total: 0, pending: 0, inProgress: 0, completed: 0, failed: 0, fatal: 0 };
  const failedItems: string[] = [];
  const fatalItems: string[] = [];
  const artifacts: Record<string, string> = {};

  for (const id of planItemIds(plan)) {
    const item = itemState(state, id);
    counts.total++;
    switch (item.status) {
      case 'pending':
        counts.pending++;
        break;
      case 'in_progress':
        counts.inProgress++;
        break;
      case 'completed':
        counts.completed++;
        break;
      case 'failed':
        counts.failed++;
        failedItems.push(id);
        break;
      case 'fatal':
        counts.fatal++;
        fatalItems.push(id);
        break;
    }
    if (item.artifact) {
      artifacts[id] = item.artifact;
    }
  }

  return {
    runId: state.runId,
    kind: state.kind,
    status: state.status,
    dryRun: options.dryRun ?? false,
    counts,
    totalWaves: plan.waves.length,
    completedWaves: [...state.completedWaves],
    failedItems,
    fatalItems,
    errors: [...state.errors],
    artifacts,
  };
}

export function formatSummary(summary: RunSummary): string {
  const { counts } = summary;
  const lines = [
    `Run ${summary.runId} (${summary.kind}): ${summary.status}${summary.dryRun ? ' [dry run]' : ''}`,
    `Completed: ${counts.completed}/${counts.total}`,
    `Failed: ${counts.failed}`,
    `Fatal: ${counts.fatal}`,
    `Pending: ${counts.pending + counts.inProgress}`,
    `Waves: ${summary.completedWaves.length}/${summary.totalWaves}`,
  ];

  const fatalErrors = summary.errors.filter((e) => isFatal(e.kind));
  if (fatalErrors.length > 0) {
    lines.push('', 'Fatal errors:');
    for (const error of fatalErrors) {
      lines.push(`  - ${error.itemId}: ${errorKindLabel(error.kind)}`);
    }
  }

  return lines.join('\n');
}

export function formatPlan(plan: ExecutionPlan, options: { maxParallel?: number } = {}): string {
  const lines = [`Execution plan: ${plan.waves.length} wave(s), ${planItemIds(plan).length} item(s)`];

  for (const wave of plan.waves) {
    lines.push(`  Wave ${wave.wave}: ${wave.items.map((id) => `#${id}`).join(', ')}`);
    lines.push(`    └─ ${wave.description ?? 'No description'}`);
  }

  if (options.maxParallel !== undefined) {
    lines.push(`Max parallel: ${options.maxParallel > 0 ? options.maxParallel : 'unbounded'}`);
  }
  if (plan.estimatedTime) {
    lines.push(`Estimated time: ${plan.estimatedTime}`);
  }
  if (plan.successCriteria.length > 0) {
    lines.push('Success criteria:');
    for (const criterion of plan.successCriteria) {
      lines.push(`  - ${criterion}`);
    }
  }

  return lines.join('\n');
}

function firstLine(text: string): string {
  return text.split('\n').find((line) => line.trim() !== '')?.trim() ?? '';
}

export function renderMarkdownReport(summary: RunSummary, plan: ExecutionPlan): string {
  const { counts } = summary;
  const done = new Set(summary.completedWaves);
  const sections: string[] = [
    `## Run Report: ${summary.runId}`,
    '',
    `**Status:** ${summary.status}`,
    '',
    `- Completed: ${counts.completed}/${counts.total}`,
    `- Failed: ${counts.failed}`,
    `- Fatal: ${counts.fatal}`,
    `- Pending: ${counts.pending + counts.inProgress}`,
    '',
    '### Waves',
    ...plan.waves.map(
      (wave) => `- Wave ${wave.wave} (${done.has(wave.wave) ? 'done' : 'open'}): ${wave.items.join(', ')}`,
    ),
  ];

  const artifacts = Object.entries(summary.artifacts);
  if (artifacts.length > 0) {
    sections.push('', '### Artifacts', ...artifacts.map(([id, artifact]) => `- ${id}: ${artifact}`));
  }

  if (summary.errors.length > 0) {
    sections.push(
      '',
      '### Errors',
      ...summary.errors.map((e) => `- ${e.itemId}: ${errorKindLabel(e.kind)} - ${firstLine(e.message)}`),
    );
  }

  return sections.join('\n') + '\n';
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.dryRun) return EXIT_SUCCESS;
  switch (summary.status) {
    case 'completed':
      return summary.counts.failed > 0 ? EXIT_PARTIAL : EXIT_SUCCESS;
    case 'interrupted':
      return EXIT_INTERRUPTED;
    case 'fatal_error':
    case 'initialized':
    case 'running':
      return EXIT_FATAL;
  }
}

export function reportPath(stateDir: string, runId: string): string {
  return join(stateDir, `${runId}.report.md`);
}

/** Writes `<stateDir>/<runId>.report.md` once a run completes. */
export class MarkdownReportWriter implements Finalizer {
  readonly name = 'markdown-report';

  async run({ runId, stateDir, plan, summary }: FinalizerContext): Promise<void> {
    const path = reportPath(stateDir, runId);
    await writeFileAtomic(path, renderMarkdownReport(summary, plan));
    logger.info(`Report written to ${path}`);
  }
}
