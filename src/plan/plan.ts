/**
 * Execution plans: parsing, validation and per-run persistence.
 *
 * A plan is accepted once and is immutable afterwards. The stored copy under
 * the state directory is what a resumed run executes, so editing the source
 * file mid-run does not reshuffle waves that already ran.
 */

import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidPlanError } from '../errors/errors.js';
import { writeFileAtomic } from '../utils/atomic-file.js';
import { isSafeId, SAFE_ID_RULE } from '../utils/ids.js';
import type { WorkItem } from '../types.js';

const ItemIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform(String)
  .refine(isSafeId, (id) => ({ message: `item id "${id}" ${SAFE_ID_RULE}` }));

const WaveSchema = z.object({
  wave: z.number().int().positive(),
  items: z.array(ItemIdSchema),
  description: z.string().optional(),
});

const PlanItemSchema = z.object({
  title: z.string().optional(),
  dependsOn: z.array(ItemIdSchema).default([]),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstDefined(source: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined) return source[key];
  }
  return undefined;
}

function withoutKeys(source: Record<string, unknown>, keys: string[]): Record<string, unknown> {
  return Object.fromEntries(Object.entries(source).filter(([key]) => !keys.includes(key)));
}

function normalizeWave(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  return {
    ...withoutKeys(raw, ['issues', 'epics', 'epic_ids', 'depends_on_wave']),
    items: firstDefined(raw, ['items', 'issues', 'epics', 'epic_ids']),
  };
}

function normalizeItem(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  return { ...withoutKeys(raw, ['depends_on']), dependsOn: firstDefined(raw, ['dependsOn', 'depends_on']) };
}

/**
 * Accepts the older snake_case plan documents (`epic_waves`, `issues`,
 * `issue_details`, ...) alongside the canonical shape.
 */
export function normalizePlanDocument(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;

  const waves = firstDefined(raw, ['waves', 'epic_waves']);
  const items = firstDefined(raw, ['items', 'issue_details', 'epic_details']);

  return {
    waves: Array.isArray(waves) ? waves.map(normalizeWave) : waves,
    items: isRecord(items)
      ? Object.fromEntries(Object.entries(items).map(([id, item]) => [id, normalizeItem(item)]))
      : items,
    successCriteria: firstDefined(raw, ['successCriteria', 'success_criteria']),
    estimatedTime: firstDefined(raw, ['estimatedTime', 'estimated_time']),
  };
}

export const ExecutionPlanSchema = z.preprocess(
  normalizePlanDocument,
  z.object({
    waves: z.array(WaveSchema),
    items: z.record(z.string(), PlanItemSchema).default({}),
    successCriteria: z.array(z.string()).default([]),
    estimatedTime: z.string().optional(),
  }),
);

export type ExecutionPlan = z.infer<typeof ExecutionPlanSchema>;
export type Wave = ExecutionPlan['waves'][number];

/** Structural problems zod cannot express. Empty result means valid. */
export function validatePlan(plan: ExecutionPlan): string[] {
  const issues: string[] = [];

  if (plan.waves.length === 0) {
    issues.push('plan has no waves');
  }

  const seen = new Map<string, number>();
  let previous = 0;
  for (const wave of plan.waves) {
    if (wave.wave <= previous) {
      issues.push(`wave ${wave.wave} does not follow wave ${previous}`);
    }
    previous = Math.max(previous, wave.wave);

    if (wave.items.length === 0) {
      issues.push(`wave ${wave.wave} has no items`);
    }
    for (const id of wave.items) {
      const firstWave = seen.get(id);
      if (firstWave !== undefined) {
        issues.push(`item ${id} appears in wave ${firstWave} and wave ${wave.wave}`);
      } else {
        seen.set(id, wave.wave);
      }
    }
  }

  return issues;
}

/**
 * Parse and validate a plan document.
 * @throws InvalidPlanError
 */
export function parsePlan(document: unknown): ExecutionPlan {
  const parsed = ExecutionPlanSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidPlanError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const issues = validatePlan(parsed.data);
  if (issues.length > 0) {
    throw new InvalidPlanError(issues);
  }
  return parsed.data;
}

export function planItemIds(plan: ExecutionPlan): string[] {
  return plan.waves.flatMap((wave) => wave.items);
}

export function workItem(plan: ExecutionPlan, id: string): WorkItem {
  const details = Object.hasOwn(plan.items, id) ? plan.items[id] : undefined;
  return { id, title: details?.title, dependsOn: details?.dependsOn ?? [] };
}

/** One wave per item, in the given order. */
export function sequentialPlan(ids: string[], describe: (id: string) => string = (id) => `Item #${id}`): ExecutionPlan {
  return {
    waves: ids.map((id, index) => ({ wave: index + 1, items: [id], description: describe(id) })),
    items: {},
    successCriteria: [],
  };
}

// ─────────────────────────────────────────────────────────────
// Plan sources
// ─────────────────────────────────────────────────────────────

export interface PlanSource {
  /** Where the plan comes from, for log lines. */
  readonly description: string;
  read(): Promise<unknown>;
}

export function filePlanSource(path: string): PlanSource {
  return {
    description: path,
    async read() {
      let content: string;
      try {
        content = await readFile(path, 'utf-8');
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          throw new InvalidPlanError([`plan file ${path} does not exist`]);
        }
        throw err;
      }
      try {
        return JSON.parse(content);
      } catch {
        throw new InvalidPlanError([`plan file ${path} is not valid JSON`]);
      }
    },
  };
}

export function inlinePlanSource(document: unknown, description = 'inline plan'): PlanSource {
  return { description, read: async () => document };
}

// ─────────────────────────────────────────────────────────────
// Persistence
// ─────────────────────────────────────────────────────────────

export class PlanStore {
  constructor(readonly stateDir: string) {}

  planPath(runId: string): string {
    return join(this.stateDir, `${runId}.plan.json`);
  }

  async exists(runId: string): Promise<boolean> {
    try {
      await access(this.planPath(runId));
      return true;
    } catch {
      return false;
    }
  }

  async save(runId: string, plan: ExecutionPlan): Promise<void> {
    await writeFileAtomic(this.planPath(runId), JSON.stringify(plan, null, 2) + '\n');
  }

  /** The stored plan, or undefined when none was saved for this run. */
  async load(runId: string): Promise<ExecutionPlan | undefined> {
    if (!(await this.exists(runId))) {
      return undefined;
    }
    return parsePlan(await filePlanSource(this.planPath(runId)).read());
  }
}
