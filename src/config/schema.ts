import { z } from 'zod';

const BackoffSchema = z.object({
  baseMs: z.number().int().min(0).default(5000),
  maxMs: z.number().int().min(0).default(300000),
});

/**
 * How a single epic-level item (an issue) is handed to the agent.
 * `{id}`, `{title}` and `{attempt}` in `args` and `artifactPath` are
 * substituted per item.
 */
const AgentSchema = z.object({
  command: z.string().min(1).default('pi'),
  args: z.array(z.string()).default(['--mode', 'json', 'Work on issue #{id}: {title}']),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string(), z.string()).optional(),
  // File whose presence (holding e.g. a PR URL) marks the item as done
  artifactPath: z.string().min(1).optional(),
});

/** Outer level: items are epics, each one a nested run. */
const ProjectSchema = z.object({
  maxParallel: z.number().int().min(0).default(2),
  maxRetries: z.number().int().min(0).default(1),
  itemTimeoutMs: z.number().int().min(0).default(2 * 60 * 60 * 1000),
  innerRunPrefix: z
    .string()
    .regex(/^[A-Za-z0-9._-]*$/, 'may contain only letters, digits, ".", "_" and "-"')
    .default('epic-'),
});

/**
 * conductor.json
 */
export const ConductorConfigSchema = z.object({
  stateDir: z.string().min(1).default('.conductor'),
  logDirectory: z.string().min(1).optional(),

  // Epic-level scheduling
  maxRetries: z.number().int().min(0).default(2),
  maxParallel: z.number().int().min(0).default(0), // 0 = unbounded
  itemTimeoutMs: z.number().int().min(0).default(0), // 0 = no timeout
  backoff: BackoffSchema.default({}),

  agent: AgentSchema.default({}),
  project: ProjectSchema.default({}),
});

export type ConductorConfig = z.infer<typeof ConductorConfigSchema>;
export type ConductorConfigInput = z.input<typeof ConductorConfigSchema>;
export type AgentConfig = z.infer<typeof AgentSchema>;
export type ProjectConfig = z.infer<typeof ProjectSchema>;
export type BackoffConfig = z.infer<typeof BackoffSchema>;

export const CONFIG_FILENAME = 'conductor.json';
