import { z } from 'zod';
import { ERROR_KINDS, type ErrorKind } from '../errors/classifier.js';

export const STATE_VERSION = 1;

export const RUN_STATUSES = ['initialized', 'running', 'interrupted', 'fatal_error', 'completed'] as const;
export const ITEM_STATUSES = ['pending', 'in_progress', 'completed', 'failed', 'fatal'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];
export type ItemStatus = (typeof ITEM_STATUSES)[number];

const ErrorKindSchema = z.custom<ErrorKind>(
  (value) => typeof value === 'string' && (ERROR_KINDS as readonly string[]).includes(value),
  { message: 'Unknown error kind' },
);

export const ErrorRecordSchema = z.object({
  itemId: z.string(),
  kind: ErrorKindSchema,
  message: z.string(),
  timestamp: z.string(),
});

export const ItemStateSchema = z.object({
  status: z.enum(ITEM_STATUSES),
  attempts: z.number().int().min(0),
  updatedAt: z.string(),
  artifact: z.string().optional(),
});

export const RunStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  runId: z.string().min(1),
  kind: z.enum(['epic', 'project', 'run']),
  status: z.enum(RUN_STATUSES),
  currentWave: z.number().int().min(0),
  completedWaves: z.array(z.number().int().positive()),
  items: z.record(z.string(), ItemStateSchema),
  errors: z.array(ErrorRecordSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
  pid: z.number().int(),
  hostname: z.string(),
});

export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;
export type ItemState = z.infer<typeof ItemStateSchema>;
export type RunState = z.infer<typeof RunStateSchema>;
export type RunKind = RunState['kind'];
