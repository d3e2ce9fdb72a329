/**
 * Epic-level unit of work: one agent process per issue.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import type { AgentConfig } from '../config/schema.js';
import type { ExecuteContext, UnitOfWork, UnitResult, WorkItem } from '../types.js';
import {
  executeSubprocess,
  type SubprocessOptions,
  type SubprocessResult,
} from '../utils/subprocess-handler.js';
import { logger } from '../utils/logger.js';

export type SubprocessRunner = (
  command: string,
  args: string[],
  options: SubprocessOptions
) => Promise<SubprocessResult>;

export interface AgentCommandUnitOptions {
  agent: AgentConfig;
  /** Per-item logs go to `<logDir>/<id>.log`. */
  logDir: string;
  runner?: SubprocessRunner;
}

/** Substitute `{id}`, `{title}` and `{attempt}`; unknown placeholders are left alone. */
export function renderTemplate(template: string, item: WorkItem, attempt: number): string {
  const values: Record<string, string> = {
    id: item.id,
    title: item.title ?? `Item ${item.id}`,
    attempt: String(attempt),
  };
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    (Object.hasOwn(values, key) ? values[key] : undefined) ?? match
  );
}

export class AgentCommandUnit implements UnitOfWork {
  private readonly runner: SubprocessRunner;

  constructor(private readonly options: AgentCommandUnitOptions) {
    this.runner = options.runner ?? executeSubprocess;
  }

  logPath(itemId: string): string {
    return join(this.options.logDir, `${itemId}.log`);
  }

  async execute(item: WorkItem, { attempt, signal }: ExecuteContext): Promise<UnitResult> {
    const { agent } = this.options;
    const args = agent.args.map((arg) => renderTemplate(arg, item, attempt));

    logger.debug(`Starting agent for item ${item.id}`, { command: agent.command, attempt });
    const result = await this.runner(agent.command, args, { cwd: agent.cwd, env: agent.env, signal });

    await this.appendLog(item.id, attempt, result);
    const artifact = await this.readArtifact(item, attempt);

    return {
      success: result.success,
      output: result.output,
      timedOut: result.timedOut || result.canceled,
      exitCode: result.exitCode ?? undefined,
      artifact,
    };
  }

  private async appendLog(itemId: string, attempt: number, result: SubprocessResult): Promise<void> {
    const path = this.logPath(itemId);
    await mkdir(dirname(path), { recursive: true });
    const header = `\n=== attempt ${attempt} at ${new Date().toISOString()} (exit ${result.exitCode ?? 'none'}) ===\n`;
    await appendFile(path, header + result.output + '\n', 'utf-8');
  }

  /** Trimmed content of the completion artifact file, if it exists and is non-empty. */
  private async readArtifact(item: WorkItem, attempt: number): Promise<string | undefined> {
    const { artifactPath, cwd } = this.options.agent;
    if (!artifactPath) return undefined;

    const rendered = renderTemplate(artifactPath, item, attempt);
    const path = isAbsolute(rendered) ? rendered : resolve(cwd ?? process.cwd(), rendered);
    try {
      const content = (await readFile(path, 'utf-8')).trim();
      return content || undefined;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }
  }
}
