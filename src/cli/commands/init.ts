import { access, writeFile } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import type { Command } from 'commander';
import { ConductorConfigSchema, CONFIG_FILENAME, type ConductorConfigInput } from '../../config/schema.js';
import type { GlobalOptions } from '../shared.js';

interface InitAnswers {
  command: string;
  args: string;
  artifactPath: string;
  maxParallel: number;
  maxRetries: number;
  stateDir: string;
}

/** Split a command line on whitespace; double quotes group words. */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  for (const match of line.matchAll(pattern)) {
    args.push(match[1] ?? match[2] ?? '');
  }
  return args;
}

export function quoteArgs(args: string[]): string {
  return args.map((arg) => (/\s/.test(arg) || arg === '' ? `"${arg}"` : arg)).join(' ');
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const nonNegative = (input: number) => (Number.isInteger(input) && input >= 0) || 'Must be a non-negative integer';

/**
 * Interactive creation of conductor.json.
 */
export async function initCommand(_options: object, command: Command): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const configDir = resolve(globals.config ?? process.cwd());
  const configPath = join(configDir, CONFIG_FILENAME);
  const defaults = ConductorConfigSchema.parse({});

  console.log(chalk.cyan('\n wave-conductor - Interactive Setup\n'));

  if (await fileExists(configPath)) {
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
      { type: 'confirm', name: 'overwrite', message: `${configPath} exists. Overwrite?`, default: false },
    ]);
    if (!overwrite) {
      console.log(chalk.gray('Left existing config unchanged.'));
      return;
    }
  }

  const answers = await inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'command',
      message: 'Agent command:',
      default: defaults.agent.command,
      validate: (input: string) => input.trim().length > 0 || 'Command is required',
    },
    {
      type: 'input',
      name: 'args',
      message: 'Agent arguments ({id}, {title} and {attempt} are substituted):',
      default: quoteArgs(defaults.agent.args),
    },
    {
      type: 'input',
      name: 'artifactPath',
      message: 'Completion artifact file (empty for none):',
      default: '.worktrees/issue-{id}.pr',
    },
    {
      type: 'number',
      name: 'maxParallel',
      message: 'Max parallel items per wave (0 = unbounded):',
      default: defaults.maxParallel,
      validate: nonNegative,
    },
    {
      type: 'number',
      name: 'maxRetries',
      message: 'Attempts per item:',
      default: defaults.maxRetries,
      validate: nonNegative,
    },
    {
      type: 'input',
      name: 'stateDir',
      message: 'State directory:',
      default: defaults.stateDir,
    },
  ]);

  const input: ConductorConfigInput = {
    stateDir: answers.stateDir.trim(),
    maxParallel: answers.maxParallel,
    maxRetries: answers.maxRetries,
    agent: {
      command: answers.command.trim(),
      args: splitArgs(answers.args),
      artifactPath: answers.artifactPath.trim() || undefined,
    },
  };
  // Validate before writing so a bad answer never lands on disk
  const config = ConductorConfigSchema.parse(input);

  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
  console.log(chalk.green(`\n Config written to ${configPath}\n`));
}
