import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from './commands/init.js';
import { projectCommand } from './commands/project.js';
import { resumeCommand } from './commands/resume.js';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { parseInteger, parseRunId, withErrorHandling } from './shared.js';

function withSchedulingOptions(command: Command): Command {
  return command
    .option('--max-parallel <n>', 'Items running at once per wave (0 = unbounded)', parseInteger)
    .option('--max-retries <n>', 'Attempts per item before it is left failed', parseInteger)
    .option('--timeout <ms>', 'Per-item timeout in milliseconds (0 = none)', parseInteger);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('conductor')
    .description(chalk.cyan('wave-conductor') + ' - run agent work in dependency waves with resumable state')
    .version('1.0.0')
    .option('-c, --config <dir>', 'Directory holding conductor.json (default: cwd)')
    .option('-s, --state-dir <dir>', 'State directory (overrides the config file)');

  withSchedulingOptions(
    program
      .command('run')
      .description('Start a new run from a plan file')
      .argument('<runId>', 'Run identifier', parseRunId)
      .requiredOption('-p, --plan <file>', 'Execution plan (JSON)')
      .option('--fresh', 'Replace a completed run with the same id')
      .option('-f, --force', 'Take over the lock even if its owner is alive')
      .option('--dry-run', 'Validate and print the plan without executing')
  ).action(withErrorHandling(runCommand));

  withSchedulingOptions(
    program
      .command('resume')
      .description('Resume an interrupted or failed run')
      .argument('<runId>', 'Run identifier', parseRunId)
      .option('-p, --plan <file>', 'Plan file, used only if the run has no stored plan')
      .option('-f, --force', 'Take over the lock even if its owner is alive')
  ).action(withErrorHandling(resumeCommand));

  withSchedulingOptions(
    program
      .command('project')
      .description('Run a project: each item of the plan is an epic run with its own plan')
      .argument('<runId>', 'Project run identifier', parseRunId)
      .requiredOption('-p, --plan <file>', 'Project plan whose items are epic ids')
      .requiredOption('-e, --epic-plans <dir>', 'Directory with one <epicId>.json plan per epic')
      .option('-f, --force', 'Take over locks even if their owners are alive')
      .option('--dry-run', 'Validate and print every plan without executing')
  ).action(withErrorHandling(projectCommand));

  program
    .command('status')
    .description('Show one run, or list all runs')
    .argument('[runId]', 'Run identifier', parseRunId)
    .action(withErrorHandling(statusCommand));

  program
    .command('init')
    .description('Create conductor.json interactively')
    .action(withErrorHandling(initCommand));

  return program;
}
