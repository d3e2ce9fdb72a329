#!/usr/bin/env node
import chalk from 'chalk';
import { errorMessage } from '../errors/errors.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(chalk.red(`Fatal: ${errorMessage(err)}`));
    process.exitCode = 1;
  });
