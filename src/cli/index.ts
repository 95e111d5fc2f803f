#!/usr/bin/env node
/**
 * Smart Todo CLI entry point.
 */

import { closeLogger } from '../core/logger.js';
import { closePrompt } from './prompt.js';
import { createProgram } from './program.js';

try {
  await createProgram().parseAsync();
} finally {
  closePrompt();
  closeLogger();
}
