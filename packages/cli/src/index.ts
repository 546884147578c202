#!/usr/bin/env node
/**
 * fx-regime entry point
 */

import 'dotenv/config';
import { pino } from 'pino';
import { createProgram } from './program.js';
import { paint } from './utils/display.js';

const logger = pino({
  name: 'fx-regime',
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: { colorize: true },
  },
});

createProgram(logger)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(paint('red', `Fatal error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
