/**
 * Config and input file loading
 */

import { readFile } from 'node:fs/promises';
import type { z, ZodTypeAny } from 'zod';
import {
  createEngineConfig,
  InvalidConfigError,
  type EngineConfig,
} from '@fx-regime/engine';
import { EngineConfigFileSchema, MarketDataFileSchema, type MarketDataFile } from './schema.js';

/** Unreadable or invalid input; the CLI exits with status 1 */
export class CliInputError extends Error {
  constructor(message: string, readonly problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'CliInputError';
  }
}

export async function readJsonFile<S extends ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new CliInputError(`Cannot read ${path}`, [error instanceof Error ? error.message : String(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new CliInputError(`Invalid JSON in ${path}`, [error instanceof Error ? error.message : String(error)]);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new CliInputError(
      `Invalid contents in ${path}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Engine configuration from an optional overrides file
 */
export async function loadEngineConfig(path?: string): Promise<Readonly<EngineConfig>> {
  const overrides = path ? await readJsonFile(path, EngineConfigFileSchema) : {};

  try {
    return createEngineConfig(overrides);
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      throw new CliInputError(`Invalid configuration${path ? ` in ${path}` : ''}`, error.problems);
    }
    throw error;
  }
}

export function loadMarketDataFile(path: string): Promise<MarketDataFile> {
  return readJsonFile(path, MarketDataFileSchema);
}
