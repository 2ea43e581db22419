// ---------------------------------------------------------------------------
// Simulation config loading
// ---------------------------------------------------------------------------

import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import {
  discreteTimeConfigSchema,
  motionProfileConfigSchema,
  controllerConfigSchema,
  plantConfigSchema,
  type SimulationConfigInput,
} from '@axis-sim/shared';
import { InvalidConfigError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { assertConfigCompatible, type ConfigComponent } from './version.js';

/** Validate one record against its schema; failures carry flattened field errors. */
export function parseRecord<T extends z.ZodTypeAny>(
  component: string,
  schema: T,
  raw: unknown,
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(component, result.error.flatten().fieldErrors);
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadComponent<T extends z.ZodTypeAny>(
  doc: Record<string, unknown>,
  component: ConfigComponent,
  schema: T,
): z.infer<T> {
  const raw = doc[component];
  // Version gate first, so an incompatible record is reported as such rather
  // than as whatever shape errors the new major introduced.
  if (isRecord(raw) && typeof raw.version === 'string') {
    assertConfigCompatible(component, raw.version);
  }
  return parseRecord(component, schema, raw);
}

/**
 * Validate a parsed simulation document.
 *
 * @throws ConfigVersionIncompatibleError  a record's major version differs.
 * @throws InvalidVersionFormatError       a record's version is not major.minor.patch.
 * @throws InvalidConfigError              a record is missing or mistyped.
 */
export function loadSimulationConfig(raw: unknown, logger: Logger = silentLogger): SimulationConfigInput {
  if (!isRecord(raw)) {
    throw new InvalidConfigError('simulation', { simulation: ['Expected an object'] });
  }

  const config: SimulationConfigInput = {
    discrete_time: loadComponent(raw, 'discrete_time', discreteTimeConfigSchema),
    motion_profile: loadComponent(raw, 'motion_profile', motionProfileConfigSchema),
    controller: loadComponent(raw, 'controller', controllerConfigSchema),
    plant: loadComponent(raw, 'plant', plantConfigSchema),
  };

  logger.debug('config.loaded', {
    profile: config.motion_profile.type,
    controller: config.controller.type,
    plant: config.plant.type,
  });
  return config;
}

/** Read a JSON simulation document from disk and validate it. */
export async function loadSimulationConfigFile(
  filePath: string,
  logger: Logger = silentLogger,
): Promise<SimulationConfigInput> {
  const text = await readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new InvalidConfigError('simulation', { file: [`${filePath} is not valid JSON`] });
  }
  return loadSimulationConfig(raw, logger);
}
