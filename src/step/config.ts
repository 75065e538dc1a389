/**
 * Step configuration and step results files.
 *
 * Config file: either a flat object of config keys, or the pipeline layout
 *
 *   {
 *     "global-defaults": { ... },
 *     "step-runner-config": {
 *       "push-container-signature": { "config": { ... } }
 *     }
 *   }
 *
 * Results file: { "step-results": { "<step-name>": { "<key>": "<value>" } } }
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { AppError, ErrorCode } from '../errors/types';
import {
  STEP_NAME,
  CONFIG_SERVER_URL,
  CONFIG_SERVER_USERNAME,
  CONFIG_SERVER_PASSWORD,
  ConfigValues,
} from '../types/step';
import { logger } from '../utils/logger';
import { StepResult } from './step-result';

export type StepResultValues = Record<string, unknown>;

export interface ResultsStore {
  'step-results': Record<string, StepResultValues>;
}

/** Environment variables that override file configuration */
export const ENV_OVERRIDES: Record<string, string> = {
  SIGNATURE_SERVER_URL: CONFIG_SERVER_URL,
  SIGNATURE_SERVER_USERNAME: CONFIG_SERVER_USERNAME,
  SIGNATURE_SERVER_PASSWORD: CONFIG_SERVER_PASSWORD,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, source: string): AppError {
  return new AppError(message, ErrorCode.VALIDATION_ERROR, { path: source }, false);
}

/**
 * Keep scalar entries as strings; nested sections belong to other steps.
 */
function toConfigValues(section: Record<string, unknown>): ConfigValues {
  const values: ConfigValues = {};
  for (const [key, value] of Object.entries(section)) {
    if (typeof value === 'string') {
      values[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      values[key] = String(value);
    } else {
      logger.debug(`Ignoring non-scalar config entry: ${key}`);
    }
  }
  return values;
}

async function readJsonFile(filePath: string, kind: string): Promise<unknown> {
  try {
    return await fs.readJson(filePath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw invalid(`Invalid JSON in ${kind} file ${filePath}: ${error.message}`, filePath);
    }
    throw error;
  }
}

/**
 * Extract this step's configuration from a parsed config document.
 */
export function parseStepConfig(raw: unknown, source: string): ConfigValues {
  if (!isPlainObject(raw)) {
    throw invalid(`Config file ${source} must contain a JSON object`, source);
  }

  const runnerConfig = raw['step-runner-config'];
  if (runnerConfig === undefined) {
    return toConfigValues(raw);
  }
  if (!isPlainObject(runnerConfig)) {
    throw invalid(`"step-runner-config" in ${source} must be an object`, source);
  }

  const globalDefaults = raw['global-defaults'] ?? {};
  if (!isPlainObject(globalDefaults)) {
    throw invalid(`"global-defaults" in ${source} must be an object`, source);
  }

  const stepSection = runnerConfig[STEP_NAME] ?? {};
  if (!isPlainObject(stepSection)) {
    throw invalid(`"step-runner-config.${STEP_NAME}" in ${source} must be an object`, source);
  }

  const stepConfig = stepSection['config'] ?? {};
  if (!isPlainObject(stepConfig)) {
    throw invalid(`"step-runner-config.${STEP_NAME}.config" in ${source} must be an object`, source);
  }

  return {
    ...toConfigValues(globalDefaults),
    ...toConfigValues(stepConfig),
  };
}

/**
 * Load step configuration from a JSON file
 */
export async function loadStepConfig(configPath: string): Promise<ConfigValues> {
  if (!(await fs.pathExists(configPath))) {
    throw new AppError(
      `Config file not found: ${configPath}`,
      ErrorCode.FILE_NOT_FOUND,
      { path: configPath },
      false
    );
  }
  return parseStepConfig(await readJsonFile(configPath, 'config'), configPath);
}

/**
 * Config values supplied through the environment
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigValues {
  const values: ConfigValues = {};
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Merge config layers, lowest precedence first. Undefined entries never
 * clear a value from a lower layer.
 */
export function resolveConfig(...layers: ConfigValues[]): ConfigValues {
  const merged: ConfigValues = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

// ─── Results ─────────────────────────────────────────────────────

export function emptyResults(): ResultsStore {
  return { 'step-results': {} };
}

export function parseResults(raw: unknown, source: string): ResultsStore {
  if (!isPlainObject(raw)) {
    throw invalid(`Results file ${source} must contain a JSON object`, source);
  }

  const stepResults = raw['step-results'] ?? {};
  if (!isPlainObject(stepResults)) {
    throw invalid(`"step-results" in ${source} must be an object`, source);
  }

  const store = emptyResults();
  for (const [stepName, values] of Object.entries(stepResults)) {
    if (!isPlainObject(values)) {
      throw invalid(`Results for step "${stepName}" in ${source} must be an object`, source);
    }
    store['step-results'][stepName] = values;
  }
  return store;
}

/**
 * Load step results. A results file that does not exist yet is empty.
 */
export async function loadResults(resultsPath: string): Promise<ResultsStore> {
  if (!(await fs.pathExists(resultsPath))) {
    logger.debug(`No results file at ${resultsPath}, starting empty`);
    return emptyResults();
  }
  return parseResults(await readJsonFile(resultsPath, 'results'), resultsPath);
}

/**
 * Look up a result value, preferring the most recently recorded step.
 */
export function getResultValue(store: ResultsStore, key: string): string | undefined {
  const steps = Object.entries(store['step-results']).reverse();
  for (const [stepName, values] of steps) {
    if (!(key in values)) continue;

    const value = values[key];
    if (typeof value === 'string') {
      return value;
    }
    throw new AppError(
      `Result ${key} from step ${stepName} must be a string`,
      ErrorCode.VALIDATION_ERROR,
      { key, stepName },
      false
    );
  }
  return undefined;
}

/**
 * Record a step's artifacts, replacing any earlier run of the same step.
 */
export function recordStepResult(store: ResultsStore, result: StepResult): ResultsStore {
  const stepResults = { ...store['step-results'] };
  delete stepResults[result.stepName];

  const values: StepResultValues = {};
  for (const artifact of result.getArtifacts()) {
    values[artifact.name] = artifact.value;
  }
  stepResults[result.stepName] = values;

  return { 'step-results': stepResults };
}

/**
 * Write the results file atomically: unique temp file, then rename.
 */
export async function saveResults(resultsPath: string, store: ResultsStore): Promise<void> {
  await fs.ensureDir(path.dirname(resultsPath));

  const tmpFile = `${resultsPath}.tmp-${process.pid}-${randomBytes(4).toString('hex')}`;
  try {
    await fs.writeJson(tmpFile, store, { spaces: 2 });
    await fs.move(tmpFile, resultsPath, { overwrite: true });
  } catch (writeErr) {
    await fs.remove(tmpFile);
    throw writeErr;
  }
}
