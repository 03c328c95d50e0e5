import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/ErrorHandling.js';

export const CONFIG_FILE_NAME = 'p4test.config.json';

/** Ten minutes, the budget one compiler invocation gets by default. */
export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

/** Longest delay setTimeout accepts */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export const RunnerConfigSchema = z.object({
  compiler: z.string().min(1).default('./p4c-of'),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TIMEOUT_MS),
  scratch: z.boolean().default(false),
  scratchParent: z.string().min(1).default(os.tmpdir()),
  fileExtension: z.string().default('.p4'),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

type Env = Record<string, string | undefined>;

function parseBooleanFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new ConfigurationError(`${name} must be one of 1, 0, true, false (got "${value}")`);
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer (got "${value}")`);
  }
  return parsed;
}

function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.P4TEST_COMPILER) overrides.compiler = env.P4TEST_COMPILER;
  if (env.P4TEST_TIMEOUT_MS) {
    overrides.timeoutMs = parseInteger('P4TEST_TIMEOUT_MS', env.P4TEST_TIMEOUT_MS);
  }
  if (env.P4TEST_SCRATCH) overrides.scratch = parseBooleanFlag('P4TEST_SCRATCH', env.P4TEST_SCRATCH);
  if (env.P4TEST_SCRATCH_DIR) overrides.scratchParent = env.P4TEST_SCRATCH_DIR;
  return overrides;
}

function readConfigFile(cwd: string): Record<string, unknown> {
  const configPath = path.resolve(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const json: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (json && typeof json === 'object' && !Array.isArray(json)) {
      return { ...json };
    }
    console.warn(`Ignoring ${CONFIG_FILE_NAME}: expected a JSON object`);
  } catch (error) {
    console.warn(`Failed to load config from ${CONFIG_FILE_NAME}:`, error);
  }
  return {};
}

export function parseRunnerConfig(raw: unknown): RunnerConfig {
  const result = RunnerConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid runner configuration: ${problems}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Loads settings from p4test.config.json in `cwd` (when present), then applies
 * P4TEST_* environment overrides on top.
 */
export function loadRunnerConfig(
  env: Env = process.env,
  cwd: string = process.cwd(),
): RunnerConfig {
  return parseRunnerConfig({ ...readConfigFile(cwd), ...envOverrides(env) });
}
