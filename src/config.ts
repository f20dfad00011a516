/**
 * Centralized configuration for the evaluation engine.
 *
 * Configuration is loaded with the following precedence (lowest to highest):
 * 1. Built-in defaults
 * 2. Config file (eval.config.yaml or custom path)
 * 3. Environment variables (EVAL_* prefix)
 * 4. Programmatic overrides (CLI flags or API)
 *
 * Model strings use the "provider:model" format understood by the LLM client
 * (e.g. "openai:gpt-4.1-mini", "anthropic:claude-sonnet-4-5").
 */

import yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

export interface EvalConfig {
  // Concurrency
  workers: number;
  /** 0 disables the per-invocation timeout */
  agentTimeoutMs: number;

  // Models
  judgeModel: string;
  mockerModel: string;
  inputGeneratorModel: string;

  // Mocking
  enableMockCache: boolean;
  mockCacheDir: string;

  // Paths
  outputDir: string;
  resultsFile?: string;
  evaluatorsDir?: string;
  stateFile: string;

  // Reporting
  reportOutputTruncation: number;
  noReport: boolean;
  verbose: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EvalConfig = {
  workers: 1,
  agentTimeoutMs: 0,
  judgeModel: 'openai:gpt-4.1-mini',
  mockerModel: 'openai:gpt-4.1-mini',
  inputGeneratorModel: 'openai:gpt-4.1-mini',
  enableMockCache: false,
  mockCacheDir: './.eval/mock-cache',
  outputDir: './results',
  stateFile: './.eval/state.json',
  reportOutputTruncation: 2000,
  noReport: false,
  verbose: false,
};

/**
 * Raw config file structure (eval.config.yaml).
 */
const rawConfigFileSchema = z.object({
  models: z.object({
    judge: z.string().optional(),
    mocker: z.string().optional(),
    input_generator: z.string().optional(),
  }).optional(),
  runner: z.object({
    workers: z.number().int().positive().optional(),
    agent_timeout_ms: z.number().int().nonnegative().optional(),
  }).optional(),
  mocking: z.object({
    cache: z.boolean().optional(),
    cache_dir: z.string().optional(),
  }).optional(),
  output: z.object({
    dir: z.string().optional(),
    results_file: z.string().optional(),
    report_truncation: z.number().int().nonnegative().optional(),
    no_report: z.boolean().optional(),
  }).optional(),
  paths: z.object({
    evaluators_dir: z.string().optional(),
    state_file: z.string().optional(),
  }).optional(),
});

/**
 * Load a YAML config file if it exists.
 */
async function loadConfigFile(configPath?: string): Promise<Partial<EvalConfig>> {
  const filePath = configPath || path.join(process.cwd(), 'eval.config.yaml');

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    // Config file not found, that's fine
    return {};
  }

  const parsed = rawConfigFileSchema.safeParse(yaml.load(content) ?? {});
  if (!parsed.success) {
    console.warn(`Ignoring invalid config file ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return {};
  }
  const raw = parsed.data;

  const config: Partial<EvalConfig> = {};

  if (raw.models?.judge) config.judgeModel = raw.models.judge;
  if (raw.models?.mocker) config.mockerModel = raw.models.mocker;
  if (raw.models?.input_generator) config.inputGeneratorModel = raw.models.input_generator;

  if (raw.runner?.workers !== undefined) config.workers = raw.runner.workers;
  if (raw.runner?.agent_timeout_ms !== undefined) config.agentTimeoutMs = raw.runner.agent_timeout_ms;

  if (raw.mocking?.cache !== undefined) config.enableMockCache = raw.mocking.cache;
  if (raw.mocking?.cache_dir) config.mockCacheDir = raw.mocking.cache_dir;

  if (raw.output?.dir) config.outputDir = raw.output.dir;
  if (raw.output?.results_file) config.resultsFile = raw.output.results_file;
  if (raw.output?.report_truncation !== undefined) config.reportOutputTruncation = raw.output.report_truncation;
  if (raw.output?.no_report !== undefined) config.noReport = raw.output.no_report;

  if (raw.paths?.evaluators_dir) config.evaluatorsDir = raw.paths.evaluators_dir;
  if (raw.paths?.state_file) config.stateFile = raw.paths.state_file;

  return config;
}

function parseBoolean(value: string): boolean {
  return value === 'true' || value === '1';
}

/**
 * Load configuration from environment variables.
 *
 * Supported variables:
 * - EVAL_WORKERS: Max concurrent agent invocations (default: 1)
 * - EVAL_AGENT_TIMEOUT_MS: Per-invocation timeout, 0 = off (default: 0)
 * - EVAL_JUDGE_MODEL / EVAL_MOCKER_MODEL / EVAL_INPUT_GENERATOR_MODEL
 * - EVAL_MOCK_CACHE: Enable the mock response cache (default: false)
 * - EVAL_MOCK_CACHE_DIR: Where cached mock responses persist
 * - EVAL_OUTPUT_DIR: Directory for reports (default: './results')
 * - EVAL_RESULTS_FILE: Explicit path of the local results file
 * - EVAL_EVALUATORS_DIR: Evaluator definitions directory
 * - EVAL_STATE_FILE: File-backed runtime storage (default: './.eval/state.json')
 * - EVAL_REPORT_TRUNCATION: Max chars of output in reports (default: 2000)
 * - EVAL_NO_REPORT: Skip markdown/JSON reports (default: false)
 * - EVAL_VERBOSE: Verbose console output (default: false)
 */
function loadEnvConfig(): Partial<EvalConfig> {
  const config: Partial<EvalConfig> = {};
  const env = process.env;

  const workers = parseInt(env.EVAL_WORKERS || '', 10);
  if (!isNaN(workers) && workers > 0) config.workers = workers;

  const timeout = parseInt(env.EVAL_AGENT_TIMEOUT_MS || '', 10);
  if (!isNaN(timeout) && timeout >= 0) config.agentTimeoutMs = timeout;

  if (env.EVAL_JUDGE_MODEL) config.judgeModel = env.EVAL_JUDGE_MODEL;
  if (env.EVAL_MOCKER_MODEL) config.mockerModel = env.EVAL_MOCKER_MODEL;
  if (env.EVAL_INPUT_GENERATOR_MODEL) config.inputGeneratorModel = env.EVAL_INPUT_GENERATOR_MODEL;

  if (env.EVAL_MOCK_CACHE !== undefined) config.enableMockCache = parseBoolean(env.EVAL_MOCK_CACHE);
  if (env.EVAL_MOCK_CACHE_DIR) config.mockCacheDir = env.EVAL_MOCK_CACHE_DIR;

  if (env.EVAL_OUTPUT_DIR) config.outputDir = env.EVAL_OUTPUT_DIR;
  if (env.EVAL_RESULTS_FILE) config.resultsFile = env.EVAL_RESULTS_FILE;
  if (env.EVAL_EVALUATORS_DIR) config.evaluatorsDir = env.EVAL_EVALUATORS_DIR;
  if (env.EVAL_STATE_FILE) config.stateFile = env.EVAL_STATE_FILE;

  const reportTruncation = parseInt(env.EVAL_REPORT_TRUNCATION || '', 10);
  if (!isNaN(reportTruncation)) config.reportOutputTruncation = reportTruncation;

  if (env.EVAL_NO_REPORT !== undefined) config.noReport = parseBoolean(env.EVAL_NO_REPORT);
  if (env.EVAL_VERBOSE !== undefined) config.verbose = parseBoolean(env.EVAL_VERBOSE);

  return config;
}

/**
 * Merge multiple partial configs into a full config. Later configs win;
 * undefined values never overwrite.
 */
export function mergeConfigs(...configs: Partial<EvalConfig>[]): EvalConfig {
  const result: EvalConfig = { ...DEFAULT_CONFIG };

  for (const config of configs) {
    if (config.workers !== undefined) result.workers = config.workers;
    if (config.agentTimeoutMs !== undefined) result.agentTimeoutMs = config.agentTimeoutMs;
    if (config.judgeModel !== undefined) result.judgeModel = config.judgeModel;
    if (config.mockerModel !== undefined) result.mockerModel = config.mockerModel;
    if (config.inputGeneratorModel !== undefined) result.inputGeneratorModel = config.inputGeneratorModel;
    if (config.enableMockCache !== undefined) result.enableMockCache = config.enableMockCache;
    if (config.mockCacheDir !== undefined) result.mockCacheDir = config.mockCacheDir;
    if (config.outputDir !== undefined) result.outputDir = config.outputDir;
    if (config.resultsFile !== undefined) result.resultsFile = config.resultsFile;
    if (config.evaluatorsDir !== undefined) result.evaluatorsDir = config.evaluatorsDir;
    if (config.stateFile !== undefined) result.stateFile = config.stateFile;
    if (config.reportOutputTruncation !== undefined) result.reportOutputTruncation = config.reportOutputTruncation;
    if (config.noReport !== undefined) result.noReport = config.noReport;
    if (config.verbose !== undefined) result.verbose = config.verbose;
  }

  return result;
}

/**
 * Load full configuration with all sources merged.
 *
 * @param configPath - Optional path to eval.config.yaml
 * @param overrides - Optional programmatic overrides (CLI flags)
 */
export async function loadConfig(
  configPath?: string,
  overrides?: Partial<EvalConfig>
): Promise<EvalConfig> {
  const fileConfig = await loadConfigFile(configPath);
  const envConfig = loadEnvConfig();

  return mergeConfigs(fileConfig, envConfig, overrides ?? {});
}

/**
 * Load configuration synchronously (env vars + defaults only, no file).
 * Useful when you can't await, e.g. in constructors.
 */
export function loadConfigSync(overrides?: Partial<EvalConfig>): EvalConfig {
  const envConfig = loadEnvConfig();
  return mergeConfigs(envConfig, overrides ?? {});
}
