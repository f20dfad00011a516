#!/usr/bin/env node

/**
 * CLI for the agent evaluation engine.
 *
 * Primary command: `agent-eval run` runs an evaluation set against an agent.
 * Also supports: validate, report, create-set.
 */

import 'dotenv/config';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { EvalConfig } from './config.js';
import { createEvaluationSetTemplate, loadEvaluationSet, validateEvaluationSetFile } from './parser.js';
import { runPipeline, type RuntimeKind } from './pipeline.js';
import { generateReport } from './report/report.js';
import type { SetRunResult } from './types.js';

const program = new Command();

program
  .name('agent-eval')
  .description('Agent evaluation CLI: run, validate and report on evaluation sets')
  .version('1.0.0');

function splitList(value?: string): string[] | undefined {
  if (!value) return undefined;
  const parts = value.split(',').map((s) => s.trim()).filter(Boolean);
  return parts.length > 0 ? parts : undefined;
}

function parseRuntime(value: string): RuntimeKind {
  if (value === 'module' || value === 'claude-sdk') return value;
  throw new Error(`Unknown runtime "${value}". Supported: module, claude-sdk`);
}

// ============================================
// Primary command: run
// ============================================

program
  .command('run')
  .description('Run an evaluation set: execute items → score → report')
  .argument('<eval-set>', 'Path to evaluation set file (JSON or YAML)')
  .argument('<entrypoint>', 'Agent module path (module runtime) or model (claude-sdk runtime)')
  .option('--runtime <kind>', 'Agent runtime: module | claude-sdk', 'module')
  .option('--config <path>', 'Path to eval.config.yaml')
  .option('--workers <n>', 'Max concurrent agent invocations')
  .option('--timeout <ms>', 'Per-invocation timeout in milliseconds (0 = none)')
  .option('--items <ids>', 'Comma-separated item ids to run')
  .option('--judge-model <model>', 'Model for LLM-as-judge evaluators')
  .option('--mocker-model <model>', 'Model for LLM mocking and input generation')
  .option('--evaluators-dir <dir>', 'Directory of evaluator definitions')
  .option('--output-dir <dir>', 'Output directory for reports')
  .option('--results-file <path>', 'Local results file kept up to date during the run')
  .option('--mock-cache', 'Cache mocked responses on disk')
  .option('--approval-tools <names>', 'Comma-separated tools that suspend until approved (claude-sdk)')
  .option('--cwd <path>', 'Working directory for agent execution')
  .option('--run-id <id>', 'Run id (required to resume a suspended run)')
  .option('--resume', 'Resume a suspended run')
  .option('--no-report', 'Skip markdown/JSON reports')
  .option('--verbose', 'Enable verbose output')
  .action(async (evalSet: string, entrypoint: string, options: {
    runtime: string;
    config?: string;
    workers?: string;
    timeout?: string;
    items?: string;
    judgeModel?: string;
    mockerModel?: string;
    evaluatorsDir?: string;
    outputDir?: string;
    resultsFile?: string;
    mockCache?: boolean;
    approvalTools?: string;
    cwd?: string;
    runId?: string;
    resume?: boolean;
    report?: boolean;
    verbose?: boolean;
  }) => {
    try {
      if (options.resume && !options.runId) {
        throw new Error('--resume requires --run-id');
      }

      const configOverrides: Partial<EvalConfig> = {};
      if (options.workers) configOverrides.workers = parseInt(options.workers, 10);
      if (options.timeout) configOverrides.agentTimeoutMs = parseInt(options.timeout, 10);
      if (options.judgeModel) configOverrides.judgeModel = options.judgeModel;
      if (options.mockerModel) {
        configOverrides.mockerModel = options.mockerModel;
        configOverrides.inputGeneratorModel = options.mockerModel;
      }
      if (options.evaluatorsDir) configOverrides.evaluatorsDir = options.evaluatorsDir;
      if (options.outputDir) configOverrides.outputDir = options.outputDir;
      if (options.resultsFile) configOverrides.resultsFile = options.resultsFile;
      if (options.mockCache) configOverrides.enableMockCache = true;
      if (options.report === false) configOverrides.noReport = true;
      if (options.verbose) configOverrides.verbose = true;

      const result = await runPipeline({
        evalSetPath: evalSet,
        entrypoint,
        runtime: parseRuntime(options.runtime),
        configPath: options.config,
        configOverrides,
        itemIds: splitList(options.items),
        runId: options.runId,
        resume: options.resume,
        approvalTools: splitList(options.approvalTools),
        cwd: options.cwd,
      });

      if (result.status === 'faulted') {
        process.exit(1);
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// ============================================
// Validate
// ============================================

program
  .command('validate')
  .description('Validate an evaluation set file')
  .argument('<file>', 'Path to evaluation set file')
  .action(async (file: string) => {
    const errors = await validateEvaluationSetFile(file);

    if (errors.length === 0) {
      const set = await loadEvaluationSet(file);
      console.log(`Valid: ${set.items.length} item(s) in set '${set.id}'`);
    } else {
      console.error(`Validation errors in ${file}:`);
      for (const error of errors) {
        console.error(`  - ${error}`);
      }
      process.exit(1);
    }
  });

// ============================================
// Report generation
// ============================================

const jsonReportSchema = z.object({
  run: z.custom<SetRunResult>(
    (value) => typeof value === 'object' && value !== null && 'items' in value && Array.isArray(value.items),
  ),
});

program
  .command('report')
  .description('Generate a markdown report from a JSON report')
  .requiredOption('-r, --results <path>', 'Path to JSON report')
  .option('-o, --output <path>', 'Output markdown file')
  .option('--truncate <chars>', 'Max characters of agent output per item', '2000')
  .action(async (options: {
    results: string;
    output?: string;
    truncate: string;
  }) => {
    try {
      const data = jsonReportSchema.parse(JSON.parse(await fs.readFile(options.results, 'utf-8')));
      const report = await generateReport(data.run, {
        outputPath: options.output,
        outputTruncation: parseInt(options.truncate, 10),
      });

      if (!options.output) {
        console.log(report);
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// ============================================
// Create evaluation set template
// ============================================

program
  .command('create-set')
  .description('Create an evaluation set template')
  .argument('<name>', 'Name of the evaluation set')
  .option('-o, --output <path>', 'Output path for template')
  .option('-n, --num-items <number>', 'Number of placeholder items', '3')
  .action(async (name: string, options: {
    output?: string;
    numItems: string;
  }) => {
    const outputPath = options.output || path.join(process.cwd(), 'evals', 'eval-sets', `${name}.yaml`);
    const numItems = parseInt(options.numItems, 10);

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, createEvaluationSetTemplate(name, numItems));

    console.log(`Created evaluation set template: ${outputPath}`);
    console.log();
    console.log('Next steps:');
    console.log(`1. Edit ${outputPath} to add real evaluation items`);
    console.log(`2. Add evaluator definitions under ${path.join(path.dirname(path.dirname(outputPath)), 'evaluators')}`);
    console.log(`3. Run: agent-eval run ${outputPath} <agent-module>`);
  });

program.parse();
