/**
 * Evaluation pipeline orchestrator.
 *
 * Coordinates the full command-line flow:
 * load config → build runtime → run set → write reports → print summary
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import { loadConfig, type EvalConfig } from './config.js';
import { ConsoleProgressReporter } from './events/console-reporter.js';
import { EventBus } from './events/event-bus.js';
import type { LlmClient } from './llm/client.js';
import { generateJsonResults, generateReport, type ReportMetadata } from './report/report.js';
import type { RuntimeFactory } from './runtime/agent-runtime.js';
import { ClaudeSdkRuntimeFactory } from './runtime/claude-sdk-runtime.js';
import { EvalRuntime, type RuntimeResult } from './runtime/eval-runtime.js';
import { ModuleRuntimeFactory } from './runtime/module-runtime.js';
import { FileStorage } from './runtime/storage.js';
import type { SetRunResult } from './types.js';

export type RuntimeKind = 'module' | 'claude-sdk';

export interface PipelineOptions {
  /** Path to the evaluation set file */
  evalSetPath: string;
  /** Agent module path (module runtime) or model name (claude-sdk runtime) */
  entrypoint: string;
  runtime?: RuntimeKind;
  /** Path to eval.config.yaml */
  configPath?: string;
  /** Config overrides from CLI flags */
  configOverrides?: Partial<EvalConfig>;
  /** Item ids to run (empty = all) */
  itemIds?: string[];
  runId?: string;
  resume?: boolean;
  /** Tools that suspend the item until approved (claude-sdk runtime) */
  approvalTools?: string[];
  /** Working directory for agent execution */
  cwd?: string;
  /** Replaces the built-in runtime factories */
  runtimeFactory?: RuntimeFactory;
  llm?: LlmClient;
}

export interface PipelineResult extends RuntimeResult {
  runId: string;
  reportPath?: string;
  jsonPath?: string;
}

export function createRuntimeFactory(options: PipelineOptions, config: EvalConfig): RuntimeFactory {
  const storage = new FileStorage(config.stateFile);
  switch (options.runtime ?? 'module') {
    case 'module':
      return new ModuleRuntimeFactory(storage, options.cwd);
    case 'claude-sdk':
      return new ClaudeSdkRuntimeFactory({ cwd: options.cwd, approvalTools: options.approvalTools }, storage);
  }
}

/**
 * Run an evaluation set end to end.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const config = await loadConfig(options.configPath, options.configOverrides);
  const runId = options.runId ?? randomUUID();
  const resultsFile = config.resultsFile ?? path.join(config.outputDir, `results-${runId}.json`);

  const bus = new EventBus();
  new ConsoleProgressReporter(config.verbose).attach(bus);

  console.log(`${options.resume ? 'Resuming' : 'Starting'} run ${runId} for: ${options.evalSetPath}`);

  const runtime = new EvalRuntime({
    evalSetPath: options.evalSetPath,
    entrypoint: options.entrypoint,
    runtimeFactory: options.runtimeFactory ?? createRuntimeFactory(options, config),
    runId,
    itemIds: options.itemIds,
    resume: options.resume,
    config: { ...config, resultsFile },
    llm: options.llm,
    bus,
  });

  const result = await runtime.execute();
  console.log(`Results file: ${resultsFile}`);

  let reportPath: string | undefined;
  let jsonPath: string | undefined;

  if (!config.noReport) {
    console.log('\n--- Generating Reports ---\n');
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const reportBaseName = `${result.output.evalSetId}-${timestamp}`;
    reportPath = path.join(config.outputDir, `${reportBaseName}.md`);
    jsonPath = path.join(config.outputDir, `${reportBaseName}.json`);

    const metadata: ReportMetadata = {
      evalSetPath: options.evalSetPath,
      entrypoint: options.entrypoint,
      judgeModel: config.judgeModel,
      workers: config.workers,
      resumed: options.resume,
    };

    await generateReport(result.output, { outputPath: reportPath, metadata, outputTruncation: config.reportOutputTruncation });
    await generateJsonResults(result.output, { outputPath: jsonPath, metadata });
  }

  printSummary(result.output);

  return { ...result, runId, reportPath, jsonPath };
}

export function printSummary(run: SetRunResult): void {
  console.log('\n' + '='.repeat(50));
  console.log(`  Evaluation: ${run.evalSetName}`);
  console.log('='.repeat(50));
  console.log(`  Status: ${run.status}`);
  console.log(`  Items: ${run.items.length}`);
  console.log(`  Score: ${run.score.toFixed(2)}`);
  for (const avg of run.evaluatorAverages) {
    console.log(`    ${avg.evaluatorName}: ${avg.averageScore.toFixed(2)} (${avg.count} item(s))`);
  }
  if (run.status === 'suspended') {
    console.log(`\n  Suspended, waiting on:`);
    for (const trigger of run.triggers) {
      console.log(`    - ${trigger.type}${trigger.key ? ` (${trigger.key})` : ''}`);
    }
    console.log(`  Resume with: --resume --run-id ${run.runId}`);
  }
  const faulted = run.items.filter((item) => item.status === 'faulted');
  if (faulted.length > 0) {
    console.log(`\n  Faulted:`);
    for (const item of faulted) {
      console.log(`    - ${item.itemId}: ${item.error?.detail ?? 'unknown error'}`);
    }
  }
  console.log('='.repeat(50));
}
