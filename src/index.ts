/**
 * Agent evaluation engine.
 *
 * Runs an AI agent against an evaluation set with pluggable evaluators,
 * bounded concurrency, mocked tool calls and suspend/resume.
 *
 * @packageDocumentation
 */

// Types
export type {
  SimulatedTool,
  LlmMockingStrategy,
  MockAnswer,
  MockBehavior,
  BehaviorMockingStrategy,
  MockingStrategy,
  InputMockingStrategy,
  EvaluationItem,
  EvaluationSet,
  AgentStatus,
  Trigger,
  AgentErrorPayload,
  SpanRecord,
  LogRecord,
  AgentExecutionOutput,
  AgentExecution,
  ScoreType,
  ScoreOutcome,
  EvaluationResult,
  EvalItemResult,
  RunResult,
  EvaluatorAverage,
  SetRunResult,
  SpanContextRecord,
} from './types.js';

// Errors
export {
  EvalError,
  EvalUserError,
  NoMockFoundError,
  MockResponseGenerationError,
  MockedCallError,
  AgentExecutionError,
  ResumeError,
} from './errors.js';

// Config
export { loadConfig, loadConfigSync, mergeConfigs, DEFAULT_CONFIG, type EvalConfig } from './config.js';

// Parser
export {
  parseEvaluationSet,
  loadEvaluationSet,
  selectItems,
  withInputs,
  validateEvaluationSetFile,
  createEvaluationSetTemplate,
} from './parser.js';

// LLM
export { VercelAiLlmClient, resolveModel, type LlmClient, type TextRequest, type ToolCallRequest } from './llm/client.js';

// Evaluators
export { BaseEvaluator, type Evaluator, type EvaluatorDefinition } from './evaluators/base.js';
export { createEvaluator, loadEvaluators, readEvaluatorDefinitions } from './evaluators/registry.js';
export { ExactMatchEvaluator, ContainsEvaluator, JsonSimilarityEvaluator, jsonSimilarity } from './evaluators/deterministic.js';
export { ToolCallOrderEvaluator, ToolCallCountEvaluator, ToolCallArgsEvaluator, extractToolCalls } from './evaluators/trajectory.js';
export { LlmJudgeOutputEvaluator, LlmJudgeTrajectoryEvaluator } from './evaluators/llm-judge.js';

// Mocking
export {
  mockable,
  getMockedResponse,
  isToolSimulated,
  currentExecution,
  recordExecutionLog,
} from './mocks/context.js';
export { MockResponseCache } from './mocks/cache.js';
export { createMocker } from './mocks/factory.js';
export { generateInputs } from './mocks/input-generator.js';
export type { Mocker, MockedCall, ExecutionContext } from './mocks/types.js';

// Events
export { EventBus, type EvalEventMap, type EvalEventType } from './events/event-bus.js';
export { ResultFileWriter } from './events/result-writer.js';
export { ConsoleProgressReporter } from './events/console-reporter.js';

// Runtime
export type { AgentRuntime, AgentRuntimeResult, RuntimeFactory, RuntimeStorage, ExecuteOptions } from './runtime/agent-runtime.js';
export { EvalRuntime, type EvalRuntimeOptions, type RuntimeResult } from './runtime/eval-runtime.js';
export { Dispatcher } from './runtime/dispatcher.js';
export { ItemRunner } from './runtime/item-runner.js';
export { ModuleRuntimeFactory, suspend, type AgentFunction, type AgentFunctionContext } from './runtime/module-runtime.js';
export { ClaudeSdkRuntimeFactory, type ClaudeSdkRuntimeOptions } from './runtime/claude-sdk-runtime.js';
export { InMemoryStorage, FileStorage } from './runtime/storage.js';

// Scoring
export { coerceScore, itemScore, setScore, evaluatorAverages, overallStatus } from './scorer/aggregator.js';

// Pipeline
export { runPipeline, printSummary, type PipelineOptions, type PipelineResult } from './pipeline.js';

// Reports
export { generateReport, generateJsonResults, renderMarkdownReport } from './report/report.js';
