/**
 * Type definitions for the agent evaluation engine.
 */

// ============================================
// Evaluation Set Types
// ============================================

export interface SimulatedTool {
  name: string;
}

export interface LlmMockingStrategy {
  type: 'llm';
  /** Natural-language description of how simulated tools should behave */
  prompt: string;
  toolsToSimulate: SimulatedTool[];
  /** Overrides the configured mocker model */
  model?: string;
}

export interface MockAnswer {
  type: 'return' | 'raise';
  value?: unknown;
}

export interface MockBehavior {
  function: string;
  /** When omitted, any arguments match */
  arguments?: {
    args?: unknown[];
    kwargs?: Record<string, unknown>;
  };
  then: MockAnswer[];
}

export interface BehaviorMockingStrategy {
  type: 'behavior';
  behaviors: MockBehavior[];
}

export type MockingStrategy = LlmMockingStrategy | BehaviorMockingStrategy;

export interface InputMockingStrategy {
  prompt: string;
  model?: string;
}

export interface EvaluationItem {
  id: string;
  name: string;
  inputs: Record<string, unknown>;
  /** Evaluator id to criteria; null means "use the evaluator's default criteria" */
  evaluationCriteria: Record<string, unknown>;
  expectedAgentBehavior: string;
  mockingStrategy?: MockingStrategy;
  inputMockingStrategy?: InputMockingStrategy;
}

export interface EvaluationSet {
  id: string;
  name: string;
  version: string;
  evaluatorRefs: string[];
  items: EvaluationItem[];
  batchSize: number;
  timeoutMinutes: number;
}

// ============================================
// Agent Execution Types
// ============================================

export type AgentStatus = 'successful' | 'faulted' | 'suspended';

/** Serialized descriptor of the pending external action behind a suspension */
export interface Trigger {
  type: string;
  key?: string;
  payload?: unknown;
}

export interface AgentErrorPayload {
  code: string;
  title: string;
  detail: string;
}

export interface SpanRecord {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  executionId?: string;
  startTime: string;
  endTime?: string;
  status: 'unset' | 'ok' | 'error';
  attributes: Record<string, unknown>;
}

export interface LogRecord {
  timestamp: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  executionId?: string;
}

export interface AgentExecutionOutput {
  output: unknown;
  status: AgentStatus;
  error?: AgentErrorPayload;
  triggers: Trigger[];
  spans: SpanRecord[];
  logs: LogRecord[];
  executionTimeMs: number;
}

/** What an evaluator sees of one agent run */
export interface AgentExecution {
  inputs: Record<string, unknown>;
  output: unknown;
  trace: SpanRecord[];
  expectedAgentBehavior: string;
}

// ============================================
// Evaluation Result Types
// ============================================

export type ScoreType = 'boolean' | 'numerical' | 'error';

export interface ScoreOutcome {
  score: number | boolean;
  scoreType: ScoreType;
  details?: unknown;
}

export interface EvaluationResult extends ScoreOutcome {
  evaluationTimeMs: number;
}

export interface EvalItemResult {
  evaluatorId: string;
  evaluatorName: string;
  result: EvaluationResult;
}

export interface RunResult {
  itemId: string;
  itemName: string;
  status: AgentStatus;
  success: boolean;
  score: number;
  inputs: Record<string, unknown>;
  output: unknown;
  evaluatorResults: EvalItemResult[];
  triggers: Trigger[];
  executionTimeMs: number;
  error?: AgentErrorPayload;
  logs: LogRecord[];
}

export interface EvaluatorAverage {
  evaluatorId: string;
  evaluatorName: string;
  averageScore: number;
  count: number;
}

export interface SetRunResult {
  runId: string;
  evalSetId: string;
  evalSetName: string;
  status: AgentStatus;
  success: boolean;
  score: number;
  evaluatorAverages: EvaluatorAverage[];
  items: RunResult[];
  triggers: Trigger[];
  startedAt: string;
  finishedAt: string;
}

// ============================================
// Tracing Types
// ============================================

export interface SpanContextRecord {
  traceId: string;
  spanId: string;
}

// ============================================
// SDK Message Type Guards
// ============================================

export interface SdkTextBlock {
  type: 'text';
  text: string;
}

export interface SdkToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type SdkContentBlock = SdkTextBlock | SdkToolUseBlock | { type: string; [key: string]: unknown };

export interface SdkAssistantMessage {
  type: 'assistant';
  message: {
    content: SdkContentBlock[];
  };
}

export interface SdkResultMessage {
  type: 'result';
  subtype: string;
  session_id: string;
  result?: string;
  is_error: boolean;
  duration_ms: number;
  num_turns: number;
  total_cost_usd: number;
}

export interface SdkSystemMessage {
  type: 'system';
  subtype: string;
  session_id: string;
}

function hasType(msg: unknown, type: string): boolean {
  return typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === type;
}

export function isAssistantMessage(msg: unknown): msg is SdkAssistantMessage {
  return hasType(msg, 'assistant');
}

export function isResultMessage(msg: unknown): msg is SdkResultMessage {
  return hasType(msg, 'result');
}

export function isSystemMessage(msg: unknown): msg is SdkSystemMessage {
  return hasType(msg, 'system');
}

export function isTextBlock(block: unknown): block is SdkTextBlock {
  return hasType(block, 'text');
}

export function isToolUseBlock(block: unknown): block is SdkToolUseBlock {
  return hasType(block, 'tool_use');
}
