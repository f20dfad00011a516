/**
 * Error taxonomy for the evaluation engine.
 *
 * User errors are raised before any agent work starts. Mock errors are
 * raised inside an execution scope and are expected to be handled by the
 * caller (falling back to the real call, or surfacing as a tool failure).
 */

export type ErrorCategory = 'user' | 'system';

export class EvalError extends Error {
  readonly category: ErrorCategory;
  readonly code: string;

  constructor(message: string, code: string, category: ErrorCategory = 'system', options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
  }
}

export class EvalUserError extends EvalError {
  constructor(message: string, code = 'INVALID_INPUT', options?: { cause?: unknown }) {
    super(message, code, 'user', options);
  }
}

/** No mocker is installed, or none of its behaviors apply to the call */
export class NoMockFoundError extends EvalError {
  constructor(message: string) {
    super(message, 'NO_MOCK_FOUND');
  }
}

export class MockResponseGenerationError extends EvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MOCK_GENERATION_FAILED', 'system', options);
  }
}

/** A behavior mock configured to raise */
export class MockedCallError extends EvalError {
  readonly value: unknown;

  constructor(functionName: string, value: unknown) {
    super(
      typeof value === 'string' ? value : `Mocked call to ${functionName} raised: ${JSON.stringify(value)}`,
      'MOCKED_CALL_RAISED',
    );
    this.value = value;
  }
}

export class AgentExecutionError extends EvalError {
  constructor(message: string, code = 'AGENT_EXECUTION_FAILED', options?: { cause?: unknown }) {
    super(message, code, 'system', options);
  }
}

export class ResumeError extends EvalError {
  constructor(message: string) {
    super(message, 'RESUME_NOT_SUPPORTED', 'user');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
