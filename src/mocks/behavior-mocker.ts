/**
 * Behavior mocker. Answers calls from a declared list of
 * {function, arguments, then} behaviors.
 *
 * The first behavior whose function name and argument matcher fit the call
 * wins. Its answers are handed out in order and the last one repeats.
 * A `{"$any": true}` value in a matcher accepts any argument.
 */

import { MockedCallError, NoMockFoundError } from '../errors.js';
import type { BehaviorMockingStrategy, MockBehavior } from '../types.js';
import { deepEqual, isPlainObject } from '../utils/json.js';
import { normalizeToolName } from './context.js';
import type { ExecutionContext, MockedCall, MockParams, Mocker } from './types.js';

function isWildcard(value: unknown): boolean {
  return isPlainObject(value) && value.$any === true && Object.keys(value).length === 1;
}

function valueMatches(expected: unknown, actual: unknown): boolean {
  return isWildcard(expected) || deepEqual(expected, actual);
}

export function argumentsMatch(behavior: MockBehavior, call: MockedCall): boolean {
  const matcher = behavior.arguments;
  if (!matcher) return true;

  if (matcher.args !== undefined) {
    if (matcher.args.length !== call.args.length) return false;
    if (!matcher.args.every((expected, i) => valueMatches(expected, call.args[i]))) return false;
  }

  if (matcher.kwargs !== undefined) {
    const expectedKeys = Object.keys(matcher.kwargs).sort();
    const actualKeys = Object.keys(call.kwargs).sort();
    if (!deepEqual(expectedKeys, actualKeys)) return false;
    const kwargs = matcher.kwargs;
    if (!expectedKeys.every((key) => valueMatches(kwargs[key], call.kwargs[key]))) return false;
  }

  return true;
}

export class BehaviorMocker implements Mocker {
  readonly type = 'behavior' as const;
  /** Answers consumed per behavior index */
  private readonly consumed = new Map<number, number>();

  constructor(private readonly strategy: BehaviorMockingStrategy) {}

  async respond(call: MockedCall, _params: MockParams, _context: ExecutionContext): Promise<unknown> {
    const name = normalizeToolName(call.name);
    const index = this.strategy.behaviors.findIndex(
      (behavior) => normalizeToolName(behavior.function) === name && argumentsMatch(behavior, call),
    );
    if (index === -1) {
      throw new NoMockFoundError(`No behavior matches call to ${call.name}`);
    }

    const behavior = this.strategy.behaviors[index];
    const used = this.consumed.get(index) ?? 0;
    const answer = behavior.then[Math.min(used, behavior.then.length - 1)];
    if (!answer) {
      throw new NoMockFoundError(`Behavior for ${call.name} has no answers`);
    }
    this.consumed.set(index, used + 1);

    if (answer.type === 'raise') {
      throw new MockedCallError(call.name, answer.value);
    }
    return answer.value;
  }
}
