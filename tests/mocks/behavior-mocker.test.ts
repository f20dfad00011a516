import { describe, it, expect } from 'vitest';
import { BehaviorMocker, argumentsMatch } from '../../src/mocks/behavior-mocker.js';
import { MockedCallError, NoMockFoundError } from '../../src/errors.js';
import type { MockedCall } from '../../src/mocks/types.js';
import type { BehaviorMockingStrategy } from '../../src/types.js';
import { makeContext, makeItem } from '../helpers/fakes.js';

function call(name: string, kwargs: Record<string, unknown> = {}, args: unknown[] = []): MockedCall {
  return { name, args, kwargs };
}

const strategy: BehaviorMockingStrategy = {
  type: 'behavior',
  behaviors: [
    {
      function: 'get_weather',
      arguments: { kwargs: { city: 'Lisbon' } },
      then: [{ type: 'return', value: 'sunny' }, { type: 'return', value: 'cloudy' }],
    },
    {
      function: 'get weather',
      arguments: { kwargs: { city: { $any: true } } },
      then: [{ type: 'return', value: 'unknown' }],
    },
    {
      function: 'book_flight',
      then: [{ type: 'raise', value: 'No seats left' }],
    },
  ],
};

describe('argumentsMatch', () => {
  it('requires the same keyword names', () => {
    const behavior = strategy.behaviors[0];
    expect(argumentsMatch(behavior, call('get_weather', { city: 'Lisbon' }))).toBe(true);
    expect(argumentsMatch(behavior, call('get_weather', { city: 'Lisbon', units: 'c' }))).toBe(false);
  });

  it('compares positional arguments by position', () => {
    const behavior = { function: 'add', arguments: { args: [1, { $any: true }] }, then: [] };
    expect(argumentsMatch(behavior, call('add', {}, [1, 99]))).toBe(true);
    expect(argumentsMatch(behavior, call('add', {}, [2, 99]))).toBe(false);
    expect(argumentsMatch(behavior, call('add', {}, [1]))).toBe(false);
  });
});

describe('BehaviorMocker', () => {
  const context = makeContext(makeItem('item-1'));

  it('hands out answers in order and repeats the last one', async () => {
    const mocker = new BehaviorMocker(strategy);
    const lisbon = call('get_weather', { city: 'Lisbon' });

    expect(await mocker.respond(lisbon, {}, context)).toBe('sunny');
    expect(await mocker.respond(lisbon, {}, context)).toBe('cloudy');
    expect(await mocker.respond(lisbon, {}, context)).toBe('cloudy');
  });

  it('uses the first matching behavior and treats spaces as underscores', async () => {
    const mocker = new BehaviorMocker(strategy);
    expect(await mocker.respond(call('get_weather', { city: 'Porto' }), {}, context)).toBe('unknown');
  });

  it('raises configured errors', async () => {
    const mocker = new BehaviorMocker(strategy);
    const error = await mocker.respond(call('book_flight', { to: 'OPO' }), {}, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MockedCallError);
    expect(error).toMatchObject({ message: 'No seats left', value: 'No seats left' });
  });

  it('throws NoMockFoundError for uncovered calls', async () => {
    const mocker = new BehaviorMocker(strategy);
    await expect(mocker.respond(call('cancel_flight'), {}, context)).rejects.toBeInstanceOf(NoMockFoundError);
  });
});
