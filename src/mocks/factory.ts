/**
 * Mocker factory. Picks the mocker variant from the strategy tag.
 */

import type { LlmClient } from '../llm/client.js';
import type { MockingStrategy } from '../types.js';
import { BehaviorMocker } from './behavior-mocker.js';
import type { MockResponseCache } from './cache.js';
import { LlmMocker } from './llm-mocker.js';
import type { Mocker } from './types.js';

export interface MockerDependencies {
  llm: LlmClient;
  model: string;
  cache?: MockResponseCache;
}

export function createMocker(strategy: MockingStrategy | undefined, deps: MockerDependencies): Mocker | undefined {
  if (!strategy) return undefined;

  switch (strategy.type) {
    case 'llm':
      return new LlmMocker(strategy, deps);
    case 'behavior':
      return new BehaviorMocker(strategy);
  }
}
