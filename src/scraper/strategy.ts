/**
 * Fallback chain runner
 */

import type { CheerioAPI } from 'cheerio';
import type { Strategy } from './types.js';

export interface StrategyHit<T> {
  value: T;
  strategy: string;
}

/**
 * Try each strategy in order and return the first value that passes `accept`
 */
export function runStrategies<T>(
  $: CheerioAPI,
  strategies: readonly Strategy<T>[],
  accept: (value: T) => boolean = () => true
): StrategyHit<T> | null {
  for (const strategy of strategies) {
    const value = strategy.extract($);
    if (value !== null && accept(value)) {
      return { value, strategy: strategy.name };
    }
  }
  return null;
}
