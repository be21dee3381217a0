/**
 * Identifier generators used by `Node.withAutoId`.
 *
 * A generator hands out numbers that are unique and strictly increasing for
 * the lifetime of the process; the node layer converts them into whatever id
 * type the tree uses.
 */

import { type AppConfig, cfg } from './config.js';

export interface IdentifierGenerator {
  next(): number;
}

/**
 * Plain counter starting at `start`.
 */
export class SequentialIdGenerator implements IdentifierGenerator {
  private current: number;

  constructor(start = 1) {
    if (!Number.isSafeInteger(start)) {
      throw new RangeError(`Generator start must be a safe integer, got ${start}`);
    }
    this.current = start;
  }

  next(): number {
    if (this.current >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError('Sequential identifier space exhausted');
    }
    return this.current++;
  }
}

/**
 * Time-based generator: millisecond timestamp scaled by 1000 plus a per
 * millisecond sequence. Falls back to `last + 1` when the clock stalls, runs
 * backwards, or a millisecond's sequence is used up.
 */
export class EpochIdGenerator implements IdentifierGenerator {
  private last = 0;

  constructor(private readonly clock: () => number = Date.now) {}

  next(): number {
    const candidate = this.clock() * 1000;
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last;
  }
}

export function createIdGenerator(
  kind: AppConfig['ID_GENERATOR'] = cfg.ID_GENERATOR
): IdentifierGenerator {
  return kind === 'sequential' ? new SequentialIdGenerator() : new EpochIdGenerator();
}

/**
 * Process-wide generator shared by every auto-id node that is not given one.
 */
export const defaultIdGenerator: IdentifierGenerator = createIdGenerator();
