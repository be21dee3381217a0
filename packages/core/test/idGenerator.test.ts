import { describe, expect, it } from 'vitest';
import {
  EpochIdGenerator,
  SequentialIdGenerator,
  createIdGenerator,
  defaultIdGenerator,
} from '../src/utils/id-generator.js';

describe('Identifier generators', () => {
  describe('SequentialIdGenerator', () => {
    it('counts up from the start value', () => {
      const generator = new SequentialIdGenerator(5);
      expect([generator.next(), generator.next(), generator.next()]).toEqual([5, 6, 7]);
    });

    it('starts at 1 by default', () => {
      expect(new SequentialIdGenerator().next()).toBe(1);
    });

    it('rejects unsafe start values', () => {
      expect(() => new SequentialIdGenerator(1.5)).toThrow(RangeError);
    });

    it('stops at the end of the safe integer range', () => {
      const generator = new SequentialIdGenerator(Number.MAX_SAFE_INTEGER - 1);
      expect(generator.next()).toBe(Number.MAX_SAFE_INTEGER - 1);
      expect(() => generator.next()).toThrow('Sequential identifier space exhausted');
    });
  });

  describe('EpochIdGenerator', () => {
    it('scales the clock and stays strictly increasing when it stalls', () => {
      const generator = new EpochIdGenerator(() => 1000);
      expect([generator.next(), generator.next(), generator.next()]).toEqual([
        1_000_000, 1_000_001, 1_000_002,
      ]);
    });

    it('keeps increasing when the clock runs backwards', () => {
      const ticks = [2000, 1000, 3000];
      const generator = new EpochIdGenerator(() => ticks.shift() ?? 0);
      expect([generator.next(), generator.next(), generator.next()]).toEqual([
        2_000_000, 2_000_001, 3_000_000,
      ]);
    });

    it('produces unique values under real time', () => {
      const generator = new EpochIdGenerator();
      const ids = Array.from({ length: 1000 }, () => generator.next());
      expect(new Set(ids).size).toBe(1000);
      expect(ids.every((id, index) => index === 0 || id > (ids[index - 1] ?? 0))).toBe(true);
    });
  });

  describe('createIdGenerator', () => {
    it('picks the requested backend', () => {
      expect(createIdGenerator('sequential')).toBeInstanceOf(SequentialIdGenerator);
      expect(createIdGenerator('epoch')).toBeInstanceOf(EpochIdGenerator);
    });

    it('follows the configured backend by default', () => {
      expect(defaultIdGenerator).toBeInstanceOf(EpochIdGenerator);
    });
  });
});
