/**
 * StackCleaner Tests
 * Depth restoration, nesting, forget and underflow reporting
 */

import { afterEach, describe, expect, it } from 'vitest';
import {
  LuaRuntimeError,
  StackCleaner,
  State,
  withStackCleaner,
} from '../../src/index.js';
import { createTestState } from '../helpers/state.js';

describe('StackCleaner', () => {
  let state: State | undefined;

  afterEach(() => {
    state?.close();
    state = undefined;
  });

  it('restores the recorded depth', () => {
    state = new State();
    state.pushString('kept');

    const cleaner = new StackCleaner(state);
    expect(cleaner.depth).toBe(1);
    state.pushInteger(3);
    state.pushInteger(5);
    state.newTable();
    cleaner.dispose();

    expect(state.getTop()).toBe(1);
    expect(state.toString(1)).toBe('kept');
  });

  it('does nothing when nothing was pushed', () => {
    state = new State();
    state.pushNil();
    const cleaner = new StackCleaner(state);
    cleaner.dispose();
    expect(state.getTop()).toBe(1);
  });

  it('nested cleaners only remove their own entries', () => {
    state = new State();
    const outer = new StackCleaner(state);
    state.pushInteger(1);
    state.pushInteger(2);

    const inner = new StackCleaner(state);
    expect(inner.depth).toBe(2);
    state.pushInteger(3);
    state.pushInteger(4);
    state.pushInteger(5);
    inner.dispose();
    expect(state.getTop()).toBe(2);
    expect(state.toInteger()).toBe(2);

    state.pushInteger(6);
    outer.dispose();
    expect(state.getTop()).toBe(0);
  });

  it('keeps entries after forget', () => {
    state = new State();
    const cleaner = new StackCleaner(state);
    state.pushString('result');
    state.pushString('extra');

    cleaner.forget();
    cleaner.forget();
    cleaner.dispose();

    expect(cleaner.forgotten).toBe(true);
    expect(state.getTop()).toBe(2);
  });

  it('disposes only once', () => {
    state = new State();
    const cleaner = new StackCleaner(state);
    state.pushNil();
    cleaner.dispose();
    expect(cleaner.forgotten).toBe(false);

    state.pushNil();
    cleaner.dispose();
    expect(state.getTop()).toBe(1);
  });

  it('reports a stack popped below the recorded depth', () => {
    const test = createTestState();
    state = test.state;
    state.pushInteger(1);
    state.pushInteger(2);

    const cleaner = new StackCleaner(state);
    state.pop(2);
    cleaner.dispose();

    expect(state.getTop()).toBe(0);
    expect(test.events.underflows).toEqual([
      { recordedDepth: 2, currentDepth: 0 },
    ]);
    expect(test.events.warnings).toEqual([
      'Stack depth 0 is below the depth 2 recorded by a StackCleaner',
    ]);
  });

  it('ignores a state closed before dispose', () => {
    const closing = new State();
    const cleaner = new StackCleaner(closing);
    closing.pushNil();
    closing.close();
    expect(() => cleaner.dispose()).not.toThrow();
  });

  describe('withStackCleaner', () => {
    it('returns the body result and restores the stack', () => {
      state = new State();
      const current = state;
      const sum = withStackCleaner(current, () => {
        current.loadString('return 2 + 3');
        current.pcall(0, 1);
        return current.toInteger();
      });

      expect(sum).toBe(5);
      expect(current.getTop()).toBe(0);
    });

    it('restores the stack when the body throws', () => {
      const test = createTestState();
      state = test.state;
      const current = state;
      current.pushString('below');

      expect(() =>
        withStackCleaner(current, () => {
          current.pushInteger(1);
          current.loadString('error("stop", 0)');
          current.pcall(0, 0);
        })
      ).toThrow(LuaRuntimeError);

      expect(current.getTop()).toBe(1);
      expect(current.toString()).toBe('below');
    });

    it('lets the body keep its results with forget', () => {
      state = new State();
      const current = state;
      withStackCleaner(current, (cleaner) => {
        current.pushInteger(9);
        cleaner.forget();
      });
      expect(current.getTop()).toBe(1);
    });

    it('nests like scopes', () => {
      state = new State();
      const current = state;
      withStackCleaner(current, () => {
        current.pushInteger(3);
        current.pushInteger(5);
        for (let i = 0; i < 3; i++) {
          withStackCleaner(current, () => {
            current.loadString('return 1');
            current.pcall(0, 1);
            expect(current.getTop()).toBe(3);
          });
        }
        expect(current.getTop()).toBe(2);
      });
      expect(current.getTop()).toBe(0);
    });
  });
});
