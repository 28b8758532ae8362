/**
 * Operations Tests
 * doString, doFile, evaluate and createModule
 */

import { afterEach, describe, expect, it } from 'vitest';
import {
  CompileError,
  createModule,
  doFile,
  doString,
  evaluate,
  LUA_MULTRET,
  State,
} from '../src/index.js';
import { createTestState, fixture } from './helpers/state.js';

describe('Operations', () => {
  let state: State | undefined;

  afterEach(() => {
    state?.close();
    state = undefined;
  });

  describe('doString', () => {
    it('leaves the stack unchanged without results', () => {
      state = new State();
      expect(doString(state, 'local x = 1')).toBe(0);
      expect(state.getTop()).toBe(0);
    });

    it('keeps every result with LUA_MULTRET', () => {
      state = new State();
      expect(doString(state, 'return 1, 2, 3', 0, LUA_MULTRET)).toBe(3);
      expect(state.getTop()).toBe(3);
      expect(state.toInteger(1)).toBe(1);
      expect(state.toInteger(3)).toBe(3);
    });

    it('passes arguments from the stack', () => {
      state = new State();
      state.pushInteger(2);
      state.pushInteger(3);
      expect(doString(state, 'local a, b = ...\nreturn a * b', 2, 1)).toBe(1);
      expect(state.getTop()).toBe(1);
      expect(state.toInteger()).toBe(6);
    });

    it('adjusts relative message handler indices', () => {
      const test = createTestState();
      state = test.state;
      evaluate(state, 'function(m) return "handled: " .. m end');

      expect(() => doString(test.state, 'error("bad", 0)', 0, 0, -1)).toThrow(
        'handled: bad'
      );
    });
  });

  describe('doFile', () => {
    it('runs a file', () => {
      state = new State();
      expect(doFile(state, fixture('answer.lua'), 0, LUA_MULTRET)).toBe(1);
      expect(state.toInteger()).toBe(42);
    });

    it('passes arguments to the file', () => {
      state = new State();
      state.pushInteger(10);
      state.pushInteger(4);
      expect(doFile(state, fixture('arith.lua'), 2, LUA_MULTRET)).toBe(2);
      expect(state.toInteger(1)).toBe(14);
      expect(state.toInteger(2)).toBe(6);
    });
  });

  describe('evaluate', () => {
    it('pushes the value of an expression', () => {
      state = new State();
      expect(evaluate(state, '1 + 2')).toBe(1);
      expect(state.toInteger()).toBe(3);
    });

    it('raises compile errors for invalid expressions', () => {
      state = new State();
      const current = state;
      expect(() => evaluate(current, '1 +')).toThrow(CompileError);
      expect(() => evaluate(current, '1 +')).toThrow('[string "return 1 +"]');
      expect(current.getTop()).toBe(0);
    });
  });

  describe('createModule', () => {
    it('exposes native functions as a global table', () => {
      state = new State();
      createModule(state, 'calc', {
        add: (s) => {
          s.pushInteger(s.toInteger(1) + s.toInteger(2));
          return 1;
        },
        negate: (s) => {
          s.pushInteger(-s.toInteger(1));
          return 1;
        },
      });
      expect(state.getTop()).toBe(0);

      evaluate(state, 'calc.add(2, 5)');
      expect(state.toInteger()).toBe(7);
      evaluate(state, 'calc.negate(4)');
      expect(state.toInteger()).toBe(-4);
    });
  });
});
