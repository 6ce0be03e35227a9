/**
 * Tests for the call log, the observer slot and the execution tracer
 */

import { inspect } from 'node:util';
import { afterEach, describe, it, expect } from 'vitest';
import { LookupFailureError, StackCorruptionError } from '../../src/errors.js';
import {
  CallLog,
  ExecutionTracer,
  createTraceBridge,
  formatCallLine,
  formatReturnLine,
  getObserver,
  repr,
  setObserver,
} from '../../src/trace/index.js';
import type { CallObserver } from '../../src/types/index.js';

const reprOptions = { depth: 2, maxLength: 80 };

function recordingObserver(): CallObserver & { events: string[] } {
  const events: string[] = [];
  return {
    events,
    onCall: (name) => void events.push(`call ${name}`),
    onReturn: (name) => void events.push(`return ${name}`),
  };
}

afterEach(() => {
  setObserver(undefined);
});

describe('CallLog', () => {
  it('should keep records in append order', () => {
    const log = new CallLog();
    log.append('f', { arguments: [['x', 1]], returnValue: { value: 2 } });
    log.append('f', { arguments: [['x', 3]], returnValue: { value: 4 } });

    expect(log.records('f').map((r) => r.arguments[0]?.[1])).toEqual([1, 3]);
    expect(log.totalCalls).toBe(2);
  });

  it('should order names by the first open', () => {
    const log = new CallLog();
    log.open('outer');
    log.open('inner');
    log.append('inner', { arguments: [] });
    log.append('outer', { arguments: [] });
    log.open('inner');

    expect(log.names()).toEqual(['outer', 'inner']);
    expect(log.records('inner')).toHaveLength(1);
  });

  it('should freeze appended records', () => {
    const log = new CallLog();
    log.append('f', { arguments: [['x', 1]] });
    const [record] = log.records('f');

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record?.arguments)).toBe(true);
  });

  it('should fail lookup of an unknown function', () => {
    const log = new CallLog();
    expect(() => log.records('nope')).toThrow(LookupFailureError);
    expect(log.has('nope')).toBe(false);
  });
});

describe('observer slot', () => {
  it('should return the replaced observer', () => {
    const first = recordingObserver();
    expect(setObserver(first)).toBeUndefined();
    expect(setObserver(undefined)).toBe(first);
  });

  it('should forward bridge events to the installed observer only', () => {
    const bridge = createTraceBridge();
    bridge.enter('dropped', []);

    const observer = recordingObserver();
    setObserver(observer);
    bridge.enter('f', [['x', 1]]);
    bridge.leave('f', 2);

    expect(observer.events).toEqual(['call f', 'return f']);
  });
});

describe('repr', () => {
  it('should format call and return lines', () => {
    expect(formatCallLine('greet', [['name', 'Ada'], ['times', 2]], reprOptions)).toBe("greet(name='Ada', times=2)");
    expect(formatReturnLine('greet', [['name', 'Ada']], 'Hi Ada', reprOptions)).toBe(
      "greet(name='Ada') returns 'Hi Ada'"
    );
  });

  it('should cut long values', () => {
    expect(repr('abcdefghij', { depth: 2, maxLength: 8 })).toBe("'abcd...");
  });
});

describe('ExecutionTracer', () => {
  it('should restore the previous observer on stop', () => {
    const previous = recordingObserver();
    setObserver(previous);

    const tracer = new ExecutionTracer();
    tracer.start();
    expect(getObserver()).toBe(tracer);
    expect(tracer.active).toBe(true);
    tracer.stop();

    expect(getObserver()).toBe(previous);
    expect(tracer.active).toBe(false);
  });

  it('should pair nested returns with the latest call', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    tracer.onCall('outer', [['n', 2]]);
    tracer.onCall('inner', [['n', 1]]);
    expect(tracer.depth).toBe(2);
    tracer.onReturn('inner', 'a');
    tracer.onReturn('outer', 'b');
    tracer.stop();

    expect(tracer.depth).toBe(0);
    expect(tracer.log.names()).toEqual(['outer', 'inner']);
    expect(tracer.log.records('inner')).toEqual([{ arguments: [['n', 1]], returnValue: { value: 'a' } }]);
    expect(tracer.log.records('outer')).toEqual([{ arguments: [['n', 2]], returnValue: { value: 'b' } }]);
  });

  it('should keep a returned undefined as an observed value', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    tracer.onCall('f', []);
    tracer.onReturn('f', undefined);
    tracer.stop();

    const [record] = tracer.log.records('f');
    expect(record?.returnValue).toEqual({ value: undefined });
    expect(record && 'returnValue' in record).toBe(true);
  });

  it('should list a function that never returned with no records', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    tracer.onCall('pending', [['x', 1]]);
    tracer.stop();

    expect(tracer.log.has('pending')).toBe(true);
    expect(tracer.log.records('pending')).toEqual([]);
  });

  it('should fail on a return that does not match the stack', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    tracer.onCall('a', []);

    expect(() => tracer.onReturn('b', 1)).toThrow(
      "return from 'b' while 'a' is on top of the call stack"
    );
    tracer.stop();
  });

  it('should stay aborted after stack corruption', () => {
    const tracer = new ExecutionTracer();
    tracer.start();

    let caught: unknown;
    try {
      tracer.onReturn('f', 1);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StackCorruptionError);
    expect(caught).toMatchObject({ expected: undefined, actual: 'f' });
    expect(() => tracer.onCall('g', [])).toThrow(StackCorruptionError);
    tracer.stop();
  });

  it('should reset the log when started again', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    tracer.onCall('f', []);
    tracer.onReturn('f', 1);
    tracer.stop();
    tracer.start();
    tracer.stop();

    expect(tracer.log.size).toBe(0);
  });

  it('should leave no frame behind when a logged value cannot be printed', () => {
    const unprintable = {
      [inspect.custom]: () => {
        throw new Error('no repr');
      },
    };
    const tracer = new ExecutionTracer({ log: true, sink: () => undefined });
    tracer.start();
    try {
      expect(() => tracer.onCall('f', [['x', unprintable]])).toThrow('no repr');
      expect(tracer.depth).toBe(0);
      expect(tracer.log.has('f')).toBe(false);

      tracer.onCall('g', [['y', 1]]);
      tracer.onReturn('g', 2);
      expect(tracer.log.records('g')).toEqual([{ arguments: [['y', 1]], returnValue: { value: 2 } }]);
      expect(tracer.failure).toBeUndefined();
    } finally {
      tracer.stop();
    }
  });

  it('should keep the abort error after stopping', () => {
    const tracer = new ExecutionTracer();
    tracer.start();
    expect(() => tracer.onReturn('f', 1)).toThrow(StackCorruptionError);
    tracer.stop();
    expect(tracer.failure).toBeInstanceOf(StackCorruptionError);
    expect(tracer.failure?.message).toBe("return from 'f' with an empty call stack");
  });

  it('should write log lines to the sink', () => {
    const lines: string[] = [];
    const tracer = new ExecutionTracer({ log: true, sink: (line) => lines.push(line) });
    tracer.start();
    tracer.onCall('fact', [['n', 2]]);
    tracer.onCall('fact', [['n', 1]]);
    tracer.onReturn('fact', 1);
    tracer.onReturn('fact', 2);
    tracer.stop();

    expect(lines).toEqual(['fact(n=2)', 'fact(n=1)', 'fact(n=1) returns 1', 'fact(n=2) returns 2']);
  });
});
