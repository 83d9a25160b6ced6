/**
 * Tests for error kinds, their JSON shape and command error reporting
 *
 * Run: npx tsx cli/tests/errors.test.ts
 */
import {
  CyclicDependencyError,
  DuplicateIdentifierError,
  InvalidTaskRecordError,
  NotFoundError,
  ScheduleIoError,
  isScheduleError
} from '../lib/errors.js';
import { exitWithError } from '../commands/helpers.js';
import { test, assert, assertEqual, assertDeepEqual, summary } from './harness.js';

class ExitCalled extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`exit ${String(code)}`);
  }
}

/**
 * Run exitWithError with process.exit and console output captured
 */
function captureExit(e: unknown, json: boolean): { code: number | string | null | undefined; stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const { exit } = process;
  const { log, error } = console;

  process.exit = (code?: number | string | null): never => {
    throw new ExitCalled(code);
  };
  console.log = (...args: unknown[]) => { stdout.push(args.map(String).join(' ')); };
  console.error = (...args: unknown[]) => { stderr.push(args.map(String).join(' ')); };

  try {
    exitWithError(e, { json });
  } catch (caught) {
    if (caught instanceof ExitCalled) return { code: caught.code, stdout, stderr };
    throw caught;
  } finally {
    process.exit = exit;
    console.log = log;
    console.error = error;
  }
  throw new Error('exitWithError returned');
}

// =============================================================================
// toJSON
// =============================================================================

test('toJSON has error, kind and id', () => {
  assertDeepEqual(new NotFoundError('x', 'b').toJSON(), {
    error: 'Task not found: x (dependency of b)',
    kind: 'NotFound',
    id: 'x'
  });
  assertDeepEqual(new DuplicateIdentifierError('a').toJSON(), {
    error: 'Duplicate task identifier: a',
    kind: 'DuplicateIdentifier',
    id: 'a'
  });
});

test('cyclic dependency JSON adds the cycle', () => {
  const err = new CyclicDependencyError(['a', 'b', 'a']);
  assertEqual(err.id, 'a');
  assertDeepEqual(err.toJSON(), {
    error: 'Cyclic dependency: a → b → a',
    kind: 'CyclicDependency',
    id: 'a',
    cycle: ['a', 'b', 'a']
  });
});

test('file errors use the file as id', () => {
  const record = new InvalidTaskRecordError('tasks.csv', 4, 'empty task identifier');
  assertEqual(record.line, 4);
  assertDeepEqual(record.toJSON(), { error: 'tasks.csv:4: empty task identifier', kind: 'InvalidTaskRecord', id: 'tasks.csv' });
  assertDeepEqual(new ScheduleIoError('out.csv', 'Task file not found').toJSON(), {
    error: 'Task file not found: out.csv',
    kind: 'IoError',
    id: 'out.csv'
  });
});

test('isScheduleError tells schedule errors from others', () => {
  assert(isScheduleError(new NotFoundError('x')), 'NotFoundError is a schedule error');
  assertEqual(isScheduleError(new Error('x')), false);
  assertEqual(new NotFoundError('x').name, 'NotFoundError');
});

// =============================================================================
// exitWithError
// =============================================================================

test('JSON mode prints the error object on stdout and exits 1', () => {
  const result = captureExit(new CyclicDependencyError(['c', 'd', 'c']), true);
  assertEqual(result.code, 1);
  assertEqual(result.stderr.length, 0);
  assertEqual(result.stdout.length, 1);
  assertDeepEqual(JSON.parse(result.stdout[0]), {
    error: 'Cyclic dependency: c → d → c',
    kind: 'CyclicDependency',
    id: 'c',
    cycle: ['c', 'd', 'c']
  });
});

test('JSON mode wraps other errors as { error }', () => {
  const result = captureExit(new RangeError('Invalid array length'), true);
  assertEqual(result.code, 1);
  assertDeepEqual(JSON.parse(result.stdout[0]), { error: 'Invalid array length' });
});

test('text mode prints the message on stderr', () => {
  const result = captureExit(new NotFoundError('x', 'b'), false);
  assertEqual(result.code, 1);
  assertEqual(result.stdout.length, 0);
  assertDeepEqual(result.stderr, ['Task not found: x (dependency of b)']);
});

summary();
