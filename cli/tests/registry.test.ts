/**
 * Tests for the task registry
 *
 * Run: npx tsx cli/tests/registry.test.ts
 */
import { TaskRegistry } from '../lib/registry.js';
import { DuplicateIdentifierError, NotFoundError } from '../lib/errors.js';
import { sampleRecords } from './fixtures.js';
import { test, assert, assertEqual, assertDeepEqual, assertThrows, summary } from './harness.js';

test('register issues handles in registration order', () => {
  const registry = new TaskRegistry();
  assertEqual(registry.register({ id: 'a', duration: 2, dependencies: [] }), 0);
  assertEqual(registry.register({ id: 'b', duration: 3, dependencies: ['a'] }), 1);
  assertEqual(registry.size, 2);
});

test('lookup resolves a task by identifier', () => {
  const registry = TaskRegistry.fromRecords(sampleRecords());
  const task = registry.lookup('c');
  assertEqual(task.handle, 2);
  assertEqual(task.duration, 2);
  assertDeepEqual(task.dependencies, ['a']);
});

test('lookup of an unknown identifier fails with NotFound', () => {
  const registry = TaskRegistry.fromRecords(sampleRecords());
  const err = assertThrows(() => registry.lookup('zz'), NotFoundError);
  assertEqual(err.kind, 'NotFound');
  assertEqual(err.id, 'zz');
  assertEqual(err.message, 'Task not found: zz');
});

test('handleOf names the referencing task', () => {
  const registry = TaskRegistry.fromRecords(sampleRecords());
  const err = assertThrows(() => registry.handleOf('x', 'b'), NotFoundError);
  assertEqual(err.referencedBy, 'b');
  assertEqual(err.message, 'Task not found: x (dependency of b)');
});

test('registering a duplicate identifier fails with DuplicateIdentifier', () => {
  const records = [...sampleRecords(), { id: 'a', duration: 1, dependencies: [] }];
  const err = assertThrows(() => TaskRegistry.fromRecords(records), DuplicateIdentifierError);
  assertEqual(err.kind, 'DuplicateIdentifier');
  assertEqual(err.id, 'a');
});

test('repeated dependency entries are collapsed', () => {
  const registry = TaskRegistry.fromRecords([
    { id: 'a', duration: 1, dependencies: [] },
    { id: 'b', duration: 1, dependencies: [] },
    { id: 'c', duration: 1, dependencies: ['a', 'b', 'a'] }
  ]);
  assertDeepEqual(registry.lookup('c').dependencies, ['a', 'b']);
});

test('registered tasks are read-only', () => {
  const registry = TaskRegistry.fromRecords(sampleRecords());
  assert(Object.isFrozen(registry.lookup('d')), 'task should be frozen');
  assert(Object.isFrozen(registry.lookup('d').dependencies), 'dependencies should be frozen');
});

test('tasks() keeps input order', () => {
  const registry = TaskRegistry.fromRecords(sampleRecords());
  assertDeepEqual(registry.tasks().map(t => t.id), ['a', 'b', 'c', 'd']);
});

summary();
