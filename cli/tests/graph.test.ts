/**
 * Tests for dependency graph construction and traversal
 *
 * Run: npx tsx cli/tests/graph.test.ts
 */
import { buildDependencyGraph, detectCycles, findRoots, findSinks, postOrder } from '../lib/graph.js';
import { TaskRegistry } from '../lib/registry.js';
import { CyclicDependencyError, NotFoundError } from '../lib/errors.js';
import type { TaskRecord } from '../lib/types/task.js';
import { reversedChain, sampleRecords } from './fixtures.js';
import { test, assert, assertEqual, assertDeepEqual, assertThrows, summary } from './harness.js';

const graphOf = (records: TaskRecord[]) => buildDependencyGraph(TaskRegistry.fromRecords(records));

// =============================================================================
// buildDependencyGraph
// =============================================================================

test('successors are derived from dependencies', () => {
  const graph = graphOf(sampleRecords());
  assertDeepEqual(graph.successors, [[1, 2], [3], [3], []]);
  assertDeepEqual(graph.predecessors, [[], [0], [0], [1, 2]]);
});

test('successors and dependencies are exact inverses', () => {
  const graph = graphOf(sampleRecords());
  graph.successors.forEach((succs, a) => {
    for (const b of succs) {
      assert(graph.predecessors[b].includes(a), `${b} should depend on ${a}`);
    }
  });
  graph.predecessors.forEach((preds, b) => {
    for (const a of preds) {
      assert(graph.successors[a].includes(b), `${b} should be a successor of ${a}`);
    }
  });
});

test('unknown dependency fails with NotFound before any successor is built', () => {
  const records = sampleRecords();
  records[1] = { id: 'b', duration: 3, dependencies: ['a', 'x'] };
  const err = assertThrows(() => graphOf(records), NotFoundError);
  assertEqual(err.id, 'x');
  assertEqual(err.referencedBy, 'b');
});

test('graph is frozen', () => {
  const graph = graphOf(sampleRecords());
  assert(Object.isFrozen(graph.successors), 'successors should be frozen');
  assert(Object.isFrozen(graph.successors[0]), 'successor list should be frozen');
});

test('findRoots and findSinks', () => {
  const graph = graphOf(sampleRecords());
  assertDeepEqual(findRoots(graph), ['a']);
  assertDeepEqual(findSinks(graph), ['d']);
});

// =============================================================================
// postOrder
// =============================================================================

test('postOrder places every task after its dependencies', () => {
  const graph = graphOf(sampleRecords());
  assertDeepEqual(postOrder(graph.registry, graph.predecessors), [0, 1, 2, 3]);
});

test('postOrder over successors places sinks first', () => {
  const graph = graphOf(sampleRecords());
  assertDeepEqual(postOrder(graph.registry, graph.successors), [3, 1, 2, 0]);
});

test('postOrder rejects a two-task cycle', () => {
  const graph = graphOf([
    { id: 'a', duration: 1, dependencies: ['b'] },
    { id: 'b', duration: 1, dependencies: ['a'] }
  ]);
  const err = assertThrows(() => postOrder(graph.registry, graph.predecessors), CyclicDependencyError);
  assertDeepEqual(err.cycle, ['a', 'b', 'a']);
  assertEqual(err.message, 'Cyclic dependency: a → b → a');
});

test('postOrder handles a 50000-task chain without recursion', () => {
  const graph = graphOf(reversedChain(50000));
  const order = postOrder(graph.registry, graph.predecessors);
  assertEqual(order.length, 50000);
  assertEqual(graph.registry.at(order[0]).id, 't0');
  assertEqual(graph.registry.at(order[49999]).id, 't49999');
});

// =============================================================================
// detectCycles
// =============================================================================

test('detectCycles finds nothing in an acyclic graph', () => {
  assertDeepEqual(detectCycles(graphOf(sampleRecords())), []);
});

test('detectCycles reports a two-task cycle', () => {
  const graph = graphOf([
    { id: 'a', duration: 1, dependencies: ['b'] },
    { id: 'b', duration: 1, dependencies: ['a'] },
    { id: 'c', duration: 1, dependencies: [] }
  ]);
  assertDeepEqual(detectCycles(graph), [['a', 'b', 'a']]);
});

test('detectCycles reports a self-dependency', () => {
  const graph = graphOf([{ id: 'a', duration: 1, dependencies: ['a'] }]);
  assertDeepEqual(detectCycles(graph), [['a', 'a']]);
});

test('detectCycles reports separate cycles', () => {
  const graph = graphOf([
    { id: 'a', duration: 1, dependencies: ['b'] },
    { id: 'b', duration: 1, dependencies: ['a'] },
    { id: 'c', duration: 1, dependencies: ['d'] },
    { id: 'd', duration: 1, dependencies: ['e'] },
    { id: 'e', duration: 1, dependencies: ['c'] }
  ]);
  assertDeepEqual(detectCycles(graph), [['a', 'b', 'a'], ['c', 'd', 'e', 'c']]);
});

summary();
