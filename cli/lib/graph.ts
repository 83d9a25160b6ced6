/**
 * Dependency graph utilities
 * Build, analyze, and traverse the task dependency graph
 */
import { CyclicDependencyError } from './errors.js';
import type { TaskRegistry } from './registry.js';
import type { TaskHandle } from './types/task.js';

type Adjacency = readonly (readonly TaskHandle[])[];

export interface DependencyGraph {
  readonly registry: TaskRegistry;
  /** handle -> handles this task waits on */
  readonly predecessors: Adjacency;
  /** handle -> handles waiting on this task (inverse of predecessors) */
  readonly successors: Adjacency;
}

/**
 * Build the dependency graph from a complete registry.
 *
 * Every reference is resolved before any successor list exists, so an
 * unknown identifier fails with NotFound and nothing is half-built.
 */
export function buildDependencyGraph(registry: TaskRegistry): DependencyGraph {
  const tasks = registry.tasks();

  const predecessors = tasks.map(task =>
    Object.freeze(task.dependencies.map(dep => registry.handleOf(dep, task.id)))
  );

  // Build reverse map (who waits on each task?)
  const successors: TaskHandle[][] = tasks.map(() => []);
  predecessors.forEach((deps, handle) => {
    for (const dep of deps) {
      successors[dep].push(handle);
    }
  });

  return Object.freeze({
    registry,
    predecessors: Object.freeze(predecessors),
    successors: Object.freeze(successors.map(s => Object.freeze(s)))
  });
}

/**
 * Order handles so that every node comes after all nodes it has edges to.
 *
 * Depth-first with an explicit work stack; a node met again while still on
 * the stack closes a cycle and fails with CyclicDependency.
 */
export function postOrder(registry: TaskRegistry, edges: Adjacency): TaskHandle[] {
  const order: TaskHandle[] = [];
  // 0 = unvisited, 1 = in progress, 2 = done
  const state = new Uint8Array(registry.size);

  for (let root = 0; root < registry.size; root++) {
    if (state[root] !== 0) continue;

    const path: TaskHandle[] = [root];
    const cursor: number[] = [0];
    state[root] = 1;

    while (path.length > 0) {
      const top = path.length - 1;
      const node = path[top];
      const next = cursor[top];

      if (next < edges[node].length) {
        cursor[top] = next + 1;
        const target = edges[node][next];
        if (state[target] === 1) {
          throw new CyclicDependencyError(cyclePath(registry, path, target));
        }
        if (state[target] === 0) {
          state[target] = 1;
          path.push(target);
          cursor.push(0);
        }
      } else {
        state[node] = 2;
        order.push(node);
        path.pop();
        cursor.pop();
      }
    }
  }

  return order;
}

/**
 * Detect cycles using DFS
 * Unlike postOrder, keeps going and reports every back edge it meets.
 */
export function detectCycles(graph: DependencyGraph): string[][] {
  const { registry, predecessors } = graph;
  const cycles: string[][] = [];
  const state = new Uint8Array(registry.size);

  for (let root = 0; root < registry.size; root++) {
    if (state[root] !== 0) continue;

    const path: TaskHandle[] = [root];
    const cursor: number[] = [0];
    state[root] = 1;

    while (path.length > 0) {
      const top = path.length - 1;
      const node = path[top];
      const next = cursor[top];

      if (next < predecessors[node].length) {
        cursor[top] = next + 1;
        const dep = predecessors[node][next];
        if (state[dep] === 1) {
          cycles.push(cyclePath(registry, path, dep));
        } else if (state[dep] === 0) {
          state[dep] = 1;
          path.push(dep);
          cursor.push(0);
        }
      } else {
        state[node] = 2;
        path.pop();
        cursor.pop();
      }
    }
  }

  return cycles;
}

function cyclePath(registry: TaskRegistry, path: readonly TaskHandle[], closing: TaskHandle): string[] {
  const start = path.indexOf(closing);
  return [...path.slice(start), closing].map(h => registry.at(h).id);
}

/**
 * Find root tasks (no dependencies), in registration order
 */
export function findRoots(graph: DependencyGraph): string[] {
  return graph.registry.tasks()
    .filter(task => graph.predecessors[task.handle].length === 0)
    .map(task => task.id);
}

/**
 * Find sink tasks (nothing waits on them), in registration order
 */
export function findSinks(graph: DependencyGraph): string[] {
  return graph.registry.tasks()
    .filter(task => graph.successors[task.handle].length === 0)
    .map(task => task.id);
}
