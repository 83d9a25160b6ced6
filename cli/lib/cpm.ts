/**
 * CPM - Critical Path Method engine
 *
 * Pure calculation over an already-loaded task set. Each stage takes the
 * complete output of the previous one and returns a complete, frozen result:
 *
 *   TaskRegistry → DependencyGraph → ForwardPass → BackwardPass → Schedule
 *
 * Forward pass:  ES = max(EF of dependencies), 0 without dependencies
 *                EF = ES + duration
 * Backward pass: LF = min(LS of successors), EF (or horizon) without successors
 *                LS = LF - duration
 * Slack:         LS - ES, critical when 0
 */
import { BackwardPassUnderdeterminedError } from './errors.js';
import { buildDependencyGraph, postOrder, type DependencyGraph } from './graph.js';
import { TaskRegistry } from './registry.js';
import type { ScheduledTask, Schedule, SinkFinish, TaskRecord } from './types/task.js';

export interface ForwardPass {
  readonly graph: DependencyGraph;
  readonly earlyStart: readonly number[];
  readonly earlyFinish: readonly number[];
  /** max(EF) over all tasks, 0 for an empty project */
  readonly horizon: number;
}

export interface BackwardPass {
  readonly forward: ForwardPass;
  readonly lateStart: readonly number[];
  readonly lateFinish: readonly number[];
}

export interface ScheduleOptions {
  /** Late finish of tasks nothing waits on: their own EF, or the project horizon */
  sinkFinish?: SinkFinish;
}

/**
 * Earliest start / finish for every task
 */
export function forwardPass(graph: DependencyGraph): ForwardPass {
  const { registry, predecessors } = graph;
  const earlyStart = new Array<number>(registry.size).fill(Number.NaN);
  const earlyFinish = new Array<number>(registry.size).fill(Number.NaN);
  let horizon = 0;

  for (const handle of postOrder(registry, predecessors)) {
    let es = 0;
    for (const dep of predecessors[handle]) {
      if (earlyFinish[dep] > es) es = earlyFinish[dep];
    }
    earlyStart[handle] = es;
    earlyFinish[handle] = es + registry.at(handle).duration;
    if (earlyFinish[handle] > horizon) horizon = earlyFinish[handle];
  }

  return Object.freeze({
    graph,
    earlyStart: Object.freeze(earlyStart),
    earlyFinish: Object.freeze(earlyFinish),
    horizon
  });
}

/**
 * Latest start / finish for every task
 */
export function backwardPass(forward: ForwardPass, options: ScheduleOptions = {}): BackwardPass {
  const { registry, successors } = forward.graph;
  const sinkFinish = options.sinkFinish ?? 'own';
  const lateStart = new Array<number>(registry.size).fill(Number.NaN);
  const lateFinish = new Array<number>(registry.size).fill(Number.NaN);

  for (const handle of postOrder(registry, successors)) {
    const succs = successors[handle];
    let lf: number;

    if (succs.length === 0) {
      lf = sinkFinish === 'horizon' ? forward.horizon : forward.earlyFinish[handle];
    } else {
      lf = Number.POSITIVE_INFINITY;
      for (const s of succs) {
        if (Number.isNaN(lateStart[s])) continue;
        if (lateStart[s] < lf) lf = lateStart[s];
      }
      if (lf === Number.POSITIVE_INFINITY) {
        throw new BackwardPassUnderdeterminedError(registry.at(handle).id);
      }
    }

    lateFinish[handle] = lf;
    lateStart[handle] = lf - registry.at(handle).duration;
  }

  return Object.freeze({
    forward,
    lateStart: Object.freeze(lateStart),
    lateFinish: Object.freeze(lateFinish)
  });
}

/**
 * Slack per task and the final read-only schedule
 */
export function computeSlack(backward: BackwardPass): Schedule {
  const { forward } = backward;
  const { registry, successors } = forward.graph;

  const tasks = registry.tasks().map((task): ScheduledTask => {
    const h = task.handle;
    const slack = backward.lateStart[h] - forward.earlyStart[h];
    return Object.freeze({
      id: task.id,
      duration: task.duration,
      earlyStart: forward.earlyStart[h],
      earlyFinish: forward.earlyFinish[h],
      lateStart: backward.lateStart[h],
      lateFinish: backward.lateFinish[h],
      slack,
      critical: slack === 0,
      dependencies: task.dependencies,
      successors: Object.freeze(successors[h].map(s => registry.at(s).id))
    });
  });

  return Object.freeze({ tasks: Object.freeze(tasks), horizon: forward.horizon });
}

/**
 * Run every stage over a record set
 */
export function schedule(records: readonly TaskRecord[], options: ScheduleOptions = {}): Schedule {
  const registry = TaskRegistry.fromRecords(records);
  const graph = buildDependencyGraph(registry);
  const forward = forwardPass(graph);
  const backward = backwardPass(forward, options);
  return computeSlack(backward);
}

export interface ChainListing {
  chains: string[][];
  /** Enumeration stopped at the limit with chains left to emit */
  truncated: boolean;
}

function enumerateChains(sched: Schedule, limit: number, endsChain: (task: ScheduledTask) => boolean): ChainListing {
  const byId = new Map(sched.tasks.map(t => [t.id, t]));
  const chains: string[][] = [];
  let truncated = false;

  const nextSteps = (task: ScheduledTask): ScheduledTask[] =>
    task.successors
      .map(id => byId.get(id))
      .filter((s): s is ScheduledTask => s !== undefined && s.critical && s.earlyStart === task.earlyFinish);

  for (const root of sched.tasks) {
    if (truncated) break;
    if (!root.critical || root.dependencies.length > 0) continue;

    const path: ScheduledTask[] = [root];
    const branches: ScheduledTask[][] = [nextSteps(root)];

    while (path.length > 0) {
      const top = path.length - 1;
      const node = path[top];

      if (node.successors.length === 0) {
        if (endsChain(node)) {
          if (chains.length >= limit) {
            truncated = true;
            break;
          }
          chains.push(path.map(t => t.id));
        }
        path.pop();
        branches.pop();
        continue;
      }

      const next = branches[top].shift();
      if (next) {
        path.push(next);
        branches.push(nextSteps(next));
      } else {
        path.pop();
        branches.pop();
      }
    }
  }

  return { chains, truncated };
}

/**
 * Zero-slack chains from a dependency-free task to a task nothing waits on.
 * Each step is tight: the next task starts exactly when the previous one ends.
 *
 * @param limit - Stop after this many chains (the count can grow exponentially)
 */
export function criticalChains(sched: Schedule, limit: number = 1000): string[][] {
  return enumerateChains(sched, limit, () => true).chains;
}

/**
 * Critical chains whose last task finishes at the project horizon.
 * Only those chains count towards the limit.
 */
export function listCriticalPaths(sched: Schedule, limit: number = 1000): ChainListing {
  return enumerateChains(sched, limit, task => task.earlyFinish === sched.horizon);
}

export function criticalPath(sched: Schedule, limit?: number): string[][] {
  return listCriticalPaths(sched, limit).chains;
}
