/**
 * Schedule Manager - one batch run: load → compute → report
 *
 * MANAGER: Wires the pure CPM stages to config, logging and file I/O.
 * Reports are written only once the whole schedule exists.
 */
import path from 'path';
import { backwardPass, computeSlack, forwardPass, listCriticalPaths } from '../lib/cpm.js';
import { CyclicDependencyError, DuplicateIdentifierError, NotFoundError, type ScheduleErrorKind } from '../lib/errors.js';
import { buildDependencyGraph, detectCycles, findRoots, findSinks } from '../lib/graph.js';
import { TaskRegistry } from '../lib/registry.js';
import { buildTimeline } from '../lib/timeline.js';
import type { Schedule, TaskRecord } from '../lib/types/task.js';
import { loadConfig } from './config-manager.js';
import { loadTaskFile, saveScheduleCsv, saveTimelineCsv } from './fileio-manager.js';
import { logDebug, logWarn } from './log-manager.js';

export interface ScheduleRun {
  source: string;
  schedule: Schedule;
}

export interface ReportPaths {
  out?: string;
  timeline?: string;
  outDir?: string;
}

export interface ValidationProblem {
  kind: ScheduleErrorKind;
  id: string;
  message: string;
  cycle?: string[];
}

export interface ValidationReport {
  source: string;
  tasks: number;
  roots: string[];
  sinks: string[];
  problems: ValidationProblem[];
}

function timed<T>(stage: string, fn: () => T, context: Record<string, unknown> = {}): T {
  const start = performance.now();
  const result = fn();
  logDebug(`${stage} done`, { ...context, ms: Math.round((performance.now() - start) * 100) / 100 });
  return result;
}

/**
 * Run every CPM stage over a record set, with the configured sink mode
 */
export function computeSchedule(records: readonly TaskRecord[]): Schedule {
  const { schedule: options } = loadConfig();

  const registry = timed('Loaded', () => TaskRegistry.fromRecords(records), { tasks: records.length });
  const graph = timed('SuccessorsPopulated', () => buildDependencyGraph(registry));
  const forward = timed('ForwardComputed', () => forwardPass(graph));
  const backward = timed('BackwardComputed', () => backwardPass(forward, { sinkFinish: options.sink_finish }));
  return timed('SlackComputed', () => computeSlack(backward), { horizon: forward.horizon });
}

/**
 * Load a task file and compute its schedule.
 * The timeline is built only where it is written or shown.
 */
export function runSchedule(file?: string): ScheduleRun {
  const source = path.resolve(file ?? loadConfig().input.file);
  const records = loadTaskFile(source);
  const schedule = computeSchedule(records);
  return { source, schedule };
}

/**
 * Resolve report file paths from options and config
 */
export function resolveReportPaths(options: ReportPaths = {}): { tasksFile: string; timelineFile: string } {
  const { output } = loadConfig();
  const dir = options.outDir ?? '.';
  return {
    tasksFile: path.resolve(dir, options.out ?? output.tasks_file),
    timelineFile: path.resolve(dir, options.timeline ?? output.timeline_file)
  };
}

/**
 * Write both reports for a completed run
 */
export function writeReports(run: ScheduleRun, options: ReportPaths = {}): { tasksFile: string; timelineFile: string } {
  const paths = resolveReportPaths(options);
  const timeline = buildTimeline(run.schedule);
  saveScheduleCsv(run.schedule, paths.tasksFile);
  saveTimelineCsv(timeline, paths.timelineFile);
  return paths;
}

/**
 * Critical chains ending at the project horizon, bounded by schedule.max_chains
 */
export function findCriticalPath(sched: Schedule): string[][] {
  const limit = loadConfig().schedule.max_chains;
  const { chains, truncated } = listCriticalPaths(sched, limit);
  if (truncated) {
    logWarn('Critical chain listing stopped at schedule.max_chains', { limit });
  }
  return chains;
}

/**
 * Check a record set for every problem at once, without scheduling.
 * Duplicates keep their first record; unknown references are dropped
 * before cycles are searched.
 */
export function validateRecords(records: readonly TaskRecord[], source: string = '<input>'): ValidationReport {
  const problems: ValidationProblem[] = [];
  const unique: TaskRecord[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    if (seen.has(record.id)) {
      const err = new DuplicateIdentifierError(record.id);
      problems.push({ kind: err.kind, id: err.id, message: err.message });
      continue;
    }
    seen.add(record.id);
    unique.push(record);
  }

  const known = unique.map(record => ({
    ...record,
    dependencies: record.dependencies.filter(dep => {
      if (seen.has(dep)) return true;
      const err = new NotFoundError(dep, record.id);
      problems.push({ kind: err.kind, id: err.id, message: err.message });
      return false;
    })
  }));

  const graph = buildDependencyGraph(TaskRegistry.fromRecords(known));
  for (const cycle of detectCycles(graph)) {
    const err = new CyclicDependencyError(cycle);
    problems.push({ kind: err.kind, id: err.id, message: err.message, cycle });
  }

  return {
    source,
    tasks: unique.length,
    roots: findRoots(graph),
    sinks: findSinks(graph),
    problems
  };
}

export function validateTaskFile(file?: string): ValidationReport {
  const source = path.resolve(file ?? loadConfig().input.file);
  return validateRecords(loadTaskFile(source), source);
}
