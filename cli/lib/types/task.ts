/**
 * Task and schedule types shared by the CPM engine and the report layer
 */

/** Integer handle issued by the task registry (registration order) */
export type TaskHandle = number;

/**
 * A task as read from the input file, before registration
 */
export interface TaskRecord {
  id: string;
  duration: number;
  dependencies: string[];
}

/**
 * A registered task. Dependencies are resolved lazily by the graph builder,
 * so they are still identifiers here.
 */
export interface Task {
  readonly handle: TaskHandle;
  readonly id: string;
  readonly duration: number;
  readonly dependencies: readonly string[];
}

export type SinkFinish = 'own' | 'horizon';

export interface ScheduledTask {
  readonly id: string;
  readonly duration: number;
  readonly earlyStart: number;
  readonly earlyFinish: number;
  readonly lateStart: number;
  readonly lateFinish: number;
  readonly slack: number;
  readonly critical: boolean;
  readonly dependencies: readonly string[];
  readonly successors: readonly string[];
}

export interface Schedule {
  readonly tasks: readonly ScheduledTask[];
  readonly horizon: number;
}

export type TimelineSymbol = 'inactive' | 'critical' | 'active';

export interface TimelineRow {
  readonly id: string;
  readonly cells: readonly TimelineSymbol[];
}

export interface Timeline {
  readonly horizon: number;
  readonly rows: readonly TimelineRow[];
}
