/**
 * Timeline view - one symbol per time unit per task, over [0, horizon)
 */
import type { Schedule, ScheduledTask, Timeline, TimelineSymbol } from './types/task.js';

export type TimelineSymbols = Record<TimelineSymbol, string>;

export const DEFAULT_TIMELINE_SYMBOLS: TimelineSymbols = {
  critical: 'C',
  active: 'X',
  inactive: 'O'
};

export function classifyUnit(task: ScheduledTask, unit: number): TimelineSymbol {
  if (unit < task.earlyStart || unit >= task.earlyFinish) return 'inactive';
  return task.slack === 0 ? 'critical' : 'active';
}

export function buildTimeline(sched: Schedule): Timeline {
  const units = Array.from({ length: sched.horizon }, (_, i) => i);
  return {
    horizon: sched.horizon,
    rows: sched.tasks.map(task => ({
      id: task.id,
      cells: units.map(unit => classifyUnit(task, unit))
    }))
  };
}

/**
 * Render the timeline as fixed-width text for the terminal
 */
export function renderTimelineText(timeline: Timeline, symbols: TimelineSymbols = DEFAULT_TIMELINE_SYMBOLS): string[] {
  const width = Math.max(4, ...timeline.rows.map(r => r.id.length));
  return timeline.rows.map(row =>
    `${row.id.padEnd(width)} |${row.cells.map(c => symbols[c]).join('')}|`
  );
}
