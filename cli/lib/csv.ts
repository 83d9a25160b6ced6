/**
 * Delimited text codec for task files and schedule reports
 *
 * Task file:
 *   task,duration,dependencies
 *   a,2,
 *   b,3,a
 *   d,5,b;c
 */
import { InvalidTaskRecordError } from './errors.js';
import { DEFAULT_TIMELINE_SYMBOLS, type TimelineSymbols } from './timeline.js';
import type { Schedule, TaskRecord, Timeline } from './types/task.js';

export interface TaskCsvOptions {
  delimiter?: string;
  dependencySeparator?: string;
  hasHeader?: boolean;
  /** Name used in error messages */
  source?: string;
}

export const SCHEDULE_HEADER = ['task', 'duration', 'ES', 'EF', 'LS', 'LF', 'slack'];

/**
 * Split a dependency cell, dropping empty items
 */
export function splitDependencies(cell: string, separator: string = ';'): string[] {
  return cell.split(separator).map(s => s.trim()).filter(s => s.length > 0);
}

export function parseTaskCsv(content: string, options: TaskCsvOptions = {}): TaskRecord[] {
  const delimiter = options.delimiter ?? ',';
  const separator = options.dependencySeparator ?? ';';
  const hasHeader = options.hasHeader ?? true;
  const source = options.source ?? '<input>';

  const records: TaskRecord[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const lineNo = index + 1;
    if (hasHeader && index === 0) return;
    if (raw.trim() === '') return;

    const cells = raw.split(delimiter).map(c => c.trim());
    if (cells.length < 2) {
      throw new InvalidTaskRecordError(source, lineNo, `expected at least 2 columns, got ${cells.length}`);
    }

    const [id, durationCell, depsCell = ''] = cells;
    if (id === '') {
      throw new InvalidTaskRecordError(source, lineNo, 'empty task identifier');
    }
    if (!/^\d+$/.test(durationCell)) {
      throw new InvalidTaskRecordError(source, lineNo, `invalid duration '${durationCell}' for task ${id}`);
    }

    const duration = parseInt(durationCell, 10);
    if (!Number.isSafeInteger(duration)) {
      throw new InvalidTaskRecordError(source, lineNo, `duration '${durationCell}' for task ${id} is larger than ${Number.MAX_SAFE_INTEGER}`);
    }

    records.push({
      id,
      duration,
      dependencies: splitDependencies(depsCell, separator)
    });
  });

  return records;
}

export function serializeScheduleCsv(sched: Schedule, delimiter: string = ','): string {
  const rows = [SCHEDULE_HEADER.join(delimiter)];
  for (const t of sched.tasks) {
    rows.push([t.id, t.duration, t.earlyStart, t.earlyFinish, t.lateStart, t.lateFinish, t.slack].join(delimiter));
  }
  return rows.join('\n') + '\n';
}

export function serializeTimelineCsv(
  timeline: Timeline,
  symbols: TimelineSymbols = DEFAULT_TIMELINE_SYMBOLS,
  delimiter: string = ','
): string {
  const header = ['Task', ...Array.from({ length: timeline.horizon }, (_, i) => String(i))];
  const rows = [header.join(delimiter)];
  for (const row of timeline.rows) {
    rows.push([row.id, ...row.cells.map(c => symbols[c])].join(delimiter));
  }
  return rows.join('\n') + '\n';
}
