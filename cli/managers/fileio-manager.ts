/**
 * FileIO Manager - task file loading and report writing
 *
 * MANAGER: Orchestrates file operations with config access.
 */
import fs from 'fs';
import path from 'path';
import { parseTaskCsv, serializeScheduleCsv, serializeTimelineCsv } from '../lib/csv.js';
import { ScheduleIoError } from '../lib/errors.js';
import type { TimelineSymbols } from '../lib/timeline.js';
import type { Schedule, TaskRecord, Timeline } from '../lib/types/task.js';
import { loadConfig } from './config-manager.js';
import { logDebug } from './log-manager.js';

/**
 * Timeline symbols from config
 */
export function getTimelineSymbols(): TimelineSymbols {
  const { timeline } = loadConfig();
  return {
    critical: timeline.critical_symbol,
    active: timeline.active_symbol,
    inactive: timeline.inactive_symbol
  };
}

/**
 * Load a task file into records
 * @param file - Defaults to input.file from config
 */
export function loadTaskFile(file?: string): TaskRecord[] {
  const { input } = loadConfig();
  const filepath = path.resolve(file ?? input.file);

  if (!fs.existsSync(filepath)) {
    throw new ScheduleIoError(filepath, 'Task file not found');
  }

  const content = fs.readFileSync(filepath, 'utf8');
  const records = parseTaskCsv(content, {
    delimiter: input.delimiter,
    dependencySeparator: input.dependency_separator,
    hasHeader: input.has_header,
    source: path.basename(filepath)
  });

  logDebug('Loaded task file', { file: filepath, tasks: records.length });
  return records;
}

function writeReport(filepath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    fs.writeFileSync(filepath, content);
  } catch (e) {
    throw new ScheduleIoError(filepath, `Failed to open file for writing (${e instanceof Error ? e.message : String(e)})`);
  }
}

/**
 * Write the task details report (task,duration,ES,EF,LS,LF,slack)
 */
export function saveScheduleCsv(sched: Schedule, filepath: string): void {
  writeReport(filepath, serializeScheduleCsv(sched, loadConfig().input.delimiter));
  logDebug('Wrote task details', { file: filepath, tasks: sched.tasks.length });
}

/**
 * Write the timeline report, one column per time unit
 */
export function saveTimelineCsv(timeline: Timeline, filepath: string): void {
  writeReport(filepath, serializeTimelineCsv(timeline, getTimelineSymbols(), loadConfig().input.delimiter));
  logDebug('Wrote timeline', { file: filepath, horizon: timeline.horizon });
}
