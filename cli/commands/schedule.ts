/**
 * Schedule commands (schedule, show, critical, validate)
 */
import path from 'path';
import { buildTimeline, renderTimelineText } from '../lib/timeline.js';
import { formatTable, jsonOut } from '../lib/strings.js';
import type { Schedule } from '../lib/types/task.js';
import { getTimelineSymbols } from '../managers/fileio-manager.js';
import { findCriticalPath, runSchedule, validateTaskFile, writeReports } from '../managers/schedule-manager.js';
import { withErrors } from './helpers.js';
import type { Command } from 'commander';
import type { CriticalOptions, ScheduleOptions, ShowOptions, ValidateOptions } from './helpers.js';

function displayPath(file: string): string {
  return path.relative(process.cwd(), file) || file;
}

function scheduleJson(source: string, sched: Schedule) {
  return {
    source,
    horizon: sched.horizon,
    criticalPath: findCriticalPath(sched),
    tasks: sched.tasks.map(t => ({
      id: t.id,
      duration: t.duration,
      ES: t.earlyStart,
      EF: t.earlyFinish,
      LS: t.lateStart,
      LF: t.lateFinish,
      slack: t.slack,
      critical: t.critical
    }))
  };
}

/**
 * Per-task table, critical tasks marked with *
 */
export function formatScheduleTable(sched: Schedule): string[] {
  const rows = [['', 'task', 'duration', 'ES', 'EF', 'LS', 'LF', 'slack']];
  for (const t of sched.tasks) {
    rows.push([
      t.critical ? '*' : '',
      t.id,
      String(t.duration),
      String(t.earlyStart),
      String(t.earlyFinish),
      String(t.lateStart),
      String(t.lateFinish),
      String(t.slack)
    ]);
  }
  return formatTable(rows);
}

/**
 * Register schedule, show, critical, validate commands
 */
export function registerScheduleCommands(program: Command): void {
  // schedule
  program.command('schedule [file]')
    .description('Compute the schedule and write task details + timeline reports')
    .option('-o, --out <file>', 'Task details report (default: output.tasks_file)')
    .option('-t, --timeline <file>', 'Timeline report (default: output.timeline_file)')
    .option('-d, --out-dir <dir>', 'Directory for both reports')
    .option('--json', 'JSON output (reports are still written)')
    .action((file: string | undefined, options: ScheduleOptions) => {
      withErrors(options, () => {
        const run = runSchedule(file);
        const { tasksFile, timelineFile } = writeReports(run, options);

        if (options.json) {
          jsonOut({ ...scheduleJson(run.source, run.schedule), files: { tasks: tasksFile, timeline: timelineFile } });
          return;
        }

        console.log(`Task details written to ${displayPath(tasksFile)}`);
        console.log(`Timeline written to ${displayPath(timelineFile)}`);
      });
    });

  // show
  program.command('show [file]')
    .description('Print the schedule table and timeline without writing files')
    .option('--no-timeline', 'Table only')
    .option('--json', 'JSON output')
    .action((file: string | undefined, options: ShowOptions) => {
      withErrors(options, () => {
        const run = runSchedule(file);

        if (options.json) {
          jsonOut(scheduleJson(run.source, run.schedule));
          return;
        }

        formatScheduleTable(run.schedule).forEach(line => console.log(line));
        if (options.timeline !== false && run.schedule.horizon > 0) {
          console.log('');
          renderTimelineText(buildTimeline(run.schedule), getTimelineSymbols()).forEach(line => console.log(line));
        }
        console.log('');
        console.log(`Project horizon: ${run.schedule.horizon}`);
      });
    });

  // critical
  program.command('critical [file]')
    .description('Print the project horizon and the critical path(s)')
    .option('--json', 'JSON output')
    .action((file: string | undefined, options: CriticalOptions) => {
      withErrors(options, () => {
        const { schedule } = runSchedule(file);
        const paths = findCriticalPath(schedule);
        const critical = schedule.tasks.filter(t => t.critical).map(t => t.id);

        if (options.json) {
          jsonOut({ horizon: schedule.horizon, criticalTasks: critical, criticalPaths: paths });
          return;
        }

        console.log(`Project horizon: ${schedule.horizon}`);
        if (paths.length === 0) {
          console.log('No critical path (empty project).');
        } else if (paths.length === 1) {
          console.log(`Critical path: ${paths[0].join(' → ')}`);
        } else {
          console.log(`Critical paths (${paths.length}):`);
          paths.forEach(p => console.log(`  ${p.join(' → ')}`));
        }
      });
    });

  // validate
  program.command('validate [file]')
    .description('Check duplicates, unknown dependencies and cycles (exit 1 on problems)')
    .option('--json', 'JSON output')
    .action((file: string | undefined, options: ValidateOptions) => {
      withErrors(options, () => {
        const report = validateTaskFile(file);

        if (options.json) {
          jsonOut(report);
        } else if (report.problems.length === 0) {
          console.log(`✓ ${displayPath(report.source)}: ${report.tasks} tasks, no problems`);
          console.log(`  Roots: ${report.roots.join(', ') || '-'}`);
          console.log(`  Sinks: ${report.sinks.join(', ') || '-'}`);
        } else {
          console.error(`✗ ${displayPath(report.source)}: ${report.problems.length} problem(s)`);
          report.problems.forEach(p => console.error(`  [${p.kind}] ${p.message}`));
        }

        if (report.problems.length > 0) process.exit(1);
      });
    });
}
