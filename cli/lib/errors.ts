/**
 * Schedule error kinds
 *
 * Every failure the scheduler can report is one of these. They all carry the
 * offending identifier (or file / line) so the input can be fixed.
 */

export type ScheduleErrorKind =
  | 'NotFound'
  | 'DuplicateIdentifier'
  | 'CyclicDependency'
  | 'BackwardPassUnderdetermined'
  | 'InvalidTaskRecord'
  | 'IoError';

export abstract class ScheduleError extends Error {
  abstract readonly kind: ScheduleErrorKind;

  /** Identifier (task id or file path) the error is about */
  readonly id: string;

  constructor(message: string, id: string) {
    super(message);
    this.name = new.target.name;
    this.id = id;
  }

  toJSON(): { error: string; kind: ScheduleErrorKind; id: string } {
    return { error: this.message, kind: this.kind, id: this.id };
  }
}

/**
 * Reference to a task identifier that was never loaded
 */
export class NotFoundError extends ScheduleError {
  readonly kind = 'NotFound';
  /** Task whose dependency list holds the unknown reference, if known */
  readonly referencedBy?: string;

  constructor(id: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Task not found: ${id} (dependency of ${referencedBy})`
        : `Task not found: ${id}`,
      id
    );
    this.referencedBy = referencedBy;
  }
}

export class DuplicateIdentifierError extends ScheduleError {
  readonly kind = 'DuplicateIdentifier';

  constructor(id: string) {
    super(`Duplicate task identifier: ${id}`, id);
  }
}

export class CyclicDependencyError extends ScheduleError {
  readonly kind = 'CyclicDependency';
  /** Cycle path, first and last entries equal (a → b → a) */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Cyclic dependency: ${cycle.join(' → ')}`, cycle[0] ?? '');
    this.cycle = cycle;
  }

  override toJSON() {
    return { ...super.toJSON(), cycle: [...this.cycle] };
  }
}

/**
 * A task has successors but none produced a late start.
 * Unreachable when successors are derived before the backward pass.
 */
export class BackwardPassUnderdeterminedError extends ScheduleError {
  readonly kind = 'BackwardPassUnderdetermined';

  constructor(id: string) {
    super(`Backward pass could not resolve late finish for task: ${id}`, id);
  }
}

export class InvalidTaskRecordError extends ScheduleError {
  readonly kind = 'InvalidTaskRecord';
  readonly line: number;

  constructor(file: string, line: number, reason: string) {
    super(`${file}:${line}: ${reason}`, file);
    this.line = line;
  }
}

export class ScheduleIoError extends ScheduleError {
  readonly kind = 'IoError';

  constructor(file: string, reason: string) {
    super(`${reason}: ${file}`, file);
  }
}

export function isScheduleError(e: unknown): e is ScheduleError {
  return e instanceof ScheduleError;
}
