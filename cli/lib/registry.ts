/**
 * Task registry - single owner of the tasks loaded for one run
 *
 * Identifiers are indexed once, at registration, into stable integer
 * handles. Everything downstream works over handles.
 */
import { DuplicateIdentifierError, NotFoundError } from './errors.js';
import type { Task, TaskHandle, TaskRecord } from './types/task.js';

export class TaskRegistry {
  private readonly _tasks: Task[] = [];
  private readonly _index = new Map<string, TaskHandle>();

  /**
   * Build a registry from records, in order.
   * Fails on the first duplicate identifier.
   */
  static fromRecords(records: readonly TaskRecord[]): TaskRegistry {
    const registry = new TaskRegistry();
    for (const record of records) {
      registry.register(record);
    }
    return registry;
  }

  get size(): number {
    return this._tasks.length;
  }

  /**
   * Register a task and return its handle.
   * Repeated dependency entries are collapsed, first occurrence wins.
   */
  register(record: TaskRecord): TaskHandle {
    if (this._index.has(record.id)) {
      throw new DuplicateIdentifierError(record.id);
    }

    const handle = this._tasks.length;
    const task: Task = Object.freeze({
      handle,
      id: record.id,
      duration: record.duration,
      dependencies: Object.freeze([...new Set(record.dependencies)])
    });

    this._tasks.push(task);
    this._index.set(record.id, handle);
    return handle;
  }

  has(id: string): boolean {
    return this._index.has(id);
  }

  /**
   * Resolve an identifier to its handle
   * @param referencedBy - Task whose dependency list holds the reference (error context)
   */
  handleOf(id: string, referencedBy?: string): TaskHandle {
    const handle = this._index.get(id);
    if (handle === undefined) {
      throw new NotFoundError(id, referencedBy);
    }
    return handle;
  }

  lookup(id: string): Task {
    return this.at(this.handleOf(id));
  }

  at(handle: TaskHandle): Task {
    const task = this._tasks[handle];
    if (!task) {
      throw new NotFoundError(`#${handle}`);
    }
    return task;
  }

  /** All tasks in registration order */
  tasks(): readonly Task[] {
    return this._tasks;
  }
}
