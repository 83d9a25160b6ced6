/**
 * Shared test data
 */
import type { TaskRecord } from '../lib/types/task.js';

// a → b → d is critical; c has one unit of slack
export const SAMPLE_CSV = [
  'task,duration,dependencies',
  'a,2,',
  'b,3,a',
  'c,2,a',
  'd,5,b;c',
  ''
].join('\n');

export function sampleRecords(): TaskRecord[] {
  return [
    { id: 'a', duration: 2, dependencies: [] },
    { id: 'b', duration: 3, dependencies: ['a'] },
    { id: 'c', duration: 2, dependencies: ['a'] },
    { id: 'd', duration: 5, dependencies: ['b', 'c'] }
  ];
}

/**
 * t0 → t1 → … → t(n-1), registered last-first so traversal starts at the deep end
 */
export function reversedChain(n: number): TaskRecord[] {
  const records: TaskRecord[] = [];
  for (let i = n - 1; i >= 0; i--) {
    records.push({ id: `t${i}`, duration: 1, dependencies: i === 0 ? [] : [`t${i - 1}`] });
  }
  return records;
}
