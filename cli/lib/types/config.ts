/**
 * Shared config-related types
 */
import type { SinkFinish } from './task.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ConfigValue = string | number | boolean;

export type ConfigSchemaEntry =
  | { type: 'string'; default: string; description: string }
  | { type: 'boolean'; default: boolean; description: string }
  | { type: 'number'; default: number; description: string }
  | { type: 'enum'; default: string; values: readonly string[]; description: string };

export type ConfigSchema = Record<string, ConfigSchemaEntry>;

export interface ConfigDisplayItem {
  key: string;
  value: ConfigValue;
  default: ConfigValue;
  description: string;
  type: ConfigSchemaEntry['type'];
  values?: readonly string[];
  isDefault: boolean;
}

export interface CritpathConfig {
  input: {
    file: string;
    delimiter: string;
    dependency_separator: string;
    has_header: boolean;
  };
  output: {
    tasks_file: string;
    timeline_file: string;
  };
  timeline: {
    critical_symbol: string;
    active_symbol: string;
    inactive_symbol: string;
  };
  schedule: {
    sink_finish: SinkFinish;
    max_chains: number;
  };
  logging: {
    level: LogLevel;
  };
}
