/**
 * Config Manager - Configuration schema, loading, validation, and semantic accessors
 *
 * Handles:
 * - Configuration schema definition (single source of truth)
 * - Config file loading and merging with defaults
 * - Config validation against schema
 * - CLI config overrides
 */
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type {
  ConfigDisplayItem,
  ConfigSchema,
  ConfigSchemaEntry,
  ConfigValue,
  CritpathConfig,
  LogLevel
} from '../lib/types/config.js';
import type { SinkFinish } from '../lib/types/task.js';

export const CONFIG_FILENAME = 'critpath.yaml';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const SINK_FINISH_MODES: readonly SinkFinish[] = ['own', 'horizon'];

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

export const CONFIG_SCHEMA: ConfigSchema = {
  'input.file': {
    type: 'string',
    default: 'tasks.csv',
    description: 'Task file read when no file argument is given'
  },
  'input.delimiter': {
    type: 'string',
    default: ',',
    description: 'Column delimiter of the task file'
  },
  'input.dependency_separator': {
    type: 'string',
    default: ';',
    description: 'Separator between dependency identifiers'
  },
  'input.has_header': {
    type: 'boolean',
    default: true,
    description: 'Skip the first line of the task file'
  },
  'output.tasks_file': {
    type: 'string',
    default: 'output.csv',
    description: 'Task details report (task,duration,ES,EF,LS,LF,slack)'
  },
  'output.timeline_file': {
    type: 'string',
    default: 'timeline.csv',
    description: 'Timeline report, one column per time unit'
  },
  'timeline.critical_symbol': {
    type: 'string',
    default: 'C',
    description: 'Timeline cell for an active critical task'
  },
  'timeline.active_symbol': {
    type: 'string',
    default: 'X',
    description: 'Timeline cell for an active task with slack'
  },
  'timeline.inactive_symbol': {
    type: 'string',
    default: 'O',
    description: 'Timeline cell outside [ES, EF)'
  },
  'schedule.sink_finish': {
    type: 'enum',
    default: 'own',
    values: SINK_FINISH_MODES,
    description: 'Late finish of tasks nothing waits on (own = their EF, horizon = project end)'
  },
  'schedule.max_chains': {
    type: 'number',
    default: 1000,
    description: 'Maximum critical chains listed by the critical command'
  },
  'logging.level': {
    type: 'enum',
    default: 'warn',
    values: LOG_LEVELS,
    description: 'Minimum level of diagnostic log lines on stderr'
  }
};

type ConfigValues = Record<string, ConfigValue>;

// ============================================================================
// CONFIG STATE
// ============================================================================

let _configPath: string | null = null;
let _values: ConfigValues | null = null;
let _configOverrides: ConfigValues = {};

/**
 * Set config file path from the --config flag
 */
export function setConfigPath(configPath: string): void {
  _configPath = path.resolve(configPath);
  _values = null;
}

/**
 * Config file path: --config, then CRITPATH_CONFIG, then ./critpath.yaml
 */
export function getConfigPath(): string {
  if (_configPath) return _configPath;
  if (process.env.CRITPATH_CONFIG) return path.resolve(process.env.CRITPATH_CONFIG);
  return path.resolve(CONFIG_FILENAME);
}

// ============================================================================
// CONFIG OVERRIDES
// ============================================================================

/**
 * Set config overrides from CLI flag
 * Called in critpath.ts before any config is loaded
 */
export function setConfigOverrides(overrides: ConfigValues): void {
  _configOverrides = { ..._configOverrides, ...overrides };
  _values = null;
}

/**
 * Parse a config override string: "key=value"
 * Handles type coercion based on schema
 */
export function parseConfigOverride(override: string): { key: string; value: ConfigValue } | null {
  const match = override.match(/^([^=]+)=(.*)$/);
  if (!match) {
    console.error(`Invalid config override format: ${override}`);
    console.error(`Expected: key=value (e.g., schedule.sink_finish=horizon)`);
    return null;
  }

  const [, key, rawValue] = match;
  const schema = CONFIG_SCHEMA[key];

  if (!schema) {
    console.error(`Unknown config key: ${key}`);
    console.error(`Available keys: ${Object.keys(CONFIG_SCHEMA).join(', ')}`);
    return null;
  }

  switch (schema.type) {
    case 'boolean':
      return { key, value: rawValue.toLowerCase() === 'true' || rawValue === '1' };
    case 'number': {
      const value = parseInt(rawValue, 10);
      if (isNaN(value) || value < 1) {
        console.error(`Invalid number for ${key}: ${rawValue}`);
        return null;
      }
      return { key, value };
    }
    case 'enum':
      if (!schema.values.includes(rawValue)) {
        console.error(`Invalid value for ${key}: ${rawValue}`);
        console.error(`Valid values: ${schema.values.join(', ')}`);
        return null;
      }
      return { key, value: rawValue };
    case 'string':
      if (rawValue === '') {
        console.error(`Invalid value for ${key}: must not be empty`);
        return null;
      }
      return { key, value: rawValue };
  }
}

// ============================================================================
// CONFIG LOADING & VALIDATION
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested YAML sections into dot-notation keys
 */
export function flattenConfig(obj: Record<string, unknown>, prefix: string = ''): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenConfig(value, fullKey));
    } else {
      flat[fullKey] = value;
    }
  }
  return flat;
}

/**
 * Check a raw value against its schema entry.
 * Returns the default (with a warning) when the value does not fit.
 */
function validateValue(key: string, schema: ConfigSchemaEntry, value: unknown): ConfigValue {
  switch (schema.type) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      console.error(`Warning: ${key} should be boolean, got ${typeof value}`);
      return schema.default;
    case 'number':
      if (typeof value === 'number' && Number.isInteger(value) && value >= 1) return value;
      console.error(`Warning: ${key} should be positive integer, got ${String(value)}`);
      return schema.default;
    case 'string':
      if (typeof value === 'string' && value !== '') return value;
      console.error(`Warning: ${key} should be non-empty string, got ${typeof value}`);
      return schema.default;
    case 'enum':
      if (typeof value === 'string' && schema.values.includes(value)) return value;
      console.error(`Warning: Invalid ${key} '${String(value)}'. Valid: ${schema.values.join(', ')}`);
      return schema.default;
  }
}

function readUserConfig(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};

  try {
    const loaded = yaml.load(fs.readFileSync(configPath, 'utf8'));
    if (loaded === undefined || loaded === null) return {};
    if (!isPlainObject(loaded)) {
      console.error(`Warning: ${configPath} should contain a mapping, ignoring it`);
      return {};
    }
    return flattenConfig(loaded);
  } catch (e) {
    console.error(`Warning: Could not parse ${path.basename(configPath)}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

/**
 * Load config values (flat, validated)
 * Merges file values over defaults, then applies CLI overrides
 */
export function loadConfigValues(): ConfigValues {
  if (_values) return _values;

  const user = readUserConfig(getConfigPath());
  for (const key of Object.keys(user)) {
    if (!CONFIG_SCHEMA[key]) {
      console.error(`Warning: Unknown config key ignored: ${key}`);
    }
  }

  const values: ConfigValues = {};
  for (const [key, schema] of Object.entries(CONFIG_SCHEMA)) {
    values[key] = key in user ? validateValue(key, schema, user[key]) : schema.default;
  }

  // Apply CLI overrides (--with-config flag)
  Object.assign(values, _configOverrides);

  _values = values;
  return values;
}

function readString(values: ConfigValues, key: string): string {
  const value = values[key];
  return typeof value === 'string' ? value : String(CONFIG_SCHEMA[key].default);
}

function readBoolean(values: ConfigValues, key: string): boolean {
  const value = values[key];
  return typeof value === 'boolean' ? value : CONFIG_SCHEMA[key].default === true;
}

function readNumber(values: ConfigValues, key: string): number {
  const value = values[key];
  return typeof value === 'number' ? value : Number(CONFIG_SCHEMA[key].default);
}

function readEnum<T extends string>(values: ConfigValues, key: string, allowed: readonly T[]): T {
  const value = values[key];
  const fallback = CONFIG_SCHEMA[key].default;
  return allowed.find(a => a === value) ?? allowed.find(a => a === fallback) ?? allowed[0];
}

/**
 * Load configuration as a typed object
 */
export function loadConfig(): CritpathConfig {
  const values = loadConfigValues();
  return {
    input: {
      file: readString(values, 'input.file'),
      delimiter: readString(values, 'input.delimiter'),
      dependency_separator: readString(values, 'input.dependency_separator'),
      has_header: readBoolean(values, 'input.has_header')
    },
    output: {
      tasks_file: readString(values, 'output.tasks_file'),
      timeline_file: readString(values, 'output.timeline_file')
    },
    timeline: {
      critical_symbol: readString(values, 'timeline.critical_symbol'),
      active_symbol: readString(values, 'timeline.active_symbol'),
      inactive_symbol: readString(values, 'timeline.inactive_symbol')
    },
    schedule: {
      sink_finish: readEnum(values, 'schedule.sink_finish', SINK_FINISH_MODES),
      max_chains: readNumber(values, 'schedule.max_chains')
    },
    logging: {
      level: readEnum(values, 'logging.level', LOG_LEVELS)
    }
  };
}

/**
 * Clear config cache and overrides (for testing or after config changes)
 */
export function clearConfigCache(): void {
  _values = null;
  _configOverrides = {};
  _configPath = null;
}

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

// ============================================================================
// DISPLAY & GENERATION
// ============================================================================

/**
 * Get all config values with schema info for display
 */
export function getConfigDisplay(): ConfigDisplayItem[] {
  const values = loadConfigValues();
  return Object.entries(CONFIG_SCHEMA).map(([key, schema]) => ({
    key,
    value: values[key],
    default: schema.default,
    description: schema.description,
    type: schema.type,
    values: schema.type === 'enum' ? schema.values : undefined,
    isDefault: values[key] === schema.default
  }));
}

/**
 * Render a commented config file holding every default
 */
export function renderDefaultConfig(): string {
  const lines = ['# critpath configuration', '# Generated from schema - edit as needed', ''];

  const sections: Record<string, Array<ConfigSchemaEntry & { key: string }>> = {};
  for (const [key, def] of Object.entries(CONFIG_SCHEMA)) {
    const [section, ...rest] = key.split('.');
    if (!sections[section]) sections[section] = [];
    sections[section].push({ key: rest.join('.'), ...def });
  }

  for (const [section, items] of Object.entries(sections)) {
    lines.push(`${section}:`);
    for (const item of items) {
      lines.push(`  # ${item.description}`);
      if (item.type === 'enum') {
        lines.push(`  # Valid: ${item.values.join(', ')}`);
      }
      lines.push(`  ${item.key}: ${yaml.dump(item.default).trimEnd()}`);
      lines.push('');
    }
  }

  return lines.join('\n');
}
