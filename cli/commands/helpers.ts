/**
 * Command helpers
 *
 * Shared option types and error reporting for critpath subcommands.
 */
import { isScheduleError } from '../lib/errors.js';
import { jsonOut } from '../lib/strings.js';

// ============================================================================
// Types
// ============================================================================

export interface JsonOption {
  json?: boolean;
}

export interface ScheduleOptions extends JsonOption {
  out?: string;
  timeline?: string;
  outDir?: string;
}

export interface ShowOptions extends JsonOption {
  timeline?: boolean;
}

export type CriticalOptions = JsonOption;
export type ValidateOptions = JsonOption;

export interface ConfigInitOptions {
  force?: boolean;
}

// ============================================================================
// Error reporting
// ============================================================================

/**
 * Print an error and exit 1
 * JSON mode prints { error, kind, id } on stdout so callers can parse it.
 */
export function exitWithError(e: unknown, options: JsonOption = {}): never {
  if (isScheduleError(e)) {
    if (options.json) {
      jsonOut(e.toJSON());
    } else {
      console.error(e.message);
    }
  } else {
    const message = e instanceof Error ? e.message : String(e);
    if (options.json) {
      jsonOut({ error: message });
    } else {
      console.error(message);
    }
  }
  process.exit(1);
}

/**
 * Run a command body, converting thrown errors into exit status 1
 */
export function withErrors<O extends JsonOption>(options: O, fn: () => void): void {
  try {
    fn();
  } catch (e) {
    exitWithError(e, options);
  }
}
