#!/usr/bin/env node
/**
 * critpath - Critical Path Method scheduler
 *
 * Command syntax:
 *   critpath <command> [file] [options]
 *   critpath <group>:<command>           # Colon notation (config:init → config init)
 *
 * Config file detection:
 *   1. --config <path> flag (highest priority)
 *   2. CRITPATH_CONFIG environment variable
 *   3. ./critpath.yaml
 *
 * Config overrides:
 *   --with-config key=value              # Override any config value
 *   Can be specified multiple times for multiple overrides
 *
 * Examples:
 *   critpath schedule tasks.csv
 *   critpath show tasks.csv --no-timeline
 *   critpath critical tasks.csv --json
 *   critpath --with-config schedule.sink_finish=horizon show
 */
import { program } from 'commander';
import { setConfigOverrides, parseConfigOverride, setConfigPath } from './managers/config-manager.js';
import { getCliVersion } from './lib/version.js';
import { registerScheduleCommands } from './commands/schedule.js';
import { registerConfigCommands } from './commands/config.js';
import type { ConfigValue } from './lib/types/config.js';

const args = process.argv.slice(2);

// Extract --config flag manually (before commander parses)
const configIdx = args.indexOf('--config');
if (configIdx !== -1) {
  const value = args[configIdx + 1];
  if (!value) {
    console.error('--config requires a path (e.g., --config ./critpath.yaml)');
    process.exit(1);
  }
  setConfigPath(value);
  args.splice(configIdx, 2);
}

// Extract --with-config flags manually (before commander parses)
// Can be specified multiple times: --with-config key=value --with-config key2=value2
const configOverrides: Record<string, ConfigValue> = {};
let overrideIdx = args.indexOf('--with-config');
while (overrideIdx !== -1) {
  const value = args[overrideIdx + 1];
  if (!value) {
    console.error('--with-config requires a value (e.g., --with-config schedule.sink_finish=horizon)');
    process.exit(1);
  }
  const parsed = parseConfigOverride(value);
  if (!parsed) {
    process.exit(1);
  }
  configOverrides[parsed.key] = parsed.value;
  args.splice(overrideIdx, 2);
  overrideIdx = args.indexOf('--with-config');
}

if (Object.keys(configOverrides).length > 0) {
  setConfigOverrides(configOverrides);
}

// Expand colon syntax: config:init → config init (first arg only)
let commandExpanded = false;
const expandedArgs = args.flatMap(arg => {
  if (!commandExpanded && arg.includes(':') && !arg.startsWith('-') && !arg.includes('=')) {
    const parts = arg.split(':');
    if (parts.length === 2 && /^[a-z-]+$/.test(parts[0]) && /^[a-z-]+$/.test(parts[1])) {
      commandExpanded = true;
      return parts;
    }
  }
  return [arg];
});

program
  .name('critpath')
  .description('Critical Path Method scheduler\n\nReads a task file (task,duration,dependencies) and computes ES/EF/LS/LF, slack and the critical path.')
  .version(getCliVersion())
  .addHelpText('after', `
Global Options (before command):
  --config <path>            Config file (overrides CRITPATH_CONFIG, default ./critpath.yaml)
  --with-config <key=value>  Override config value (repeatable)
`);

registerScheduleCommands(program);
registerConfigCommands(program);

// Show help if no command
if (expandedArgs.length === 0) {
  program.help();
}

program.parse(['node', 'critpath', ...expandedArgs]);
