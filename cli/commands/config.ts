/**
 * Config commands - Configuration management
 */
import fs from 'fs';
import { configExists, getConfigDisplay, getConfigPath, renderDefaultConfig } from '../managers/config-manager.js';
import { jsonOut } from '../lib/strings.js';
import type { ConfigDisplayItem } from '../lib/types/config.js';
import type { Command } from 'commander';
import type { ConfigInitOptions, JsonOption } from './helpers.js';

/**
 * Register config commands
 */
export function registerConfigCommands(program: Command): void {
  const config = program.command('config')
    .description('Configuration management (show, init)')
    .option('--json', 'JSON output')
    .action((options: JsonOption) => {
      const configDisplay = getConfigDisplay();

      if (options.json) {
        jsonOut({
          configFile: getConfigPath(),
          configExists: configExists(),
          settings: configDisplay
        });
        return;
      }

      // YAML-style output
      console.log('# critpath configuration\n');
      console.log(`# config_file: ${getConfigPath()} ${configExists() ? '✓' : '(using defaults)'}`);

      // Group settings by section
      const sections: Record<string, ConfigDisplayItem[]> = {};
      for (const item of configDisplay) {
        const [section] = item.key.split('.');
        if (!sections[section]) sections[section] = [];
        sections[section].push(item);
      }

      for (const [section, items] of Object.entries(sections)) {
        console.log(`\n${section}:`);
        for (const item of items) {
          const keyName = item.key.split('.').slice(1).join('.');
          const marker = item.isDefault ? '' : '  # (custom)';
          const valuesHint = item.values ? ` [${item.values.join('|')}]` : '';
          console.log(`  # ${item.description}${valuesHint}`);
          console.log(`  ${keyName}: ${item.value}${marker}`);
        }
      }
    });

  // config:init
  config.command('init')
    .description('Generate critpath.yaml from schema with defaults')
    .option('--force', 'Overwrite existing critpath.yaml')
    .action((options: ConfigInitOptions) => {
      const configPath = getConfigPath();

      if (fs.existsSync(configPath) && !options.force) {
        console.error(`Config already exists: ${configPath}`);
        console.error('Use --force to overwrite');
        process.exit(1);
      }

      fs.writeFileSync(configPath, renderDefaultConfig());
      console.log(`Created: ${configPath}`);
    });
}
