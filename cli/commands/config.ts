import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, saveConfig, getConfigPath, maskedConfig, setConnectorValue } from '../config.js';
import { CONNECTORS, envVarName, isConnectorSource } from '../connectors/index.js';
import { fail } from './shared.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage stored connector settings');

  config
    .command('show')
    .description('Show current configuration with secrets masked')
    .action(() => {
      try {
        const cfg = maskedConfig(loadConfig());
        console.log(chalk.cyan('Config path:'), getConfigPath());
        const sources = Object.keys(cfg.connectors);
        if (sources.length === 0) {
          console.log(chalk.gray('No connectors configured'));
          return;
        }
        for (const source of sources) {
          console.log(chalk.cyan(`\n${source}`));
          for (const [key, value] of Object.entries(cfg.connectors[source])) {
            console.log(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
          }
        }
      } catch (err) {
        fail(err);
      }
    });

  config
    .command('set')
    .description('Store one connector setting; use options.<name> for connector options')
    .argument('<connector>', `Connector: ${Object.keys(CONNECTORS).join(', ')}`)
    .argument('<key>', 'Setting name, e.g. apiKey or options.batchSize')
    .argument('<value>', 'Setting value')
    .action((source: string, key: string, value: string) => {
      if (!isConnectorSource(source)) {
        console.error(chalk.red(`Unknown connector: ${source}. Use one of ${Object.keys(CONNECTORS).join(', ')}.`));
        process.exit(1);
      }
      try {
        saveConfig(setConnectorValue(loadConfig(), source, key, value));
      } catch (err) {
        fail(err);
      }
      console.log(chalk.green(`${source}.${key} saved`));
    });

  config
    .command('env')
    .description('List the environment variables a connector reads')
    .argument('<connector>', 'Connector name')
    .action((source: string) => {
      if (!isConnectorSource(source)) {
        console.error(chalk.red(`Unknown connector: ${source}`));
        process.exit(1);
      }
      for (const key of CONNECTORS[source].credentials) {
        console.log(`${envVarName(source, key)}  → ${key}`);
      }
    });
}
