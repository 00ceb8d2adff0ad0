import type { Command } from 'commander';
import chalk from 'chalk';
import { getCheckpointPath, mask } from '../config.js';
import { FileCheckpointStore } from '../connectors/base/index.js';
import { fail } from './shared.js';

export function registerCheckpointCommand(program: Command): void {
  const checkpoint = program
    .command('checkpoint')
    .description('Inspect and clear stored cursors and cached tokens');

  checkpoint
    .command('list')
    .description('List stored checkpoints with values masked')
    .action(() => {
      try {
        const entries = Object.entries(new FileCheckpointStore(getCheckpointPath()).list());
        console.log(chalk.cyan('Checkpoint file:'), getCheckpointPath());
        if (entries.length === 0) console.log(chalk.gray('No checkpoints stored'));
        for (const [name, value] of entries) console.log(`  ${name}: ${mask(value)}`);
      } catch (err) {
        fail(err);
      }
    });

  checkpoint
    .command('clear')
    .description('Remove one checkpoint so the next run starts over')
    .argument('<name>', 'Checkpoint name, e.g. seatgeek-sales-cursor')
    .action(async (name: string) => {
      let removed: boolean;
      try {
        removed = await new FileCheckpointStore(getCheckpointPath()).remove(name);
      } catch (err) {
        fail(err);
      }
      if (removed) {
        console.log(chalk.green(`Checkpoint ${name} cleared`));
      } else {
        console.log(chalk.yellow(`No checkpoint named ${name}`));
      }
    });
}
