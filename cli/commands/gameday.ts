import type { Command } from 'commander';
import { GamedayConnector, GamedayConfigSchema } from '../connectors/gameday.js';
import { createConnector, intOption, readRows, runWrite, withCredentials, type CommandOpts } from './shared.js';

export function registerGamedayCommands(program: Command): void {
  const gameday = program
    .command('gameday')
    .description('Gameday member uploads');

  withCredentials(gameday.command('post-members'), 'gameday')
    .description('Upload members from a JSONL file in batches')
    .requiredOption('-f, --file <path>', 'JSONL file, one member per line')
    .option('--batch-size <n>', 'Members per request', intOption)
    .action(async (opts: CommandOpts & { file: string; batchSize?: number }) => {
      const connector = createConnector('gameday', opts, GamedayConfigSchema, (config, deps) => new GamedayConnector(config, deps));
      const members = readRows(opts.file).rows;
      await runWrite(`Posting ${members.length} members to Gameday...`, () => connector.postMembers(members, opts.batchSize));
    });
}
