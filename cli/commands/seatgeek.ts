import type { Command } from 'commander';
import chalk from 'chalk';
import { SeatGeekConnector, SeatGeekConfigSchema } from '../connectors/seatgeek.js';
import { createConnector, exportCommand, fail, runExport, withCredentials, type CommandOpts, type ExportOpts } from './shared.js';

function connect(opts: CommandOpts): SeatGeekConnector {
  return createConnector('seatgeek', opts, SeatGeekConfigSchema, (config, deps) => new SeatGeekConnector(config, deps));
}

export function registerSeatGeekCommands(program: Command): void {
  const seatgeek = program
    .command('seatgeek')
    .description('SeatGeek sales exports');

  exportCommand(seatgeek, 'seatgeek', 'sales', 'Export sales, resuming from the stored cursor')
    .option('--from-start', 'Ignore the stored cursor and start from the first page')
    .action(async (opts: ExportOpts & { fromStart?: boolean }) => {
      const connector = connect(opts);
      await runExport('seatgeek', 'sales', opts.out, () => connector.getSales({ fromStart: opts.fromStart }));
    });

  withCredentials(seatgeek.command('auth'), 'seatgeek')
    .description('Fetch a bearer token and store it for later runs')
    .action(async (opts: CommandOpts) => {
      const connector = connect(opts);
      try {
        await connector.cacheAuthenticationToken();
        console.log(chalk.green('Bearer token stored'));
      } catch (err) {
        fail(err);
      }
    });
}
