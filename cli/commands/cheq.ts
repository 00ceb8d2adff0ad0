import type { Command } from 'commander';
import { CheqConnector, CheqConfigSchema } from '../connectors/cheq.js';
import { endOfDay, isoDate, startOfDay } from '../connectors/base/index.js';
import { createConnector, dateOption, exportCommand, idListOption, runExport, type ExportOpts } from './shared.js';

function connect(opts: ExportOpts): CheqConnector {
  return createConnector('cheq', opts, CheqConfigSchema, (config, deps) => new CheqConnector(config, deps));
}

export function registerCheqCommands(program: Command): void {
  const cheq = program
    .command('cheq')
    .description('Cheq venue ordering exports: sales, menus');

  exportCommand(cheq, 'cheq', 'sales', 'Export orders placed between the start of --from and the end of --to')
    .requiredOption('--from <date>', 'Start date (YYYY-MM-DD)', dateOption)
    .requiredOption('--to <date>', 'End date (YYYY-MM-DD)', dateOption)
    .option('--payment-statuses <ids>', 'Comma-separated payment status codes (default: all)', idListOption)
    .action(async (opts: ExportOpts & { from: Date; to: Date; paymentStatuses?: number[] }) => {
      const connector = connect(opts);
      const from = startOfDay(opts.from);
      const to = endOfDay(opts.to);
      await runExport('cheq', 'sales', opts.out, () => connector.getSales(from, to, { paymentStatuses: opts.paymentStatuses }), {
        from: isoDate(from),
        to: isoDate(to),
      });
    });

  exportCommand(cheq, 'cheq', 'menu', 'Export menu items')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('cheq', 'menu', opts.out, () => connector.getMenu());
    });
}
