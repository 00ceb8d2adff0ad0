import type { Command } from 'commander';
import { BumpConnector, BumpConfigSchema } from '../connectors/bump.js';
import { isoDate } from '../connectors/base/index.js';
import { createConnector, dateOption, exportCommand, intOption, runExport, type ExportOpts } from './shared.js';

type BumpOpts = ExportOpts & { perPage?: number };
type RangeOpts = BumpOpts & { from: Date; to: Date };

function connect(opts: ExportOpts): BumpConnector {
  return createConnector('bump', opts, BumpConfigSchema, (config, deps) => new BumpConnector(config, deps));
}

export function registerBumpCommands(program: Command): void {
  const bump = program
    .command('bump')
    .description('Bump event, sales and donor exports');

  exportCommand(bump, 'bump', 'events', 'Export event details in a date range')
    .requiredOption('--from <date>', 'Start date (YYYY-MM-DD)', dateOption)
    .requiredOption('--to <date>', 'End date (YYYY-MM-DD)', dateOption)
    .option('--per-page <n>', 'Records per page', intOption)
    .action(async (opts: RangeOpts) => {
      const connector = connect(opts);
      await runExport('bump', 'events', opts.out, () => connector.getEventDetails(opts.from, opts.to, { perPage: opts.perPage }), {
        from: isoDate(opts.from),
        to: isoDate(opts.to),
      });
    });

  exportCommand(bump, 'bump', 'sales', 'Export sales from the start of --from to the end of --to')
    .requiredOption('--from <date>', 'Start date (YYYY-MM-DD)', dateOption)
    .requiredOption('--to <date>', 'End date (YYYY-MM-DD)', dateOption)
    .option('--per-page <n>', 'Records per page', intOption)
    .action(async (opts: RangeOpts) => {
      const connector = connect(opts);
      await runExport('bump', 'sales', opts.out, () => connector.getSales(opts.from, opts.to, { perPage: opts.perPage }), {
        from: isoDate(opts.from),
        to: isoDate(opts.to),
      });
    });

  const lists = [
    ['locations', 'Export locations'],
    ['nonprofits', 'Export nonprofits'],
    ['customers', 'Export customers'],
  ] as const;

  for (const [name, description] of lists) {
    exportCommand(bump, 'bump', name, description)
      .option('--per-page <n>', 'Records per page', intOption)
      .action(async (opts: BumpOpts) => {
        const connector = connect(opts);
        const page = { perPage: opts.perPage };
        await runExport('bump', name, opts.out, () => {
          switch (name) {
            case 'locations': return connector.getLocations(page);
            case 'nonprofits': return connector.getNonprofits(page);
            case 'customers': return connector.getCustomers(page);
          }
        });
      });
  }
}
