import type { Command } from 'commander';
import { TradableBitsConnector, TradableBitsConfigSchema } from '../connectors/tradable-bits.js';
import { createConnector, exportCommand, intOption, runExport, type ExportOpts } from './shared.js';

function connect(opts: ExportOpts): TradableBitsConnector {
  return createConnector('tradable-bits', opts, TradableBitsConfigSchema, (config, deps) => new TradableBitsConnector(config, deps));
}

export function registerTradableBitsCommands(program: Command): void {
  const tb = program
    .command('tradable-bits')
    .description('Tradable Bits fan engagement exports');

  exportCommand(tb, 'tradable-bits', 'campaigns', 'Export campaigns')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('tradable-bits', 'campaigns', opts.out, () => connector.getCampaigns());
    });

  exportCommand(tb, 'tradable-bits', 'fans', 'Export every fan')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('tradable-bits', 'fans', opts.out, () => connector.getFans());
    });

  exportCommand(tb, 'tradable-bits', 'activities', 'Export activities, newest first unless --since-id is given')
    .option('--since-id <id>', 'Only activities after this id, oldest first', intOption)
    .action(async (opts: ExportOpts & { sinceId?: number }) => {
      const connector = connect(opts);
      await runExport('tradable-bits', 'activities', opts.out, () => connector.getActivities({ sinceId: opts.sinceId }),
        opts.sinceId !== undefined ? { sinceId: opts.sinceId } : undefined);
    });
}
