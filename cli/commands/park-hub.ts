import type { Command } from 'commander';
import { ParkHubConnector, ParkHubConfigSchema } from '../connectors/park-hub.js';
import { createConnector, exportCommand, fail, runExport, withCredentials, type CommandOpts, type ExportOpts } from './shared.js';

function connect(opts: CommandOpts): ParkHubConnector {
  return createConnector('park-hub', opts, ParkHubConfigSchema, (config, deps) => new ParkHubConnector(config, deps));
}

export function registerParkHubCommands(program: Command): void {
  const parkHub = program
    .command('park-hub')
    .description('ParkHub partner exports: events, lots, service status');

  exportCommand(parkHub, 'park-hub', 'events', 'Export the events of the organization')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('park-hub', 'events', opts.out, () => connector.getEvents());
    });

  exportCommand(parkHub, 'park-hub', 'lots', 'Export the parking lots of the organization')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('park-hub', 'lots', opts.out, () => connector.getLots());
    });

  withCredentials(parkHub.command('status'), 'park-hub')
    .description('Print the partner API status as JSON')
    .action(async (opts: CommandOpts) => {
      const connector = connect(opts);
      try {
        console.log(JSON.stringify(await connector.getSiteStatus(), null, 2));
      } catch (err) {
        fail(err);
      }
    });
}
