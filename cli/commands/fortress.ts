import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { FORTRESS_ENDPOINTS, FortressConnector, FortressConfigSchema, type FortressEndpoint } from '../connectors/fortress.js';
import { isoSeconds } from '../connectors/base/index.js';
import { createConnector, dateOption, exportCommand, runExport, type ExportOpts } from './shared.js';

function isEndpoint(value: string): value is FortressEndpoint {
  return Object.prototype.hasOwnProperty.call(FORTRESS_ENDPOINTS, value);
}

function endpointOption(value: string): FortressEndpoint {
  if (!isEndpoint(value)) {
    throw new InvalidArgumentError(`Expected one of: ${Object.keys(FORTRESS_ENDPOINTS).join(', ')}.`);
  }
  return value;
}

export function registerFortressCommands(program: Command): void {
  const fortress = program
    .command('fortress')
    .description('Fortress CRM exports per season');

  exportCommand(fortress, 'fortress', 'export', 'Export one endpoint for a season and time window')
    .requiredOption('--endpoint <name>', `Endpoint: ${Object.keys(FORTRESS_ENDPOINTS).join(', ')}`, endpointOption)
    .requiredOption('--season <label>', 'Season label from the config file')
    .requiredOption('--from <time>', 'Window start (ISO date or timestamp)', dateOption)
    .requiredOption('--to <time>', 'Window end (ISO date or timestamp)', dateOption)
    .action(async (opts: ExportOpts & { endpoint: FortressEndpoint; season: string; from: Date; to: Date }) => {
      const connector = createConnector('fortress', opts, FortressConfigSchema, (config, deps) => new FortressConnector(config, deps));
      const query = { endpoint: opts.endpoint, season: opts.season, from: opts.from, to: opts.to };
      await runExport('fortress', opts.endpoint, opts.out, () => connector.getData(query), {
        season: opts.season,
        from: isoSeconds(opts.from),
        to: isoSeconds(opts.to),
      });
    });
}
