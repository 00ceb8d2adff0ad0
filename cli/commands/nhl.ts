import type { Command } from 'commander';
import { NhlConnector, NhlConfigSchema } from '../connectors/nhl.js';
import { isoDate, type JsonRecord, type Table } from '../connectors/base/index.js';
import {
  createConnector, dateOption, exportCommand, fail, intOption, runExport, withCredentials, type CommandOpts, type ExportOpts,
} from './shared.js';

function connect(opts: CommandOpts): NhlConnector {
  return createConnector('nhl', opts, NhlConfigSchema, (config, deps) => new NhlConnector(config, deps));
}

const REFERENCE: [name: string, description: string, fetch: (c: NhlConnector) => Promise<Table>][] = [
  ['teams', 'Export all teams', c => c.getTeams()],
  ['venues', 'Export all venues', c => c.getVenues()],
  ['seasons', 'Export all seasons', c => c.getSeasons()],
  ['game-types', 'Export game type codes', c => c.getGameTypes()],
  ['game-statuses', 'Export game status codes', c => c.getGameStatuses()],
  ['positions', 'Export player positions', c => c.getPositions()],
];

const GAME_DOCUMENTS: [name: string, fetch: (c: NhlConnector, gameId: number) => Promise<JsonRecord>][] = [
  ['boxscore', (c, id) => c.getBoxscore(id)],
  ['linescore', (c, id) => c.getLinescore(id)],
];

export function registerNhlCommands(program: Command): void {
  const nhl = program
    .command('nhl')
    .description('NHL stats API exports: reference data, schedule, standings, players, games');

  for (const [name, description, fetch] of REFERENCE) {
    exportCommand(nhl, 'nhl', name, description)
      .action(async (opts: ExportOpts) => {
        const connector = connect(opts);
        await runExport('nhl', name, opts.out, () => fetch(connector));
      });
  }

  exportCommand(nhl, 'nhl', 'schedule', 'Export the games of one day')
    .requiredOption('--date <date>', 'Day (YYYY-MM-DD)', dateOption)
    .requiredOption('--game-type <code>', 'Game type code, e.g. R or P')
    .action(async (opts: ExportOpts & { date: Date; gameType: string }) => {
      const connector = connect(opts);
      await runExport('nhl', 'schedule', opts.out, () => connector.getSchedule(opts.date, opts.gameType), {
        date: isoDate(opts.date),
        gameType: opts.gameType,
      });
    });

  exportCommand(nhl, 'nhl', 'standings', 'Export league standings for a season')
    .requiredOption('--season <season>', 'Season, e.g. 20232024')
    .action(async (opts: ExportOpts & { season: string }) => {
      const connector = connect(opts);
      await runExport('nhl', 'standings', opts.out, () => connector.getStandings(opts.season), { season: opts.season });
    });

  exportCommand(nhl, 'nhl', 'person', 'Export one player')
    .requiredOption('--player-id <id>', 'Player id', intOption)
    .action(async (opts: ExportOpts & { playerId: number }) => {
      const connector = connect(opts);
      await runExport('nhl', 'person', opts.out, () => connector.getPerson(opts.playerId), { playerId: opts.playerId });
    });

  for (const [name, fetch] of GAME_DOCUMENTS) {
    withCredentials(nhl.command(`get-${name}`), 'nhl')
      .description(`Print the ${name} of one game as JSON`)
      .argument('<gameId>', 'Game id', intOption)
      .action(async (gameId: number, opts: CommandOpts) => {
        const connector = connect(opts);
        try {
          console.log(JSON.stringify(await fetch(connector, gameId), null, 2));
        } catch (err) {
          fail(err);
        }
      });
  }
}
