import { InvalidArgumentError, type Command } from 'commander';
import {
  BlinkfireConnector, BlinkfireConfigSchema, STREAMING_MEDIUMS, isStreamingMedium, type StreamingMedium,
} from '../connectors/blinkfire.js';
import { isoDate, type Table } from '../connectors/base/index.js';
import { createConnector, dateOption, daysBetween, exportCommand, intOption, runExport, type ExportOpts } from './shared.js';

function connect(opts: ExportOpts): BlinkfireConnector {
  return createConnector('blinkfire', opts, BlinkfireConfigSchema, (config, deps) => new BlinkfireConnector(config, deps));
}

type RangeOpts = ExportOpts & { from: Date; to: Date };

function mediumOption(value: string): StreamingMedium {
  if (!isStreamingMedium(value)) throw new InvalidArgumentError(`Expected one of ${STREAMING_MEDIUMS.join(', ')}.`);
  return value;
}

/** Export command over each day of --from..--to. */
function rangeCommand(parent: Command, name: string, description: string): Command {
  return exportCommand(parent, 'blinkfire', name, description)
    .requiredOption('--from <date>', 'First day (YYYY-MM-DD)', dateOption)
    .requiredOption('--to <date>', 'Last day (YYYY-MM-DD)', dateOption);
}

type RangeFetch = (c: BlinkfireConnector, dates: Date[]) => Promise<Table>;

function exportRange(name: string, opts: RangeOpts, fetch: RangeFetch, extra: Record<string, unknown> = {}): Promise<void> {
  const connector = connect(opts);
  return runExport('blinkfire', name, opts.out, () => fetch(connector, daysBetween(opts.from, opts.to)), {
    from: isoDate(opts.from),
    to: isoDate(opts.to),
    ...extra,
  });
}

const DAILY: [name: string, description: string, fetch: RangeFetch][] = [
  ['demographics-channel', 'Export channel demographics per medium for each day', (c, d) => c.getDemographicsChannel(d)],
  ['demographics-entity', 'Export entity demographics for each day', (c, d) => c.getDemographicsEntity(d)],
  ['demographics-viewers', 'Export viewership demographics by channel for each day', (c, d) => c.getDemographicsViewers(d)],
  ['global-ranking', 'Export the global ranking report against the entity group', (c, d) => c.getGlobalRankingReport(d)],
  ['assets', 'Export the asset report, one row per asset', (c, d) => c.getAssetReport(d)],
  ['sponsorship', 'Export the sponsorship report', (c, d) => c.getSponsorshipReport(d)],
  ['daily-engagement', 'Export daily engagement, one row per game day and medium', (c, d) => c.getDailyEngagementReport(d)],
  ['scene-value', 'Export the scene value report, one row per scene', (c, d) => c.getSceneValueReport(d)],
];

export function registerBlinkfireCommands(program: Command): void {
  const blinkfire = program
    .command('blinkfire')
    .description('Blinkfire social analytics exports');

  exportCommand(blinkfire, 'blinkfire', 'teams', 'Export the teams of the entity')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('blinkfire', 'teams', opts.out, () => connector.getTeams());
    });

  exportCommand(blinkfire, 'blinkfire', 'venues', 'Export venues, tagged with their team')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('blinkfire', 'venues', opts.out, () => connector.getVenues());
    });

  const cursorLists = [
    ['brands', 'Export sponsor brands'],
    ['people', 'Export people'],
    ['insights', 'Export delivered insights'],
  ] as const;

  for (const [name, description] of cursorLists) {
    exportCommand(blinkfire, 'blinkfire', name, description)
      .option('--limit <n>', 'Records per page', intOption)
      .action(async (opts: ExportOpts & { limit?: number }) => {
        const connector = connect(opts);
        const list = { limit: opts.limit };
        await runExport('blinkfire', name, opts.out, () => {
          switch (name) {
            case 'brands': return connector.getBrands(list);
            case 'people': return connector.getPeople(list);
            case 'insights': return connector.getDeliveredInsights(list);
          }
        });
      });
  }

  rangeCommand(blinkfire, 'audiences', 'Export audience channels for each day of a range')
    .action((opts: RangeOpts) => exportRange('audiences', opts, (c, dates) => c.getAudiences(dates)));

  for (const [name, description, fetch] of DAILY) {
    rangeCommand(blinkfire, name, description).action((opts: RangeOpts) => exportRange(name, opts, fetch));
  }

  rangeCommand(blinkfire, 'streaming', 'Export a streaming platform report')
    .requiredOption('--medium <medium>', STREAMING_MEDIUMS.join(' | '), mediumOption)
    .action((opts: RangeOpts & { medium: StreamingMedium }) =>
      exportRange('streaming', opts, (c, dates) => c.getStreamingReport(dates, opts.medium), { medium: opts.medium }));

  rangeCommand(blinkfire, 'custom-report', 'Export a saved custom report')
    .requiredOption('--report-id <id>', 'Custom report id')
    .action((opts: RangeOpts & { reportId: string }) =>
      exportRange('custom-report', opts, (c, dates) => c.getCustomReport(dates, opts.reportId), { reportId: opts.reportId }));

  const postLists = [
    ['posts', 'Export posts of the entity, following cursors for each day'],
    ['sponsorship-posts', 'Export sponsorship post totals, following cursors for each day'],
  ] as const;

  for (const [name, description] of postLists) {
    rangeCommand(blinkfire, name, description)
      .option('--limit <n>', 'Records per page', intOption)
      .action((opts: RangeOpts & { limit?: number }) => exportRange(name, opts, (c, dates) => (name === 'posts'
        ? c.getPosts(dates, { limit: opts.limit })
        : c.getSponsorshipPosts(dates, { limit: opts.limit }))));
  }
}
