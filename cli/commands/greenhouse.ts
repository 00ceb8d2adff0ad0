import type { Command } from 'commander';
import { GreenhouseConnector, GreenhouseConfigSchema } from '../connectors/greenhouse.js';
import type { JsonRecord, QueryParams, Table } from '../connectors/base/index.js';
import { createConnector, exportCommand, fail, intOption, runExport, withCredentials, type CommandOpts, type ExportOpts } from './shared.js';

type ListFetch = (c: GreenhouseConnector, params: QueryParams) => Promise<Table>;
type OneFetch = (c: GreenhouseConnector, id: number) => Promise<JsonRecord>;

const LISTS: [name: string, fetch: ListFetch][] = [
  ['jobs', (c, p) => c.getAllJobs(p)],
  ['candidates', (c, p) => c.getAllCandidates(p)],
  ['applications', (c, p) => c.getAllApplications(p)],
  ['job-posts', (c, p) => c.getAllJobPosts(p)],
];

const SINGLES: [name: string, fetch: OneFetch][] = [
  ['job', (c, id) => c.getJob(id)],
  ['candidate', (c, id) => c.getCandidate(id)],
  ['application', (c, id) => c.getApplication(id)],
  ['job-post', (c, id) => c.getJobPost(id)],
];

function connect(opts: CommandOpts): GreenhouseConnector {
  return createConnector('greenhouse', opts, GreenhouseConfigSchema, (config, deps) => new GreenhouseConnector(config, deps));
}

export function registerGreenhouseCommands(program: Command): void {
  const greenhouse = program
    .command('greenhouse')
    .description('Greenhouse Harvest exports: jobs, candidates, applications, job posts');

  for (const [name, fetch] of LISTS) {
    exportCommand(greenhouse, 'greenhouse', name, `Export all ${name.replace('-', ' ')}`)
      .option('--per-page <n>', 'Records per page (max 500)', intOption)
      .option('--updated-after <time>', 'Only records updated after this ISO timestamp')
      .action(async (opts: ExportOpts & { perPage?: number; updatedAfter?: string }) => {
        const connector = connect(opts);
        const params: QueryParams = { per_page: opts.perPage, updated_after: opts.updatedAfter };
        await runExport('greenhouse', name, opts.out, () => fetch(connector, params));
      });
  }

  for (const [name, fetch] of SINGLES) {
    withCredentials(greenhouse.command(`get-${name}`), 'greenhouse')
      .description(`Print one ${name.replace('-', ' ')} as JSON`)
      .argument('<id>', 'Record id', intOption)
      .action(async (id: number, opts: CommandOpts) => {
        const connector = connect(opts);
        try {
          console.log(JSON.stringify(await fetch(connector, id), null, 2));
        } catch (err) {
          fail(err);
        }
      });
  }
}
