import type { Command } from 'commander';
import chalk from 'chalk';
import { MetaConnector, MetaConfigSchema } from '../connectors/meta.js';
import type { Table, WriteReport } from '../connectors/base/index.js';
import {
  createConnector, exportCommand, fail, readRows, runExport, runWrite, withCredentials, type CommandOpts, type ExportOpts,
} from './shared.js';

type AudienceWrite = (c: MetaConnector, audienceId: string, users: Table) => Promise<WriteReport>;

const USER_WRITES: [name: string, description: string, write: AudienceWrite][] = [
  ['add-users', 'Add users to a custom audience', (c, id, users) => c.addAudienceUsers(id, users)],
  ['delete-users', 'Remove users from a custom audience', (c, id, users) => c.deleteAudienceUsers(id, users)],
  ['replace-users', 'Replace every user of a custom audience', (c, id, users) => c.replaceAudienceUsers(id, users)],
];

function connect(opts: CommandOpts): MetaConnector {
  return createConnector('meta', opts, MetaConfigSchema, (config, deps) => new MetaConnector(config, deps));
}

export function registerMetaCommands(program: Command): void {
  const meta = program
    .command('meta')
    .description('Meta custom audiences and lead ads');

  withCredentials(meta.command('create-audience'), 'meta')
    .description('Create a customer-file custom audience')
    .requiredOption('--name <text>', 'Audience name')
    .option('--description <text>', 'Audience description', '')
    .action(async (opts: CommandOpts & { name: string; description: string }) => {
      const connector = connect(opts);
      try {
        const audience = await connector.createAudience(opts.name, opts.description);
        console.log(chalk.green(`Audience created: ${String(audience.id)}`));
      } catch (err) {
        fail(err);
      }
    });

  withCredentials(meta.command('audience-info'), 'meta')
    .description('Print the status and size of an audience')
    .argument('<audienceId>', 'Audience id')
    .action(async (audienceId: string, opts: CommandOpts) => {
      const connector = connect(opts);
      try {
        console.log(JSON.stringify(await connector.getAudienceInfo(audienceId), null, 2));
      } catch (err) {
        fail(err);
      }
    });

  for (const [name, description, write] of USER_WRITES) {
    withCredentials(meta.command(name), 'meta')
      .description(`${description}; columns are Meta schema keys (EMAIL, PHONE, ...)`)
      .requiredOption('--audience-id <id>', 'Audience id')
      .requiredOption('-f, --file <path>', 'JSONL file, one user per line')
      .action(async (opts: CommandOpts & { audienceId: string; file: string }) => {
        const connector = connect(opts);
        const users = readRows(opts.file);
        await runWrite(`Uploading ${users.rows.length} users...`, () => write(connector, opts.audienceId, users));
      });
  }

  exportCommand(meta, 'meta', 'leadgen-forms', 'Export the lead forms of a page')
    .requiredOption('--page-id <id>', 'Page id')
    .action(async (opts: ExportOpts & { pageId: string }) => {
      const connector = connect(opts);
      await runExport('meta', 'leadgen-forms', opts.out, () => connector.getLeadgenForms(opts.pageId), { pageId: opts.pageId });
    });

  exportCommand(meta, 'meta', 'leads', 'Export the submissions of a lead form')
    .requiredOption('--form-id <id>', 'Lead form id')
    .action(async (opts: ExportOpts & { formId: string }) => {
      const connector = connect(opts);
      await runExport('meta', 'leads', opts.out, () => connector.getFormSubmissions(opts.formId), { formId: opts.formId });
    });

  withCredentials(meta.command('cache-token'), 'meta')
    .description('Exchange the access token for a long-lived one and store it')
    .action(async (opts: CommandOpts) => {
      const connector = connect(opts);
      try {
        await connector.cacheLongLivedToken();
        console.log(chalk.green('Long-lived token stored'));
      } catch (err) {
        fail(err);
      }
    });
}
