import type { Command } from 'commander';
import { MailchimpConnector, MailchimpConfigSchema } from '../connectors/mailchimp.js';
import { createConnector, exportCommand, intOption, runExport, type ExportOpts } from './shared.js';

type PageOpts = ExportOpts & { perPage?: number };

function connect(opts: ExportOpts): MailchimpConnector {
  return createConnector('mailchimp', opts, MailchimpConfigSchema, (config, deps) => new MailchimpConnector(config, deps));
}

export function registerMailchimpCommands(program: Command): void {
  const mailchimp = program
    .command('mailchimp')
    .description('Mailchimp audience exports');

  exportCommand(mailchimp, 'mailchimp', 'lists', 'Export audiences (lists)')
    .option('--per-page <n>', 'Records per request', intOption)
    .action(async (opts: PageOpts) => {
      const connector = connect(opts);
      await runExport('mailchimp', 'lists', opts.out, () => connector.getLists({ perPage: opts.perPage }));
    });

  exportCommand(mailchimp, 'mailchimp', 'members', 'Export the members of one list')
    .requiredOption('--list-id <id>', 'List id')
    .option('--per-page <n>', 'Records per request', intOption)
    .action(async (opts: PageOpts & { listId: string }) => {
      const connector = connect(opts);
      await runExport('mailchimp', 'members', opts.out, () => connector.getListMembers(opts.listId, { perPage: opts.perPage }), {
        listId: opts.listId,
      });
    });
}
