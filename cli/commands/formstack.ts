import type { Command } from 'commander';
import { FormstackConnector, FormstackConfigSchema } from '../connectors/formstack.js';
import { createConnector, exportCommand, idListOption, intOption, runExport, type ExportOpts } from './shared.js';

function connect(opts: ExportOpts): FormstackConnector {
  return createConnector('formstack', opts, FormstackConfigSchema, (config, deps) => new FormstackConnector(config, deps));
}

export function registerFormstackCommands(program: Command): void {
  const formstack = program
    .command('formstack')
    .description('Formstack exports: forms, folders, submissions');

  exportCommand(formstack, 'formstack', 'forms', 'Export forms')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('formstack', 'forms', opts.out, () => connector.getForms());
    });

  exportCommand(formstack, 'formstack', 'folders', 'Export folders')
    .action(async (opts: ExportOpts) => {
      const connector = connect(opts);
      await runExport('formstack', 'folders', opts.out, () => connector.getFolders());
    });

  exportCommand(formstack, 'formstack', 'submissions', 'Export the submissions of one form')
    .requiredOption('--form-id <id>', 'Form id', intOption)
    .option('--min-time <time>', 'Only submissions after this time ("YYYY-MM-DD HH:mm:ss")')
    .action(async (opts: ExportOpts & { formId: number; minTime?: string }) => {
      const connector = connect(opts);
      await runExport('formstack', 'submissions', opts.out, () => connector.getFormSubmissions(opts.formId, { minTime: opts.minTime }), {
        formId: opts.formId,
        ...(opts.minTime ? { minTime: opts.minTime } : {}),
      });
    });

  exportCommand(formstack, 'formstack', 'folder-submissions', 'Export submissions of every form in a folder')
    .requiredOption('--folder-id <id>', 'Folder id', intOption)
    .option('--skip-form-ids <ids>', 'Comma-separated form ids to leave out', idListOption)
    .action(async (opts: ExportOpts & { folderId: number; skipFormIds?: number[] }) => {
      const connector = connect(opts);
      const skip = opts.skipFormIds ?? [];
      await runExport('formstack', 'folder-submissions', opts.out, () => connector.getAllSubmissionsInFolder(opts.folderId, skip), {
        folderId: opts.folderId,
        skipFormIds: skip,
      });
    });
}
