import type { Command } from 'commander';
import { YellowDogConnector, YellowDogConfigSchema } from '../connectors/yellow-dog.js';
import type { Table } from '../connectors/base/index.js';
import { createConnector, exportCommand, runExport, type ExportOpts } from './shared.js';

const RESOURCES: [name: string, description: string, fetch: (c: YellowDogConnector) => Promise<Table>][] = [
  ['items', 'Export inventory items', c => c.getItems()],
  ['recipes', 'Export recipes', c => c.getRecipes()],
  ['recipe-types', 'Export recipe types', c => c.getRecipeTypes()],
  ['dimensions', 'Export dimensions', c => c.getDimensions()],
];

export function registerYellowDogCommands(program: Command): void {
  const yd = program
    .command('yellow-dog')
    .description('Yellow Dog inventory exports');

  for (const [name, description, fetch] of RESOURCES) {
    exportCommand(yd, 'yellow-dog', name, description)
      .action(async (opts: ExportOpts) => {
        const connector = createConnector('yellow-dog', opts, YellowDogConfigSchema, (config, deps) => new YellowDogConnector(config, deps));
        await runExport('yellow-dog', name, opts.out, () => fetch(connector));
      });
  }
}
