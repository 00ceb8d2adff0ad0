import type { Command } from 'commander';
import chalk from 'chalk';
import { GeminiConnector, GeminiConfigSchema } from '../connectors/gemini.js';
import { createConnector, fail, withCredentials, type CommandOpts } from './shared.js';

export function registerGeminiCommands(program: Command): void {
  const gemini = program
    .command('gemini')
    .description('Gemini text generation');

  withCredentials(gemini.command('generate'), 'gemini')
    .description('Generate text for a prompt and print it')
    .argument('<prompt>', 'Prompt text')
    .action(async (prompt: string, opts: CommandOpts) => {
      const connector = createConnector('gemini', opts, GeminiConfigSchema, (config, deps) => new GeminiConnector(config, deps));
      console.error(chalk.cyan(`\nAsking ${connector.model}...\n`));
      try {
        console.log(await connector.generateText(prompt));
      } catch (err) {
        fail(err);
      }
    });
}
