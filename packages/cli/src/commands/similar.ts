import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject, parsePositiveInteger } from '../options.js';

export const similarCommand = new Command('similar')
  .description('Capabilities that overlap with the given one')
  .argument('<name>', 'Capability name')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('-n, --limit <n>', 'How many to show', parsePositiveInteger, 5)
  .action((name: string, opts: ProjectOption & { limit: number }) => {
    try {
      const kit = openProject(opts);
      const similar = kit.similar(name, opts.limit);

      if (similar.length === 0) {
        console.log(chalk.gray(`  Nothing similar to ${name}.`));
        return;
      }
      console.log();
      for (const s of similar) {
        console.log(`  ${chalk.bold(s.descriptor.name.padEnd(28))} ${chalk.gray(s.descriptor.category)} ${s.similarity}`);
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
