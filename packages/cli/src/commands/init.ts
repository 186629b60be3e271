import { resolve } from 'node:path';
import { SQUADKIT_DIR, SquadKit, errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';

export const initCommand = new Command('init')
  .description('Create .squadkit/ with a default config')
  .option('-p, --project <path>', 'Project directory', '.')
  .action((opts: { project: string }) => {
    const root = resolve(opts.project);

    try {
      const kit = SquadKit.init(root);
      console.log(chalk.green('Project initialized:'), chalk.bold(root));
      console.log(chalk.gray(`  Config: ${root}/${SQUADKIT_DIR}/config.json`));
      console.log(chalk.gray(`  Search roots (lowest priority first):`));
      for (const r of kit.registry.searchRoots) {
        console.log(chalk.gray(`    ${r}`));
      }
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
