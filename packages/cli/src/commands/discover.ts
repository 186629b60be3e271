import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { openProject, type ProjectOption } from '../options.js';

export const discoverCommand = new Command('discover')
  .description('Scan the search roots and list what was found')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('-f, --force', 'Ignore the cache and re-scan')
  .option('-v, --verbose', 'Log every skipped file and override')
  .action((opts: ProjectOption & { force?: boolean }) => {
    try {
      const kit = openProject(opts);
      const { index, warnings } = kit.discover({ force: opts.force });

      console.log();
      console.log(chalk.white(`  ${index.size} capabilities from ${kit.registry.searchRoots.length} roots`));
      for (const category of index.categories()) {
        const names = index.search({ category }).map((d) => d.name);
        console.log(`  ${chalk.cyan(category.padEnd(16))} ${names.join(', ')}`);
      }

      if (warnings.length > 0) {
        console.log();
        console.log(chalk.yellow(`  ${warnings.length} warnings:`));
        for (const w of warnings) {
          console.log(chalk.yellow(`    [${w.kind}] ${w.message}`));
        }
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
