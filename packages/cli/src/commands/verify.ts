import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject } from '../options.js';

export const verifyCommand = new Command('verify')
  .description('Check the ledger against its events')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('--rebuild', 'Recompute the ledger from its events when verification fails')
  .action((opts: ProjectOption & { rebuild?: boolean }) => {
    try {
      const kit = openProject(opts);
      const check = kit.verify();

      if (check.ok) {
        console.log(chalk.green('  Ledger OK'));
        return;
      }

      console.log(chalk.red(`  Ledger failed ${check.issues.length} checks:`));
      for (const issue of check.issues) console.log(chalk.red(`    - ${issue}`));

      if (!opts.rebuild) {
        console.log(chalk.gray('  Run with --rebuild to recompute it.'));
        process.exit(1);
      }

      const report = kit.rebuild();
      console.log(chalk.green(`  Rebuilt from ${report.source}: ${report.eventCount} events`));
      if (report.invalidEvents > 0) console.log(chalk.yellow(`    ${report.invalidEvents} invalid entries left out`));
      if (report.duplicateEventIds.length > 0) {
        console.log(chalk.yellow(`    duplicate ids dropped: ${report.duplicateEventIds.join(', ')}`));
      }
      if (report.preservedAs) console.log(chalk.gray(`    original kept at ${report.preservedAs}`));
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
