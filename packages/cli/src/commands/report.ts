import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject } from '../options.js';

export const reportCommand = new Command('report')
  .description('Registry and ledger summary')
  .option('-p, --project <path>', 'Project directory', '.')
  .action((opts: ProjectOption) => {
    try {
      const kit = openProject(opts);
      const report = kit.report();

      console.log(chalk.bold.white(`\n  ${report.registry.totalCapabilities} capabilities`));
      for (const { category, count } of report.registry.categories) {
        console.log(`    ${category.padEnd(16)} ${count}`);
      }

      console.log();
      console.log(chalk.white(`  Tech tags: ${report.registry.distinctTags} distinct`));
      console.log(chalk.cyan(`    ${report.registry.topTags.map((t) => `${t.tag} (${t.count})`).join(', ') || '(none)'}`));

      console.log();
      console.log(
        chalk.white(
          `  Ledger: ${report.ledgerEvents} events, ${report.trackedCapabilities} capabilities, ${report.totalXP} XP`,
        ),
      );
      if (report.scanWarnings > 0) {
        console.log(chalk.yellow(`  ${report.scanWarnings} scan warnings (see \`squadkit discover\`)`));
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
