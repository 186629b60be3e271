import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject, parsePositiveInteger } from '../options.js';

export const recommendCommand = new Command('recommend')
  .description('Rank capabilities for a task and form a squad')
  .argument('<request...>', 'Free-text task description')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('--min-size <n>', 'Smallest squad', parsePositiveInteger)
  .option('--max-size <n>', 'Largest squad', parsePositiveInteger)
  .option('-v, --verbose', 'Log registry diagnostics')
  .action((request: string[], opts: ProjectOption & { minSize?: number; maxSize?: number }) => {
    try {
      const kit = openProject(opts);
      const { signature, squad } = kit.recommend(request.join(' '), {
        minSize: opts.minSize,
        maxSize: opts.maxSize,
      });

      console.log();
      console.log(
        chalk.white(`  ${signature.projectType}, complexity ${signature.complexity}`) +
          chalk.cyan(signature.inferredTechStack.length > 0 ? `  [${signature.inferredTechStack.join(', ')}]` : ''),
      );
      console.log();

      if (squad.members.length === 0) {
        console.log(chalk.gray('  No capabilities discovered. Check the search roots with `squadkit discover`.'));
        console.log();
        return;
      }

      for (const m of squad.members) {
        const level = m.level > 1 ? chalk.yellow(` L${m.level}`) : '';
        console.log(
          `  ${chalk.magenta(m.role.padEnd(12))} ${chalk.bold(m.descriptor.name)}${level} ${chalk.gray(m.score.toFixed(3))}`,
        );
      }

      console.log();
      console.log(chalk.white(`  Score: ${squad.aggregateScore.toFixed(3)}`));
      if (squad.synergies.length > 0) {
        const pairs = squad.synergies.map(([a, b]) => `${a} + ${b}`).join(', ');
        console.log(chalk.green(`  Synergy +${squad.synergyBonus}%: ${pairs} (adjusted ${squad.adjustedScore.toFixed(3)})`));
      }
      if (squad.undersized) {
        console.log(chalk.yellow(`  Only ${squad.members.length} candidates; squad is below the minimum size.`));
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
