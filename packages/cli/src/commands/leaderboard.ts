import { errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject, parsePositiveInteger } from '../options.js';

export const leaderboardCommand = new Command('leaderboard')
  .description('Top capabilities by XP')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('-n, --top <n>', 'How many to show', parsePositiveInteger, 10)
  .action((opts: ProjectOption & { top: number }) => {
    try {
      const kit = openProject(opts);
      const entries = kit.leaderboard(opts.top);

      if (entries.length === 0) {
        console.log(chalk.gray('  Nothing discovered or recorded yet.'));
        return;
      }

      console.log();
      for (const { rank, progress: p } of entries) {
        const line = `  ${String(rank).padStart(3)}. ${p.capabilityName.padEnd(28)} L${p.level} ${p.tier.padEnd(12)} ${p.totalXP} XP`;
        console.log(p.eventCount === 0 ? chalk.gray(line) : line);
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
