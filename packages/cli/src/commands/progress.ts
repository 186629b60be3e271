import { errorMessage, levelProgress } from '@squadkit/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { type ProjectOption, openProject } from '../options.js';

function bar(percent: number, width = 20): string {
  const filled = Math.round((percent / 100) * width);
  return chalk.green('#'.repeat(filled)) + chalk.gray('-'.repeat(width - filled));
}

export const progressCommand = new Command('progress')
  .description('Show level, streaks and achievements for a capability')
  .argument('<name>', 'Capability name')
  .option('-p, --project <path>', 'Project directory', '.')
  .action((name: string, opts: ProjectOption) => {
    try {
      const kit = openProject(opts);
      const p = kit.getProgress(name);
      const lp = levelProgress(p.totalXP, kit.levelTable);

      console.log(chalk.bold.white(`\n  ${name}`));
      console.log(`  Level ${chalk.yellow(String(p.level))} ${chalk.cyan(p.tier)}  ${p.totalXP} XP`);
      if (lp.nextThreshold === null) {
        console.log(`  ${bar(100)} max level`);
      } else {
        console.log(`  ${bar(lp.progressPercent)} ${lp.progressPercent}%  ${lp.xpToNext} XP to level ${p.level + 1}`);
      }
      console.log();

      const rate = p.eventCount === 0 ? '-' : `${Math.round(p.successRate * 100)}%`;
      console.log(chalk.white('  Tasks:'));
      console.log(
        `    ${chalk.green(String(p.successCount))} success  ${chalk.red(String(p.failureCount))} failure  ` +
          `${rate} rate  streak ${p.currentStreak} (best ${p.bestStreak})`,
      );

      console.log();
      console.log(chalk.white('  Achievements:'));
      if (p.unlockedAchievements.length === 0) {
        console.log(chalk.gray('    (none)'));
      } else {
        for (const key of p.unlockedAchievements) console.log(chalk.magenta(`    * ${key}`));
      }
      if (p.lastEventAt) console.log(chalk.gray(`\n  Last active ${p.lastEventAt}`));
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
