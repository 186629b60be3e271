import {
  type ProgressionNotification,
  TaskComplexity,
  calculateXP,
  errorMessage,
} from '@squadkit/core';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { type ProjectOption, openProject, parseInteger, parseNumber } from '../options.js';

interface LogOptions extends ProjectOption {
  failure?: boolean;
  xp?: number;
  complexity: TaskComplexity;
  quality?: number;
  duration?: number;
}

function parseComplexity(value: string): TaskComplexity {
  const parsed = TaskComplexity.safeParse(value.toLowerCase());
  if (!parsed.success) throw new InvalidArgumentError(`Expected one of: ${TaskComplexity.options.join(', ')}.`);
  return parsed.data;
}

function announce(n: ProgressionNotification): void {
  switch (n.type) {
    case 'achievement_unlocked':
      console.log(chalk.magenta(`  Achievement unlocked: ${String(n.payload.title)} (+${String(n.payload.xpReward)} XP)`));
      break;
    case 'level_up':
      console.log(chalk.green(`  Level up: ${String(n.payload.from)} -> ${String(n.payload.to)} (${String(n.payload.tier)})`));
      break;
    case 'xp_gained':
      break;
  }
}

export const logCommand = new Command('log')
  .description('Record a task outcome for a capability')
  .argument('<name>', 'Capability name')
  .argument('<task>', 'Task label')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('--failure', 'The task failed')
  .option('--xp <n>', 'Award exactly this much XP', parseInteger)
  .option('-c, --complexity <level>', 'simple, medium, complex or expert', parseComplexity, 'simple')
  .option('-q, --quality <0-1>', 'Quality rating of the result', parseNumber)
  .option('-d, --duration <seconds>', 'Time the task took', parseNumber)
  .option('-v, --verbose', 'Log ledger diagnostics')
  .action((name: string, task: string, opts: LogOptions) => {
    try {
      const kit = openProject(opts, { onNotify: announce });
      const success = !opts.failure;

      let baseXP: number;
      if (opts.xp !== undefined) {
        baseXP = opts.xp;
      } else {
        const { currentStreak } = kit.getProgress(name);
        baseXP = calculateXP({
          complexity: opts.complexity,
          quality: opts.quality,
          durationSeconds: opts.duration,
          streak: currentStreak,
          success,
        }).baseXP;
      }

      const result = kit.recordEvent({
        capabilityName: name,
        taskLabel: task,
        outcome: success ? 'success' : 'failure',
        baseXP,
      });

      const { progress } = result;
      const mark = success ? chalk.green('[x]') : chalk.red('[!]');
      console.log(`  ${mark} ${chalk.gray(`#${result.event.eventId}`)} ${chalk.bold(name)} +${baseXP} XP`);
      console.log(chalk.gray(`      Level ${progress.level} ${progress.tier}, ${progress.totalXP} XP total`));
      for (const f of result.failures) {
        console.log(chalk.yellow(`  Achievement "${f.achievementKey}" could not be evaluated: ${f.message}`));
      }
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
