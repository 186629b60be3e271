#!/usr/bin/env tsx
import { Command } from 'commander';
import { discoverCommand } from './commands/discover.js';
import { initCommand } from './commands/init.js';
import { leaderboardCommand } from './commands/leaderboard.js';
import { logCommand } from './commands/log.js';
import { progressCommand } from './commands/progress.js';
import { recommendCommand } from './commands/recommend.js';
import { reportCommand } from './commands/report.js';
import { searchCommand } from './commands/search.js';
import { similarCommand } from './commands/similar.js';
import { verifyCommand } from './commands/verify.js';

const program = new Command();

program
  .name('squadkit')
  .description('Discover specialist descriptors, assemble squads and track their progression')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(discoverCommand);
program.addCommand(searchCommand);
program.addCommand(recommendCommand);
program.addCommand(logCommand);
program.addCommand(progressCommand);
program.addCommand(leaderboardCommand);
program.addCommand(similarCommand);
program.addCommand(reportCommand);
program.addCommand(verifyCommand);

program.parse();
