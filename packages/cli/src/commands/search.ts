import { CapabilityCategory, type SearchFilters, errorMessage } from '@squadkit/core';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { type ProjectOption, openProject, parseInteger, parseList } from '../options.js';

interface SearchOptions extends ProjectOption {
  category?: CapabilityCategory;
  tech?: string[];
  text?: string;
  min?: number;
  max?: number;
}

function parseCategory(value: string): CapabilityCategory {
  const parsed = CapabilityCategory.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${CapabilityCategory.options.join(', ')}.`);
  }
  return parsed.data;
}

export const searchCommand = new Command('search')
  .description('Filter capabilities by category, tech stack, complexity or text')
  .option('-p, --project <path>', 'Project directory', '.')
  .option('-c, --category <category>', 'Category', parseCategory)
  .option('-t, --tech <tags>', 'Comma-separated tech tags, all required', parseList)
  .option('-q, --text <text>', 'Substring of name or summary')
  .option('--min <n>', 'Minimum complexity (1-5)', parseInteger)
  .option('--max <n>', 'Maximum complexity (1-5)', parseInteger)
  .action((opts: SearchOptions) => {
    try {
      const kit = openProject(opts);
      const filters: SearchFilters = {
        ...(opts.category ? { category: opts.category } : {}),
        ...(opts.tech ? { techStack: opts.tech } : {}),
        ...(opts.text ? { text: opts.text } : {}),
        complexity: { min: opts.min, max: opts.max },
      };
      const results = kit.search(filters);

      if (results.length === 0) {
        console.log(chalk.gray('  No capabilities match.'));
        return;
      }

      console.log();
      for (const d of results) {
        const tags = d.techStackTags.length > 0 ? chalk.cyan(` [${d.techStackTags.join(', ')}]`) : '';
        console.log(`  ${chalk.bold(d.name)} ${chalk.gray(`(${d.category}, complexity ${d.complexity})`)}${tags}`);
        console.log(chalk.gray(`    ${d.summary}`));
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
