import { CommanderError, InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { leaderboardCommand } from '../commands/leaderboard.js';
import { parseInteger, parseList, parseNumber, parsePositiveInteger } from '../options.js';

describe('option parsers', () => {
  it('reads integers and rejects fractions', () => {
    expect(parseInteger('-3')).toBe(-3);
    expect(() => parseInteger('2.5')).toThrow(InvalidArgumentError);
  });

  it('rejects counts below one', () => {
    expect(parsePositiveInteger('1')).toBe(1);
    expect(parsePositiveInteger('25')).toBe(25);
    expect(() => parsePositiveInteger('0')).toThrow('"0" must be at least 1.');
    expect(() => parsePositiveInteger('-4')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInteger('abc')).toThrow('"abc" is not an integer.');
  });

  it('reads numbers and lists', () => {
    expect(parseNumber('0.75')).toBe(0.75);
    expect(() => parseNumber(' ')).toThrow(InvalidArgumentError);
    expect(parseList('Python, react,,SQL ')).toEqual(['python', 'react', 'sql']);
  });
});

describe('leaderboard', () => {
  it('refuses a zero --top before running', () => {
    const command = leaderboardCommand.exitOverride().configureOutput({ writeErr: () => {} });
    let caught: unknown;
    try {
      command.parse(['--top', '0'], { from: 'user' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CommanderError);
    expect(caught instanceof CommanderError && caught.code).toBe('commander.invalidArgument');
  });
});
