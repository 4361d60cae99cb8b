import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';
import { wantsJson } from '../../../src/cli/commands/shared.js';

describe('createCli', () => {
  it('should register the commands', () => {
    const program = createCli();

    expect(program.name()).toBe('switchboard');
    expect(program.commands.map((command) => command.name())).toEqual(['ask', 'analyze', 'tools']);
  });

  it('should expose the ask options', () => {
    const ask = createCli().commands.find((command) => command.name() === 'ask');

    expect(ask?.options.map((option) => option.long)).toEqual([
      '--session',
      '--json',
      '--verbose',
      '--offline',
      '--trace',
      '--evaluate',
    ]);
  });
});

describe('wantsJson', () => {
  it('should follow the configured output format when --json is absent', () => {
    expect(wantsJson({}, { outputFormat: 'json' })).toBe(true);
    expect(wantsJson({}, { outputFormat: 'text' })).toBe(false);
  });

  it('should let --json override the configured format', () => {
    expect(wantsJson({ json: true }, { outputFormat: 'text' })).toBe(true);
  });
});
