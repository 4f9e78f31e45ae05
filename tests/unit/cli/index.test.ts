import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register every command', () => {
    const program = createCli();

    expect(program.name()).toBe('filequal');
    expect(program.commands.map((c) => c.name())).toEqual(['analyze', 'report', 'init', 'cache', 'watch']);
  });

  it('should report the package version', () => {
    expect(createCli().version()).toBe('1.0.0');
  });

  it('should expose cache subcommands', () => {
    const cache = createCli().commands.find((c) => c.name() === 'cache');

    expect(cache?.commands.map((c) => c.name())).toEqual(['stats', 'clear']);
  });
});
