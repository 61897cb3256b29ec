import { describe, expect, it } from 'vitest';

import { runStackwatchCli } from './run-stackwatch-cli.js';
import { createMemoryCliIo } from './testing/memory-cli-io.js';

describe('runStackwatchCli', () => {
  it('registers the watch command', async () => {
    const io = createMemoryCliIo();

    const exitCode = await runStackwatchCli({
      argv: ['node', 'stackwatch', 'watch', '--help'],
      programName: 'stackwatch',
      version: '0.0.0-test',
      io,
    });

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toContain('Usage: stackwatch watch [options]');
    expect(io.stdoutBuffer).toContain('--template <path>');
  });

  it('prints the version', async () => {
    const io = createMemoryCliIo();

    const exitCode = await runStackwatchCli({
      argv: ['node', 'stackwatch', '--version'],
      programName: 'stackwatch',
      version: '1.2.3',
      io,
    });

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('1.2.3\n');
  });
});
