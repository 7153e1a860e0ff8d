import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProgram } from '../src/cli.js';
import { createPrintCommand } from '../src/commands/print/index.js';
import { recordingSink, brokenSink } from './helpers/recording-sink.js';

beforeEach(() => {
  vi.stubEnv('SEQPRINT_DEBUG', '');
});

afterEach(() => {
  process.exitCode = undefined;
});

// ── default command ──

describe('seqprint', () => {
  it('prints the sequence with no arguments', async () => {
    const out = recordingSink();
    await createProgram(out.sink).parseAsync([], { from: 'user' });
    expect(out.text()).toBe('0\n1\n2\n');
  });

  it('reports success through the exit code', async () => {
    const out = recordingSink();
    await createProgram(out.sink).parseAsync(['node', 'seqprint']);
    expect(process.exitCode).toBe(0);
  });

  it('writes nothing to stderr under normal operation', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const out = recordingSink();
    await createProgram(out.sink).parseAsync([], { from: 'user' });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('produces identical output when run twice', async () => {
    const first = recordingSink();
    const second = recordingSink();
    await createProgram(first.sink).parseAsync([], { from: 'user' });
    await createProgram(second.sink).parseAsync([], { from: 'user' });
    expect(first.text()).toBe('0\n1\n2\n');
    expect(second.text()).toBe(first.text());
  });

  it('runs the print subcommand by name', async () => {
    const out = recordingSink();
    await createProgram(out.sink).parseAsync(['print'], { from: 'user' });
    expect(out.chunks).toEqual(['0\n', '1\n', '2\n']);
  });
});

// ── output faults ──

describe('print command with an unwritable output', () => {
  it('exits with status 1 and reports the fault on stderr', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    await expect(
      createPrintCommand(brokenSink()).parseAsync([], { from: 'user' }),
    ).rejects.toThrow('process.exit(1)');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('✗ Failed to write to output: EPIPE: broken pipe, write'),
    );
  });
});
