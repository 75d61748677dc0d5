import { CommanderError } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createProgram, parseMode, parseWidth } from './cli';
import { createLogger } from './logger';

const quietProgram = () => {
  const errors: string[] = [];
  const program = createProgram(createLogger({ write: () => true }, { write: () => true }))
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: (chunk) => errors.push(chunk) });
  return { program, errors };
};

const catchCommanderError = async (run: () => Promise<unknown>): Promise<CommanderError> => {
  try {
    await run();
  } catch (err) {
    if (err instanceof CommanderError) return err;
    throw err;
  }
  throw new Error('Expected the command to fail.');
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseWidth', () => {
  it('accepts positive integers', () => {
    expect(parseWidth('120')).toBe(120);
    expect(parseWidth('1')).toBe(1);
  });

  it.each(['0', '-4', '1.5', 'wide', '', '0x10', '1e2', ' 12 '])('rejects %j', (value) => {
    expect(() => parseWidth(value)).toThrow('Width must be a positive integer.');
  });
});

describe('parseMode', () => {
  it('accepts standard and edge', () => {
    expect(parseMode('standard')).toBe('standard');
    expect(parseMode('edge')).toBe('edge');
  });
});

describe('createProgram', () => {
  it('lists the width and mode options in its help', () => {
    const { program } = quietProgram();
    const help = program.helpInformation();
    expect(help).toContain('--width <columns>');
    expect(help).toContain('--mode <mode>');
  });

  it('fails with exit code 1 on an unknown mode', async () => {
    const { program, errors } = quietProgram();
    const err = await catchCommanderError(() =>
      program.parseAsync(['node', 'termascii', 'picture.png', '--mode', 'invalid'])
    );

    expect(err.exitCode).toBe(1);
    expect(err.message).toContain("Unknown mode 'invalid'. Use 'standard' or 'edge'.");
    expect(errors.join('')).toContain("Unknown mode 'invalid'");
  });

  it('fails with exit code 1 on a non-positive width', async () => {
    const { program } = quietProgram();
    const err = await catchCommanderError(() =>
      program.parseAsync(['node', 'termascii', 'picture.png', '--width', '0'])
    );

    expect(err.exitCode).toBe(1);
    expect(err.message).toContain('Width must be a positive integer.');
  });

  it('reports a missing image on stderr and exits with 1', async () => {
    const errLines: string[] = [];
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const program = createProgram(createLogger({ write: () => true }, { write: (chunk) => errLines.push(chunk) }))
      .exitOverride();
    const missing = 'no-such-dir/picture.png';

    await expect(program.parseAsync(['node', 'termascii', missing, '--width', '20'])).rejects.toThrow('exit 1');

    expect(exit).toHaveBeenCalledWith(1);
    expect(errLines).toHaveLength(1);
    expect(errLines[0]).toContain('ERROR');
    expect(errLines[0].endsWith(` Could not find image file "${missing}".\n`)).toBe(true);
  });

  it('requires an image argument', async () => {
    const { program } = quietProgram();
    const err = await catchCommanderError(() => program.parseAsync(['node', 'termascii']));
    expect(err.code).toBe('commander.missingArgument');
  });
});
