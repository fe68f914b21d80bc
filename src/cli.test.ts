import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { main } from './cli.js';
import { BufferIo } from './io.js';

let dir: string;

const program = (name: string, source: string): string => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, source);
  return file;
};

const invoke = (args: string[], input = '') => {
  const io = new BufferIo(input);
  const log = vi.fn<(message: string) => void>();
  const code = main(args, io, log);
  return { code, io, log };
};

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bf-interp-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('main', () => {
  it('runs a program file and exits 0', () => {
    const { code, io, log } = invoke([program('hello.b', '++++++++[>++++++++<-]>+.+.')]);
    expect(code).toBe(0);
    expect(io.text).toBe('AB');
    expect(log).not.toHaveBeenCalled();
  });

  it('reports a located error and exits 1', () => {
    const { code, log } = invoke([program('left.b', '+\n <')]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith(
      'Error: TapePointerOutOfBounds: tape pointer out of range (underflow) (line 2, column 2)'
    );
  });

  it('keeps output written before the failure', () => {
    const { code, io } = invoke([program('partial.b', '+'.repeat(66) + '.<')]);
    expect(code).toBe(1);
    expect(io.text).toBe('B');
  });

  it('reports a missing path without a position', () => {
    const missing = path.join(dir, 'nope.b');
    const { code, log } = invoke([missing]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith(`Error: SourceReadFailure: path does not exist: ${missing}`);
  });

  it('refuses a directory', () => {
    const { code, log } = invoke([dir]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith(`Error: SourceReadFailure: target is not a file: ${dir}`);
  });

  it('requires a file argument', () => {
    const usage = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { code, log } = invoke([]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith('No input file specified');
    expect(usage).toHaveBeenCalledTimes(1);
    usage.mockRestore();
  });

  it('prints usage for --help', () => {
    const usage = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(invoke(['--help']).code).toBe(0);
    expect(usage).toHaveBeenCalledTimes(1);
    usage.mockRestore();
  });

  it('skips input newlines unless --raw-input is given', () => {
    const file = program('echo.b', ',.');
    expect(invoke([file], '\nx').io.text).toBe('x');
    expect(invoke(['--raw-input', file], '\nx').io.text).toBe('\n');
    expect(invoke(['-r', file], '\nx').io.text).toBe('\n');
  });

  it('aborts at --max-steps', () => {
    const { code, log } = invoke(['--max-steps', '5', program('spin.b', '+[]')]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith('Error: StepLimitExceeded: step limit of 5 reached (line 1, column 3)');
  });

  it('rejects a malformed step limit', () => {
    const { code, log } = invoke(['-s', 'many', program('any.b', '+')]);
    expect(code).toBe(1);
    expect(log).toHaveBeenCalledWith('Invalid step limit. Use a non-negative integer');
  });

  it('logs the execution time with --time', () => {
    const { code, log } = invoke(['-t', program('timed.b', '+')]);
    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\nExecution time: \d+\.\d{2}ms$/);
  });
});
