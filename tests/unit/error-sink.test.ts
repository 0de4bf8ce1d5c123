import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ErrorSink } from '../../src/utils/error-sink.js';
import { OutputCollector } from '../helpers/fakes.js';

describe('ErrorSink', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'parallel-fuzz-sink-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes to the error stream only when no file is configured', async () => {
    const stream = new OutputCollector();
    const sink = new ErrorSink({ stream });

    await sink.write('FAILED: FuzzA in a_test.go (exit code 1)');

    expect(stream.text).toBe('FAILED: FuzzA in a_test.go (exit code 1)\n');
  });

  it('creates the error file and appends to it', async () => {
    const stream = new OutputCollector();
    const errorLogPath = path.join(tempDir, 'errors.log');
    const sink = new ErrorSink({ stream, errorLogPath });

    await sink.write('first\n');
    await sink.write('second\n');

    expect(fs.readFileSync(errorLogPath, 'utf-8')).toBe('first\nsecond\n');
    expect(stream.text).toBe('first\nsecond\n');
  });

  it('keeps existing file content', async () => {
    const errorLogPath = path.join(tempDir, 'errors.log');
    fs.writeFileSync(errorLogPath, 'earlier run\n');
    const sink = new ErrorSink({ stream: new OutputCollector(), errorLogPath });

    await sink.write('this run\n');

    expect(fs.readFileSync(errorLogPath, 'utf-8')).toBe('earlier run\nthis run\n');
  });

  it('keeps concurrent failures contiguous', async () => {
    const errorLogPath = path.join(tempDir, 'errors.log');
    const stream = new OutputCollector();
    const sink = new ErrorSink({ stream, errorLogPath });
    const first = `FAILED: FuzzA\n${'a'.repeat(200_000)}\n---\n`;
    const second = `FAILED: FuzzB\n${'b'.repeat(200_000)}\n---\n`;

    await Promise.all([sink.write(first), sink.write(second)]);

    expect(fs.readFileSync(errorLogPath, 'utf-8')).toBe(first + second);
    expect(stream.chunks).toEqual([first, second]);
  });

  it('rejects a failed append but keeps later writes going', async () => {
    const stream = new OutputCollector();
    const sink = new ErrorSink({
      stream,
      errorLogPath: path.join(tempDir, 'missing-dir', 'errors.log'),
    });

    await expect(sink.write('lost in file\n')).rejects.toThrow();
    await expect(sink.write('still on stderr\n')).rejects.toThrow();
    await sink.flush();

    expect(stream.text).toBe('lost in file\nstill on stderr\n');
  });
});
