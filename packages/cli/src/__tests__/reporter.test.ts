import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Chalk } from 'chalk';
import { pino } from 'pino';
import { MirrorEngine, MemoryRemoteStore, emptyRequest, memoryFile, memoryFolder } from '@cloudmirror/engine';
import { attachReporter, formatDecision, formatFailure, formatProgress } from '../utils/reporter.js';

describe('reporter', () => {
  describe('formatDecision', () => {
    it('should describe a skip', () => {
      expect(
        formatDecision({
          decision: 'skip',
          destinationPath: '/m/a.txt',
          exists: true,
          existingLocalSize: 10,
          expectedSize: 10,
        })
      ).toBe('[skip] /m/a.txt (size matches)');
    });

    it('should describe a resume with the bytes already on disk', () => {
      expect(
        formatDecision({
          decision: 'resume',
          destinationPath: '/m/big.bin',
          exists: true,
          existingLocalSize: 4,
          expectedSize: 10,
          rangeOffset: 4,
        })
      ).toBe('[resume] /m/big.bin (4/10 bytes)');
    });

    it('should describe a fresh download with and without a known size', () => {
      const base = {
        decision: 'fresh' as const,
        destinationPath: '/m/new.bin',
        exists: false,
        existingLocalSize: 0,
        oversized: false,
      };

      expect(formatDecision({ ...base, expectedSize: 42 })).toBe('[get ] /m/new.bin (42 bytes)');
      expect(formatDecision(base)).toBe('[get ] /m/new.bin');
    });
  });

  describe('formatProgress', () => {
    it('should show bytes and percentage', () => {
      expect(
        formatProgress({
          label: 'movie.mov',
          destinationPath: '/m/movie.mov',
          bytesWritten: 3_000_000,
          expectedSize: 4_000_000,
          percent: 75,
        })
      ).toBe('  movie.mov: 3000000/4000000 bytes (75.0%)');
    });
  });

  describe('formatFailure', () => {
    it('should include the error message', () => {
      expect(
        formatFailure({
          destinationPath: '/m/x.bin',
          decision: 'fresh',
          success: false,
          bytesWritten: 0,
          durationMs: 1,
          error: 'connection reset',
        })
      ).toBe('[fail] /m/x.bin: connection reset');
    });
  });

  describe('attachReporter', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudmirror-reporter-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should print skips and warn about oversized local copies', async () => {
      const store = new MemoryRemoteStore({
        drive: memoryFolder({
          'same.txt': memoryFile('abc'),
          'shrunk.txt': memoryFile('xyz'),
        }),
      });
      fs.writeFileSync(path.join(tmpDir, 'same.txt'), 'abc');
      fs.writeFileSync(path.join(tmpDir, 'shrunk.txt'), 'a much longer local copy');
      const engine = new MirrorEngine(
        {
          destination: tmpDir,
          resume: false,
          progress: false,
          ioErrorPolicy: 'abort',
          photosDirName: 'Photos',
        },
        pino({ level: 'silent' }),
        { drive: store }
      );
      const stdout: string[] = [];
      const stderr: string[] = [];
      attachReporter(engine, {
        log: (line) => stdout.push(line),
        error: (line) => stderr.push(line),
        color: new Chalk({ level: 0 }),
      });

      await engine.run(emptyRequest());

      expect(stdout).toEqual([
        'Mirroring drive root…',
        `[skip] ${path.join(tmpDir, 'same.txt')} (size matches)`,
        `[get ] ${path.join(tmpDir, 'shrunk.txt')} (3 bytes)`,
      ]);
      expect(stderr).toEqual(['  local copy is larger than remote (24 > 3); overwriting']);
    });
  });
});
