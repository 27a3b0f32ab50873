import { describe, it, expect } from 'vitest';
import { exitCodeFor, parseCliArgs, parseTimestamp } from '../src/cli.js';
import type { RunDefaults } from '../src/config/sources.js';
import { InvalidInputError, SourceUnavailableError } from '../src/errors.js';

const defaults: RunDefaults = {
  timezone: 'Asia/Seoul',
  bucketWidthHours: 4,
  metric: 'totalAmount',
  outputDir: 'output',
  queryDir: 'query',
  midFormatCheck: true,
};

describe('parseTimestamp', () => {
  it('reads dates and times in the source zone', () => {
    expect(parseTimestamp('2024-03-05', 'Asia/Seoul').toFormat('yyyy-MM-dd HH:mm:ss')).toBe('2024-03-05 00:00:00');
    expect(parseTimestamp('2024-03-05 08:30', 'Asia/Seoul').toFormat('HH:mm:ss')).toBe('08:30:00');
    expect(parseTimestamp('2024-03-05T08:30:15', 'Asia/Seoul').zoneName).toBe('Asia/Seoul');
  });
  it('rejects garbage', () => {
    expect(() => parseTimestamp('yesterday', 'Asia/Seoul')).toThrow(InvalidInputError);
  });
});

describe('parseCliArgs', () => {
  it('fills defaults', () => {
    const o = parseCliArgs(['--watchlist', 'mids.csv', '--start', '2024-03-05', '--end', '2024-03-06', '--width', '6'], defaults);
    expect(o).toMatchObject({ watchlist: 'mids.csv', width: 6, metric: 'totalAmount', outDir: 'output', topN: 20, formatCheck: true });
    expect(o.checkpoint).toBeUndefined();
  });
  it('turns the format check off', () => {
    const o = parseCliArgs(['-w', 'm.csv', '--start', '2024-03-05', '--end', '2024-03-06', '--skip-format-check'], defaults);
    expect(o.formatCheck).toBe(false);
  });
  it('rejects missing or unknown options', () => {
    expect(() => parseCliArgs(['--watchlist', 'm.csv', '--start', '2024-03-05'], defaults)).toThrow(InvalidInputError);
    expect(() => parseCliArgs(['--bogus'], defaults)).toThrow(InvalidInputError);
    expect(() => parseCliArgs(['-w', 'm', '--start', '2024-03-05', '--end', '2024-03-06', '--top', '0'], defaults)).toThrow('--top');
  });
});

describe('exitCodeFor', () => {
  it('maps error kinds to exit codes', () => {
    expect(exitCodeFor(new InvalidInputError('x'))).toBe(2);
    expect(exitCodeFor(new SourceUnavailableError('oracle', 'down'))).toBe(3);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
