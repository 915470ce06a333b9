import { describe, it, expect, beforeEach } from '@jest/globals';
import pino from 'pino';
import { createTimer } from '../../../../src/lib/logger';

describe('createTimer', () => {
  let lines: Array<Record<string, unknown>>;
  let logger: pino.Logger;
  let clock: number;
  const now = (): number => clock;

  beforeEach(() => {
    lines = [];
    clock = 1_000;
    logger = pino(
      { level: 'debug', base: undefined, timestamp: false },
      {
        write(line: string): void {
          lines.push(JSON.parse(line));
        },
      },
    );
  });

  it('should log the start with its context', () => {
    createTimer(logger, 'scan', { organization: 'acme' }, now);

    expect(lines).toEqual([{ level: 20, operation: 'scan', organization: 'acme', msg: 'Starting scan' }]);
  });

  it('should report elapsed time at each checkpoint', () => {
    const timer = createTimer(logger, 'scan', { organization: 'acme' }, now);
    clock = 1_250;

    expect(timer.checkpoint('listed', { repositories: 3 })).toBe(250);
    expect(lines[1]).toEqual({
      level: 20,
      operation: 'scan',
      stage: 'listed',
      elapsed_ms: 250,
      organization: 'acme',
      repositories: 3,
      msg: 'scan: listed after 250ms',
    });
  });

  it('should log completion at info level with the summary fields', () => {
    const timer = createTimer(logger, 'scan', {}, now);
    clock = 3_000;

    timer.end({ matches: 2 });

    expect(lines[1]).toEqual({
      level: 30,
      operation: 'scan',
      duration_ms: 2_000,
      matches: 2,
      msg: 'Completed scan in 2000ms',
    });
  });

  it('should log failures with the error attached', () => {
    const timer = createTimer(logger, 'scan', {}, now);
    clock = 1_500;

    timer.error(new Error('search failed'));
    timer.error('plain failure');

    expect(lines[1]).toMatchObject({
      level: 50,
      duration_ms: 500,
      err: { type: 'Error', message: 'search failed' },
      msg: 'Failed scan after 500ms',
    });
    expect(lines[2]).toMatchObject({ err: { message: 'plain failure' } });
  });
});
