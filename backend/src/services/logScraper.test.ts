import { describe, test, expect } from 'vitest';
import { extractPhaseDurations, withDefaultSubPhases, hasReadyMarker } from './logScraper';

const STARTUP_LOG = [
  'INFO 05-01 10:03:01 [core.py:58] Initializing a V1 LLM engine',
  'INFO 05-01 10:04:12 [default_loader.py:272] Loading weights took 41.27 seconds',
  'INFO 05-01 10:04:40 [backends.py:215] torch.compile takes 18.5 s in total',
  'INFO 05-01 10:05:02 [gpu_model_runner.py:1686] Graph capturing finished in 12 secs, took 0.45 GiB',
  'INFO:     Application startup complete.',
].join('\n');

describe('extractPhaseDurations', () => {
  test('extracts every known sub-phase', () => {
    expect(extractPhaseDurations(STARTUP_LOG)).toEqual({
      weightLoad: 41.27,
      compile: 18.5,
      graphCapture: 12,
    });
  });

  test('takes the first occurrence when a marker repeats', () => {
    const log = [
      'Loading weights took 30.10 seconds',
      'Loading weights took 99.90 seconds',
    ].join('\n');

    expect(extractPhaseDurations(log)).toEqual({ weightLoad: 30.1 });
  });

  test('is idempotent', () => {
    expect(extractPhaseDurations(STARTUP_LOG)).toEqual(extractPhaseDurations(STARTUP_LOG));
  });

  test('absent markers yield no entry', () => {
    const durations = extractPhaseDurations('INFO: Started server process');
    expect(durations).toEqual({});
    expect('compile' in durations).toBe(false);
  });

  test('empty log yields an empty mapping', () => {
    expect(extractPhaseDurations('')).toEqual({});
  });
});

describe('withDefaultSubPhases', () => {
  test('defaults missing sub-phases to 0', () => {
    expect(withDefaultSubPhases({ compile: 7.25 })).toEqual({ weightLoad: 0, compile: 7.25, graphCapture: 0 });
  });
});

describe('hasReadyMarker', () => {
  test('finds the startup marker anywhere in the log', () => {
    expect(hasReadyMarker(STARTUP_LOG, 'Application startup complete')).toBe(true);
    expect(hasReadyMarker('Loading weights took 1 seconds', 'Application startup complete')).toBe(false);
  });
});
