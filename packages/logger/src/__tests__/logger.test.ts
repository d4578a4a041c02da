import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';

const axiom = vi.hoisted(() => ({
  ingest: vi.fn(),
  flush: vi.fn(async () => {}),
  constructed: [] as unknown[],
}));

vi.mock('@axiomhq/js', () => ({
  Axiom: class {
    ingest = axiom.ingest;
    flush = axiom.flush;
    constructor(options: unknown) {
      axiom.constructed.push(options);
    }
  },
}));

import { log, flushLogs } from '../index';

describe('log', () => {
  beforeEach(() => {
    axiom.ingest.mockClear();
    axiom.flush.mockClear();
    axiom.constructed.length = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('writes one JSON line through the console method of the level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    log('info', 'BALLOT', 'round.created', { roundId: 0 }, {});
    log('warn', 'BALLOT', 'operation.rejected', { code: 'ALREADY_VOTED' }, {});

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry.level).toBe('info');
    expect(entry.component).toBe('BALLOT');
    expect(entry.event).toBe('round.created');
    expect(entry.roundId).toBe(0);
    expect(typeof entry.timestamp).toBe('string');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0])).code).toBe('ALREADY_VOTED');
  });

  test('drops entries below LOG_LEVEL', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    log('debug', 'REGISTRY', 'ignored', undefined, { LOG_LEVEL: 'warn' });
    log('info', 'REGISTRY', 'ignored', undefined, { LOG_LEVEL: 'warn' });
    log('error', 'REGISTRY', 'kept', undefined, { LOG_LEVEL: 'warn' });

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  test('falls back to info when LOG_LEVEL is not a known level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('debug', 'REGISTRY', 'ignored', undefined, { LOG_LEVEL: 'verbose' });
    log('info', 'REGISTRY', 'kept', undefined, { LOG_LEVEL: 'verbose' });

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  test('queues entries for Axiom when a token is configured', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const env = { AXIOM_TOKEN: 'test-token', AXIOM_DATASET: 'ballots-test' };

    log('info', 'BALLOT', 'vote.cast', { index: 2 }, env);
    log('info', 'BALLOT', 'vote.cast', { index: 1 }, env);
    await flushLogs();

    expect(axiom.constructed).toEqual([{ token: 'test-token', orgId: undefined }]);
    expect(axiom.ingest).toHaveBeenCalledTimes(2);
    expect(axiom.ingest.mock.calls[0][0]).toBe('ballots-test');
    expect(axiom.flush).toHaveBeenCalledTimes(1);
  });

  test('does not touch Axiom without a token', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    log('info', 'BALLOT', 'round.created', undefined, {});

    expect(axiom.ingest).not.toHaveBeenCalled();
  });
});
