import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { formatTimestamp, LOG, morganStream, setLogLevel } from './logger';

describe('LOG', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should prefix messages with a timestamp and the level', () => {
    LOG.info('Now playing %s', 'sailboat');

    expect(console.log).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[INFO\] Now playing sailboat$/),
    );
  });

  it('should route each level to the matching console method', () => {
    setLogLevel('debug');
    LOG.error('e');
    LOG.warn('w');
    LOG.debug('d');

    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/\[ERROR\] e$/));
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/\[WARN\] w$/));
    expect(console.debug).toHaveBeenCalledWith(expect.stringMatching(/\[DEBUG\] d$/));
  });

  it('should drop messages below the configured level', () => {
    setLogLevel('warn');
    LOG.info('hidden');
    LOG.debug('hidden');
    LOG.warn('shown');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should prefix stream loggers with the stream id', () => {
    LOG.forStream('sailboat').info('Stopped stream');

    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/\[INFO\] \[sailboat\] Stopped stream$/));
  });

  it('should forward morgan lines without the trailing newline', () => {
    morganStream.write('GET /api/streams 200 1.234 ms - 2\n');

    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/\[INFO\] GET \/api\/streams 200 1\.234 ms - 2$/));
  });
});

describe('formatTimestamp', () => {
  it('should format local time with zero padding', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 9))).toBe('2024-01-05 03:04:09');
  });
});
