import path from 'path';
import { describe, expect, it } from 'vitest';

import { DEFAULT_VIDEO_EXTENSIONS, loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      expressPort: 8080,
      videoDir: path.resolve('./videos'),
      videoExtensions: DEFAULT_VIDEO_EXTENSIONS,
      rtspHost: 'localhost',
      rtspPort: 8554,
      publicHost: 'localhost',
      hlsBaseUrl: '',
      ffmpegPath: 'ffmpeg',
      encoderScript: '',
      stopGraceMs: 5000,
      watchDebounceMs: 1000,
      watchPolling: false,
      watchPollIntervalMs: 2000,
      reconcileIntervalMs: 30000,
      restartOnCrash: false,
      autoStart: true,
      waitForMediaServer: true,
      mediaServerTimeoutMs: 60000,
      logLevel: 'info',
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      EXPRESS_PORT: '9080',
      VIDEO_DIR: '/srv/videos',
      VIDEO_EXTENSIONS: 'MP4, mkv ,.webm',
      RTSP_PORT: '18554',
      PUBLIC_HOST: 'samples',
      HLS_BASE_URL: 'http://samples:8888/',
      RESTART_ON_CRASH: 'yes',
      AUTO_START: 'false',
      WATCH_POLLING: '1',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.expressPort).toBe(9080);
    expect(config.videoDir).toBe('/srv/videos');
    expect(config.videoExtensions).toEqual(['.mp4', '.mkv', '.webm']);
    expect(config.rtspPort).toBe(18554);
    expect(config.publicHost).toBe('samples');
    expect(config.hlsBaseUrl).toBe('http://samples:8888');
    expect(config.restartOnCrash).toBe(true);
    expect(config.autoStart).toBe(false);
    expect(config.watchPolling).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('should ignore values it cannot parse', () => {
    const config = loadConfig({ RTSP_PORT: 'abc', LOG_LEVEL: 'verbose', VIDEO_EXTENSIONS: ' , ' });

    expect(config.rtspPort).toBe(8554);
    expect(config.logLevel).toBe('info');
    expect(config.videoExtensions).toEqual(DEFAULT_VIDEO_EXTENSIONS);
  });
});
