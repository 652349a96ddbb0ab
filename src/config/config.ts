import dotenv from 'dotenv';
import path from 'path';


dotenv.config();

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface configInterface {
    expressPort: number;
    videoDir: string;
    videoExtensions: string[];
    rtspHost: string;
    rtspPort: number;
    publicHost: string;
    hlsBaseUrl: string;
    ffmpegPath: string;
    encoderScript: string;
    stopGraceMs: number;
    watchDebounceMs: number;
    watchPolling: boolean;
    watchPollIntervalMs: number;
    reconcileIntervalMs: number;
    restartOnCrash: boolean;
    autoStart: boolean;
    waitForMediaServer: boolean;
    mediaServerTimeoutMs: number;
    logLevel: LogLevel;
}

export const DEFAULT_VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.mov', '.avi', '.webm', '.m4v', '.flv', '.ts', '.mpg', '.mpeg'];

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
    if (value === undefined || value.trim() === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

const parseExtensions = (value: string | undefined): string[] => {
    if (!value) return DEFAULT_VIDEO_EXTENSIONS;
    const extensions = value
        .split(',')
        .map(ext => ext.trim().toLowerCase())
        .filter(ext => ext.length > 0)
        .map(ext => ext.startsWith('.') ? ext : `.${ext}`);
    return extensions.length > 0 ? extensions : DEFAULT_VIDEO_EXTENSIONS;
};

const parseLogLevel = (value: string | undefined): LogLevel => {
    const level = (value || '').trim().toLowerCase();
    return LOG_LEVELS.find(candidate => candidate === level) || 'info';
};

/**
 * Builds the supervisor configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): configInterface => ({
    expressPort: Number(env.EXPRESS_PORT) || 8080,
    videoDir: path.resolve(env.VIDEO_DIR || './videos'),
    videoExtensions: parseExtensions(env.VIDEO_EXTENSIONS),
    rtspHost: env.RTSP_HOST || 'localhost',
    rtspPort: Number(env.RTSP_PORT) || 8554,
    publicHost: env.PUBLIC_HOST || 'localhost',
    hlsBaseUrl: (env.HLS_BASE_URL || '').replace(/\/+$/, ''),
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
    encoderScript: env.ENCODER_SCRIPT || '',
    stopGraceMs: Number(env.STOP_GRACE_MS) || 5000,
    watchDebounceMs: Number(env.WATCH_DEBOUNCE_MS) || 1000,
    watchPolling: parseBoolean(env.WATCH_POLLING, false),
    watchPollIntervalMs: Number(env.WATCH_POLL_INTERVAL_MS) || 2000,
    reconcileIntervalMs: Number(env.RECONCILE_INTERVAL_MS) || 30000,
    restartOnCrash: parseBoolean(env.RESTART_ON_CRASH, false),
    autoStart: parseBoolean(env.AUTO_START, true),
    waitForMediaServer: parseBoolean(env.WAIT_FOR_MEDIA_SERVER, true),
    mediaServerTimeoutMs: Number(env.MEDIA_SERVER_TIMEOUT_MS) || 60000,
    logLevel: parseLogLevel(env.LOG_LEVEL),
});

const config: configInterface = loadConfig();
export default config;
