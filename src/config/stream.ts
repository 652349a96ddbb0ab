import config, { type configInterface } from './config'

export interface EncoderInvocation {
    id: string;
    sourcePath: string;
    loopCount: number;
}

export interface EncoderCommand {
    command: string;
    args: string[];
}

export type EncoderCommandBuilder = (invocation: EncoderInvocation) => EncoderCommand;

export const publishUrl = (id: string, cfg: Pick<configInterface, 'rtspHost' | 'rtspPort'> = config) =>
    `rtsp://${cfg.rtspHost}:${cfg.rtspPort}/${id}`;

// -stream_loop takes the same contract as loopCount: -1 forever, N extra playthroughs
export const FFMPEG_PIPELINE = (sourcePath: string, rtspUrl: string, loopCount: number) => [
    '-hide_banner',
    '-loglevel', 'error',        // Only report errors
    '-nostats',
    '-re',                       // Read input at native frame rate
    '-stream_loop', String(loopCount),
    '-i', sourcePath,
    '-c', 'copy',                // No re-encoding
    '-map', '0',
    '-f', 'rtsp',
    '-rtsp_transport', 'tcp',
    rtspUrl
]

/**
 * Command-line contract for the external encoder. With a relay script configured the
 * script receives `<sourcePath> <streamId> <loopCount>`, otherwise ffmpeg is called directly.
 */
export const createEncoderCommandBuilder = (
    cfg: Pick<configInterface, 'ffmpegPath' | 'encoderScript' | 'rtspHost' | 'rtspPort'> = config
): EncoderCommandBuilder => ({ id, sourcePath, loopCount }) => {
    if (cfg.encoderScript) {
        return { command: cfg.encoderScript, args: [sourcePath, id, String(loopCount)] };
    }
    return { command: cfg.ffmpegPath, args: FFMPEG_PIPELINE(sourcePath, publishUrl(id, cfg), loopCount) };
}

export const generateStreamUrls = (
    id: string,
    cfg: Pick<configInterface, 'publicHost' | 'rtspPort' | 'hlsBaseUrl'> = config
) => ({
    rtsp: `rtsp://${cfg.publicHost}:${cfg.rtspPort}/${id}`,
    hls: cfg.hlsBaseUrl ? `${cfg.hlsBaseUrl}/${id}/index.m3u8` : undefined,
});
