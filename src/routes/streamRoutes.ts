import { Router, Request, Response } from 'express';
import type { configInterface } from '../config/config';
import { generateStreamUrls } from '../config/stream';
import { isValidLoopCount, StreamResult, StreamSnapshot } from '../models/streamState';
import type { StreamManager } from '../streamManager';
import { formatError, HTTP_STATUS_BY_KIND, InvalidRequestError, SupervisorError } from '../utils/errors';
import { LOG } from '../utils/logger';

export type UrlSettings = Pick<configInterface, 'publicHost' | 'rtspPort' | 'hlsBaseUrl'>;

export interface StreamView extends StreamSnapshot {
    rtspUrl: string;
    hlsUrl?: string;
}

/**
 * Reads the loop count from the query string or the body (JSON or form). Absent means "reuse the last one".
 */
export const parseLoopCount = (req: Request): number | undefined => {
    const body: unknown = req.body;
    const fromBody = typeof body === 'object' && body !== null && 'loop' in body ? body.loop : undefined;
    const raw: unknown = req.query.loop ?? fromBody;

    if (raw === undefined || raw === '') {
        return undefined;
    }

    let value = Number.NaN;
    if (typeof raw === 'number') {
        value = raw;
    } else if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) {
        value = Number(raw.trim());
    }

    if (!isValidLoopCount(value)) {
        throw new InvalidRequestError(`Invalid loop count "${String(raw)}": expected an integer >= -1`);
    }
    return value;
};

const sendError = (res: Response, error: unknown) => {
    if (error instanceof SupervisorError) {
        res.status(HTTP_STATUS_BY_KIND[error.kind]).json({
            success: false,
            message: error.message,
            error: { kind: error.kind, streamId: error.streamId }
        });
        return;
    }

    LOG.error(`Unexpected API error: ${formatError(error)}`);
    res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: { kind: 'Unknown' }
    });
};

const sendResults = (res: Response, results: StreamResult[]) => {
    const success = results.every(result => result.success);
    res.status(success ? 200 : 207).json({
        success,
        data: results,
        count: results.length
    });
};

export const createStreamRoutes = (manager: StreamManager, urls: UrlSettings): Router => {
    const router = Router();

    const view = (snapshot: StreamSnapshot): StreamView => {
        const { rtsp, hls } = generateStreamUrls(snapshot.id, urls);
        return { ...snapshot, rtspUrl: rtsp, hlsUrl: hls };
    };

    /**
     * GET /api/streams - List every known stream
     */
    router.get('/', (req: Request, res: Response) => {
        const streams = manager.list().map(view);
        res.json({
            success: true,
            data: streams,
            count: streams.length
        });
    });

    /**
     * POST /api/streams/start-all - Start every stopped stream
     */
    router.post('/start-all', async (req: Request, res: Response) => {
        try {
            const loopCount = parseLoopCount(req);
            sendResults(res, await manager.startAll(loopCount));
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * POST /api/streams/stop-all - Stop every running stream
     */
    router.post('/stop-all', async (req: Request, res: Response) => {
        try {
            sendResults(res, await manager.stopAll());
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * GET /api/streams/:id - One stream
     */
    router.get('/:id', (req: Request, res: Response) => {
        try {
            res.json({ success: true, data: view(manager.get(req.params.id)) });
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * POST /api/streams/:id/start?loop=N - Start a stream, no-op when already running
     */
    router.post('/:id/start', async (req: Request, res: Response) => {
        try {
            const loopCount = parseLoopCount(req);
            const snapshot = await manager.start(req.params.id, loopCount);
            res.json({ success: true, data: view(snapshot) });
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * POST /api/streams/:id/stop - Stop a stream, no-op when already stopped
     */
    router.post('/:id/stop', async (req: Request, res: Response) => {
        try {
            const snapshot = await manager.stop(req.params.id);
            res.json({ success: true, data: view(snapshot) });
        } catch (error) {
            sendError(res, error);
        }
    });

    return router;
};
