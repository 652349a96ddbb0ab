import type { StreamProcess } from '../services/processRunner';
import type { ErrorKind } from '../utils/errors';

export type StreamStatus = 'running' | 'stopped';

/** Loop count contract: -1 repeats forever, 0 plays once, N plays N+1 times */
export const INFINITE_LOOP = -1;

export interface StreamRecord {
    readonly id: string;
    readonly sourcePath: string;
    status: StreamStatus;
    loopCount: number;
    process?: StreamProcess;
    startedAt?: Date;
    lastError?: string;
}

export interface StreamSnapshot {
    id: string;
    sourcePath: string;
    status: StreamStatus;
    loopCount: number;
    pid?: number;
    startedAt?: string;
    lastError?: string;
}

export interface StreamResult {
    id: string;
    success: boolean;
    status?: StreamStatus;
    error?: {
        kind: ErrorKind | 'Unknown';
        message: string;
    };
}

export const isValidLoopCount = (value: number): boolean =>
    Number.isInteger(value) && value >= INFINITE_LOOP;
