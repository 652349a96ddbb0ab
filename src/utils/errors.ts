export type ErrorKind =
  | 'NotFound'
  | 'NamingCollision'
  | 'ProcessSpawnFailure'
  | 'ProcessCrash'
  | 'WatcherFailure'
  | 'InvalidRequest';

export class SupervisorError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly streamId?: string,
  ) {
    super(message);
    this.name = `${kind}Error`;
  }
}

export class NotFoundError extends SupervisorError {
  constructor(streamId: string) {
    super('NotFound', `Stream not found: ${streamId}`, streamId);
  }
}

export class NamingCollisionError extends SupervisorError {
  constructor(
    streamId: string,
    readonly existingPath: string,
    readonly rejectedPath: string,
  ) {
    super('NamingCollision', `${rejectedPath} maps to stream "${streamId}" already owned by ${existingPath}`, streamId);
  }
}

export class ProcessSpawnError extends SupervisorError {
  constructor(streamId: string, reason: string) {
    super('ProcessSpawnFailure', `Failed to launch encoder for ${streamId}: ${reason}`, streamId);
  }
}

export class ProcessCrashError extends SupervisorError {
  constructor(streamId: string, reason: string) {
    super('ProcessCrash', `Encoder for ${streamId} exited unexpectedly: ${reason}`, streamId);
  }
}

export class WatcherError extends SupervisorError {
  constructor(directory: string, reason: string) {
    super('WatcherFailure', `Cannot watch ${directory}: ${reason}`);
  }
}

export class InvalidRequestError extends SupervisorError {
  constructor(message: string, streamId?: string) {
    super('InvalidRequest', message, streamId);
  }
}

export const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  NamingCollision: 409,
  ProcessSpawnFailure: 500,
  ProcessCrash: 500,
  WatcherFailure: 500,
  InvalidRequest: 400,
};

export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
