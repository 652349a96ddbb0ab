import net from 'net';

export interface WaitForPortOptions {
  timeoutMs: number;
  intervalMs?: number;
  connectTimeoutMs?: number;
}

const probe = (host: string, port: number, connectTimeoutMs: number): Promise<boolean> =>
  new Promise(resolve => {
    const socket = net.connect({ host, port });
    const finish = (reachable: boolean) => {
      socket.destroy();
      resolve(reachable);
    };
    socket.setTimeout(connectTimeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });

/**
 * Polls until something accepts TCP connections on host:port.
 * Resolves false when the deadline passes first.
 */
export async function waitForPort(host: string, port: number, options: WaitForPortOptions): Promise<boolean> {
  const { timeoutMs, intervalMs = 1000, connectTimeoutMs = 1000 } = options;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    if (await probe(host, port, connectTimeoutMs)) {
      return true;
    }
    if (Date.now() + intervalMs > deadline) {
      return false;
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}
