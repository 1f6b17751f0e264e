import type { Server } from 'http';

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Stops accepting connections, waits for in-flight requests, then runs `closers` in order. */
export async function drainAndClose(
  server: Server,
  closers: Array<() => Promise<void>> = [],
): Promise<void> {
  await closeServer(server);
  for (const close of closers) await close();
}
