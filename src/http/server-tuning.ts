import type { Server } from 'node:net';

import { logWarn } from '../services/logger.js';

const DROP_LOG_INTERVAL_MS = 10_000;

/**
 * Caps concurrent connections through `server.maxConnections` and logs the
 * connections Node drops at the cap, at most once per interval.
 */
export function applyConnectionLimit(
  server: Server,
  maxConnections: number,
  now: () => number = Date.now
): void {
  if (!Number.isInteger(maxConnections) || maxConnections <= 0) return;

  server.maxConnections = maxConnections;

  let lastLoggedAt = Number.NEGATIVE_INFINITY;
  let droppedSinceLastLog = 0;

  server.on('drop', (data) => {
    droppedSinceLastLog += 1;
    const current = now();
    if (current - lastLoggedAt < DROP_LOG_INTERVAL_MS) return;

    logWarn('Incoming connection dropped (maxConnections reached)', {
      maxConnections,
      dropped: droppedSinceLastLog,
      remoteAddress: data?.remoteAddress,
    });

    lastLoggedAt = current;
    droppedSinceLastLog = 0;
  });
}
