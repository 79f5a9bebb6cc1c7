import type { Response } from 'express';

export const SSE_HEARTBEAT_MS = 15000;

export function formatSSE(event: unknown): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export interface EventStream {
  send(event: unknown): void;
  close(): void;
  isOpen(): boolean;
  onClose(listener: () => void): void;
}

/**
 * Switches the response to an event stream and keeps it alive with heartbeats.
 */
export function openEventStream(res: Response, heartbeatMs: number = SSE_HEARTBEAT_MS): EventStream {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no', // Disable nginx buffering
  });

  // Initial comment establishes the connection
  res.write(':ok\n\n');

  let open = true;
  const closeListeners: (() => void)[] = [];

  const markClosed = () => {
    if (!open) return;
    open = false;
    clearInterval(heartbeat);
    for (const listener of closeListeners) listener();
  };

  const write = (chunk: string) => {
    if (!open) return;
    try {
      res.write(chunk);
    } catch {
      markClosed();
    }
  };

  const heartbeat = setInterval(() => write(':heartbeat\n\n'), heartbeatMs);
  res.on('close', markClosed);

  return {
    send: (event) => write(formatSSE(event)),
    close: () => {
      if (!open) return;
      markClosed();
      res.end();
    },
    isOpen: () => open,
    onClose: (listener) => {
      closeListeners.push(listener);
    },
  };
}
