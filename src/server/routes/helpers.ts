import { IncomingMessage, ServerResponse } from 'node:http';
import type { Writable } from 'node:stream';
import { URL } from 'node:url';

export type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

export function sendJson(res: ServerResponse, status: number, payload: unknown) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    req.on('data', chunk => {
      if (typeof chunk === 'string') {
        chunks.push(Buffer.from(chunk, 'utf8'));
      } else {
        chunks.push(chunk);
      }
    });

    req.on('end', () => {
      if (chunks.length === 0) {
        resolve({});
        return;
      }

      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }

      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', reject);
  });
}

/** Returns false once the client is gone or its buffer is full. */
export function writeEvent(res: Writable, event: string, payload: unknown): boolean {
  if (res.writableEnded || res.destroyed) {
    return false;
  }

  try {
    return res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
  } catch {
    return false;
  }
}
