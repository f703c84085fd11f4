import type { IncomingMessage, ServerResponse } from 'node:http';

export const MAX_JSON_BODY_BYTES = 1 * 1024 * 1024;

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Closes the connection once the response is flushed, for requests whose
 * body is abandoned unread.
 */
export function closeAfterResponse(req: IncomingMessage, res: ServerResponse): void {
  const closeSocket = () => {
    const socket = req.socket;
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
  };
  req.pause();
  res.once('finish', closeSocket);
  res.once('close', closeSocket);
}

/**
 * Buffers and parses a JSON request body. Resolves `undefined` for an empty
 * body. On invalid JSON (400) or an oversized body (413) the error response
 * is written here and the promise resolves null.
 */
export function readJsonBody(
  req: IncomingMessage,
  res: ServerResponse,
  maxBytes: number = MAX_JSON_BODY_BYTES,
): Promise<unknown> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let settled = false;

    const cleanup = () => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
      req.off('aborted', onAborted);
    };

    const done = (value: unknown) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(value);
    };

    const rejectTooLarge = () => {
      if (!res.writableEnded) {
        sendJson(res, 413, { error: 'payload-too-large', message: `JSON body exceeds ${maxBytes} bytes` });
      }
      closeAfterResponse(req, res);
      done(null);
    };

    const onData = (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      totalBytes += buffer.length;
      if (totalBytes > maxBytes) {
        rejectTooLarge();
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = () => {
      if (settled) return;
      if (totalBytes === 0) {
        done(undefined);
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf8');
      try {
        done(JSON.parse(raw));
      } catch {
        if (!res.writableEnded) {
          sendJson(res, 400, { error: 'invalid-json', message: 'Request body is not valid JSON' });
        }
        done(null);
      }
    };

    const onError = () => {
      if (!res.writableEnded) {
        sendJson(res, 400, { error: 'invalid-json', message: 'Request body could not be read' });
      }
      done(null);
    };

    const onAborted = () => {
      done(null);
    };

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', onError);
    req.once('aborted', onAborted);
  });
}
