/**
 * Gatehouse - Request Body Snapshot
 * Bounded, best-effort copy of a request body for audit records.
 */

import type { IncomingMessage } from 'node:http';

export const TRUNCATED_MARKER = '...[truncated]';
export const UNAVAILABLE_MARKER = '[body unavailable]';

export interface BodySnapshotOptions {
  /** Maximum bytes kept; 0 disables snapshots */
  limit: number;
  timeoutMs: number;
}

type SnapshotSource = IncomingMessage & { body?: unknown };

function hasBody(req: IncomingMessage): boolean {
  const length = req.headers['content-length'];
  if (length !== undefined) {
    return parseInt(length, 10) > 0;
  }
  return req.headers['transfer-encoding'] !== undefined;
}

/**
 * Length of the longest prefix of `bytes`, at most `limit` long, that does
 * not end inside a multi-byte UTF-8 sequence.
 */
export function completePrefixLength(bytes: Uint8Array, limit: number): number {
  const end = Math.min(limit, bytes.length);
  let lead = end;
  while (lead > 0 && end - lead < 4 && ((bytes[lead - 1] ?? 0) & 0xc0) === 0x80) {
    lead--;
  }
  if (lead === 0) {
    return end;
  }

  const first = bytes[lead - 1] ?? 0;
  const width = first >= 0xf0 ? 4 : first >= 0xe0 ? 3 : first >= 0xc0 ? 2 : 1;
  return end - (lead - 1) >= width ? end : lead - 1;
}

function clip(text: string, limit: number): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= limit) {
    return text;
  }
  return bytes.subarray(0, completePrefixLength(bytes, limit)).toString('utf8') + TRUNCATED_MARKER;
}

/**
 * A body parser that already ran wins; otherwise the raw stream is read up
 * to `limit` bytes. Never rejects.
 */
export function captureBodySnapshot(
  req: SnapshotSource,
  options: BodySnapshotOptions
): Promise<string | undefined> {
  const { limit, timeoutMs } = options;

  if (limit <= 0) {
    return Promise.resolve(undefined);
  }

  if (req.body !== undefined) {
    const parsed = req.body;
    if (typeof parsed === 'string') {
      return Promise.resolve(clip(parsed, limit));
    }
    if (Buffer.isBuffer(parsed)) {
      return Promise.resolve(clip(parsed.toString('utf8'), limit));
    }
    try {
      return Promise.resolve(clip(JSON.stringify(parsed) ?? '', limit));
    } catch {
      return Promise.resolve(UNAVAILABLE_MARKER);
    }
  }

  if (!hasBody(req) || req.readableEnded || req.destroyed) {
    return Promise.resolve('');
  }

  return new Promise<string>((resolve) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const finish = (suffix: string): void => {
      clearTimeout(timer);
      req.removeListener('data', onData);
      req.removeListener('end', onEnd);
      req.removeListener('error', onError);
      const bytes = Buffer.concat(chunks);
      const kept = suffix === '' ? bytes : bytes.subarray(0, completePrefixLength(bytes, bytes.length));
      resolve(kept.toString('utf8') + suffix);
    };

    const onData = (chunk: Buffer | string): void => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      const room = limit - size;

      if (buffer.length > room) {
        const joined = Buffer.concat([...chunks, buffer]);
        chunks.splice(0, chunks.length, joined.subarray(0, completePrefixLength(joined, limit)));
        size = limit;
        finish(TRUNCATED_MARKER);
        return;
      }

      chunks.push(buffer);
      size += buffer.length;
    };

    const onEnd = (): void => finish('');
    const onError = (): void => finish(chunks.length > 0 ? TRUNCATED_MARKER : UNAVAILABLE_MARKER);

    const timer = setTimeout(() => finish(TRUNCATED_MARKER), timeoutMs);
    timer.unref();

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', onError);
  });
}
