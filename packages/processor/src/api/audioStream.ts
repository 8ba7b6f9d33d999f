import type { Context } from 'hono';
import { stream } from 'hono/streaming';
import { createReadStream, promises as fs } from 'fs';

export type ByteRange = { start: number; end: number };

/**
 * Parses a single `bytes=` range against a file size. `null` means no usable
 * Range header (serve the whole file); `'unsatisfiable'` maps to 416.
 */
export function parseRange(header: string | undefined, size: number): ByteRange | 'unsatisfiable' | null {
  if (!header) return null;

  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match || (match[1] === '' && match[2] === '')) {
    return null;
  }

  if (match[1] === '') {
    // suffix range: last N bytes
    const length = parseInt(match[2], 10);
    if (length === 0 || size === 0) return 'unsatisfiable';
    return { start: Math.max(size - length, 0), end: size - 1 };
  }

  const start = parseInt(match[1], 10);
  const end = match[2] === '' ? size - 1 : Math.min(parseInt(match[2], 10), size - 1);
  if (start >= size || end < start) {
    return 'unsatisfiable';
  }
  return { start, end };
}

export async function streamAudioFile(c: Context, filePath: string): Promise<Response> {
  const stats = await fs.stat(filePath);
  const fileSize = stats.size;
  const range = parseRange(c.req.header('Range'), fileSize);

  c.header('Accept-Ranges', 'bytes');
  c.header('Content-Type', 'audio/mpeg');
  c.header('Cache-Control', 'public, max-age=3600');

  if (range === 'unsatisfiable') {
    c.header('Content-Range', `bytes */${fileSize}`);
    return c.body(null, 416);
  }

  const { start, end } = range ?? { start: 0, end: fileSize - 1 };
  if (range) {
    c.status(206);
    c.header('Content-Range', `bytes ${start}-${end}/${fileSize}`);
  }
  c.header('Content-Length', String(fileSize === 0 ? 0 : end - start + 1));

  if (c.req.method === 'HEAD' || fileSize === 0) {
    return c.body(null);
  }

  return stream(c, async output => {
    const input = createReadStream(filePath, { start, end });
    output.onAbort(() => {
      input.destroy();
    });

    for await (const chunk of input) {
      if (chunk instanceof Uint8Array) {
        await output.write(chunk);
      }
    }
  }, async (error, output) => {
    console.error(`Streaming error for ${filePath}:`, error);
    await output.close();
  });
}
