import type { IncomingMessage } from 'node:http';

/** Request failure that maps directly onto a response status. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

/** Read and parse a JSON request body of at most `limitBytes`. */
export async function readJsonBody(req: IncomingMessage, limitBytes: number): Promise<unknown> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limitBytes) {
    throw new HttpError(413, `Request body exceeds ${limitBytes} bytes`);
  }

  const chunks: Buffer[] = [];
  let received = 0;
  // Keep draining past the limit; leaving the loop early would destroy the socket before we can reply
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buf.length;
    if (received <= limitBytes) chunks.push(buf);
  }
  if (received > limitBytes) {
    throw new HttpError(413, `Request body exceeds ${limitBytes} bytes`);
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (text.trim() === '') {
    throw new HttpError(400, 'Request body is empty');
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(400, 'Request body is not valid JSON');
  }
}
