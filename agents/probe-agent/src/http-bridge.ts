import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';

export type FetchHandler = (req: Request) => Promise<Response>;

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export async function toWebRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) value.forEach((v) => headers.append(key, v));
    else if (value !== undefined) headers.set(key, value);
  }

  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';
  return new Request(new URL(req.url ?? '/', origin), {
    method,
    headers,
    ...(hasBody ? { body: await readBody(req) } : {}),
  });
}

export async function sendWebResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.end(Buffer.from(await response.arrayBuffer()));
}

/** Serves a fetch-style handler from `node:http`. */
export function toRequestListener(
  handler: FetchHandler,
  opts: { origin: string; onError: (err: unknown) => void },
): RequestListener {
  return (req, res) => {
    toWebRequest(req, opts.origin)
      .then((request) => handler(request))
      .then((response) => sendWebResponse(res, response))
      .catch((err: unknown) => {
        opts.onError(err);
        if (!res.headersSent) {
          res.statusCode = 500;
          res.setHeader('content-type', 'application/json');
        }
        res.end(JSON.stringify({ ok: false, error: { code: 'AGENT_INTERNAL', message: 'internal error' } }));
      });
  };
}
