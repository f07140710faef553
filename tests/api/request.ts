import express from 'express';

export interface TestResponse {
  status: number;
  body: unknown;
}

/**
 * Serve the app on an ephemeral port for a single request. A string body
 * is sent as-is, anything else as JSON.
 */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
): Promise<TestResponse> {
  const server = app.listen(0);
  try {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
    const { port } = address;
    const init: RequestInit = { method, headers: { 'Content-Type': 'application/json' } };
    if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);

    const res = await fetch(`http://127.0.0.1:${port}${path}`, init);
    const json: unknown = await res.json();
    return { status: res.status, body: json };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

/** Read a nested field from a JSON body. */
export function field(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function stringField(value: unknown, ...path: Array<string | number>): string {
  const found = field(value, ...path);
  if (typeof found !== 'string') throw new Error(`Expected a string at ${path.join('.')}`);
  return found;
}
