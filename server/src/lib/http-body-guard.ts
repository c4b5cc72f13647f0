import type { Context } from 'hono';

export type JsonBodyResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

/** 413 up front when the declared Content-Length already exceeds the limit. */
export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (!Number.isFinite(declared) || declared < 0) return null;
  return declared > maxBytes ? tooLarge(c, maxBytes) : null;
}

async function readBodyText(c: Context, maxBytes: number): Promise<{ ok: true; text: string } | { ok: false; response: Response }> {
  const stream = c.req.raw.body;
  if (!stream) return { ok: true, text: '' };

  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = '';
  try {
    for (let chunk = await reader.read(); !chunk.done; chunk = await reader.read()) {
      received += chunk.value.byteLength;
      if (received > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      text += decoder.decode(chunk.value, { stream: true });
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }
  return { ok: true, text: text + decoder.decode() };
}

/**
 * Read and parse a JSON body, counting the bytes actually received so a
 * missing or wrong Content-Length cannot bypass the limit. An empty body
 * parses as `{}`; malformed JSON is a 400.
 */
export async function readJsonBody(c: Context, maxBytes: number): Promise<JsonBodyResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415) };
  }

  const body = await readBodyText(c, maxBytes);
  if (!body.ok) return body;
  if (!body.text.trim()) return { ok: true, data: {} };

  try {
    return { ok: true, data: JSON.parse(body.text) };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }
}
