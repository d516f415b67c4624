import { MenderApiError } from '../errors.js';
import type { DecodedBody } from './types.js';

const TEXT_CONTENT_TYPES = ['text/', 'application/text'];
const BINARY_PREVIEW_BYTES = 32;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function isJsonContentType(contentType: string): boolean {
  return contentType.includes('application/json') || contentType.includes('+json');
}

function looksLikeJson(text: string): boolean {
  const trimmed = text.trim();
  return (trimmed.startsWith('{') || trimmed.startsWith('[')) && trimmed.length > 1;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

function tryDecodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return null;
  }
}

function hexPreview(bytes: Uint8Array): string {
  return Array.from(bytes.subarray(0, BINARY_PREVIEW_BYTES), (byte) => byte.toString(16).padStart(2, '0')).join('');
}

/**
 * Decodes raw response bytes. The declared content type is tried first; a
 * missing or misleading one falls back to sniffing (JSON, then UTF-8 text,
 * then binary).
 */
export function decodeBytes(bytes: Uint8Array, contentTypeHeader: string | null): DecodedBody {
  if (bytes.byteLength === 0) {
    return { format: 'empty' };
  }

  const contentType = (contentTypeHeader ?? '').toLowerCase();
  const text = tryDecodeUtf8(bytes);

  if (text !== null && !text.trim()) {
    return { format: 'empty' };
  }

  if (text !== null && isJsonContentType(contentType)) {
    const parsed = tryParseJson(text);
    if (parsed.ok) {
      return { format: 'json', value: parsed.value };
    }
  }

  if (text !== null && TEXT_CONTENT_TYPES.some((prefix) => contentType.includes(prefix))) {
    return { format: 'text', text };
  }

  if (text !== null && looksLikeJson(text)) {
    const parsed = tryParseJson(text);
    if (parsed.ok) {
      return { format: 'json', value: parsed.value };
    }
  }

  if (text !== null) {
    return { format: 'text', text };
  }

  return { format: 'binary', size: bytes.byteLength, preview: hexPreview(bytes) };
}

export async function decodeResponseBody(response: Response): Promise<DecodedBody> {
  const buffer = await response.arrayBuffer();
  return decodeBytes(new Uint8Array(buffer), response.headers.get('content-type'));
}

/**
 * Unwraps a body that must be JSON. An empty body yields `undefined`; text or
 * binary bodies on a JSON endpoint are reported as an invalid response.
 */
export function expectJson(body: DecodedBody): unknown {
  if (body.format === 'json') {
    return body.value;
  }
  if (body.format === 'empty') {
    return undefined;
  }
  throw new MenderApiError('INVALID_RESPONSE', 'Invalid response format from the Mender server.', {
    details: { format: body.format }
  });
}
