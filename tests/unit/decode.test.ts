import { describe, expect, test } from 'vitest';

import { MenderApiError } from '../../src/errors.js';
import { decodeBytes, decodeResponseBody, expectJson } from '../../src/mender/decode.js';

const encoder = new TextEncoder();

describe('decodeBytes', () => {
  test('treats zero bytes and whitespace as empty', () => {
    expect(decodeBytes(new Uint8Array(), 'application/json')).toEqual({ format: 'empty' });
    expect(decodeBytes(encoder.encode('  \n\t'), null)).toEqual({ format: 'empty' });
  });

  test('parses JSON declared with a charset', () => {
    expect(decodeBytes(encoder.encode('{"id":"dev-1"}'), 'application/json; charset=utf-8')).toEqual({
      format: 'json',
      value: { id: 'dev-1' }
    });
  });

  test('falls back to text when declared JSON is malformed', () => {
    expect(decodeBytes(encoder.encode('{not json'), 'application/json')).toEqual({
      format: 'text',
      text: '{not json'
    });
  });

  test('keeps declared text as text even when it looks like JSON', () => {
    expect(decodeBytes(encoder.encode('[1,2]'), 'text/plain')).toEqual({ format: 'text', text: '[1,2]' });
  });

  test('sniffs JSON without a content type', () => {
    expect(decodeBytes(encoder.encode('[1,2]'), null)).toEqual({ format: 'json', value: [1, 2] });
  });

  test('decodes undeclared UTF-8 as text', () => {
    expect(decodeBytes(encoder.encode('2024-05-01 INFO ready'), 'application/octet-stream')).toEqual({
      format: 'text',
      text: '2024-05-01 INFO ready'
    });
  });

  test('reports invalid UTF-8 as binary with a hex preview', () => {
    expect(decodeBytes(new Uint8Array([0xff, 0xfe, 0x00, 0x01]), null)).toEqual({
      format: 'binary',
      size: 4,
      preview: 'fffe0001'
    });
  });

  test('limits the binary preview to 32 bytes', () => {
    const bytes = new Uint8Array(40).fill(0xff);
    const decoded = decodeBytes(bytes, null);

    expect(decoded).toEqual({ format: 'binary', size: 40, preview: 'ff'.repeat(32) });
  });
});

describe('decodeResponseBody', () => {
  test('reads the body and content type from a response', async () => {
    const response = new Response('{"ok":true}', { headers: { 'content-type': 'application/json' } });

    await expect(decodeResponseBody(response)).resolves.toEqual({ format: 'json', value: { ok: true } });
  });

  test('returns empty for a bodiless response', async () => {
    await expect(decodeResponseBody(new Response(null, { status: 204 }))).resolves.toEqual({ format: 'empty' });
  });
});

describe('expectJson', () => {
  test('unwraps JSON and maps empty to undefined', () => {
    expect(expectJson({ format: 'json', value: [1] })).toEqual([1]);
    expect(expectJson({ format: 'empty' })).toBeUndefined();
  });

  test('rejects text bodies', () => {
    const attempt = () => expectJson({ format: 'text', text: '<html></html>' });

    expect(attempt).toThrow(MenderApiError);
    expect(attempt).toThrow('Invalid response format from the Mender server.');
  });
});
