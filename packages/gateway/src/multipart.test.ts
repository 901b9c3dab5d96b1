/**
 * multipart/form-data parsing and download header tests.
 */

import { describe, it, expect } from 'vitest';
import { boundaryFrom, contentDisposition, parseMultipart } from './multipart.js';

const BOUNDARY = 'test-boundary-42';

function formBody(parts: string[]): Buffer {
  return Buffer.from(parts.map((p) => `--${BOUNDARY}\r\n${p}\r\n`).join('') + `--${BOUNDARY}--\r\n`, 'utf-8');
}

describe('boundaryFrom', () => {
  it('reads plain and quoted boundaries', () => {
    expect(boundaryFrom('multipart/form-data; boundary=abc123')).toBe('abc123');
    expect(boundaryFrom('multipart/form-data; boundary="a b;c"')).toBe('a b;c');
    expect(boundaryFrom('Multipart/Form-Data; charset=utf-8; boundary=xyz')).toBe('xyz');
  });

  it('returns null for other content types', () => {
    expect(boundaryFrom(undefined)).toBeNull();
    expect(boundaryFrom('application/json')).toBeNull();
    expect(boundaryFrom('multipart/form-data')).toBeNull();
  });
});

describe('parseMultipart', () => {
  it('separates text fields from files', () => {
    const body = formBody([
      'Content-Disposition: form-data; name="code"\r\n\r\nab12c',
      'Content-Disposition: form-data; name="file"; filename="report.pdf"\r\nContent-Type: application/pdf\r\n\r\n%PDF-1.4',
    ]);

    const form = parseMultipart(body, BOUNDARY);

    expect(form.fields.get('code')).toBe('ab12c');
    expect(form.files).toHaveLength(1);
    expect(form.files[0]?.field).toBe('file');
    expect(form.files[0]?.filename).toBe('report.pdf');
    expect(form.files[0]?.contentType).toBe('application/pdf');
    expect(form.files[0]?.data.toString('utf-8')).toBe('%PDF-1.4');
  });

  it('keeps binary content and embedded CRLFs intact', () => {
    const payload = Buffer.from([0x00, 0xff, 0x0d, 0x0a, 0x2d, 0x2d, 0x41]);
    const head = Buffer.from(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="blob.bin"\r\n\r\n`,
    );
    const tail = Buffer.from(`\r\n--${BOUNDARY}--\r\n`);

    const form = parseMultipart(Buffer.concat([head, payload, tail]), BOUNDARY);

    expect(form.files[0]?.data.equals(payload)).toBe(true);
  });

  it('decodes escaped quotes and line breaks in filenames', () => {
    const body = formBody([
      'Content-Disposition: form-data; name="file"; filename="résumé %22v2%22%0D%0a.pdf"\r\n\r\nx',
    ]);
    const form = parseMultipart(body, BOUNDARY);
    expect(form.files[0]?.filename).toBe('résumé "v2"\r\n.pdf');
  });

  it('leaves other percent sequences in filenames alone', () => {
    const body = formBody(['Content-Disposition: form-data; name="file"; filename="100%25 done.txt"\r\n\r\nx']);
    expect(parseMultipart(body, BOUNDARY).files[0]?.filename).toBe('100%25 done.txt');
  });

  it('reports an empty file part with zero bytes', () => {
    const body = formBody(['Content-Disposition: form-data; name="file"; filename=""\r\n\r\n']);
    const form = parseMultipart(body, BOUNDARY);
    expect(form.files[0]?.filename).toBe('');
    expect(form.files[0]?.data.length).toBe(0);
  });

  it('returns nothing for a body without the boundary', () => {
    const form = parseMultipart(Buffer.from('code=AB12C'), BOUNDARY);
    expect(form.fields.size).toBe(0);
    expect(form.files).toEqual([]);
  });

  it('stops at a truncated part', () => {
    const body = Buffer.from(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="code"\r\n\r\nAB12C\r\n--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="a.txt"\r\n\r\nhal`,
    );
    const form = parseMultipart(body, BOUNDARY);
    expect(form.fields.get('code')).toBe('AB12C');
    expect(form.files).toEqual([]);
  });
});

describe('contentDisposition', () => {
  it('quotes plain ASCII names', () => {
    expect(contentDisposition('report.pdf')).toBe(`attachment; filename="report.pdf"; filename*=UTF-8''report.pdf`);
  });

  it('adds an encoded name for non-ASCII and quotes', () => {
    expect(contentDisposition('résumé "v2".txt')).toBe(
      `attachment; filename="r_sum_ _v2_.txt"; filename*=UTF-8''r%C3%A9sum%C3%A9%20%22v2%22.txt`,
    );
  });
});
