import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import type { SumRow } from '../sum/fields.js';
import { decodeAscii, openSum, readSum, splitLines } from '../sum/readSum.js';
import { expectSumError } from './expectSumError.js';

const SAMPLE_PATH = fileURLToPath(new URL('../../tests/fixtures/sample.sum', import.meta.url));
const SEP = '----------';

describe('decodeAscii', () => {
  it('decodes ASCII bytes, including from a subarray', () => {
    const bytes = Buffer.from('xxSTNNBR', 'ascii');
    expect(decodeAscii(bytes.subarray(2))).toBe('STNNBR');
  });

  it('rejects a byte above 0x7f', () => {
    const err = expectSumError(() => decodeAscii(Uint8Array.from([0x41, 0xe9, 0x42])));
    expect(err.code).toBe('INVALID_FORMAT');
    expect(err.message).toBe('non-ASCII input');
    expect(err.data).toEqual({ offset: 1 });
  });

  it('rejects a non-ASCII character in a string', () => {
    expect(expectSumError(() => decodeAscii('ab°')).data).toEqual({ offset: 2 });
  });
});

describe('splitLines', () => {
  it('handles LF, CRLF and CR', () => {
    expect(splitLines('a\nb\r\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('also breaks on vertical tab, form feed and the separator controls', () => {
    expect(splitLines('1\f2')).toEqual(['1', '2']);
    expect(splitLines('a\vb\x1cc\x1dd\x1ee\f')).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('does not add a line for a trailing break', () => {
    expect(splitLines('a\n\n')).toEqual(['a', '']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('readSum', () => {
  it('decodes a one-line body with a composite latitude', () => {
    const text = ['preheader', 'STNNBR CASTNO LATITUDE', SEP, '001  002  12 30.0 N', ''].join('\n');
    expect([...readSum(text)]).toEqual([{ stnnbr: '001', castno: '002', lat: 12.5 }]);
  });

  it('accepts CRLF files given as bytes', () => {
    const bytes = Buffer.from(`x\r\nSTNNBR CASTNO\r\n${SEP}\r\n1 2\r\n`, 'ascii');
    expect([...readSum(bytes)]).toEqual([{ stnnbr: '1', castno: '2' }]);
  });

  it('yields nothing for a header without records', () => {
    expect([...readSum(`x\nSTNNBR CASTNO LATITUDE\n${SEP}\n`)]).toEqual([]);
  });

  it('throws structural errors before returning the iterator', () => {
    const err = expectSumError(() => readSum(`x\nSTNNBR CASTNO\n${SEP}\n1 2 3\n`));
    expect(err.code).toBe('COLUMN_COUNT_MISMATCH');
    expect(err.data).toEqual({ expected: 2, found: 3 });
  });

  it('rejects non-ASCII input anywhere in the file', () => {
    const bytes = Buffer.concat([
      Buffer.from(`x\nSTNNBR\n${SEP}\n1\n`, 'ascii'),
      Uint8Array.from([0xff]),
    ]);
    expect(expectSumError(() => readSum(bytes)).code).toBe('INVALID_FORMAT');
  });

  it('skips columns declared empty without consuming tokens', () => {
    const text = `x\nSTNNBR BOTTLES CASTNO\n${SEP}\n1   2\n3   4\n`;
    expect([...readSum(text, { emptyCols: ['BOTTLES'] })]).toEqual([
      { stnnbr: '1', bottles: null, castno: '2' },
      { stnnbr: '3', bottles: null, castno: '4' },
    ]);
    expect(expectSumError(() => readSum(text)).data).toEqual({ expected: 3, found: 2 });
  });

  it('nulls a malformed coordinate without dropping the row', () => {
    const text = `x\nSTNNBR LATITUDE\n${SEP}\n1 12 30.0 N\n2 ab 30.0 N\n`;
    expect([...readSum(text)]).toEqual([
      { stnnbr: '1', lat: 12.5 },
      { stnnbr: '2', lat: null },
    ]);
  });

  it('hands a non-parameter token on to the comments', () => {
    const text = `x\nSTNNBR PARAMETERS COMMENTS\n${SEP}\n1 12,-3 note\n2 A1    note\n`;
    expect([...readSum(text)]).toEqual([
      { stnnbr: '1', parameters: '12,-3', comments: 'note' },
      { stnnbr: '2', parameters: null, comments: 'A1 note' },
    ]);
  });

  it('decodes rows lazily and can stop early', () => {
    const rows = readSum(`x\nSTNNBR\n${SEP}\n1\n2\n3\n`);
    expect(rows.next().value).toEqual({ stnnbr: '1' });
    expect(rows.next().value).toEqual({ stnnbr: '2' });
  });

  it('is single pass', () => {
    const rows = readSum(`x\nSTNNBR\n${SEP}\n1\n`);
    expect([...rows]).toHaveLength(1);
    expect([...rows]).toHaveLength(0);
  });
});

describe('readSum on a full cruise summary', () => {
  const bytes = fs.readFileSync(SAMPLE_PATH);

  it('resolves the layout, including the corrected depth column', () => {
    const { layout, slices, body } = openSum(bytes);
    expect(layout.fields).toEqual([
      'expocode', 'woce_sect', 'stnnbr', 'castno', 'type', 'date', 'time', 'event',
      'lat', 'lon', 'nav', 'depth', 'corrected_depth', 'height', 'wire', 'max_pressure',
      'bottles', 'parameters', 'comments',
    ]);
    expect(layout.markers).toEqual({ uncorrected: 88, corrected: 94 });
    expect(slices).toHaveLength(23);
    expect(body).toHaveLength(4);
  });

  it('yields one row per body line with the layout keys', () => {
    const { layout, rows } = openSum(bytes);
    const decoded = [...rows];
    expect(decoded).toHaveLength(4);
    for (const row of decoded) {
      expect(Object.keys(row)).toEqual(layout.fields);
    }
  });

  it('decodes the first record', () => {
    const decoded = [...readSum(bytes)];
    expect(decoded[0]).toBeDefined();
    const first: SumRow = decoded[0] ?? {};
    const { lat, lon, ...rest } = first;
    expect(lat).toBeCloseTo(-32.175, 10);
    expect(lon).toBeCloseTo(115.3375, 10);
    expect(rest).toEqual({
      expocode: 'TESTSHIP01',
      woce_sect: 'X01',
      stnnbr: '1',
      castno: '1',
      type: 'ROS',
      date: '011205',
      time: '0512',
      event: 'BE',
      nav: 'GPS',
      depth: '4400',
      corrected_depth: '4410',
      height: '10',
      wire: '4350',
      max_pressure: '4402',
      bottles: '36',
      parameters: '1-8,27',
      comments: 'test cast',
    });
  });

  it('keeps blank columns of a short line as empty strings', () => {
    const third = [...readSum(bytes)][2];
    expect(third?.event).toBe('EN');
    expect(third?.height).toBe('');
    expect(third?.bottles).toBe('');
    expect(third?.parameters).toBe('');
    expect(third?.comments).toBe('');
  });

  it('gives the same rows on every run', () => {
    expect([...readSum(bytes)]).toEqual([...readSum(bytes)]);
  });
});
