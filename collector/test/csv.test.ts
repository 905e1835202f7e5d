import { describe, it, expect } from 'vitest';
import { formatCsvRow, parseCsv, readCsvRecords } from '../csv';
import { CsvParseError } from '../errors';

describe('formatCsvRow', () => {
    it('quotes only when needed', () => {
        expect(formatCsvRow(['a', 'b,c', 'say "hi"', ''])).toBe('a,"b,c","say ""hi""",\r\n');
    });

    it('quotes embedded line breaks', () => {
        expect(formatCsvRow(['x\ny'])).toBe('"x\ny"\r\n');
    });
});

describe('parseCsv', () => {
    it('splits rows and skips blank lines', () => {
        const text = 'a,b\r\n1,"x, y"\r\n\r\n2,"he said ""hi"""\n';
        expect(parseCsv(text)).toEqual([
            ['a', 'b'],
            ['1', 'x, y'],
            ['2', 'he said "hi"']
        ]);
    });

    it('keeps line breaks inside quoted fields', () => {
        expect(parseCsv('a\n"line1\nline2"\n')).toEqual([['a'], ['line1\nline2']]);
    });

    it('accepts bare carriage returns and a missing final terminator', () => {
        expect(parseCsv('a,b\r1,2')).toEqual([['a', 'b'], ['1', '2']]);
    });

    it('keeps trailing empty fields', () => {
        expect(parseCsv('a,\n')).toEqual([['a', '']]);
    });

    it('treats quotes inside unquoted fields literally', () => {
        expect(parseCsv('ab"c,d')).toEqual([['ab"c', 'd']]);
    });

    it('rejects text after a closing quote', () => {
        const parse = () => parseCsv('x,y\n"ab"x,c\n');
        expect(parse).toThrow(CsvParseError);
        expect(parse).toThrow('Unexpected text after closing quote (line 2)');
        expect(() => parseCsv('"a" ,b')).toThrow(CsvParseError);
    });

    it('accepts a closing quote before a delimiter, line break or end of input', () => {
        expect(parseCsv('"a","b"\r\n"c"')).toEqual([['a', 'b'], ['c']]);
    });

    it('reads back a field that was already quoted when written', () => {
        expect(parseCsv(formatCsvRow(['"a, b"', 'z']))).toEqual([['"a, b"', 'z']]);
    });

    it('rejects an unterminated quoted field', () => {
        const parse = () => parseCsv('a,b\n1,"oops\n2,3');
        expect(parse).toThrow(CsvParseError);
        expect(parse).toThrow('Unterminated quoted field (line 2)');
    });

    it('returns no rows for empty text', () => {
        expect(parseCsv('')).toEqual([]);
    });
});

describe('readCsvRecords', () => {
    it('keys rows by header, padding and truncating', () => {
        expect(readCsvRecords('x,y\n1\n1,2,3')).toEqual({
            header: ['x', 'y'],
            records: [
                { x: '1', y: '' },
                { x: '1', y: '2' }
            ]
        });
    });

    it('handles empty input', () => {
        expect(readCsvRecords('')).toEqual({ header: [], records: [] });
    });
});
