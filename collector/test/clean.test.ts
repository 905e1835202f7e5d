import { describe, it, expect } from 'vitest';
import { cleanRecord, cleanValue, stringifyUnknown } from '../clean';
import { FIELDNAMES } from '../types';

describe('cleanValue', () => {
    it('wraps text containing a comma in quotes', () => {
        expect(cleanValue('Sunny, hot')).toBe('"Sunny, hot"');
    });

    it('collapses doubled quotes', () => {
        expect(cleanValue('a ""quoted"" word')).toBe('"a "quoted" word"');
        expect(cleanValue('""""x""""')).toBe('x');
    });

    it('flattens line breaks and trims', () => {
        expect(cleanValue('  line1\nline2\r  ')).toBe('line1 line2');
        expect(cleanValue('a\r\nb')).toBe('a b');
    });

    it('removes backticks only from quoted values', () => {
        expect(cleanValue('use `code`, please')).toBe('"use code, please"');
        expect(cleanValue('use `code`')).toBe('use `code`');
    });

    it('renders scalars', () => {
        expect(cleanValue(null)).toBe('');
        expect(cleanValue(undefined)).toBe('');
        expect(cleanValue(true)).toBe('true');
        expect(cleanValue(false)).toBe('false');
        expect(cleanValue(42)).toBe('42');
        expect(cleanValue(3.5)).toBe('3.5');
        expect(cleanValue(10n)).toBe('10');
    });

    it('never throws on structured values', () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;

        expect(cleanValue({ a: 1 })).toBe('{"a":1}');
        expect(cleanValue([1, 2])).toBe('[1,2]');
        expect(cleanValue(cyclic)).toBe('[object Object]');
        expect(cleanValue(() => 1)).toBe('[object Function]');
        expect(cleanValue(Symbol('s'))).toBe('Symbol(s)');
    });
});

describe('stringifyUnknown', () => {
    it('keeps strings verbatim', () => {
        expect(stringifyUnknown(' "raw", text ')).toBe(' "raw", text ');
    });
});

describe('cleanRecord', () => {
    it('orders cells by schema, filling gaps and dropping unknown fields', () => {
        const cells = cleanRecord({ region: 'Miami_FL', timestamp: '2026-07-04 18:00:00', extra: 'ignored' });

        expect(cells).toHaveLength(FIELDNAMES.length);
        expect(cells[0]).toBe('2026-07-04 18:00:00');
        expect(cells[1]).toBe('Miami_FL');
        expect(cells.slice(2).every((cell) => cell === '')).toBe(true);
    });
});
