/**
 * Weather Collector — CSV Codec
 *
 * Minimal RFC 4180 reader/writer for the daily datasets. Quotes are
 * only significant at the start of a field; a stray quote inside an unquoted
 * field is kept literally. A closing quote must end its field.
 */

import { CsvParseError } from './errors';

export const LINE_TERMINATOR = '\r\n';

export function formatCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function formatCsvRow(values: readonly string[]): string {
    return values.map(formatCsvField).join(',') + LINE_TERMINATOR;
}

/**
 * Split CSV text into rows of cells. Blank lines are skipped.
 * Throws CsvParseError when a quoted field is never closed or is followed by
 * anything other than a delimiter or line break.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    let atFieldStart = true;
    let afterClosingQuote = false;
    let line = 1;
    let quoteLine = 1;

    const endRow = () => {
        row.push(field);
        if (!(row.length === 1 && row[0] === '')) {
            rows.push(row);
        }
        row = [];
        field = '';
        atFieldStart = true;
        afterClosingQuote = false;
    };

    for (let i = 0; i < text.length; i += 1) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i += 1;
                } else {
                    inQuotes = false;
                    afterClosingQuote = true;
                }
            } else {
                if (ch === '\n') line += 1;
                field += ch;
            }
            continue;
        }

        if (ch === '"' && atFieldStart) {
            inQuotes = true;
            atFieldStart = false;
            quoteLine = line;
        } else if (ch === ',') {
            row.push(field);
            field = '';
            atFieldStart = true;
            afterClosingQuote = false;
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && text[i + 1] === '\n') i += 1;
            endRow();
            line += 1;
        } else if (afterClosingQuote) {
            throw new CsvParseError('Unexpected text after closing quote', line);
        } else {
            field += ch;
            atFieldStart = false;
        }
    }

    if (inQuotes) {
        throw new CsvParseError('Unterminated quoted field', quoteLine);
    }
    if (field !== '' || row.length > 0) {
        endRow();
    }
    return rows;
}

export interface CsvTable {
    header: string[];
    records: Record<string, string>[];
}

/**
 * Decode CSV text into records keyed by the header row.
 * Short rows are padded with empty cells; surplus cells are dropped.
 */
export function readCsvRecords(text: string): CsvTable {
    const [header = [], ...body] = parseCsv(text);
    const records = body.map((cells) => {
        const record: Record<string, string> = {};
        header.forEach((name, index) => {
            record[name] = cells[index] ?? '';
        });
        return record;
    });
    return { header, records };
}
