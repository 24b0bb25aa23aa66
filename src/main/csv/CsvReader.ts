import { ParseError } from '../utils/errors';
import { LineReader } from '../text/LineReader';

export interface CsvRow {
  fields: string[];
  /** 1-based line on which the row starts */
  line: number;
}

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

const QUOTE = '"';
const SEPARATOR = ',';

/**
 * RFC 4180 reader: quoted fields may hold separators, doubled quotes and
 * line breaks. Blank lines are skipped; header names are trimmed.
 */
export class CsvReader {
  /** @throws ParseError for a missing header or an unterminated quoted field */
  static parse(content: string | Uint8Array, file: string): CsvTable {
    const rows = CsvReader.tokenize(LineReader.decode(content), file);
    const first = rows.shift();
    if (!first) {
      throw new ParseError('Missing header row', file);
    }
    return { header: first.fields.map((name) => name.trim()), rows };
  }

  /** Index of each header name; the first occurrence wins */
  static columnIndex(header: string[]): Map<string, number> {
    const index = new Map<string, number>();
    header.forEach((name, i) => {
      if (!index.has(name)) index.set(name, i);
    });
    return index;
  }

  private static tokenize(text: string, file: string): CsvRow[] {
    const rows: CsvRow[] = [];
    let fields: string[] = [];
    let field = '';
    let inQuotes = false;
    let line = 1;
    let rowLine = 1;
    let quoteLine = 1;

    const endRow = (): void => {
      fields.push(field);
      // A blank line yields one empty field
      if (fields.length > 1 || fields[0] !== '') {
        rows.push({ fields, line: rowLine });
      }
      fields = [];
      field = '';
    };

    for (let i = 0; i < text.length; i++) {
      const ch = text[i];

      if (inQuotes) {
        if (ch === QUOTE) {
          if (text[i + 1] === QUOTE) {
            field += QUOTE;
            i++;
          } else {
            inQuotes = false;
          }
        } else {
          if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) line++;
          field += ch;
        }
        continue;
      }

      switch (ch) {
        case QUOTE:
          inQuotes = true;
          quoteLine = line;
          break;
        case SEPARATOR:
          fields.push(field);
          field = '';
          break;
        case '\r':
          if (text[i + 1] === '\n') i++;
          endRow();
          line++;
          rowLine = line;
          break;
        case '\n':
          endRow();
          line++;
          rowLine = line;
          break;
        default:
          field += ch;
      }
    }

    if (inQuotes) {
      throw new ParseError('Unterminated quoted field', file, quoteLine);
    }
    if (field.length > 0 || fields.length > 0) {
      endRow();
    }
    return rows;
  }
}
