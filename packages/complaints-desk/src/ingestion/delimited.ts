/**
 * Delimited text parsing for dataset files.
 *
 * Records come back keyed by header name with values exactly as written:
 * no trimming and no type conversion. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks.
 */

export type DelimitedRecord = Readonly<Record<string, string>>;

export interface DelimitedParseOptions {
  /** Field separator (default `;`) */
  readonly delimiter?: string;
}

export interface DelimitedDocument {
  readonly headers: readonly string[];
  readonly records: readonly DelimitedRecord[];
}

const BOM = '\uFEFF';

/**
 * Split content into rows of raw fields.
 */
export function tokenizeDelimited(content: string, delimiter = ';'): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = (): void => {
    row.push(field);
    // Blank line: a single empty field
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
    } else if (char === delimiter) {
      row.push(field);
      field = '';
    } else if (char === '\r' && content[i + 1] === '\n') {
      // CRLF: the \n closes the row
    } else if (char === '\n') {
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Parse a header row plus records.
 *
 * Short records leave trailing columns out of the record; surplus fields
 * beyond the header are dropped.
 */
export function parseDelimited(
  content: string,
  options: DelimitedParseOptions = {}
): DelimitedDocument {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const [headerRow, ...dataRows] = tokenizeDelimited(text, options.delimiter ?? ';');

  if (!headerRow) {
    return { headers: [], records: [] };
  }

  const records = dataRows.map((values) => {
    const record: Record<string, string> = {};
    headerRow.forEach((header, index) => {
      const value = values[index];
      if (value !== undefined) {
        record[header] = value;
      }
    });
    return record;
  });

  return { headers: headerRow, records };
}
