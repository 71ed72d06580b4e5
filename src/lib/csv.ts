export type CsvParseResult = {
  headers: string[];
  rows: string[][];
  delimiter: string;
  truncated: boolean;
};

export type CsvParseOptions = {
  maxRows?: number;
  delimiter?: string;
};

const CANDIDATE_DELIMITERS = [',', '\t', ';'];

function countUnquoted(line: string, delimiter: string): number {
  let count = 0;
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (!inQuotes && ch === delimiter) {
      count += 1;
    }
  }
  return count;
}

function detectDelimiter(line: string): string {
  let best = ',';
  let bestCount = -1;
  for (const delimiter of CANDIDATE_DELIMITERS) {
    const count = countUnquoted(line, delimiter);
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

const isBlankRow = (row: string[]): boolean => row.every((value) => value.trim() === '');

export function parseCsv(text: string, options: CsvParseOptions = {}): CsvParseResult {
  const sanitized = text.replace(/^\uFEFF/, '');
  const firstLineEnd = sanitized.search(/\r?\n/);
  const firstLine = firstLineEnd >= 0 ? sanitized.slice(0, firstLineEnd) : sanitized;
  const delimiter = options.delimiter ?? detectDelimiter(firstLine);
  // The header row does not count against maxRows.
  const rowLimit = options.maxRows ? options.maxRows + 1 : undefined;

  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let truncated = false;

  for (let i = 0; i < sanitized.length; i += 1) {
    const ch = sanitized[i];

    if (inQuotes) {
      if (ch === '"') {
        if (sanitized[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      row.push(field);
      field = '';
      if (!isBlankRow(row)) {
        rows.push(row);
      }
      row = [];
      if (rowLimit && rows.length >= rowLimit) {
        truncated = sanitized.slice(i + 1).trim() !== '';
        break;
      }
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    if (!isBlankRow(row)) {
      rows.push(row);
    }
  }

  const [headerRow, ...dataRows] = rows;
  const headers = (headerRow ?? []).map((h) => h.trim());

  return { headers, rows: dataRows, delimiter, truncated };
}

/**
 * Zips each data row with the header names. Missing trailing cells become
 * empty strings; extra cells past the last header are dropped.
 */
export function csvRowsToRecords(result: CsvParseResult): Array<Record<string, string>> {
  return result.rows.map((row) => {
    const record: Record<string, string> = {};
    result.headers.forEach((header, index) => {
      if (header === '' || header in record) return;
      record[header] = row[index] ?? '';
    });
    return record;
  });
}

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '')
    .replace(/[^a-z0-9]/g, '');
}
