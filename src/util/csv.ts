/**
 * CSV helpers for the regional inventories. Handles a header row, comma
 * separators, double-quoted fields (with `""` escapes) and CRLF line endings.
 */

export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);

  return cells.map(cell => cell.trim());
}

export function parseCsv(text: string): CsvTable {
  const lines = text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0);

  if (lines.length === 0) {
    return { headers: [], rows: [] };
  }

  const [headerLine, ...body] = lines;
  const headers = splitCsvLine(headerLine);
  const rows = body.map(line => {
    const cells = splitCsvLine(line);
    const row: Record<string, string> = {};
    headers.forEach((header, i) => (row[header] = cells[i] ?? ''));
    return row;
  });

  return { headers, rows };
}

/**
 * Parse a numeric cell; empty or malformed cells give NaN
 */
export function toNumber(cell: string | undefined): number {
  if (cell === undefined || cell.trim() === '') {
    return NaN;
  }
  return Number(cell);
}
