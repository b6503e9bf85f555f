/**
 * Minimal RFC 4180 CSV reading and writing for the record store.
 *
 * Fields containing a comma, a double quote or a line break are quoted;
 * embedded quotes are doubled. A leading UTF-8 BOM is ignored.
 */

export interface CsvTable {
  header: string[];
  /** Data rows with the 1-based line number each row starts on */
  rows: { line: number; values: string[] }[];
}

export function parseCsv(content: string): CsvTable {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const records: { line: number; values: string[] }[] = [];

  let values: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let rowHasContent = false;

  const endRecord = () => {
    if (rowHasContent) {
      values.push(field);
      records.push({ line: recordLine, values });
    }
    values = [];
    field = '';
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (char === ',') {
      values.push(field);
      field = '';
      rowHasContent = true;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += char;
      rowHasContent = true;
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quoted field starting on line ${recordLine}`);
  }
  endRecord();

  const [first, ...rest] = records;
  return {
    header: first ? first.values.map((name) => name.trim()) : [],
    rows: rest,
  };
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function serializeCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [header, ...rows].map((row) => row.map(quoteField).join(','));
  return `${lines.join('\n')}\n`;
}
