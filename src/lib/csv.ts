export type ParsedCsvRow = {
  line: number;
  fields: string[];
};

export function parseCsvRows(input: string): ParsedCsvRow[] {
  const sanitized = (input ?? "").replace(/\uFEFF/g, "");
  if (!sanitized.trim()) {
    return [];
  }

  const rows: ParsedCsvRow[] = [];
  let field = "";
  let fields: string[] = [];
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;

  for (let i = 0; i < sanitized.length; i += 1) {
    const char = sanitized[i];

    if (char === '"') {
      if (inQuotes && sanitized[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      fields.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && sanitized[i + 1] === "\n") {
        i += 1;
      }
      fields.push(field);
      rows.push({ line: rowLine, fields });
      field = "";
      fields = [];
      line += 1;
      rowLine = line;
      continue;
    }

    if (char === "\n") {
      // Quoted newline: the record continues, the physical line count does not.
      line += 1;
    }
    field += char;
  }

  fields.push(field);
  rows.push({ line: rowLine, fields });

  return rows.filter((row) => !isEmptyCsvRow(row.fields));
}

export function isEmptyCsvRow(fields: string[]): boolean {
  return fields.every((field) => field.trim().length === 0);
}

export function quoteCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsvLine(values: Array<string | number | null | undefined>): string {
  return values.map((value) => quoteCsvField(value)).join(",");
}
