import { LeadInput } from "../types/lead";
import { PatternCatalog } from "../catalog/patternCatalog";
import { InvalidInputError } from "../errors";
import { scoreLeadForResponse } from "./batch";

export const REQUIRED_COLUMNS = ["role", "company_size", "message"] as const;
export const SCORE_COLUMNS = ["score", "priority_label", "justification"] as const;

export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse CSV text: quoted fields, doubled quotes, CRLF or LF line ends.
 * Blank lines are skipped. An unterminated quote throws InvalidInputError.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  const endRecord = () => {
    record.push(field);
    if (record.length > 1 || record[0] !== "") {
      records.push(record);
    }
    record = [];
    field = "";
  };

  // Leading BOM from spreadsheet exports
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  while (i < input.length) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      record.push(field);
      field = "";
    } else if (ch === "\n") {
      endRecord();
    } else if (ch !== "\r") {
      field += ch;
    }
    i += 1;
  }

  if (inQuotes) {
    throw new InvalidInputError("csv", "CSV has an unterminated quoted field");
  }

  if (field !== "" || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse an uploaded lead sheet. Throws InvalidInputError naming any missing
 * required column, or the first row wider than the header.
 */
export function parseLeadCsv(text: string): CsvTable {
  const [headerRow, ...dataRows] = parseCsv(text);
  if (!headerRow) {
    throw new InvalidInputError("csv", "CSV is empty");
  }

  const headers = headerRow.map(h => h.trim());
  const missing = REQUIRED_COLUMNS.filter(col => !headers.includes(col));
  if (missing.length > 0) {
    throw new InvalidInputError("csv", `CSV must contain columns: ${missing.join(", ")}`);
  }

  const rows = dataRows.map((cells, rowIdx) => {
    if (cells.length > headers.length) {
      throw new InvalidInputError(
        "csv",
        `CSV row ${rowIdx + 1} has ${cells.length} values but the header has ${headers.length}`
      );
    }
    const row: Record<string, string> = {};
    headers.forEach((header, idx) => {
      row[header] = cells[idx] ?? "";
    });
    return row;
  });

  return { headers, rows };
}

export function rowToLead(row: Record<string, string>): LeadInput {
  return {
    role: row.role ?? "",
    company_size: (row.company_size ?? "").trim(),
    message: row.message ?? "",
  };
}

// ============================================================================
// EXPORT
// ============================================================================

// Spreadsheets evaluate cells starting with these as formulas
const FORMULA_PREFIX = /^[=+\-@\t\r]/;

export function escapeCsvValue(value: string): string {
  const safe = FORMULA_PREFIX.test(value) ? `'${value}` : value;
  return /[",\r\n]/.test(safe) ? `"${safe.replace(/"/g, '""')}"` : safe;
}

export function formatCsv(headers: readonly string[], rows: readonly Record<string, string>[]): string {
  const lines = [headers.map(escapeCsvValue).join(",")];
  for (const row of rows) {
    lines.push(headers.map(h => escapeCsvValue(row[h] ?? "")).join(","));
  }
  return lines.join("\n");
}

/**
 * Score every row of an uploaded sheet and return it with score columns appended.
 */
export function scoreLeadCsv(text: string, catalog: PatternCatalog): { csv: string; total: number; failed: number } {
  const table = parseLeadCsv(text);
  const scoreColumns: readonly string[] = SCORE_COLUMNS;
  const outputHeaders = [
    ...table.headers.filter(h => !scoreColumns.includes(h)),
    ...SCORE_COLUMNS,
  ];

  let failed = 0;
  const scoredRows = table.rows.map(row => {
    const result = scoreLeadForResponse(rowToLead(row), catalog);
    if (!result.success) failed += 1;
    return {
      ...row,
      score: String(result.score),
      priority_label: result.priority_label,
      justification: result.justification,
    };
  });

  return { csv: formatCsv(outputHeaders, scoredRows), total: table.rows.length, failed };
}
