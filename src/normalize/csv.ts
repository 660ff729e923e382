/**
 * CSV reader for sensor logs.
 *
 * RFC-4180 quoting, `\n` or `\r\n` line endings, blank lines skipped.
 * Lines starting with `#` outside a quoted field are comments; those shaped
 * `# key: value` are collected as metadata (keys lowercased).
 */

import {
  DataQualityError,
  err,
  ok,
  type DataQualityIssue,
  type Result,
} from "../errors/index.js";

export interface CsvRow {
  /** 1-based line number where the row starts */
  readonly line: number;
  readonly cells: readonly string[];
}

export interface CsvDocument {
  readonly header: readonly string[];
  readonly headerLine: number;
  readonly rows: readonly CsvRow[];
  readonly metadata: Readonly<Record<string, string>>;
}

type RawRecord =
  | { type: "fields"; line: number; fields: string[]; blank: boolean }
  | { type: "comment"; line: number; text: string };

const METADATA_LINE = /^#\s*([A-Za-z][\w .-]*?)\s*:\s*(.*?)\s*$/;

/** Malformed-row issues reported individually before collapsing into a count. */
const MAX_ROW_ISSUES = 10;

function splitRecords(text: string): Result<RawRecord[], DataQualityError> {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let field = "";
  let quotedField = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  const atRecordStart = (): boolean =>
    fields.length === 0 && field === "" && !quotedField;

  const endRecord = (): void => {
    fields.push(field);
    const blank = fields.length === 1 && fields[0].trim() === "" && !quotedField;
    records.push({ type: "fields", line: recordLine, fields, blank });
    fields = [];
    field = "";
    quotedField = false;
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (ch === "\n") line++;
      field += ch;
      i++;
      continue;
    }

    if (ch === "#" && atRecordStart()) {
      let end = text.indexOf("\n", i);
      if (end === -1) end = text.length;
      const comment = text.slice(i, end).replace(/\r$/, "");
      records.push({ type: "comment", line: recordLine, text: comment });
      i = end + 1;
      line++;
      recordLine = line;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      quotedField = true;
      i++;
      continue;
    }
    if (ch === ",") {
      fields.push(field);
      field = "";
      quotedField = false;
      i++;
      continue;
    }
    if (ch === "\r" && text[i + 1] === "\n") {
      i++;
      continue;
    }
    if (ch === "\n") {
      endRecord();
      line++;
      recordLine = line;
      i++;
      continue;
    }
    field += ch;
    i++;
  }

  if (inQuotes) {
    return err(
      new DataQualityError([
        {
          code: "MALFORMED_ROW",
          message: `Unterminated quoted field in row starting on line ${recordLine}`,
          detail: { line: recordLine },
        },
      ])
    );
  }
  if (!atRecordStart()) {
    endRecord();
  }

  return ok(records);
}

/**
 * Parse CSV text into a header, data rows and metadata.
 */
export function parseCsv(input: string): Result<CsvDocument, DataQualityError> {
  const text = input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  const split = splitRecords(text);
  if (!split.ok) return split;

  const metadata: Record<string, string> = {};
  let header: string[] | null = null;
  let headerLine = 0;
  const rows: CsvRow[] = [];
  const issues: DataQualityIssue[] = [];
  let malformed = 0;

  for (const record of split.value) {
    if (record.type === "comment") {
      const match = METADATA_LINE.exec(record.text);
      if (match) {
        metadata[match[1].toLowerCase()] = match[2];
      }
      continue;
    }
    if (record.blank) continue;

    if (header === null) {
      header = record.fields.map((cell) => cell.trim());
      headerLine = record.line;
      continue;
    }

    if (record.fields.length !== header.length) {
      malformed++;
      if (malformed <= MAX_ROW_ISSUES) {
        issues.push({
          code: "MALFORMED_ROW",
          message: `Line ${record.line} has ${record.fields.length} fields, header has ${header.length}`,
          detail: { line: record.line, fields: record.fields.length, expected: header.length },
        });
      }
      continue;
    }
    rows.push({ line: record.line, cells: record.fields });
  }

  if (malformed > MAX_ROW_ISSUES) {
    issues.push({
      code: "MALFORMED_ROW",
      message: `${malformed - MAX_ROW_ISSUES} further malformed rows not listed`,
      detail: { total: malformed },
    });
  }
  if (issues.length > 0) {
    return err(new DataQualityError(issues));
  }

  if (header === null) {
    return err(
      new DataQualityError([{ code: "EMPTY_INPUT", message: "Input has no header row" }])
    );
  }
  if (rows.length === 0) {
    return err(
      new DataQualityError([{ code: "EMPTY_INPUT", message: "Input has no data rows" }])
    );
  }

  return ok({ header, headerLine, rows, metadata });
}
