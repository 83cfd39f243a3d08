import Papa from "papaparse";
import type { CandidateRecord, PredictionRecord, RecordTable } from "./record.types";

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvFormatError";
  }
}

/**
 * Decodes CSV text into rows, preserving source order. Blank lines are not
 * rows; nothing else is filtered or reordered.
 */
export const parseCsvRows = (text: string): string[][] => {
  const result = Papa.parse<string[]>(text, {
    header: false,
    delimiter: ",",
    dynamicTyping: false,
    skipEmptyLines: "greedy"
  });

  const fatal = result.errors.find((error) => error.type === "Quotes");
  if (fatal) {
    throw new CsvFormatError(`Malformed CSV at row ${fatal.row ?? "?"}: ${fatal.message}`);
  }

  return result.data;
};

export const decodeRecordTable = (text: string, idColumn: string): RecordTable => {
  const [header, ...body] = parseCsvRows(text);
  if (!header) return { columns: [], rows: [] };

  const columns = header.map((name) => name.trim());
  const idIndex = columns.indexOf(idColumn);
  if (idIndex < 0) {
    throw new CsvFormatError(`CSV header is missing identifier column "${idColumn}"`);
  }

  const rows = body.map((cells, index): CandidateRecord => {
    if (cells.length > columns.length) {
      throw new CsvFormatError(
        `CSV row ${index + 1} has ${cells.length} cells but the header declares ${columns.length}`
      );
    }
    const aligned = columns.map((_column, i) => cells[i] ?? "");
    return { id: (aligned[idIndex] ?? "").trim(), cells: aligned };
  });

  return { columns, rows };
};

export const encodeRecordTable = (table: RecordTable, options: { header: boolean } = { header: true }): string =>
  Papa.unparse(
    { fields: table.columns, data: table.rows.map((row) => row.cells) },
    { header: options.header, newline: "\n" }
  );

/**
 * Raw job output is header-less with the score in the first column.
 */
export const decodePredictions = (text: string): PredictionRecord[] =>
  parseCsvRows(text).map((cells, position) => {
    const score = cells[0];
    if (score === undefined) {
      throw new CsvFormatError(`Prediction row ${position + 1} has no columns`);
    }
    return { position, score: score.trim() };
  });
