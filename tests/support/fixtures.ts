import type { CandidateRecord, RecordTable } from "../../src/core/records/record.types";

export const measurementColumns = [
  "id",
  "timestamp",
  "parameter",
  "device_id",
  "location_id",
  "deployment_date",
  "value",
  "predicted_label"
];

export const measurementRow = (
  id: number,
  overrides: Partial<{ parameter: string; value: string; flag: string }> = {}
): CandidateRecord => ({
  id: String(id),
  cells: [
    String(id),
    "2024-03-01T00:00:00Z",
    overrides.parameter ?? "pm25",
    `dev-${id}`,
    "loc-1",
    "2023-01-01",
    overrides.value ?? "65535",
    overrides.flag ?? "false"
  ]
});

/** CSV line for `measurementRow(id)` as written by the exporter. */
export const measurementLine = (id: number, value = "65535", flag = "false") =>
  `${id},2024-03-01T00:00:00Z,pm25,dev-${id},loc-1,2023-01-01,${value},${flag}`;

export const measurementTable = (rows: CandidateRecord[]): RecordTable => ({
  columns: [...measurementColumns],
  rows
});

export const exportCsv = (ids: number[]) =>
  [measurementColumns.join(","), ...ids.map((id) => measurementLine(id))].join("\n");

export const fixedClock = (iso: string) => () => new Date(iso);
