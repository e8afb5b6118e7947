import type { ReadonlyLayoutTable, ReportLayout } from "./hid_report_layout";

export type LayoutField = Exclude<keyof ReportLayout, "reportId">;

export type LayoutDifference = Readonly<
  | { reportId: number; field: "present"; expected: boolean; actual: boolean }
  | { reportId: number; field: LayoutField; expected: number; actual: number }
>;

const LAYOUT_FIELDS: readonly LayoutField[] = [
  "buttonsBitOffset",
  "buttonsCount",
  "xBitOffset",
  "xSize",
  "yBitOffset",
  "ySize",
  "wheelBitOffset",
  "wheelSize",
  "panBitOffset",
  "panSize",
  "totalBits",
];

/**
 * Structurally compare two layout tables, e.g. one decoded here against one captured from
 * another decoder. Differences are ordered by report id, then by field.
 */
export function diffLayoutTables(expected: ReadonlyLayoutTable, actual: ReadonlyLayoutTable): LayoutDifference[] {
  const reportIds = Array.from(new Set([...expected.keys(), ...actual.keys()])).sort((a, b) => a - b);
  const out: LayoutDifference[] = [];
  for (const reportId of reportIds) {
    const want = expected.get(reportId);
    const got = actual.get(reportId);
    if (!want || !got) {
      out.push({ reportId, field: "present", expected: want !== undefined, actual: got !== undefined });
      continue;
    }
    for (const field of LAYOUT_FIELDS) {
      if (want[field] !== got[field]) {
        out.push({ reportId, field, expected: want[field], actual: got[field] });
      }
    }
  }
  return out;
}
