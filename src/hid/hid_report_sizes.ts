import type { ReadonlyLayoutTable } from "./hid_report_layout";

/**
 * Compute expected input report payload byte lengths from a decoded layout table.
 *
 * The returned lengths exclude any reportId prefix byte. Only Input items advance a layout's
 * bit cursor, so Output and Feature reports sharing an id do not contribute.
 */
export function computeInputReportPayloadByteLengths(table: ReadonlyLayoutTable): Map<number, number> {
  const out = new Map<number, number>();
  for (const [reportId, layout] of table) {
    out.set(reportId, Math.ceil(layout.totalBits / 8));
  }
  return out;
}

/**
 * Compute the maximum *on-wire* byte length of any input report in the table.
 *
 * The returned size includes the optional reportId prefix byte (when reportId != 0).
 */
export function computeMaxInputReportBytesOnWire(table: ReadonlyLayoutTable): number {
  let max = 0;
  for (const [reportId, dataBytes] of computeInputReportPayloadByteLengths(table)) {
    const onWireBytes = dataBytes + (reportId !== 0 ? 1 : 0);
    max = Math.max(max, onWireBytes);
  }
  return max;
}
