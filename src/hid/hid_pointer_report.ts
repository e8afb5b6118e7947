import { getAxisPlacement, type PointerAxis, type ReadonlyLayoutTable, type ReportLayout } from "./hid_report_layout";

export const HID_BOOT_MOUSE_REPORT_BYTES = 3;

export type PointerSample = Readonly<{
  // 0 when the report carries no report id prefix.
  reportId: number;
  buttons: number;
  x: number;
  y: number;
  wheel: number;
  pan: number;
}>;

/** Read `bitSize` (1..32) bits starting at `bitOffset`, least significant bit first. */
export function readHidBitsUnsigned(data: Uint8Array, bitOffset: number, bitSize: number): number {
  if (bitSize <= 0 || bitSize > 32) return 0;
  let value = 0;
  for (let i = 0; i < bitSize; i++) {
    const bitIndex = bitOffset + i;
    const byte = data[bitIndex >>> 3];
    if (byte === undefined) break;
    if ((byte >> (bitIndex & 7)) & 1) value += 2 ** i;
  }
  return value;
}

export function readHidBitsSigned(data: Uint8Array, bitOffset: number, bitSize: number): number {
  const value = readHidBitsUnsigned(data, bitOffset, bitSize);
  if (bitSize <= 0 || bitSize > 32) return 0;
  const signBit = 2 ** (bitSize - 1);
  return value >= signBit ? value - 2 ** bitSize : value;
}

function toInt16(value: number): number {
  return (value << 16) >> 16;
}

function toInt8(value: number): number {
  return (value << 24) >> 24;
}

/**
 * Pick the layout describing a raw input report.
 *
 * Reports whose first byte matches a non-zero report id use that layout when the bytes after
 * the id hold the whole report. Otherwise the id-less layout (report id 0) is used when the
 * report is long enough.
 */
export function selectLayoutForReport(
  table: ReadonlyLayoutTable,
  report: Uint8Array,
): Readonly<ReportLayout> | null {
  if (report.byteLength === 0) return null;
  const reportId = report[0] ?? 0;
  if (reportId !== 0) {
    const layout = table.get(reportId);
    if (layout && (report.byteLength - 1) * 8 >= layout.totalBits) return layout;
  }
  const unnumbered = table.get(0);
  if (unnumbered && report.byteLength * 8 >= unnumbered.totalBits) return unnumbered;
  return null;
}

function readAxis(layout: Readonly<ReportLayout>, data: Uint8Array, axis: PointerAxis): number {
  const { bitOffset, size } = getAxisPlacement(layout, axis);
  return size === 0 ? 0 : readHidBitsSigned(data, bitOffset, size);
}

export function decodePointerReportWithLayout(layout: Readonly<ReportLayout>, report: Uint8Array): PointerSample {
  const data = layout.reportId !== 0 ? report.subarray(1) : report;
  return {
    reportId: layout.reportId,
    buttons: readHidBitsUnsigned(data, layout.buttonsBitOffset, layout.buttonsCount),
    x: toInt16(readAxis(layout, data, "x")),
    y: toInt16(readAxis(layout, data, "y")),
    wheel: toInt8(readAxis(layout, data, "wheel")),
    pan: toInt16(readAxis(layout, data, "pan")),
  };
}

// Layouts are only consulted for reports at least this long; shorter ones use fixed offsets.
export const HID_LAYOUT_MIN_REPORT_BYTES = 5;
// Highest first byte taken as a report id by the fixed-offset formats.
export const HID_FIXED_FORMAT_MAX_REPORT_ID = 0x0f;

function decodeFixedOffsetReport(report: Uint8Array): PointerSample | null {
  if (report.byteLength < 4) return null;
  const first = report[0] ?? 0;
  if (first >= 1 && first <= HID_FIXED_FORMAT_MAX_REPORT_ID) {
    // Report id, buttons, int8 X, int8 Y[, int8 wheel].
    return {
      reportId: first,
      buttons: report[1] ?? 0,
      x: toInt8(report[2] ?? 0),
      y: toInt8(report[3] ?? 0),
      wheel: report.byteLength >= 5 ? toInt8(report[4] ?? 0) : 0,
      pan: 0,
    };
  }
  // Buttons, int8 X, int8 Y, int8 wheel.
  return {
    reportId: 0,
    buttons: first,
    x: toInt8(report[1] ?? 0),
    y: toInt8(report[2] ?? 0),
    wheel: toInt8(report[3] ?? 0),
    pan: 0,
  };
}

/**
 * Decode a raw input report into a pointer sample.
 *
 * The report length picks the format:
 * - exactly 3 bytes: boot protocol mouse report (buttons, int8 X, int8 Y), whatever the layouts say;
 * - 5 bytes or more: the matching layout from `selectLayoutForReport`, when there is one;
 * - otherwise (4 bytes, or no layout matched): fixed offsets, with a leading report id when the
 *   first byte is 1..15.
 *
 * Returns `null` for reports shorter than 3 bytes.
 */
export function decodePointerReport(table: ReadonlyLayoutTable, report: Uint8Array): PointerSample | null {
  if (report.byteLength === HID_BOOT_MOUSE_REPORT_BYTES) {
    return {
      reportId: 0,
      buttons: report[0] ?? 0,
      x: toInt8(report[1] ?? 0),
      y: toInt8(report[2] ?? 0),
      wheel: 0,
      pan: 0,
    };
  }
  if (report.byteLength >= HID_LAYOUT_MIN_REPORT_BYTES) {
    const layout = selectLayoutForReport(table, report);
    if (layout) return decodePointerReportWithLayout(layout, report);
  }
  return decodeFixedOffsetReport(report);
}
