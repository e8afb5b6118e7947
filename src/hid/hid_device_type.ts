import type { ReadonlyLayoutTable, ReportLayout } from "./hid_report_layout";

export type PointerDeviceDetection = Readonly<{
  isMouse: boolean;
  // First layout (in descriptor order) carrying both X and Y; null when there is none.
  layout: Readonly<ReportLayout> | null;
}>;

// A descriptor that yields both X and Y input fields describes a mouse-like device, regardless of
// the boot interface protocol the device advertises.
export function detectPointerDevice(table: ReadonlyLayoutTable): PointerDeviceDetection {
  for (const layout of table.values()) {
    if (layout.xSize > 0 && layout.ySize > 0) {
      return { isMouse: true, layout };
    }
  }
  return { isMouse: false, layout: null };
}
