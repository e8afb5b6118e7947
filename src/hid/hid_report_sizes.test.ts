import { describe, expect, it } from "vitest";

import { USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR, USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR } from "../usb/hid_descriptors";
import { walkHidReportDescriptor } from "./hid_descriptor_walker";
import { createReportLayout } from "./hid_report_layout";
import { computeInputReportPayloadByteLengths, computeMaxInputReportBytesOnWire } from "./hid_report_sizes";

describe("hid/hid_report_sizes", () => {
  it("computes per-report payload lengths without the report id byte", () => {
    const table = walkHidReportDescriptor(USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR);
    expect(Array.from(computeInputReportPayloadByteLengths(table))).toEqual([
      [2, 8],
      [3, 4],
      [4, 1],
      [8, 1],
    ]);
    expect(computeMaxInputReportBytesOnWire(table)).toBe(9);
  });

  it("adds no prefix byte for report id 0", () => {
    const table = walkHidReportDescriptor(USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR);
    expect(computeMaxInputReportBytesOnWire(table)).toBe(4);
  });

  it("rounds partial bytes up", () => {
    const table = new Map([[5, { ...createReportLayout(5), totalBits: 11 }]]);
    expect(computeInputReportPayloadByteLengths(table).get(5)).toBe(2);
    expect(computeMaxInputReportBytesOnWire(table)).toBe(3);
  });

  it("returns 0 for an empty table", () => {
    expect(computeMaxInputReportBytesOnWire(new Map())).toBe(0);
  });
});
