import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";

import { formatHexBytes, parseHexBytes } from "../hex";
import { USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR } from "../usb/hid_descriptors";
import { walkHidReportDescriptor } from "./hid_descriptor_walker";
import { diffLayoutTables } from "./hid_layout_diff";
import type { LayoutTable, ReportLayout } from "./hid_report_layout";

type ReceiverMouseFixture = {
  descriptor: string;
  layouts: ReportLayout[];
};

function loadFixture(): ReceiverMouseFixture {
  const fixtureUrl = new URL("../../tests/fixtures/hid/receiver_mouse_layouts.json", import.meta.url);
  return JSON.parse(readFileSync(fixtureUrl, "utf8")) as ReceiverMouseFixture;
}

describe("hid/receiver mouse descriptor", () => {
  it("matches the captured layout table", () => {
    const fixture = loadFixture();
    const descriptor = parseHexBytes(fixture.descriptor);
    expect(formatHexBytes(descriptor)).toBe(formatHexBytes(USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR));

    const expected: LayoutTable = new Map(fixture.layouts.map((layout) => [layout.reportId, layout]));
    expect(diffLayoutTables(expected, walkHidReportDescriptor(descriptor))).toEqual([]);
  });

  it("places buttons, X, Y and wheel of the pointer report", () => {
    const report = walkHidReportDescriptor(USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR).get(2);
    expect(report).toMatchObject({
      buttonsBitOffset: 0,
      buttonsCount: 16,
      xBitOffset: 16,
      xSize: 16,
      yBitOffset: 32,
      ySize: 16,
      wheelBitOffset: 48,
      wheelSize: 8,
      totalBits: 64,
    });
  });

  it("stops after the wheel when the descriptor ends there", () => {
    const prefix = parseHexBytes(
      [
        "05 01 09 02 A1 01 85 02 09 01 A1 00 05 09 19 01 29 10 15 00 25 01 95 10 75 01 81 02",
        "05 01 16 01 80 26 FF 7F 75 10 95 02 09 30 09 31 81 06",
        "15 81 25 7F 75 08 95 01 09 38 81 06",
        "C0 C0",
      ].join(" "),
    );
    const table = walkHidReportDescriptor(prefix);
    expect(Array.from(table.keys())).toEqual([2]);
    expect(table.get(2)).toMatchObject({ wheelBitOffset: 48, wheelSize: 8, panSize: 0, totalBits: 56 });
  });
});
