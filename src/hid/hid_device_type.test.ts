import { describe, expect, it } from "vitest";

import {
  USB_HID_BOOT_KEYBOARD_REPORT_DESCRIPTOR,
  USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR,
  USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR,
} from "../usb/hid_descriptors";
import { walkHidReportDescriptor } from "./hid_descriptor_walker";
import { detectPointerDevice } from "./hid_device_type";
import { createReportLayout } from "./hid_report_layout";

describe("hid/detectPointerDevice", () => {
  it("detects the pointer report of a multi-report receiver", () => {
    const detection = detectPointerDevice(walkHidReportDescriptor(USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR));
    expect(detection.isMouse).toBe(true);
    expect(detection.layout?.reportId).toBe(2);
  });

  it("detects a boot mouse", () => {
    const detection = detectPointerDevice(walkHidReportDescriptor(USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR));
    expect(detection.isMouse).toBe(true);
    expect(detection.layout?.reportId).toBe(0);
  });

  it("does not treat a keyboard as a mouse", () => {
    expect(detectPointerDevice(walkHidReportDescriptor(USB_HID_BOOT_KEYBOARD_REPORT_DESCRIPTOR))).toEqual({
      isMouse: false,
      layout: null,
    });
  });

  it("requires both X and Y", () => {
    const table = new Map([[1, { ...createReportLayout(1), xSize: 8, totalBits: 8 }]]);
    expect(detectPointerDevice(table).isMouse).toBe(false);
  });
});
