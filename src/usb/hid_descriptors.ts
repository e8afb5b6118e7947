/**
 * Report descriptors of common pointer and keyboard devices, used by the CLI's `--builtin`
 * option and as test inputs.
 */

export const USB_HID_BOOT_KEYBOARD_REPORT_DESCRIPTOR = new Uint8Array([
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x09, 0x06, // Usage (Keyboard)
  0xa1, 0x01, // Collection (Application)
  0x05, 0x07, // Usage Page (Keyboard/Keypad)
  0x19, 0xe0, // Usage Minimum (Left Control)
  0x29, 0xe7, // Usage Maximum (Right GUI)
  0x15, 0x00, // Logical Minimum (0)
  0x25, 0x01, // Logical Maximum (1)
  0x75, 0x01, // Report Size (1)
  0x95, 0x08, // Report Count (8)
  0x81, 0x02, // Input (Data,Var,Abs) Modifier byte
  0x95, 0x01, // Report Count (1)
  0x75, 0x08, // Report Size (8)
  0x81, 0x01, // Input (Const,Array,Abs) Reserved byte
  0x95, 0x05, // Report Count (5)
  0x75, 0x01, // Report Size (1)
  0x05, 0x08, // Usage Page (LEDs)
  0x19, 0x01, // Usage Minimum (Num Lock)
  0x29, 0x05, // Usage Maximum (Kana)
  0x91, 0x02, // Output (Data,Var,Abs) LED report
  0x95, 0x01, // Report Count (1)
  0x75, 0x03, // Report Size (3)
  0x91, 0x01, // Output (Const,Array,Abs) LED padding
  0x95, 0x06, // Report Count (6)
  0x75, 0x08, // Report Size (8)
  0x15, 0x00, // Logical Minimum (0)
  0x25, 0x89, // Logical Maximum (137)
  0x05, 0x07, // Usage Page (Keyboard/Keypad)
  0x19, 0x00, // Usage Minimum (0)
  0x29, 0x89, // Usage Maximum (137)
  0x81, 0x00, // Input (Data,Array,Abs) Key arrays (6 bytes)
  0xc0, // End Collection
]);

export const USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR = new Uint8Array([
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x09, 0x02, // Usage (Mouse)
  0xa1, 0x01, // Collection (Application)
  0x09, 0x01, // Usage (Pointer)
  0xa1, 0x00, // Collection (Physical)
  0x05, 0x09, // Usage Page (Buttons)
  0x19, 0x01, // Usage Minimum (Button 1)
  0x29, 0x03, // Usage Maximum (Button 3)
  0x15, 0x00, // Logical Minimum (0)
  0x25, 0x01, // Logical Maximum (1)
  0x95, 0x03, // Report Count (3)
  0x75, 0x01, // Report Size (1)
  0x81, 0x02, // Input (Data,Var,Abs) Button bits
  0x95, 0x01, // Report Count (1)
  0x75, 0x05, // Report Size (5)
  0x81, 0x01, // Input (Const,Array,Abs) Padding
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x09, 0x30, // Usage (X)
  0x09, 0x31, // Usage (Y)
  0x09, 0x38, // Usage (Wheel)
  0x15, 0x81, // Logical Minimum (-127)
  0x25, 0x7f, // Logical Maximum (127)
  0x75, 0x08, // Report Size (8)
  0x95, 0x03, // Report Count (3)
  0x81, 0x06, // Input (Data,Var,Rel) X,Y,Wheel
  0xc0, // End Collection
  0xc0, // End Collection
]);

// Wireless receiver mouse: 16 buttons and 16-bit X/Y on report 2, plus consumer, system control
// and vendor reports.
export const USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR = new Uint8Array([
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x09, 0x02, // Usage (Mouse)
  0xa1, 0x01, // Collection (Application)
  0x85, 0x02, // Report ID (2)
  0x09, 0x01, // Usage (Pointer)
  0xa1, 0x00, // Collection (Physical)
  0x05, 0x09, // Usage Page (Buttons)
  0x19, 0x01, // Usage Minimum (Button 1)
  0x29, 0x10, // Usage Maximum (Button 16)
  0x15, 0x00, // Logical Minimum (0)
  0x25, 0x01, // Logical Maximum (1)
  0x95, 0x10, // Report Count (16)
  0x75, 0x01, // Report Size (1)
  0x81, 0x02, // Input (Data,Var,Abs) Buttons
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x16, 0x01, 0x80, // Logical Minimum (-32767)
  0x26, 0xff, 0x7f, // Logical Maximum (32767)
  0x75, 0x10, // Report Size (16)
  0x95, 0x02, // Report Count (2)
  0x09, 0x30, // Usage (X)
  0x09, 0x31, // Usage (Y)
  0x81, 0x06, // Input (Data,Var,Rel) X,Y
  0x15, 0x81, // Logical Minimum (-127)
  0x25, 0x7f, // Logical Maximum (127)
  0x75, 0x08, // Report Size (8)
  0x95, 0x01, // Report Count (1)
  0x09, 0x38, // Usage (Wheel)
  0x81, 0x06, // Input (Data,Var,Rel) Wheel
  0x05, 0x0c, // Usage Page (Consumer)
  0x0a, 0x38, 0x02, // Usage (AC Pan)
  0x95, 0x01, // Report Count (1)
  0x81, 0x06, // Input (Data,Var,Rel) Pan
  0xc0, // End Collection
  0xc0, // End Collection
  0x05, 0x0c, // Usage Page (Consumer)
  0x09, 0x01, // Usage (Consumer Control)
  0xa1, 0x01, // Collection (Application)
  0x85, 0x03, // Report ID (3)
  0x75, 0x10, // Report Size (16)
  0x95, 0x02, // Report Count (2)
  0x15, 0x01, // Logical Minimum (1)
  0x26, 0xff, 0x02, // Logical Maximum (767)
  0x19, 0x01, // Usage Minimum (1)
  0x2a, 0xff, 0x02, // Usage Maximum (767)
  0x81, 0x00, // Input (Data,Array,Abs)
  0xc0, // End Collection
  0x05, 0x01, // Usage Page (Generic Desktop)
  0x09, 0x80, // Usage (System Control)
  0xa1, 0x01, // Collection (Application)
  0x85, 0x04, // Report ID (4)
  0x75, 0x02, // Report Size (2)
  0x95, 0x01, // Report Count (1)
  0x15, 0x01, // Logical Minimum (1)
  0x25, 0x03, // Logical Maximum (3)
  0x09, 0x82, // Usage (System Sleep)
  0x09, 0x81, // Usage (System Power Down)
  0x09, 0x83, // Usage (System Wake Up)
  0x81, 0x60, // Input (Data,Array,Abs,NoPref,Null)
  0x75, 0x06, // Report Size (6)
  0x81, 0x03, // Input (Const,Var,Abs) Padding
  0xc0, // End Collection
  0x06, 0xbc, 0xff, // Usage Page (Vendor 0xFFBC)
  0x09, 0x88, // Usage (0x88)
  0xa1, 0x01, // Collection (Application)
  0x85, 0x08, // Report ID (8)
  0x19, 0x01, // Usage Minimum (1)
  0x29, 0xff, // Usage Maximum (255)
  0x15, 0x01, // Logical Minimum (1)
  0x26, 0xff, 0x00, // Logical Maximum (255)
  0x75, 0x08, // Report Size (8)
  0x95, 0x01, // Report Count (1)
  0x81, 0x00, // Input (Data,Array,Abs)
  0xc0, // End Collection
]);

export const BUILTIN_HID_REPORT_DESCRIPTORS: Readonly<Record<string, Uint8Array>> = {
  "boot-keyboard": USB_HID_BOOT_KEYBOARD_REPORT_DESCRIPTOR,
  "boot-mouse": USB_HID_BOOT_MOUSE_REPORT_DESCRIPTOR,
  "receiver-mouse": USB_HID_RECEIVER_MOUSE_REPORT_DESCRIPTOR,
};
