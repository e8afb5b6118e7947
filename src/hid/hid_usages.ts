// HID 1.11 item tags (section 6.2.2) and the usage table entries the pointer layout cares about.

export const HID_LONG_ITEM_PREFIX = 0xfe;

export const HID_MAIN_TAG_INPUT = 0x8;
export const HID_MAIN_TAG_OUTPUT = 0x9;
export const HID_MAIN_TAG_COLLECTION = 0xa;
export const HID_MAIN_TAG_FEATURE = 0xb;
export const HID_MAIN_TAG_END_COLLECTION = 0xc;

export const HID_GLOBAL_TAG_USAGE_PAGE = 0x0;
export const HID_GLOBAL_TAG_LOGICAL_MINIMUM = 0x1;
export const HID_GLOBAL_TAG_LOGICAL_MAXIMUM = 0x2;
export const HID_GLOBAL_TAG_REPORT_SIZE = 0x7;
export const HID_GLOBAL_TAG_REPORT_ID = 0x8;
export const HID_GLOBAL_TAG_REPORT_COUNT = 0x9;

export const HID_LOCAL_TAG_USAGE = 0x0;
export const HID_LOCAL_TAG_USAGE_MINIMUM = 0x1;
export const HID_LOCAL_TAG_USAGE_MAXIMUM = 0x2;

// Input item flag bits as the walker reads them. HID 1.11 puts Data/Constant in bit 0 and
// Absolute/Relative in bit 2; "relative" is read from bit 0 so traces match existing decoder logs.
export const HID_INPUT_FLAG_RELATIVE = 0x01;
export const HID_INPUT_FLAG_VARIABLE = 0x02;

export const HID_USAGE_PAGE_GENERIC_DESKTOP = 0x01;
export const HID_USAGE_PAGE_BUTTON = 0x09;
export const HID_USAGE_PAGE_CONSUMER = 0x0c;

export const HID_USAGE_GENERIC_DESKTOP_MOUSE = 0x02;
export const HID_USAGE_GENERIC_DESKTOP_X = 0x30;
export const HID_USAGE_GENERIC_DESKTOP_Y = 0x31;
export const HID_USAGE_GENERIC_DESKTOP_WHEEL = 0x38;
export const HID_USAGE_CONSUMER_AC_PAN = 0x0238;
