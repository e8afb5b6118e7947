import { formatHexBytes } from "../hex";
import {
  HidDescriptorWalker,
  type HidDescriptorWalkerOptions,
  type HidGlobalField,
  type HidWalkEvent,
  type UsageEntry,
} from "./hid_descriptor_walker";
import type { HidItem } from "./hid_item_reader";
import type { HidUsage } from "./hid_numeric";
import {
  getAxisPlacement,
  POINTER_AXES,
  type LayoutTable,
  type PointerField,
  type ReadonlyLayoutTable,
} from "./hid_report_layout";

const MAIN_ITEM_NAMES: Readonly<Record<number, string>> = {
  0x8: "INPUT",
  0x9: "OUTPUT",
  0xa: "COLLECTION",
  0xb: "FEATURE",
  0xc: "END_COLLECTION",
};

const GLOBAL_ITEM_NAMES: Readonly<Record<number, string>> = {
  0x0: "USAGE_PAGE",
  0x1: "LOGICAL_MIN",
  0x2: "LOGICAL_MAX",
  0x7: "REPORT_SIZE",
  0x8: "REPORT_ID",
  0x9: "REPORT_COUNT",
};

const LOCAL_ITEM_NAMES: Readonly<Record<number, string>> = {
  0x0: "USAGE",
  0x1: "USAGE_MIN",
  0x2: "USAGE_MAX",
};

const GLOBAL_FIELD_LABELS: Record<HidGlobalField, string> = {
  usagePage: "Usage Page",
  logicalMinimum: "Logical Min",
  logicalMaximum: "Logical Max",
  reportSize: "Report Size",
  reportCount: "Report Count",
  reportId: "Report ID",
};

const FIELD_LABELS: Record<PointerField, string> = {
  buttons: "Buttons",
  x: "X",
  y: "Y",
  wheel: "Wheel",
  pan: "Pan",
};

function hex(value: number, width: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, "0")}`;
}

export function hidItemName(item: HidItem): string {
  switch (item.kind) {
    case "main":
      return MAIN_ITEM_NAMES[item.tag] ?? "UNKNOWN";
    case "global":
      return GLOBAL_ITEM_NAMES[item.tag] ?? "UNKNOWN";
    case "local":
      return LOCAL_ITEM_NAMES[item.tag] ?? "UNKNOWN";
    case "long":
      return "LONG";
    case "reserved":
      return "UNKNOWN";
  }
}

function itemHeader(item: HidItem): string {
  const offset = item.byteOffset.toString(16).toUpperCase().padStart(4, "0");
  const prefix = item.prefix.toString(16).toUpperCase().padStart(2, "0");
  return `[${offset}] ${hidItemName(item).padEnd(15)} [${prefix}] data=${formatHexBytes(item.payload)}`;
}

function formatUsage(usage: HidUsage): string {
  return `Page=${hex(usage.page, 4)}, Usage=${hex(usage.usage, 4)}`;
}

function formatUsageEntry(entry: UsageEntry): string {
  if (entry.min === entry.max) return `Usage: ${formatUsage({ page: entry.page, usage: entry.min })}`;
  return `Usage Range: Page=${hex(entry.page, 4)}, ${hex(entry.min, 4)}-${hex(entry.max, 4)}`;
}

function formatGlobal(field: HidGlobalField, value: number): string {
  switch (field) {
    case "usagePage":
      return `${GLOBAL_FIELD_LABELS[field]}: ${hex(value, 4)}`;
    case "reportSize":
      return `${GLOBAL_FIELD_LABELS[field]}: ${value} bits`;
    default:
      return `${GLOBAL_FIELD_LABELS[field]}: ${value}`;
  }
}

function formatField(field: PointerField, bitOffset: number, size: number): string {
  const sizeLabel = field === "buttons" ? "count" : "size";
  return `${FIELD_LABELS[field]}: offset=${bitOffset}, ${sizeLabel}=${size}`;
}

/**
 * Render one walk event as a single diagnostic line. Item events start with the item's byte
 * offset, name, prefix byte and payload; field events are indented under their Input item.
 */
export function formatHidWalkEvent(event: HidWalkEvent): string {
  switch (event.type) {
    case "global":
      return `${itemHeader(event.item)} -> ${formatGlobal(event.field, event.value)}`;
    case "usage":
      return `${itemHeader(event.item)} -> ${formatUsageEntry(event.entry)}`;
    case "usageMinimum":
      return `${itemHeader(event.item)} -> Usage Min: ${formatUsage(event.usage)}`;
    case "usageRangeDropped":
      return `${itemHeader(event.item)} -> Usage Max: ${formatUsage(event.maximum)} (dropped: Usage Min on page ${hex(event.minimum.page, 4)})`;
    case "collection":
      return `${itemHeader(event.item)} -> Collection Type: ${event.collectionType} (depth=${event.depth})${event.mouse ? " [mouse]" : ""}`;
    case "endCollection":
      return `${itemHeader(event.item)} -> End Collection (depth=${event.depth})`;
    case "input":
      return (
        `${itemHeader(event.item)} -> Input: report=${event.reportId} flags=${hex(event.flags, 2)} ` +
        `variable=${event.isVariable} relative=${event.isRelative} bitSize=${event.bitSize} bitOffset=${event.bitOffset}`
      );
    case "field":
      return `    -> ${formatField(event.field, event.bitOffset, event.size)}`;
    case "ignored":
      return itemHeader(event.item);
    case "long":
      return `${itemHeader(event.item)} -> Long item: tag=${hex(event.item.tag, 2)}, ${event.item.payload.byteLength} bytes`;
    case "truncated": {
      const offset = event.byteOffset.toString(16).toUpperCase().padStart(4, "0");
      return `[${offset}] truncated: ${event.remaining} trailing bytes`;
    }
    default: {
      const _exhaustive: never = event;
      throw new Error(`unknown walk event: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function formatLayoutTable(table: ReadonlyLayoutTable): string[] {
  const lines: string[] = [];
  const reportIds = Array.from(table.keys()).sort((a, b) => a - b);
  for (const reportId of reportIds) {
    const layout = table.get(reportId);
    if (!layout) continue;
    lines.push(`Report ID ${reportId}:`);
    lines.push(`  ${formatField("buttons", layout.buttonsBitOffset, layout.buttonsCount)}`);
    for (const axis of POINTER_AXES) {
      const { bitOffset, size } = getAxisPlacement(layout, axis);
      lines.push(`  ${formatField(axis, bitOffset, size)}`);
    }
    lines.push(`  Total bits: ${layout.totalBits}`);
  }
  return lines;
}

export type HidDescriptorTrace = {
  layouts: LayoutTable;
  lines: string[];
  // Set when the walk stopped before the end of the descriptor.
  truncation: { byteOffset: number; remaining: number } | null;
};

/** Walk a descriptor while recording a formatted line per event. */
export function traceHidReportDescriptor(
  descriptor: Uint8Array,
  opts: Omit<HidDescriptorWalkerOptions, "onEvent"> = {},
): HidDescriptorTrace {
  const lines: string[] = [];
  let truncation: HidDescriptorTrace["truncation"] = null;
  const walker = new HidDescriptorWalker({
    ...opts,
    onEvent: (event) => {
      if (event.type === "truncated") {
        truncation = { byteOffset: event.byteOffset, remaining: event.remaining };
      }
      lines.push(formatHidWalkEvent(event));
    },
  });
  const layouts = walker.walk(descriptor);
  return { layouts, lines, truncation };
}
