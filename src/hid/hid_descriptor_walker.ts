import { iterateHidItems, type HidItem } from "./hid_item_reader";
import { decodeHidSigned, decodeHidUnsigned, decodeHidUsage, type HidUsage } from "./hid_numeric";
import {
  createReportLayout,
  setAxisPlacement,
  type LayoutTable,
  type PointerAxis,
  type PointerField,
  type ReadonlyLayoutTable,
  type ReportLayout,
} from "./hid_report_layout";
import {
  HID_GLOBAL_TAG_LOGICAL_MAXIMUM,
  HID_GLOBAL_TAG_LOGICAL_MINIMUM,
  HID_GLOBAL_TAG_REPORT_COUNT,
  HID_GLOBAL_TAG_REPORT_ID,
  HID_GLOBAL_TAG_REPORT_SIZE,
  HID_GLOBAL_TAG_USAGE_PAGE,
  HID_INPUT_FLAG_RELATIVE,
  HID_INPUT_FLAG_VARIABLE,
  HID_LOCAL_TAG_USAGE,
  HID_LOCAL_TAG_USAGE_MAXIMUM,
  HID_LOCAL_TAG_USAGE_MINIMUM,
  HID_MAIN_TAG_COLLECTION,
  HID_MAIN_TAG_END_COLLECTION,
  HID_MAIN_TAG_INPUT,
  HID_USAGE_CONSUMER_AC_PAN,
  HID_USAGE_GENERIC_DESKTOP_MOUSE,
  HID_USAGE_GENERIC_DESKTOP_WHEEL,
  HID_USAGE_GENERIC_DESKTOP_X,
  HID_USAGE_GENERIC_DESKTOP_Y,
  HID_USAGE_PAGE_BUTTON,
  HID_USAGE_PAGE_CONSUMER,
  HID_USAGE_PAGE_GENERIC_DESKTOP,
} from "./hid_usages";

export interface HidGlobalState {
  usagePage: number;
  logicalMinimum: number;
  logicalMaximum: number;
  reportSize: number;
  reportCount: number;
  reportId: number;
}

export type HidGlobalField = keyof HidGlobalState;

// A Usage is stored as the degenerate range `min === max`.
export type UsageEntry = Readonly<{
  page: number;
  min: number;
  max: number;
}>;

export type HidWalkEvent =
  | { type: "global"; item: HidItem; field: HidGlobalField; value: number }
  | { type: "usage"; item: HidItem; entry: UsageEntry }
  | { type: "usageMinimum"; item: HidItem; usage: HidUsage }
  | { type: "usageRangeDropped"; item: HidItem; minimum: HidUsage; maximum: HidUsage }
  | { type: "collection"; item: HidItem; collectionType: number; depth: number; mouse: boolean }
  | { type: "endCollection"; item: HidItem; depth: number }
  | {
      type: "input";
      item: HidItem;
      reportId: number;
      flags: number;
      isVariable: boolean;
      isRelative: boolean;
      bitSize: number;
      bitOffset: number;
    }
  | { type: "field"; item: HidItem; reportId: number; field: PointerField; bitOffset: number; size: number }
  | { type: "ignored"; item: HidItem }
  | { type: "long"; item: HidItem }
  | { type: "truncated"; byteOffset: number; remaining: number };

export type HidDescriptorWalkerOptions = {
  onEvent?: (event: HidWalkEvent) => void;
  // Bytes past this many are treated as absent, which ends the walk as a truncation.
  maxDescriptorBytes?: number;
};

const AXIS_USAGES: ReadonlyArray<{ page: number; usage: number; axis: PointerAxis }> = [
  { page: HID_USAGE_PAGE_GENERIC_DESKTOP, usage: HID_USAGE_GENERIC_DESKTOP_X, axis: "x" },
  { page: HID_USAGE_PAGE_GENERIC_DESKTOP, usage: HID_USAGE_GENERIC_DESKTOP_Y, axis: "y" },
  { page: HID_USAGE_PAGE_GENERIC_DESKTOP, usage: HID_USAGE_GENERIC_DESKTOP_WHEEL, axis: "wheel" },
  { page: HID_USAGE_PAGE_CONSUMER, usage: HID_USAGE_CONSUMER_AC_PAN, axis: "pan" },
];

function isSingleUsage(entry: UsageEntry, page: number, usage: number): boolean {
  return entry.page === page && entry.min === usage && entry.max === usage;
}

/**
 * Folds report descriptor items into per-report pointer layouts.
 *
 * One instance owns the parsing state of one descriptor. The state deliberately differs from a
 * full HID parser in a few places that existing layout consumers depend on:
 * - only Input items clear the pending usage list (Output, Feature and collections keep it);
 * - a Report ID item always restarts the bit cursor at 0, even for an id seen before;
 * - multi-byte payloads are read big-endian (see `hid_numeric.ts`).
 */
export class HidDescriptorWalker {
  readonly #onEvent: ((event: HidWalkEvent) => void) | undefined;
  readonly #maxDescriptorBytes: number;

  readonly #globals: HidGlobalState = {
    usagePage: 0,
    logicalMinimum: 0,
    logicalMaximum: 0,
    reportSize: 0,
    reportCount: 0,
    reportId: 0,
  };
  #usages: UsageEntry[] = [];
  #pendingUsageMinimum: HidUsage | null = null;
  #depth = 0;
  #inMouseCollection = false;
  #bitOffset = 0;
  readonly #layouts: LayoutTable = new Map();
  #walked = false;

  constructor(opts: HidDescriptorWalkerOptions = {}) {
    const max = opts.maxDescriptorBytes ?? Number.POSITIVE_INFINITY;
    if (Number.isNaN(max) || max < 0) {
      throw new Error(`invalid maxDescriptorBytes: ${String(opts.maxDescriptorBytes)}`);
    }
    this.#onEvent = opts.onEvent;
    this.#maxDescriptorBytes = max;
  }

  get globals(): Readonly<HidGlobalState> {
    return this.#globals;
  }

  get pendingUsages(): readonly UsageEntry[] {
    return this.#usages;
  }

  get pendingUsageMinimum(): HidUsage | null {
    return this.#pendingUsageMinimum;
  }

  get collectionDepth(): number {
    return this.#depth;
  }

  get inMouseCollection(): boolean {
    return this.#inMouseCollection;
  }

  get bitOffset(): number {
    return this.#bitOffset;
  }

  get layouts(): ReadonlyLayoutTable {
    return this.#layouts;
  }

  /**
   * Walk a whole descriptor and return the layout table.
   *
   * Stops quietly at the first item that does not fit in the remaining bytes; everything
   * accumulated before it is kept.
   */
  walk(descriptor: Uint8Array): LayoutTable {
    if (this.#walked) {
      throw new Error("HidDescriptorWalker instances are single-use; create a new walker per descriptor");
    }
    this.#walked = true;

    const bytes =
      descriptor.byteLength > this.#maxDescriptorBytes
        ? descriptor.subarray(0, this.#maxDescriptorBytes)
        : descriptor;
    let consumed = 0;
    for (const item of iterateHidItems(bytes)) {
      this.apply(item);
      consumed = item.byteOffset + item.byteLength;
    }
    if (consumed < descriptor.byteLength) {
      this.#emit({ type: "truncated", byteOffset: consumed, remaining: descriptor.byteLength - consumed });
    }
    return this.#layouts;
  }

  apply(item: HidItem): void {
    switch (item.kind) {
      case "global":
        this.#applyGlobal(item);
        return;
      case "local":
        this.#applyLocal(item);
        return;
      case "main":
        this.#applyMain(item);
        return;
      case "long":
        this.#emit({ type: "long", item });
        return;
      case "reserved":
        this.#emit({ type: "ignored", item });
        return;
      default: {
        const _exhaustive: never = item.kind;
        throw new Error(`unknown HID item kind: ${String(_exhaustive)}`);
      }
    }
  }

  #emit(event: HidWalkEvent): void {
    this.#onEvent?.(event);
  }

  #ensureLayout(reportId: number): ReportLayout {
    let layout = this.#layouts.get(reportId);
    if (!layout) {
      layout = createReportLayout(reportId);
      this.#layouts.set(reportId, layout);
    }
    return layout;
  }

  #setGlobal(item: HidItem, field: HidGlobalField, value: number): void {
    this.#globals[field] = value;
    this.#emit({ type: "global", item, field, value });
  }

  #applyGlobal(item: HidItem): void {
    switch (item.tag) {
      case HID_GLOBAL_TAG_USAGE_PAGE:
        this.#setGlobal(item, "usagePage", decodeHidUnsigned(item.payload));
        return;
      case HID_GLOBAL_TAG_LOGICAL_MINIMUM:
        this.#setGlobal(item, "logicalMinimum", decodeHidSigned(item.payload));
        return;
      case HID_GLOBAL_TAG_LOGICAL_MAXIMUM:
        this.#setGlobal(item, "logicalMaximum", decodeHidSigned(item.payload));
        return;
      case HID_GLOBAL_TAG_REPORT_SIZE:
        this.#setGlobal(item, "reportSize", decodeHidUnsigned(item.payload));
        return;
      case HID_GLOBAL_TAG_REPORT_COUNT:
        this.#setGlobal(item, "reportCount", decodeHidUnsigned(item.payload));
        return;
      case HID_GLOBAL_TAG_REPORT_ID: {
        const reportId = decodeHidUnsigned(item.payload);
        this.#setGlobal(item, "reportId", reportId);
        this.#ensureLayout(reportId);
        this.#bitOffset = 0;
        return;
      }
      default:
        this.#emit({ type: "ignored", item });
    }
  }

  #decodeUsage(item: HidItem): HidUsage {
    const usage = decodeHidUsage(item.payload);
    return usage.page === 0 ? { page: this.#globals.usagePage, usage: usage.usage } : usage;
  }

  #pushUsage(item: HidItem, entry: UsageEntry): void {
    this.#usages.push(entry);
    this.#emit({ type: "usage", item, entry });
  }

  #applyLocal(item: HidItem): void {
    switch (item.tag) {
      case HID_LOCAL_TAG_USAGE: {
        const { page, usage } = this.#decodeUsage(item);
        this.#pushUsage(item, { page, min: usage, max: usage });
        return;
      }
      case HID_LOCAL_TAG_USAGE_MINIMUM: {
        const usage = this.#decodeUsage(item);
        this.#pendingUsageMinimum = usage;
        this.#emit({ type: "usageMinimum", item, usage });
        return;
      }
      case HID_LOCAL_TAG_USAGE_MAXIMUM: {
        const maximum = this.#decodeUsage(item);
        const minimum = this.#pendingUsageMinimum;
        if (!minimum) {
          this.#pushUsage(item, { page: maximum.page, min: maximum.usage, max: maximum.usage });
          return;
        }
        this.#pendingUsageMinimum = null;
        if (minimum.page === maximum.page) {
          this.#pushUsage(item, { page: maximum.page, min: minimum.usage, max: maximum.usage });
        } else {
          this.#emit({ type: "usageRangeDropped", item, minimum, maximum });
        }
        return;
      }
      default:
        this.#emit({ type: "ignored", item });
    }
  }

  #applyMain(item: HidItem): void {
    switch (item.tag) {
      case HID_MAIN_TAG_COLLECTION: {
        this.#depth += 1;
        const mouse = this.#usages.some((entry) =>
          isSingleUsage(entry, HID_USAGE_PAGE_GENERIC_DESKTOP, HID_USAGE_GENERIC_DESKTOP_MOUSE),
        );
        if (mouse) this.#inMouseCollection = true;
        this.#emit({
          type: "collection",
          item,
          collectionType: decodeHidUnsigned(item.payload),
          depth: this.#depth,
          mouse,
        });
        return;
      }
      case HID_MAIN_TAG_END_COLLECTION:
        this.#depth = Math.max(0, this.#depth - 1);
        if (this.#depth === 0) this.#inMouseCollection = false;
        this.#emit({ type: "endCollection", item, depth: this.#depth });
        return;
      case HID_MAIN_TAG_INPUT:
        this.#applyInput(item);
        return;
      default:
        // Output and Feature describe no pointer fields and leave the pending usages in place.
        this.#emit({ type: "ignored", item });
    }
  }

  #applyInput(item: HidItem): void {
    const flags = decodeHidUnsigned(item.payload);
    const isVariable = (flags & HID_INPUT_FLAG_VARIABLE) !== 0;
    const isRelative = (flags & HID_INPUT_FLAG_RELATIVE) !== 0;
    const { reportId, reportSize, reportCount } = this.#globals;
    const bitSize = reportSize * reportCount;
    const base = this.#bitOffset;
    const layout = this.#ensureLayout(reportId);

    this.#emit({ type: "input", item, reportId, flags, isVariable, isRelative, bitSize, bitOffset: base });

    let usageIndex = 0;
    for (const entry of this.#usages) {
      // Variable fields get one report-size slot per usage; array fields all share the base offset.
      const fieldBitOffset = isVariable && usageIndex < reportCount ? base + usageIndex * reportSize : base;

      if (entry.page === HID_USAGE_PAGE_BUTTON && entry.min >= 1) {
        if (layout.buttonsCount === 0) layout.buttonsBitOffset = base;
        const count = isVariable ? reportCount : entry.max - entry.min + 1;
        layout.buttonsCount = Math.max(layout.buttonsCount, count);
        this.#emit({
          type: "field",
          item,
          reportId,
          field: "buttons",
          bitOffset: layout.buttonsBitOffset,
          size: layout.buttonsCount,
        });
      }

      if (isVariable) {
        for (const { page, usage, axis } of AXIS_USAGES) {
          if (!isSingleUsage(entry, page, usage)) continue;
          setAxisPlacement(layout, axis, fieldBitOffset, reportSize);
          this.#emit({ type: "field", item, reportId, field: axis, bitOffset: fieldBitOffset, size: reportSize });
        }
        usageIndex += 1;
      }
    }

    this.#bitOffset = base + bitSize;
    layout.totalBits = this.#bitOffset;
    this.#usages = [];
  }
}

export function walkHidReportDescriptor(
  descriptor: Uint8Array,
  opts: HidDescriptorWalkerOptions = {},
): LayoutTable {
  return new HidDescriptorWalker(opts).walk(descriptor);
}
