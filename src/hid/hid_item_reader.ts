import { HID_LONG_ITEM_PREFIX } from "./hid_usages";

export type HidItemKind = "main" | "global" | "local" | "reserved" | "long";

const SHORT_ITEM_KINDS: readonly HidItemKind[] = ["main", "global", "local", "reserved"];

export type HidItem = Readonly<{
  kind: HidItemKind;
  // Short items: bits 4..7 of the prefix. Long items: the bLongItemTag header byte.
  tag: number;
  prefix: number;
  payload: Uint8Array;
  byteOffset: number;
  // Prefix, header and payload.
  byteLength: number;
}>;

/**
 * Read one report descriptor item starting at `offset`.
 *
 * Returns `null` at the end of the buffer, or when the item's declared size runs past it. A
 * truncated descriptor is not an error; callers stop walking and keep what they have.
 */
export function readHidItem(bytes: Uint8Array, offset: number): HidItem | null {
  if (offset < 0 || offset >= bytes.byteLength) return null;
  const prefix = bytes[offset] ?? 0;

  if (prefix === HID_LONG_ITEM_PREFIX) {
    if (offset + 3 > bytes.byteLength) return null;
    const dataSize = bytes[offset + 1] ?? 0;
    const longTag = bytes[offset + 2] ?? 0;
    const start = offset + 3;
    if (start + dataSize > bytes.byteLength) return null;
    return {
      kind: "long",
      tag: longTag,
      prefix,
      payload: bytes.subarray(start, start + dataSize),
      byteOffset: offset,
      byteLength: 3 + dataSize,
    };
  }

  const sizeCode = prefix & 0x03;
  const size = sizeCode === 3 ? 4 : sizeCode;
  const start = offset + 1;
  if (start + size > bytes.byteLength) return null;
  return {
    kind: SHORT_ITEM_KINDS[(prefix >> 2) & 0x03] ?? "reserved",
    tag: (prefix >> 4) & 0x0f,
    prefix,
    payload: bytes.subarray(start, start + size),
    byteOffset: offset,
    byteLength: 1 + size,
  };
}

export function* iterateHidItems(bytes: Uint8Array): Generator<HidItem, void, void> {
  let offset = 0;
  for (;;) {
    const item = readHidItem(bytes, offset);
    if (!item) return;
    yield item;
    offset += item.byteLength;
  }
}
