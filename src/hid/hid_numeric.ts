// Payload decoding for short items.
//
// 2- and 4-byte payloads are read big-endian even though descriptors store them little-endian.
// Layout tables are compared against existing decoder output that reads them this way: a
// 2-byte Consumer usage `38 02` is 0x3802, not AC Pan 0x0238.

export type HidUsage = Readonly<{
  page: number;
  usage: number;
}>;

function viewOf(payload: Uint8Array): DataView {
  return new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
}

export function decodeHidUnsigned(payload: Uint8Array): number {
  switch (payload.byteLength) {
    case 1:
      return payload[0] ?? 0;
    case 2:
      return viewOf(payload).getUint16(0, false);
    case 4:
      return viewOf(payload).getUint32(0, false);
    default:
      return 0;
  }
}

export function decodeHidSigned(payload: Uint8Array): number {
  switch (payload.byteLength) {
    case 1:
      return viewOf(payload).getInt8(0);
    case 2:
      return viewOf(payload).getInt16(0, false);
    case 4:
      return viewOf(payload).getInt32(0, false);
    default:
      return 0;
  }
}

/**
 * Decode a Usage / Usage Minimum / Usage Maximum payload.
 *
 * A 4-byte payload carries an extended usage: the first two bytes are the usage id and the
 * last two the usage page. Shorter payloads report page 0; callers substitute the current
 * Usage Page global.
 */
export function decodeHidUsage(payload: Uint8Array): HidUsage {
  switch (payload.byteLength) {
    case 1:
    case 2:
      return { page: 0, usage: decodeHidUnsigned(payload) };
    case 4: {
      const view = viewOf(payload);
      return { page: view.getUint16(2, false), usage: view.getUint16(0, false) };
    }
    default:
      return { page: 0, usage: 0 };
  }
}
