import { addI32Saturating, clampI32 } from "./int32";

// Per-packet limits of the outgoing 6-byte mouse report (int16 X/Y, int8 wheel); -32768 and
// -128 are never sent.
export const MOUSE_PACKET_AXIS_LIMIT = 32767;
export const MOUSE_PACKET_WHEEL_LIMIT = 127;
export const MOUSE_PACKET_BYTES = 6;

export type MouseMotionSample = Readonly<{
  dx: number;
  dy: number;
  wheel: number;
  buttons: number;
}>;

export type MouseMotionPacket = Readonly<{
  dx: number;
  dy: number;
  wheel: number;
  buttons: number;
  buttonsChanged: boolean;
}>;

/**
 * Decouples the rate at which input reports arrive from the rate packets go out: samples are
 * summed as they arrive and drained on the sender's own schedule via `take()`.
 */
export class MouseMotionAccumulator {
  #dx = 0;
  #dy = 0;
  #wheel = 0;
  #buttons = 0;
  #motionDirty = false;
  #buttonsDirty = false;

  get pending(): Readonly<{ dx: number; dy: number; wheel: number; buttons: number }> {
    return { dx: this.#dx, dy: this.#dy, wheel: this.#wheel, buttons: this.#buttons };
  }

  get dirty(): boolean {
    return this.#motionDirty || this.#buttonsDirty;
  }

  add(sample: MouseMotionSample): void {
    this.#dx = addI32Saturating(this.#dx, sample.dx);
    this.#dy = addI32Saturating(this.#dy, sample.dy);
    this.#wheel = addI32Saturating(this.#wheel, sample.wheel);
    if (sample.dx !== 0 || sample.dy !== 0 || sample.wheel !== 0) {
      this.#motionDirty = true;
    }
    if (sample.buttons !== this.#buttons) {
      this.#buttons = sample.buttons;
      this.#buttonsDirty = true;
    }
  }

  /**
   * Drain up to one packet worth of motion.
   *
   * Returns `null` when nothing changed since the last packet. Motion beyond the packet limits
   * stays in the accumulator and is reported by later calls.
   */
  take(): MouseMotionPacket | null {
    if (!this.#motionDirty && !this.#buttonsDirty) return null;

    const dx = clampI32(this.#dx, -MOUSE_PACKET_AXIS_LIMIT, MOUSE_PACKET_AXIS_LIMIT);
    const dy = clampI32(this.#dy, -MOUSE_PACKET_AXIS_LIMIT, MOUSE_PACKET_AXIS_LIMIT);
    const wheel = clampI32(this.#wheel, -MOUSE_PACKET_WHEEL_LIMIT, MOUSE_PACKET_WHEEL_LIMIT);
    const packet: MouseMotionPacket = {
      dx,
      dy,
      wheel,
      buttons: this.#buttons,
      buttonsChanged: this.#buttonsDirty,
    };

    this.#dx -= dx;
    this.#dy -= dy;
    this.#wheel -= wheel;
    this.#motionDirty = this.#dx !== 0 || this.#dy !== 0 || this.#wheel !== 0;
    this.#buttonsDirty = false;
    return packet;
  }

  /** Put a packet that could not be sent back into the accumulator. */
  restore(packet: MouseMotionPacket): void {
    this.#dx = addI32Saturating(this.#dx, packet.dx);
    this.#dy = addI32Saturating(this.#dy, packet.dy);
    this.#wheel = addI32Saturating(this.#wheel, packet.wheel);
    this.#buttons = packet.buttons;
    this.#motionDirty = true;
    this.#buttonsDirty = true;
  }

  clear(): void {
    this.#dx = 0;
    this.#dy = 0;
    this.#wheel = 0;
    this.#buttons = 0;
    this.#motionDirty = false;
    this.#buttonsDirty = false;
  }
}

/** Encode a packet as: buttons (low 3 bits), X int16 LE, Y int16 LE, wheel int8. */
export function encodeMouseMotionPacket(packet: MouseMotionPacket): Uint8Array {
  const out = new Uint8Array(MOUSE_PACKET_BYTES);
  const view = new DataView(out.buffer);
  view.setUint8(0, packet.buttons & 0x07);
  view.setInt16(1, packet.dx, true);
  view.setInt16(3, packet.dy, true);
  view.setInt8(5, packet.wheel);
  return out;
}
