// Bit positions are relative to the start of the report data, i.e. after the report id prefix
// byte when the report id is non-zero.
export interface ReportLayout {
  reportId: number;
  buttonsBitOffset: number;
  buttonsCount: number;
  xBitOffset: number;
  xSize: number;
  yBitOffset: number;
  ySize: number;
  wheelBitOffset: number;
  wheelSize: number;
  panBitOffset: number;
  panSize: number;
  totalBits: number;
}

export type LayoutTable = Map<number, ReportLayout>;
export type ReadonlyLayoutTable = ReadonlyMap<number, Readonly<ReportLayout>>;

export type PointerAxis = "x" | "y" | "wheel" | "pan";
export type PointerField = "buttons" | PointerAxis;

export const POINTER_AXES: readonly PointerAxis[] = ["x", "y", "wheel", "pan"];

export function createReportLayout(reportId: number): ReportLayout {
  return {
    reportId,
    buttonsBitOffset: 0,
    buttonsCount: 0,
    xBitOffset: 0,
    xSize: 0,
    yBitOffset: 0,
    ySize: 0,
    wheelBitOffset: 0,
    wheelSize: 0,
    panBitOffset: 0,
    panSize: 0,
    totalBits: 0,
  };
}

export function getAxisPlacement(layout: Readonly<ReportLayout>, axis: PointerAxis): { bitOffset: number; size: number } {
  switch (axis) {
    case "x":
      return { bitOffset: layout.xBitOffset, size: layout.xSize };
    case "y":
      return { bitOffset: layout.yBitOffset, size: layout.ySize };
    case "wheel":
      return { bitOffset: layout.wheelBitOffset, size: layout.wheelSize };
    case "pan":
      return { bitOffset: layout.panBitOffset, size: layout.panSize };
    default: {
      const _exhaustive: never = axis;
      throw new Error(`unknown pointer axis: ${String(_exhaustive)}`);
    }
  }
}

export function setAxisPlacement(layout: ReportLayout, axis: PointerAxis, bitOffset: number, size: number): void {
  switch (axis) {
    case "x":
      layout.xBitOffset = bitOffset;
      layout.xSize = size;
      return;
    case "y":
      layout.yBitOffset = bitOffset;
      layout.ySize = size;
      return;
    case "wheel":
      layout.wheelBitOffset = bitOffset;
      layout.wheelSize = size;
      return;
    case "pan":
      layout.panBitOffset = bitOffset;
      layout.panSize = size;
      return;
    default: {
      const _exhaustive: never = axis;
      throw new Error(`unknown pointer axis: ${String(_exhaustive)}`);
    }
  }
}
