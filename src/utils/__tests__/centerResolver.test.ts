import { describe, it, expect } from "vitest";
import { gatingRadiusPx, resolveTargetCenter } from "../centerResolver";
import type { DetectionResult } from "../holeDetection";

const calib = { targetDiameterMm: 154.4, pixelsPerMm: 1 };

function detection(holes: Array<[number, number]>): DetectionResult {
  return { targetCenter: { x: 320, y: 240 }, holes: holes.map(([x, y]) => ({ x, y, radius: 4 })) };
}

describe("resolveTargetCenter", () => {
  it("keeps the frame centre without a manual override", () => {
    const res = resolveTargetCenter(detection([[330, 250]]), null, calib);
    expect(res.targetCenter).toEqual({ x: 320, y: 240 });
    expect(res.exactCenter).toEqual({ x: 320, y: 240 });
    expect(res.holes).toHaveLength(1);
  });

  it("truncates the reported manual centre but gates on the exact one", () => {
    expect(gatingRadiusPx(calib)).toBeCloseTo(115.8, 9);
    const res = resolveTargetCenter(detection([[166.4, 60.2], [166.6, 60.2]]), { x: 50.7, y: 60.2 }, calib);
    expect(res.targetCenter).toEqual({ x: 50, y: 60 });
    expect(res.exactCenter).toEqual({ x: 50.7, y: 60.2 });
    expect(res.holes.map((h) => h.x)).toEqual([166.4]);
  });

  it("truncates negative coordinates toward zero", () => {
    expect(resolveTargetCenter(detection([]), { x: -3.7, y: 2.9 }, calib).targetCenter).toEqual({ x: -3, y: 2 });
  });

  it("drops every hole when the calibration is unusable", () => {
    const d = detection([[320, 240]]);
    expect(resolveTargetCenter(d, null, { ...calib, pixelsPerMm: 0 }).holes).toEqual([]);
    expect(resolveTargetCenter(d, null, { ...calib, pixelsPerMm: Number.NaN }).holes).toEqual([]);
  });

  it("leaves its input alone", () => {
    const d = detection([[320, 240], [900, 900]]);
    const manual = { x: 321.5, y: 240.5 };
    resolveTargetCenter(d, manual, calib);
    expect(d.holes).toHaveLength(2);
    expect(d.targetCenter).toEqual({ x: 320, y: 240 });
    expect(manual).toEqual({ x: 321.5, y: 240.5 });
  });
});
