import { describe, it, expect } from "vitest";
import {
  detectHoles,
  findHoleCandidates,
  measureContour,
  polygonArea,
  polygonPerimeter,
  type DetectionParams,
} from "../holeDetection";
import { createFrame } from "../frame";
import { DEFAULT_DETECTION_PARAMS } from "../config";
import { paintDisk, paintRect, paperFrame } from "./frames";

const square16 = [
  [10, 10], [10, 11], [10, 12], [10, 13], [10, 14],
  [11, 14], [12, 14], [13, 14], [14, 14],
  [14, 13], [14, 12], [14, 11], [14, 10],
  [13, 10], [12, 10], [11, 10],
].map(([x, y]) => ({ x, y }));

describe("contour metrics", () => {
  it("measures a traced square", () => {
    const c = measureContour(square16);
    expect(c).not.toBeNull();
    if (!c) return;
    expect(c.area).toBe(16);
    expect(c.perimeter).toBe(16);
    expect(c.circularity).toBeCloseTo(Math.PI / 4, 10);
    expect(c.radius).toBeCloseTo(Math.sqrt(16 / Math.PI), 10);
    expect(c.x).toBe(12);
    expect(c.y).toBe(12);
  });

  it("uses the absolute shoelace area regardless of winding", () => {
    const tri = [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 3 }];
    expect(polygonArea(tri)).toBe(6);
    expect(polygonArea([...tri].reverse())).toBe(6);
    expect(polygonPerimeter(tri)).toBe(12);
  });

  it("rejects degenerate contours with zero perimeter", () => {
    expect(measureContour([{ x: 3, y: 3 }])).toBeNull();
    expect(measureContour([{ x: 3, y: 3 }, { x: 3, y: 3 }])).toBeNull();
  });
});

describe("detectHoles", () => {
  it("finds one hole and reports the frame centre (640x480 with a 12px hole)", () => {
    const frame = paintDisk(paperFrame(640, 480), 100, 100, 12);
    const res = detectHoles(frame, DEFAULT_DETECTION_PARAMS);
    expect(res).not.toBeNull();
    if (!res) return;
    expect(res.targetCenter).toEqual({ x: 320, y: 240 });
    expect(res.holes).toHaveLength(1);
    const [h] = res.holes;
    expect(h.x).toBeCloseTo(100, 0);
    expect(h.y).toBeCloseTo(100, 0);
    expect(h.radius).toBeGreaterThan(11);
    expect(h.radius).toBeLessThan(12.5);
  });

  it("reports a small square as an equal-area disk", () => {
    const frame = paintRect(paperFrame(40, 40), 10, 10, 5, 5);
    const res = detectHoles(frame, DEFAULT_DETECTION_PARAMS);
    expect(res?.holes).toHaveLength(1);
    expect(res?.holes[0].x).toBe(12);
    expect(res?.holes[0].y).toBe(12);
    expect(res?.holes[0].radius).toBeCloseTo(2.2568, 4);
  });

  it("ignores pixels at or above the threshold", () => {
    const frame = paintRect(paperFrame(40, 40), 10, 10, 5, 5, 100);
    expect(detectHoles(frame, { ...DEFAULT_DETECTION_PARAMS, thresholdValue: 100 })?.holes).toEqual([]);
    expect(detectHoles(frame, { ...DEFAULT_DETECTION_PARAMS, thresholdValue: 101 })?.holes).toHaveLength(1);
  });

  it("drops elongated scratches by circularity", () => {
    // 2x20 bar: traced polygon is 1x19, circularity ~0.15
    const frame = paintRect(paperFrame(60, 60), 10, 10, 2, 20);
    expect(detectHoles(frame, DEFAULT_DETECTION_PARAMS)?.holes).toEqual([]);
    const loose = { ...DEFAULT_DETECTION_PARAMS, minHoleRadius: 0, minCircularity: 0.1 };
    expect(detectHoles(frame, loose)?.holes).toHaveLength(1);
  });

  it("drops borders with too few or too many points", () => {
    const loose: DetectionParams = { thresholdValue: 100, minHoleRadius: 0, maxHoleRadius: 1000, minCircularity: 0 };
    // 3x3 -> 8 border points; 200x200 -> 796 border points
    const small = paintRect(paperFrame(30, 30), 5, 5, 3, 3);
    const big = paintRect(paperFrame(260, 260), 20, 20, 200, 200);
    expect(detectHoles(small, loose)?.holes).toEqual([]);
    expect(detectHoles(big, loose)?.holes).toEqual([]);
  });

  it("keeps every reported hole inside the configured bounds", () => {
    const frame = paperFrame(320, 240);
    paintDisk(frame, 40, 40, 3);
    paintDisk(frame, 100, 60, 6.5);
    paintDisk(frame, 200, 80, 12);
    paintDisk(frame, 260, 180, 18);
    paintRect(frame, 60, 150, 4, 40);
    const configs: DetectionParams[] = [
      DEFAULT_DETECTION_PARAMS,
      { thresholdValue: 128, minHoleRadius: 5, maxHoleRadius: 13, minCircularity: 0.8 },
      { thresholdValue: 200, minHoleRadius: 1, maxHoleRadius: 50, minCircularity: 0.2 },
    ];
    for (const cfg of configs) {
      const found = findHoleCandidates(frame, cfg);
      expect(found.length).toBeGreaterThan(0);
      for (const c of found) {
        expect(c.radius).toBeGreaterThanOrEqual(cfg.minHoleRadius);
        expect(c.radius).toBeLessThanOrEqual(cfg.maxHoleRadius);
        expect(c.circularity).toBeGreaterThanOrEqual(cfg.minCircularity);
        expect((4 * Math.PI * Math.PI * c.radius * c.radius) / (c.perimeter * c.perimeter)).toBeCloseTo(c.circularity, 9);
      }
    }
  });

  it("is deterministic", () => {
    const frame = paintDisk(paintDisk(paperFrame(200, 200), 50, 50, 8), 150, 120, 10);
    const a = detectHoles(frame, DEFAULT_DETECTION_PARAMS);
    const b = detectHoles(frame, DEFAULT_DETECTION_PARAMS);
    expect(a).toEqual(b);
    expect(a?.holes).toHaveLength(2);
  });

  it("returns an empty list, not an error, for blank paper", () => {
    expect(detectHoles(paperFrame(5, 3), DEFAULT_DETECTION_PARAMS)).toEqual({
      targetCenter: { x: 2, y: 1 },
      holes: [],
    });
  });

  it("rejects frames without pixels", () => {
    expect(detectHoles(createFrame(0, 0), DEFAULT_DETECTION_PARAMS)).toBeNull();
    expect(detectHoles({ width: 10, height: 10, data: new Uint8Array(5) }, DEFAULT_DETECTION_PARAMS)).toBeNull();
  });
});
