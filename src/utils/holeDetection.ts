// Bullet hole detector
// Strategy:
// - Grayscale the frame and binarize: a pixel is a hole pixel when it is darker than the threshold
// - Trace every border of the dark regions
// - Drop borders that are too short (sensor noise) or too long (background, black aiming mark)
// - Keep near-disks: circularity 4*pi*A/P^2 against a configurable floor
// - Report each survivor as centroid + equal-area radius
// Pure function of its inputs; no state between calls.

import { isUsableFrame, toLuminance, type Frame, type Point } from "./frame";
import { traceContours } from "./contours";
import { dlog } from "./logger";

export type DetectionParams = {
  thresholdValue: number; // 0..255, foreground iff luminance < threshold
  minHoleRadius: number; // px
  maxHoleRadius: number; // px
  minCircularity: number; // 0..1
};

export type Hole = { x: number; y: number; radius: number };

export type DetectionResult = {
  targetCenter: Point; // integer pixels
  holes: Hole[];
};

export type HoleCandidate = Hole & {
  area: number;
  perimeter: number;
  circularity: number;
};

// Contours must have strictly more than MIN and strictly fewer than MAX points
export const MIN_CONTOUR_POINTS = 10;
export const MAX_CONTOUR_POINTS = 500;

export function polygonArea(points: Point[]): number {
  let twice = 0;
  for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
    twice += points[j].x * points[i].y - points[i].x * points[j].y;
  }
  return Math.abs(twice) / 2;
}

export function polygonPerimeter(points: Point[]): number {
  if (points.length < 2) return 0;
  let sum = 0;
  for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
    sum += Math.hypot(points[i].x - points[j].x, points[i].y - points[j].y);
  }
  return sum;
}

/**
 * Shape metrics for one traced border. Returns null for degenerate borders
 * (zero perimeter), which can never be scored.
 */
export function measureContour(points: Point[]): HoleCandidate | null {
  const perimeter = polygonPerimeter(points);
  if (!(perimeter > 0)) return null;
  const area = polygonArea(points);
  const circularity = (4 * Math.PI * area) / (perimeter * perimeter);
  // Vertex mean, not the area centroid: boundary points are evenly spaced
  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.x;
    sy += p.y;
  }
  return {
    x: sx / points.length,
    y: sy / points.length,
    radius: Math.sqrt(area / Math.PI),
    area,
    perimeter,
    circularity,
  };
}

export function findHoleCandidates(frame: Frame, params: DetectionParams): HoleCandidate[] {
  const { width: w, height: h } = frame;
  const gray = toLuminance(frame);
  const mask = new Uint8Array(w * h);
  for (let i = 0; i < mask.length; i++) mask[i] = gray[i] < params.thresholdValue ? 1 : 0;

  const out: HoleCandidate[] = [];
  for (const contour of traceContours(mask, w, h)) {
    const n = contour.points.length;
    if (n <= MIN_CONTOUR_POINTS || n >= MAX_CONTOUR_POINTS) continue;
    const c = measureContour(contour.points);
    if (!c) continue;
    if (c.circularity < params.minCircularity) continue;
    if (c.radius < params.minHoleRadius || c.radius > params.maxHoleRadius) continue;
    out.push(c);
  }
  return out;
}

/**
 * Detect hole candidates in a frame. Returns null only for frames with no
 * pixels (or a sample buffer that does not match the size); an empty `holes`
 * list is the normal "nothing found" answer.
 */
export function detectHoles(frame: Frame, params: DetectionParams): DetectionResult | null {
  if (!isUsableFrame(frame)) {
    dlog(`[DETECTOR] rejected frame ${frame.width}x${frame.height} (${frame.data.length} bytes)`);
    return null;
  }
  const holes = findHoleCandidates(frame, params).map(({ x, y, radius }) => ({ x, y, radius }));
  dlog(`[DETECTOR] ${holes.length} hole(s) in ${frame.width}x${frame.height}`);
  return {
    targetCenter: { x: Math.floor(frame.width / 2), y: Math.floor(frame.height / 2) },
    holes,
  };
}
