// Border following over a binary mask (Suzuki & Abe, 1985).
// Every outer border and every hole border of the 8-connected foreground
// regions comes back as one closed contour. Pixels outside the mask are
// treated as background, so regions touching the frame edge still close.

import type { Point } from "./frame";

export type ContourKind = "outer" | "hole";

export type Contour = {
  points: Point[];
  kind: ContourKind;
};

// Clockwise on screen (y grows downwards), starting west.
const DIRS: ReadonlyArray<Point> = [
  { x: -1, y: 0 },
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: -1, y: 1 },
];
const EAST = 4;

function dirIndex(dx: number, dy: number): number {
  for (let i = 0; i < DIRS.length; i++) {
    if (DIRS[i].x === dx && DIRS[i].y === dy) return i;
  }
  return -1;
}

/**
 * Trace all borders of `mask` (non-zero = foreground). Contours are returned
 * in the raster order of their starting pixel.
 */
export function traceContours(mask: Uint8Array, width: number, height: number): Contour[] {
  // 0 background, 1 unvisited foreground, +/-n visited by border n
  const labels = new Int32Array(width * height);
  for (let i = 0; i < labels.length; i++) labels[i] = mask[i] ? 1 : 0;

  const at = (x: number, y: number) => x + y * width;
  const isSet = (x: number, y: number) =>
    x >= 0 && y >= 0 && x < width && y < height && labels[at(x, y)] !== 0;

  const contours: Contour[] = [];
  let borderNum = 1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const v = labels[at(x, y)];
      if (v === 0) continue;

      let startX: number;
      let kind: ContourKind;
      if (v === 1 && (x === 0 || labels[at(x - 1, y)] === 0)) {
        startX = x - 1;
        kind = "outer";
      } else if (v > 0 && (x + 1 === width || labels[at(x + 1, y)] === 0)) {
        startX = x + 1;
        kind = "hole";
      } else {
        continue;
      }

      borderNum++;
      const points: Point[] = [];
      const first = dirIndex(startX - x, 0);

      // Clockwise from the background neighbour for the last pixel of the loop
      let lastX = -1;
      let lastY = -1;
      for (let k = 0; k < 8; k++) {
        const d = DIRS[(first + k) % 8];
        if (isSet(x + d.x, y + d.y)) {
          lastX = x + d.x;
          lastY = y + d.y;
          break;
        }
      }

      if (lastX < 0) {
        // isolated pixel
        points.push({ x, y });
        labels[at(x, y)] = -borderNum;
        contours.push({ points, kind });
        continue;
      }

      let prevX = startX;
      let prevY = y;
      let curX = x;
      let curY = y;
      for (;;) {
        points.push({ x: curX, y: curY });
        const from = dirIndex(prevX - curX, prevY - curY);

        // Counter-clockwise from the previous pixel to the next border pixel
        let nextDir = from;
        let eastExamined = false;
        for (let k = 1; k <= 8; k++) {
          const di = (from + 8 - k) % 8;
          const d = DIRS[di];
          if (isSet(curX + d.x, curY + d.y)) {
            nextDir = di;
            break;
          }
          if (di === EAST) eastExamined = true;
        }
        const nextX = curX + DIRS[nextDir].x;
        const nextY = curY + DIRS[nextDir].y;

        const idx = at(curX, curY);
        if (curX + 1 === width || eastExamined) labels[idx] = -borderNum;
        else if (labels[idx] === 1) labels[idx] = borderNum;

        if (nextX === x && nextY === y && curX === lastX && curY === lastY) break;
        prevX = curX;
        prevY = curY;
        curX = nextX;
        curY = nextY;
      }
      contours.push({ points, kind });
    }
  }
  return contours;
}
