// Raster frames handed to the core by the camera thread or the image loader.
// Samples are row-major RGB, 3 bytes per pixel, no padding between rows.

import { dwarn } from "./logger";

export type Point = { x: number; y: number };

export type Frame = {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
};

export type CropMargins = {
  left: number;
  right: number;
  top: number;
  bottom: number;
};

export function createFrame(width: number, height: number, data?: Uint8Array): Frame {
  return { width, height, data: data ?? new Uint8Array(width * height * 3) };
}

// Positive size and exactly width*height RGB samples.
export function isUsableFrame(frame: Frame): boolean {
  const { width, height, data } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height)) return false;
  if (width <= 0 || height <= 0) return false;
  return data.length === width * height * 3;
}

// ITU-R BT.601 luma, one sample per pixel.
export function toLuminance(frame: Frame): Float32Array {
  const { width: w, height: h, data } = frame;
  const n = w * h;
  const gray = new Float32Array(n);
  for (let i = 0, p = 0; i < n; i++, p += 3) {
    gray[i] = 0.299 * data[p] + 0.587 * data[p + 1] + 0.114 * data[p + 2];
  }
  return gray;
}

export function isValidCrop(frame: Frame, crop: CropMargins): boolean {
  const { left, right, top, bottom } = crop;
  const margins = [left, right, top, bottom];
  if (!margins.every((m) => Number.isInteger(m) && m >= 0)) return false;
  return left + right < frame.width && top + bottom < frame.height;
}

/**
 * Cut the margins off a frame. Returns the input unchanged when there is
 * nothing to cut or when the margins would leave no pixels behind.
 */
export function cropFrame(frame: Frame, crop: CropMargins): Frame {
  const { left, right, top, bottom } = crop;
  if (left === 0 && right === 0 && top === 0 && bottom === 0) return frame;
  if (!isValidCrop(frame, crop)) {
    dwarn(
      `[FRAME] crop ${left}/${right}/${top}/${bottom} does not fit ${frame.width}x${frame.height}; using full frame`,
    );
    return frame;
  }
  const w = frame.width - left - right;
  const h = frame.height - top - bottom;
  const out = new Uint8Array(w * h * 3);
  const srcStride = frame.width * 3;
  const rowBytes = w * 3;
  for (let y = 0; y < h; y++) {
    const start = (y + top) * srcStride + left * 3;
    out.set(frame.data.subarray(start, start + rowBytes), y * rowBytes);
  }
  return { width: w, height: h, data: out };
}
