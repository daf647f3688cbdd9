import sharp from "sharp";
import type { Frame } from "./frame";
import { dlog } from "./logger";

// Any format sharp decodes (PNG, JPEG, WebP, TIFF, GIF). Alpha is flattened
// onto white so transparent areas read as paper, not as holes.
export async function decodeImage(input: Buffer | string): Promise<Frame> {
  const label = typeof input === "string" ? input : `${input.length}-byte buffer`;
  try {
    const { data, info } = await sharp(input)
      .flatten({ background: { r: 255, g: 255, b: 255 } })
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
      throw new Error(`expected 3 channels, got ${info.channels}`);
    }
    dlog(`[LOADER] ${label}: ${info.width}x${info.height}`);
    return {
      width: info.width,
      height: info.height,
      data: new Uint8Array(data.buffer, data.byteOffset, data.length),
    };
  } catch (err) {
    throw new Error(`Could not load image ${label}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// Encode a frame back to PNG (overlay exports, test fixtures).
export async function encodePng(frame: Frame): Promise<Buffer> {
  return sharp(Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.length), {
    raw: { width: frame.width, height: frame.height, channels: 3 },
  })
    .png()
    .toBuffer();
}
