import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseArgs, run } from "../scoreImage";
import { encodePng } from "../../utils/imageLoader";
import { paintDisk, paperFrame } from "../../utils/__tests__/frames";

describe("parseArgs", () => {
  it("reads the image and every option", () => {
    expect(
      parseArgs([
        "sheet.png",
        "--threshold", "90",
        "--ppm", "4.5",
        "--center", "10.5, 20",
        "--mode", "ring",
        "--profile", "air.json",
        "--crop", "1,2,3,4",
      ]),
    ).toEqual({
      image: "sheet.png",
      threshold: 90,
      ppm: 4.5,
      center: { x: 10.5, y: 20 },
      mode: "ring",
      profile: "air.json",
      crop: [1, 2, 3, 4],
    });
  });

  it("rejects bad input", () => {
    expect(() => parseArgs([])).toThrow("Usage: score-image <image> [options]");
    expect(() => parseArgs(["a.png", "b.png"])).toThrow("Only one image can be scored at a time");
    expect(() => parseArgs(["a.png", "--zoom", "2"])).toThrow("Unknown option --zoom");
    expect(() => parseArgs(["a.png", "--ppm"])).toThrow("--ppm needs a value");
    expect(() => parseArgs(["a.png", "--center", "1"])).toThrow('--center expects 2 comma-separated numbers, got "1"');
    expect(() => parseArgs(["a.png", "--mode", "olympic"])).toThrow('--mode must be decimal or ring, got "olympic"');
  });

  it("rejects calibration and detection values it cannot honour", () => {
    expect(() => parseArgs(["a.png", "--ppm", "0"])).toThrow('--ppm must be a positive number, got "0"');
    expect(() => parseArgs(["a.png", "--ppm", "-3"])).toThrow('--ppm must be a positive number, got "-3"');
    expect(() => parseArgs(["a.png", "--threshold", "900"])).toThrow('--threshold must be between 0 and 255, got "900"');
    expect(() => parseArgs(["a.png", "--threshold", "-1"])).toThrow('--threshold must be between 0 and 255, got "-1"');
    expect(() => parseArgs(["a.png", "--crop", "-5,0,0,0"])).toThrow(
      '--crop margins must be non-negative whole numbers, got "-5,0,0,0"',
    );
    expect(() => parseArgs(["a.png", "--crop", "1.5,0,0,0"])).toThrow(
      '--crop margins must be non-negative whole numbers, got "1.5,0,0,0"',
    );
    expect(parseArgs(["a.png", "--threshold", "0", "--crop", "0,0,0,0"])).toEqual({
      image: "a.png",
      threshold: 0,
      crop: [0, 0, 0, 0],
    });
  });
});

describe("run", () => {
  let dir = "";
  let image = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "score-image-"));
    image = join(dir, "sheet.png");
    await writeFile(image, await encodePng(paintDisk(paperFrame(640, 480), 100, 100, 12)));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints the score of a photographed sheet", async () => {
    const out = await run({ image, ppm: 10 });
    expect(out.split("\n")).toEqual(["#1   8.1     7  26.08mm", "Total 8.1 over 1 shot(s), average 8.10"]);
  });

  it("scores whole rings around a manual centre", async () => {
    const out = await run({ image, ppm: 10, mode: "ring", center: { x: 100, y: 100 } });
    expect(out.split("\n")).toEqual(["#1  10.0    10  0.00mm", "Total 10.0 over 1 shot(s), average 10.00"]);
  });

  it("applies a target profile's ring table", async () => {
    const profile = join(dir, "wide.json");
    await writeFile(
      profile,
      JSON.stringify({
        name: "Wide rings",
        bulletDiameterMm: 0,
        ring10DiameterMm: 40,
        targetDiameterMm: 120,
        rings: [
          { score: 10, diameterMm: 40 },
          { score: 9, diameterMm: 80 },
          { score: 8, diameterMm: 120 },
        ],
      }),
      "utf8",
    );
    // 26.08mm out with no bullet: outside the 10 (20mm), inside the 9 (40mm)
    const out = await run({ image, ppm: 10, mode: "ring", profile });
    expect(out.split("\n")[0]).toBe("#1   9.0     9  26.08mm");
  });
});
