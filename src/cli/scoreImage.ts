// Score a single target photo from the command line.
//   tsx src/cli/scoreImage.ts <image> [--threshold 100] [--ppm 10] [--center x,y]
//                                     [--mode decimal|ring] [--profile file.json]
//                                     [--crop l,r,t,b]
import process from "node:process";
import { ScoringEngine } from "../logic/engine";
import { createDetectionSettings } from "../store/detectionSettings";
import { readEnvConfig } from "../utils/config";
import { decodeImage } from "../utils/imageLoader";
import { derror } from "../utils/logger";
import { formatSummary, summarizeShots } from "../utils/scoreSummary";
import { loadTargetProfile, scoringConfigFromProfile } from "../utils/targetProfiles";
import type { ScoringMode } from "../utils/scoring";
import type { Point } from "../utils/frame";

export type CliArgs = {
  image: string;
  threshold?: number;
  ppm?: number;
  center?: Point;
  mode?: ScoringMode;
  profile?: string;
  crop?: [number, number, number, number];
};

function parseNumbers(raw: string, count: number, flag: string): number[] {
  const parts = raw.split(",").map((s) => Number(s.trim()));
  if (parts.length !== count || parts.some((n) => !Number.isFinite(n))) {
    throw new Error(`${flag} expects ${count} comma-separated numbers, got "${raw}"`);
  }
  return parts;
}

export function parseArgs(argv: string[]): CliArgs {
  let image: string | undefined;
  const out: Omit<CliArgs, "image"> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    const next = argv[i + 1];
    const needValue = () => {
      if (next === undefined) throw new Error(`${current} needs a value`);
      i += 1;
      return next;
    };
    switch (current) {
      case "--threshold": {
        const raw = needValue();
        const [t] = parseNumbers(raw, 1, current);
        if (t < 0 || t > 255) throw new Error(`--threshold must be between 0 and 255, got "${raw}"`);
        out.threshold = t;
        break;
      }
      case "--ppm": {
        const raw = needValue();
        const [ppm] = parseNumbers(raw, 1, current);
        if (ppm <= 0) throw new Error(`--ppm must be a positive number, got "${raw}"`);
        out.ppm = ppm;
        break;
      }
      case "--center": {
        const [x, y] = parseNumbers(needValue(), 2, current);
        out.center = { x, y };
        break;
      }
      case "--mode": {
        const m = needValue();
        if (m !== "decimal" && m !== "ring") throw new Error(`--mode must be decimal or ring, got "${m}"`);
        out.mode = m;
        break;
      }
      case "--profile":
        out.profile = needValue();
        break;
      case "--crop": {
        const raw = needValue();
        const [l, r, t, b] = parseNumbers(raw, 4, current);
        if (![l, r, t, b].every((m) => Number.isInteger(m) && m >= 0)) {
          throw new Error(`--crop margins must be non-negative whole numbers, got "${raw}"`);
        }
        out.crop = [l, r, t, b];
        break;
      }
      default:
        if (current.startsWith("--")) throw new Error(`Unknown option ${current}`);
        if (image) throw new Error(`Only one image can be scored at a time`);
        image = current;
    }
  }
  if (!image) throw new Error("Usage: score-image <image> [options]");
  return { image, ...out };
}

export async function run(args: CliArgs): Promise<string> {
  const env = readEnvConfig();
  const settings = createDetectionSettings({ detection: env.detection, scoring: env.scoring });
  const s = settings.getState();
  if (args.profile) {
    const profile = await loadTargetProfile(args.profile);
    const cfg = scoringConfigFromProfile(profile, env.scoring.pixelsPerMm, env.scoring.mode);
    s.setCalibration(cfg);
  }
  if (args.threshold !== undefined) s.setThreshold(args.threshold);
  if (args.ppm !== undefined) s.setCalibration({ pixelsPerMm: args.ppm });
  if (args.mode) s.setScoringMode(args.mode);
  if (args.crop) {
    const [left, right, top, bottom] = args.crop;
    s.setCrop({ left, right, top, bottom });
  }

  const engine = new ScoringEngine({ settings, mode: "image" });
  try {
    if (args.center) engine.setManualCenter(args.center);
    engine.loadImage(await decodeImage(args.image));
    engine.tick();
    const snap = engine.getSnapshot();
    return formatSummary(summarizeShots(snap.shots, snap.totalScore));
  } finally {
    engine.dispose();
  }
}

const invokedDirectly =
  typeof process.argv[1] === "string" && /scoreImage\.[cm]?[jt]s$/.test(process.argv[1]);

if (invokedDirectly) {
  Promise.resolve()
    .then(() => run(parseArgs(process.argv.slice(2))))
    .then((text) => {
      console.log(text);
    })
    .catch((err: unknown) => {
      derror(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
