import type { DetectionParams } from "./holeDetection";
import type { ScoringConfig, ScoringMode } from "./scoring";
import type { CropMargins } from "./frame";
import { ISSF_50M_RIFLE, scoringConfigFromProfile } from "./targetProfiles";

export const DEFAULT_DETECTION_PARAMS: DetectionParams = {
  thresholdValue: 100,
  minHoleRadius: 2,
  maxHoleRadius: 20,
  minCircularity: 0.6,
};

export const DEFAULT_PIXELS_PER_MM = 10;

// Bundled ISSF 50m rifle target: 10-ring 10.4mm, 1-ring 154.4mm, .22 LR bullet.
export const DEFAULT_SCORING_CONFIG: ScoringConfig = scoringConfigFromProfile(
  ISSF_50M_RIFLE,
  DEFAULT_PIXELS_PER_MM,
);

export const DEFAULT_CROP: CropMargins = { left: 0, right: 0, top: 0, bottom: 0 };

// Holes closer than this (in pixels) to a known hole are the same hole.
export const DEDUP_TOLERANCE_PX = 10;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function readMode(env: Env, fallback: ScoringMode): ScoringMode {
  const raw = (env.SCORER_MODE || "").trim().toLowerCase();
  if (raw === "decimal" || raw === "ring") return raw;
  return fallback;
}

// Environment overrides (SCORER_*), falling back to the defaults above for
// anything unset or unparsable. Out-of-range numbers are corrected when the
// settings store is created from them.
export function readEnvConfig(env: Env = process.env): {
  detection: DetectionParams;
  scoring: ScoringConfig;
} {
  const d = DEFAULT_DETECTION_PARAMS;
  const s = DEFAULT_SCORING_CONFIG;
  const ring10 = readNumber(env, "SCORER_RING10_DIAMETER_MM", s.ring10DiameterMm);
  return {
    detection: {
      thresholdValue: readNumber(env, "SCORER_THRESHOLD", d.thresholdValue),
      minHoleRadius: readNumber(env, "SCORER_MIN_HOLE_RADIUS", d.minHoleRadius),
      maxHoleRadius: readNumber(env, "SCORER_MAX_HOLE_RADIUS", d.maxHoleRadius),
      minCircularity: readNumber(env, "SCORER_MIN_CIRCULARITY", d.minCircularity),
    },
    scoring: {
      targetDiameterMm: readNumber(env, "SCORER_TARGET_DIAMETER_MM", s.targetDiameterMm),
      ring10DiameterMm: ring10,
      bulletDiameterMm: readNumber(env, "SCORER_BULLET_DIAMETER_MM", s.bulletDiameterMm),
      pixelsPerMm: readNumber(env, "SCORER_PIXELS_PER_MM", s.pixelsPerMm),
      mode: readMode(env, s.mode),
      // the profile's rings only fit its own 10-ring
      ...(ring10 === s.ring10DiameterMm && s.ringTable ? { ringTable: s.ringTable } : {}),
    },
  };
}
