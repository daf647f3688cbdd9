import { createStore } from "zustand/vanilla";
import type { CropMargins, Point } from "../utils/frame";
import type { DetectionParams } from "../utils/holeDetection";
import type { ScoringConfig, ScoringMode } from "../utils/scoring";
import { DEFAULT_CROP, DEFAULT_DETECTION_PARAMS, DEFAULT_SCORING_CONFIG } from "../utils/config";
import { dlog, dwarn } from "../utils/logger";

// Values the overlay/configuration collaborator edits between frames.
// Every field is last-write-wins; the engine reads a snapshot per frame.
export type SettingsValues = {
  detection: DetectionParams;
  scoring: ScoringConfig;
  manualCenter: Point | null;
  crop: CropMargins;
};

type SettingsState = SettingsValues & {
  setThreshold: (v: number) => void;
  setHoleRadiusRange: (min: number, max: number) => void;
  setMinCircularity: (v: number) => void;
  setCalibration: (c: Partial<Omit<ScoringConfig, "mode">>) => void;
  setScoringMode: (mode: ScoringMode) => void;
  setManualCenter: (p: Point | null) => void;
  setCrop: (c: Partial<CropMargins>) => void;
};

export type SettingsStore = ReturnType<typeof createDetectionSettings>;

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));
const MIN_POSITIVE = 1e-3;

const isNum = (v: number | undefined): v is number => typeof v === "number" && Number.isFinite(v);

function positiveOr(v: number | undefined, fallback: number): number {
  return isNum(v) && v > 0 ? Math.max(MIN_POSITIVE, v) : fallback;
}

function marginOr(v: number | undefined, fallback: number): number {
  return isNum(v) ? Math.max(0, Math.floor(v)) : fallback;
}

// Every write, including the initial values, goes through these: a field that
// cannot be used keeps `prev`, the rest is clamped into range.
function normalizeDetection(d: Partial<DetectionParams>, prev: DetectionParams): DetectionParams {
  const lo = positiveOr(d.minHoleRadius, prev.minHoleRadius);
  const hi = positiveOr(d.maxHoleRadius, prev.maxHoleRadius);
  return {
    thresholdValue: isNum(d.thresholdValue) ? Math.round(clamp(d.thresholdValue, 0, 255)) : prev.thresholdValue,
    // keep min <= max by swapping
    minHoleRadius: Math.min(lo, hi),
    maxHoleRadius: Math.max(lo, hi),
    minCircularity: isNum(d.minCircularity) ? clamp(d.minCircularity, 0, 1) : prev.minCircularity,
  };
}

function normalizeScoring(c: Partial<ScoringConfig>, prev: ScoringConfig): ScoringConfig {
  const ring10 = positiveOr(c.ring10DiameterMm, prev.ring10DiameterMm);
  // an inherited ring table only fits the 10-ring it was made for
  const table = c.ringTable ?? (ring10 === prev.ring10DiameterMm ? prev.ringTable : undefined);
  return {
    targetDiameterMm: positiveOr(c.targetDiameterMm, prev.targetDiameterMm),
    ring10DiameterMm: ring10,
    // a zero-width bullet is allowed (pinhole / laser)
    bulletDiameterMm: isNum(c.bulletDiameterMm) ? Math.max(0, c.bulletDiameterMm) : prev.bulletDiameterMm,
    pixelsPerMm: positiveOr(c.pixelsPerMm, prev.pixelsPerMm),
    mode: c.mode === "ring" || c.mode === "decimal" ? c.mode : prev.mode,
    ringTable: table?.map((r) => ({ ...r })),
  };
}

function normalizeCrop(c: Partial<CropMargins>, prev: CropMargins): CropMargins {
  return {
    left: marginOr(c.left, prev.left),
    right: marginOr(c.right, prev.right),
    top: marginOr(c.top, prev.top),
    bottom: marginOr(c.bottom, prev.bottom),
  };
}

function validCenter(p: Point | null | undefined): p is Point {
  return !!p && Number.isFinite(p.x) && Number.isFinite(p.y);
}

export function createDetectionSettings(initial: Partial<SettingsValues> = {}) {
  const detection = normalizeDetection(initial.detection ?? {}, DEFAULT_DETECTION_PARAMS);
  const scoring = normalizeScoring(initial.scoring ?? {}, DEFAULT_SCORING_CONFIG);
  const crop = normalizeCrop(initial.crop ?? {}, DEFAULT_CROP);
  const mc = initial.manualCenter;
  const manualCenter = validCenter(mc) ? { x: mc.x, y: mc.y } : null;
  if (mc && !manualCenter) dwarn("[SETTINGS] ignoring non-finite manual centre");

  return createStore<SettingsState>()((set) => ({
    detection,
    scoring,
    manualCenter,
    crop,

    setThreshold: (v) =>
      set((s) => {
        if (!isNum(v)) return s;
        return { detection: normalizeDetection({ thresholdValue: v }, s.detection) };
      }),
    setHoleRadiusRange: (min, max) =>
      set((s) => ({
        detection: normalizeDetection({ minHoleRadius: min, maxHoleRadius: max }, s.detection),
      })),
    setMinCircularity: (v) =>
      set((s) => {
        if (!isNum(v)) return s;
        return { detection: normalizeDetection({ minCircularity: v }, s.detection) };
      }),
    setCalibration: (c) =>
      set((s) => {
        const next = normalizeScoring({ ...c, mode: s.scoring.mode }, s.scoring);
        dlog(`[SETTINGS] calibration ${next.pixelsPerMm.toFixed(2)} px/mm`);
        return { scoring: next };
      }),
    setScoringMode: (mode) => set((s) => ({ scoring: normalizeScoring({ mode }, s.scoring) })),
    setManualCenter: (p) =>
      set((s) => {
        if (p && !validCenter(p)) return s;
        return { manualCenter: p ? { x: p.x, y: p.y } : null };
      }),
    setCrop: (c) => set((s) => ({ crop: normalizeCrop(c, s.crop) })),
  }));
}

export function snapshotSettings(state: SettingsValues): SettingsValues {
  return {
    detection: { ...state.detection },
    scoring: { ...state.scoring, ringTable: state.scoring.ringTable?.map((r) => ({ ...r })) },
    manualCenter: state.manualCenter ? { ...state.manualCenter } : null,
    crop: { ...state.crop },
  };
}
