import { createStore } from "zustand/vanilla";
import type { Point } from "../utils/frame";
import type { DetectionResult, Hole } from "../utils/holeDetection";
import { distanceMm, ringNameForHole, roundToTenth, scoreHole, type ScoringConfig } from "../utils/scoring";
import { DEDUP_TOLERANCE_PX } from "../utils/config";
import { dinfo, dwarn } from "../utils/logger";

export type RecordedShot = Hole & {
  score: number;
  ring: string;
  distanceMm: number;
};

export type TrackerPhase = "empty" | "accumulating";

type ShotTrackerState = {
  // Positions of every confirmed hole; append-only until reset
  knownHoles: Point[];
  shots: RecordedShot[];
  totalScore: number;
  lastShotScore: number | null;
  // Record and score the holes that are not already known. Returns the new ones.
  update: (detection: DetectionResult & { exactCenter?: Point }, config: ScoringConfig) => RecordedShot[];
  reset: () => void;
};

export type ShotTrackerStore = ReturnType<typeof createShotTracker>;

const EMPTY: Omit<ShotTrackerState, "update" | "reset"> = {
  knownHoles: [],
  shots: [],
  totalScore: 0,
  lastShotScore: null,
};

export function trackerPhase(state: { knownHoles: Point[] }): TrackerPhase {
  return state.knownHoles.length === 0 ? "empty" : "accumulating";
}

export function isKnownHole(known: Point[], x: number, y: number, tolerancePx: number): boolean {
  for (const k of known) {
    if (Math.hypot(x - k.x, y - k.y) < tolerancePx) return true;
  }
  return false;
}

/**
 * One tracker per target session. Scores are fixed when a hole is first
 * confirmed; later calibration changes only affect holes found afterwards.
 */
export function createShotTracker(tolerancePx: number = DEDUP_TOLERANCE_PX) {
  return createStore<ShotTrackerState>()((set, get) => ({
    ...EMPTY,
    update: (detection, config) => {
      const center = detection.exactCenter ?? detection.targetCenter;
      const prior = get().knownHoles;
      const fresh: RecordedShot[] = [];
      for (const hole of detection.holes) {
        // Compared against history only, not against other holes of this frame
        if (isKnownHole(prior, hole.x, hole.y, tolerancePx)) continue;
        const score = scoreHole(hole.x, hole.y, center.x, center.y, config);
        const mm = distanceMm(hole.x, hole.y, center.x, center.y, config.pixelsPerMm);
        const ring = ringNameForHole(hole.x, hole.y, center.x, center.y, config);
        if (score === null || mm === null || ring === null) {
          dwarn(`[TRACKER] pixelsPerMm=${config.pixelsPerMm} cannot score; hole at ${hole.x.toFixed(1)},${hole.y.toFixed(1)} left for a later frame`);
          continue;
        }
        fresh.push({ ...hole, score, ring, distanceMm: mm });
      }
      if (fresh.length === 0) return fresh;

      set((s) => {
        let total = s.totalScore;
        for (const shot of fresh) total = roundToTenth(total + shot.score);
        return {
          knownHoles: [...s.knownHoles, ...fresh.map(({ x, y }) => ({ x, y }))],
          shots: [...s.shots, ...fresh],
          totalScore: total,
          lastShotScore: fresh[fresh.length - 1].score,
        };
      });
      for (const shot of fresh) {
        dinfo(`[TRACKER] new shot ${shot.score} at ${shot.x.toFixed(1)},${shot.y.toFixed(1)} (${shot.distanceMm.toFixed(2)}mm)`);
      }
      return fresh;
    },
    reset: () => set({ ...EMPTY }),
  }));
}
