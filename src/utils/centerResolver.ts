import type { Point } from "./frame";
import type { DetectionResult } from "./holeDetection";
import type { ScoringConfig } from "./scoring";

// Allow detections up to 1.5x the printed target radius from the centre.
export const GATING_MARGIN = 1.5;

export type ResolvedDetection = DetectionResult & {
  // Float centre used for gating and scoring. targetCenter is its truncation.
  exactCenter: Point;
};

export function gatingRadiusPx(
  config: Pick<ScoringConfig, "targetDiameterMm" | "pixelsPerMm">,
): number {
  return (config.targetDiameterMm / 2) * GATING_MARGIN * config.pixelsPerMm;
}

/**
 * Pick the active target centre (manual override wins over the frame centre)
 * and drop holes outside the plausible target area around it.
 */
export function resolveTargetCenter(
  detection: DetectionResult,
  manualCenter: Point | null,
  config: Pick<ScoringConfig, "targetDiameterMm" | "pixelsPerMm">,
): ResolvedDetection {
  const exactCenter = manualCenter ? { ...manualCenter } : { ...detection.targetCenter };
  const targetCenter = manualCenter
    ? { x: Math.trunc(manualCenter.x), y: Math.trunc(manualCenter.y) }
    : { ...detection.targetCenter };

  const maxR = gatingRadiusPx(config);
  // Without a usable calibration nothing can be placed on the target
  if (!Number.isFinite(maxR) || maxR <= 0) {
    return { targetCenter, exactCenter, holes: [] };
  }
  const holes = detection.holes.filter(
    (h) => Math.hypot(h.x - exactCenter.x, h.y - exactCenter.y) <= maxR,
  );
  return { targetCenter, exactCenter, holes };
}
