// Distance-to-score model for ring targets.
//
// Decimal mode is linear in the effective distance (centre distance minus the
// bullet radius, so a hole touching a ring line takes the better value):
//   score = 11 - effectiveMm / RING_WIDTH_MM, clamped to [0, 10.9], 0.1 steps
// Ring mode uses a ring table instead (the target profile's, or uniform 8mm
// rings around the 10-ring) and yields whole rings.

export const RING_WIDTH_MM = 8;
export const MAX_DECIMAL_SCORE = 10.9;

export type ScoringMode = "decimal" | "ring";

export type RingDef = { score: number; diameterMm: number; name?: string };

export const MISS = "Miss";

export type ScoringConfig = {
  targetDiameterMm: number; // outer scoring ring
  ring10DiameterMm: number;
  bulletDiameterMm: number;
  pixelsPerMm: number;
  mode: ScoringMode;
  // innermost ring first; only read in ring mode
  ringTable?: RingDef[];
};

export function isCalibrated(config: Pick<ScoringConfig, "pixelsPerMm">): boolean {
  return Number.isFinite(config.pixelsPerMm) && config.pixelsPerMm > 0;
}

export function distanceMm(
  holeX: number,
  holeY: number,
  centerX: number,
  centerY: number,
  pixelsPerMm: number,
): number | null {
  if (!isCalibrated({ pixelsPerMm })) return null;
  return Math.hypot(holeX - centerX, holeY - centerY) / pixelsPerMm;
}

export function roundToTenth(v: number): number {
  return Math.round(v * 10) / 10;
}

export function decimalScore(effectiveMm: number): number {
  const raw = 11 - Math.max(0, effectiveMm) / RING_WIDTH_MM;
  return roundToTenth(Math.min(MAX_DECIMAL_SCORE, Math.max(0, raw)));
}

// Ring k (10 = innermost) outer radius in mm for uniformly spaced rings.
export function ringRadiusMm(ring: number, ring10DiameterMm: number): number {
  return ring10DiameterMm / 2 + (10 - ring) * RING_WIDTH_MM;
}

export function uniformRingTable(ring10DiameterMm: number): RingDef[] {
  const out: RingDef[] = [];
  for (let ring = 10; ring >= 1; ring--) {
    out.push({ score: ring, diameterMm: 2 * ringRadiusMm(ring, ring10DiameterMm) });
  }
  return out;
}

export function ringTableFor(config: ScoringConfig): RingDef[] {
  return config.ringTable && config.ringTable.length > 0
    ? config.ringTable
    : uniformRingTable(config.ring10DiameterMm);
}

// First ring (from the inside) the hole edge reaches; null outside them all.
export function findRing(scoringDistanceMm: number, table: RingDef[]): RingDef | null {
  for (const r of table) {
    if (scoringDistanceMm <= r.diameterMm / 2) return r;
  }
  return null;
}

export function ringScore(scoringDistanceMm: number, table: RingDef[]): number {
  const r = findRing(scoringDistanceMm, table);
  return r ? Math.min(MAX_DECIMAL_SCORE, Math.max(0, r.score)) : 0;
}

export function ringLabel(ring: RingDef | null): string {
  if (!ring) return MISS;
  return ring.name ?? String(ring.score);
}

/**
 * Score one hole against the target centre. Returns null when the
 * calibration cannot turn pixels into millimetres.
 */
export function scoreHole(
  holeX: number,
  holeY: number,
  centerX: number,
  centerY: number,
  config: ScoringConfig,
): number | null {
  const mm = distanceMm(holeX, holeY, centerX, centerY, config.pixelsPerMm);
  if (mm === null) return null;
  const scoringDistance = mm - config.bulletDiameterMm / 2;
  if (config.mode === "ring") return ringScore(scoringDistance, ringTableFor(config));
  return decimalScore(Math.max(0, scoringDistance));
}

// Name of the ring the hole reaches ("Miss" outside), in either mode.
export function ringNameForHole(
  holeX: number,
  holeY: number,
  centerX: number,
  centerY: number,
  config: ScoringConfig,
): string | null {
  const mm = distanceMm(holeX, holeY, centerX, centerY, config.pixelsPerMm);
  if (mm === null) return null;
  return ringLabel(findRing(mm - config.bulletDiameterMm / 2, ringTableFor(config)));
}

export type RingCircle = { ring: number; radiusPx: number };

// Ring circles for the overlay, innermost first. Rings beyond the target's
// outer diameter are left out.
export function ringRadiiPx(config: ScoringConfig): RingCircle[] {
  if (!isCalibrated(config)) return [];
  return ringTableFor(config)
    .filter((r) => r.diameterMm <= config.targetDiameterMm + 1e-9)
    .map((r) => ({ ring: r.score, radiusPx: (r.diameterMm / 2) * config.pixelsPerMm }));
}
