import type { RecordedShot } from "../store/shotTracker";

export type ShotBreakdown = {
  shot: number; // 1-based, in the order the holes were confirmed
  score: number;
  ring: string; // ring name, or "Miss" outside every ring
  distanceMm: number;
};

export type ScoreSummary = {
  total: number;
  shotCount: number;
  average: number;
  breakdown: ShotBreakdown[];
};

const round2 = (v: number) => Math.round(v * 100) / 100;

export function summarizeShots(shots: RecordedShot[], total?: number): ScoreSummary {
  if (shots.length === 0) return { total: 0, shotCount: 0, average: 0, breakdown: [] };
  const sum = total ?? Math.round(shots.reduce((acc, s) => acc + s.score, 0) * 10) / 10;
  return {
    total: sum,
    shotCount: shots.length,
    average: round2(sum / shots.length),
    breakdown: shots.map((s, i) => ({
      shot: i + 1,
      score: s.score,
      ring: s.ring,
      distanceMm: round2(s.distanceMm),
    })),
  };
}

export function formatSummary(summary: ScoreSummary): string {
  const lines = summary.breakdown.map(
    (b) => `#${b.shot}  ${b.score.toFixed(1).padStart(4)}  ${b.ring.padStart(4)}  ${b.distanceMm.toFixed(2)}mm`,
  );
  lines.push(
    `Total ${summary.total.toFixed(1)} over ${summary.shotCount} shot(s), average ${summary.average.toFixed(2)}`,
  );
  return lines.join("\n");
}
