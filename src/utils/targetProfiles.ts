import { readFile } from "node:fs/promises";
import { z } from "zod";
import issf50mRifle from "../targets/issf50mRifle.json";
import type { ScoringConfig, ScoringMode } from "./scoring";

const ringSchema = z.object({
  score: z.number().int().min(0).max(10),
  diameterMm: z.number().positive(),
  name: z.string().min(1).optional(),
});

export const targetProfileSchema = z
  .object({
    name: z.string().min(1),
    bulletDiameterMm: z.number().nonnegative(),
    ring10DiameterMm: z.number().positive(),
    targetDiameterMm: z.number().positive(),
    rings: z.array(ringSchema).min(1),
  })
  .superRefine((p, ctx) => {
    for (let i = 1; i < p.rings.length; i++) {
      if (p.rings[i].diameterMm <= p.rings[i - 1].diameterMm) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rings", i, "diameterMm"],
          message: "rings must be listed innermost first with growing diameters",
        });
      }
    }
  });

export type TargetProfile = z.infer<typeof targetProfileSchema>;

export const ISSF_50M_RIFLE: TargetProfile = targetProfileSchema.parse(issf50mRifle);

export function parseTargetProfile(data: unknown): TargetProfile {
  const res = targetProfileSchema.safeParse(data);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid target profile: ${issues.join("; ")}`);
  }
  return res.data;
}

export async function loadTargetProfile(path: string): Promise<TargetProfile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new Error(`Could not read target profile ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`Target profile ${path} is not valid JSON`);
  }
  return parseTargetProfile(json);
}

// Calibration stays with the caller: the profile only knows millimetres.
export function scoringConfigFromProfile(
  profile: TargetProfile,
  pixelsPerMm: number,
  mode: ScoringMode = "decimal",
): ScoringConfig {
  return {
    targetDiameterMm: profile.targetDiameterMm,
    ring10DiameterMm: profile.ring10DiameterMm,
    bulletDiameterMm: profile.bulletDiameterMm,
    pixelsPerMm,
    mode,
    ringTable: profile.rings.map((r) => ({ ...r })),
  };
}
