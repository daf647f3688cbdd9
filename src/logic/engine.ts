/**
 * Scoring engine
 *
 * Owns one target session and runs the per-frame pipeline:
 * crop -> detect holes -> resolve centre and gate -> track new holes -> score.
 * Call `tick()` from the render loop; it never blocks on the frame source.
 */

import { cropFrame, type Frame, type Point } from "../utils/frame";
import { detectHoles } from "../utils/holeDetection";
import { resolveTargetCenter, type ResolvedDetection } from "../utils/centerResolver";
import { ringRadiiPx, type RingCircle } from "../utils/scoring";
import type { FrameSource } from "../utils/frameSource";
import {
  createDetectionSettings,
  snapshotSettings,
  type SettingsStore,
} from "../store/detectionSettings";
import { createShotTracker, type RecordedShot, type ShotTrackerStore } from "../store/shotTracker";
import { dinfo, dlog, dwarn } from "../utils/logger";

export type SourceMode = "camera" | "image";

export interface EngineOptions {
  settings?: SettingsStore;
  tracker?: ShotTrackerStore;
  source?: FrameSource | null;
  mode?: SourceMode;
}

export interface EngineSnapshot {
  detection: ResolvedDetection | null;
  totalScore: number;
  lastShotScore: number | null;
  shots: RecordedShot[];
  ringRadiiPx: RingCircle[];
  sourceMode: SourceMode;
  frozen: boolean;
  // the camera source closed and its last frame was processed
  sourceEnded: boolean;
  droppedFrames: number;
  // size of the last processed (cropped) frame
  frameSize: { w: number; h: number } | null;
}

export class ScoringEngine {
  readonly settings: SettingsStore;
  readonly tracker: ShotTrackerStore;
  private source: FrameSource | null;
  private mode: SourceMode;
  private frozen = false;
  private sourceEnded = false;
  private loadedImage: Frame | null = null;
  private reprocessRequested = false;
  private lastDetection: ResolvedDetection | null = null;
  private frameSize: { w: number; h: number } | null = null;
  private unsubscribe: () => void;

  constructor(opts: EngineOptions = {}) {
    this.settings = opts.settings ?? createDetectionSettings();
    this.tracker = opts.tracker ?? createShotTracker();
    this.source = opts.source ?? null;
    this.mode = opts.mode ?? "camera";
    // Any settings edit re-runs a static image on the next tick
    this.unsubscribe = this.settings.subscribe(() => {
      this.reprocessRequested = true;
    });
  }

  setSource(source: FrameSource | null) {
    this.source = source;
    this.sourceEnded = false;
  }

  get sourceMode(): SourceMode {
    return this.mode;
  }

  setSourceMode(mode: SourceMode) {
    if (mode === this.mode) return;
    this.mode = mode;
    this.reprocessRequested = true;
  }

  loadImage(frame: Frame) {
    this.loadedImage = frame;
    this.reprocessRequested = true;
  }

  requestReprocess() {
    this.reprocessRequested = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  toggleFreeze(): boolean {
    this.frozen = !this.frozen;
    return this.frozen;
  }

  /**
   * Move the target centre. On a static image the existing shots were scored
   * against the old centre, so the session starts over and the image is
   * re-scored.
   */
  setManualCenter(p: Point | null) {
    this.settings.getState().setManualCenter(p);
    if (this.mode === "image") {
      this.tracker.getState().reset();
      this.reprocessRequested = true;
    }
  }

  clearManualCenter() {
    this.setManualCenter(null);
  }

  resetScore() {
    this.tracker.getState().reset();
  }

  /**
   * Process at most one frame: the newest camera frame (unless frozen) or the
   * loaded image when a reprocess is pending. Returns the shots recorded by
   * this tick, or null when no frame was processed.
   */
  tick(): RecordedShot[] | null {
    let frame: Frame | null = null;
    if (this.mode === "camera") {
      if (!this.frozen && this.source && !this.sourceEnded) {
        frame = this.source.poll();
        if (!frame && this.source.isClosed) {
          this.sourceEnded = true;
          dinfo(`[ENGINE] frame source closed (${this.source.droppedCount} frame(s) superseded)`);
        }
      }
    } else if (this.loadedImage && this.reprocessRequested) {
      frame = this.loadedImage;
      this.reprocessRequested = false;
    }
    if (!frame) return null;
    return this.processFrame(frame);
  }

  processFrame(frame: Frame): RecordedShot[] {
    const cfg = snapshotSettings(this.settings.getState());
    const work = cropFrame(frame, cfg.crop);
    const detection = detectHoles(work, cfg.detection);
    if (!detection) {
      dwarn(`[ENGINE] skipped unusable frame ${work.width}x${work.height}`);
      return [];
    }
    const resolved = resolveTargetCenter(detection, cfg.manualCenter, cfg.scoring);
    const gated = detection.holes.length - resolved.holes.length;
    if (gated > 0) dlog(`[ENGINE] ${gated} detection(s) outside the target area`);
    const fresh = this.tracker.getState().update(resolved, cfg.scoring);
    this.lastDetection = resolved;
    this.frameSize = { w: work.width, h: work.height };
    return fresh;
  }

  getSnapshot(): EngineSnapshot {
    const t = this.tracker.getState();
    return {
      detection: this.lastDetection,
      totalScore: t.totalScore,
      lastShotScore: t.lastShotScore,
      shots: t.shots,
      ringRadiiPx: ringRadiiPx(this.settings.getState().scoring),
      sourceMode: this.mode,
      frozen: this.frozen,
      sourceEnded: this.sourceEnded,
      droppedFrames: this.source?.droppedCount ?? 0,
      frameSize: this.frameSize,
    };
  }

  dispose() {
    this.unsubscribe();
  }
}
