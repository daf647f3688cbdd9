import type { Frame } from "./frame";

// Non-blocking pull: the latest frame if one arrived since the last poll,
// otherwise null. The engine never waits on a source.
export interface FrameSource {
  poll(): Frame | null;
  // No more frames will arrive once the pending one is drained
  readonly isClosed: boolean;
  // Frames the producer delivered that were superseded before a poll
  readonly droppedCount: number;
}

/**
 * Single-slot hand-off between a capture producer and the engine. A newer
 * frame replaces one that was never polled; nothing is buffered.
 */
export class LatestFrameSlot implements FrameSource {
  private pending: Frame | null = null;
  private dropped = 0;
  private closed = false;

  offer(frame: Frame): boolean {
    if (this.closed) return false;
    if (this.pending) this.dropped++;
    this.pending = frame;
    return true;
  }

  poll(): Frame | null {
    const f = this.pending;
    this.pending = null;
    return f;
  }

  // Frames superseded before anyone polled them
  get droppedCount(): number {
    return this.dropped;
  }

  // Producer went away: later offers are refused, polls drain then return null
  close() {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
