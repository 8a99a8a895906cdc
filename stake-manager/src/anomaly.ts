/**
 * Node health counters.
 *
 * Both detectors count consecutive bad polls and fire once when the count
 * reaches the threshold, then start over from zero.
 */

export const POLL_INTERVAL_SECONDS = 10;
export const STALL_ALERT_POLLS = 10; // ~100s
export const LOW_PEER_ALERT_POLLS = 240; // ~40min

export type AnomalyKind = "stalled-height" | "low-peers";

export interface AnomalyAlert {
  kind: AnomalyKind;
  message: string;
  /** How long the condition held, in seconds of polling */
  durationSeconds: number;
}

export interface AnomalyThresholds {
  minPeers: number;
  stallPolls?: number;
  lowPeerPolls?: number;
}

export class AnomalyDetector {
  private lastHeight: number | null = null;
  private stalledPolls = 0;
  private lowPeerPolls = 0;
  private readonly minPeers: number;
  private readonly stallThreshold: number;
  private readonly lowPeerThreshold: number;

  constructor(opts: AnomalyThresholds) {
    this.minPeers = opts.minPeers;
    this.stallThreshold = opts.stallPolls ?? STALL_ALERT_POLLS;
    this.lowPeerThreshold = opts.lowPeerPolls ?? LOW_PEER_ALERT_POLLS;
  }

  /** Start from a height observed before polling began (e.g. at startup). */
  seedHeight(height: number): void {
    this.lastHeight = height;
  }

  get stalledCount(): number {
    return this.stalledPolls;
  }

  get lowPeerCount(): number {
    return this.lowPeerPolls;
  }

  observeHeight(height: number): AnomalyAlert | null {
    const previous = this.lastHeight;
    this.lastHeight = height;
    if (previous === null || height !== previous) {
      this.stalledPolls = 0;
      return null;
    }

    this.stalledPolls++;
    if (this.stalledPolls < this.stallThreshold) return null;

    const durationSeconds = this.stalledPolls * POLL_INTERVAL_SECONDS;
    this.stalledPolls = 0;
    return {
      kind: "stalled-height",
      durationSeconds,
      message: `WARNING! Block height has not changed for ${durationSeconds} seconds.\nLast height: ${height}`,
    };
  }

  observePeers(peers: number): AnomalyAlert | null {
    if (peers >= this.minPeers && peers > 0) {
      this.lowPeerPolls = 0;
      return null;
    }

    this.lowPeerPolls++;
    if (this.lowPeerPolls < this.lowPeerThreshold) return null;

    const durationSeconds = this.lowPeerPolls * POLL_INTERVAL_SECONDS;
    this.lowPeerPolls = 0;
    return {
      kind: "low-peers",
      durationSeconds,
      message: `WARNING! Low peer count for ${durationSeconds} seconds.\nCurrent Count: ${peers}`,
    };
  }
}
