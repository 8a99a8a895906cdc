/**
 * Shared controller state.
 *
 * One record per process. Writers never touch fields in place: every update
 * builds the next record from a copy and swaps it in whole, so a reader holding
 * a snapshot can never observe a half-written stakeInfo.
 */

// ── Types ────────────────────────────────────────────────────────────────────

export interface StakeInfo {
  stakeAmount: number;
  reclaimableSlashedStake: number;
  rewardsAmount: number;
}

export interface Balances {
  public: number;
  shielded: number;
}

export interface MarketSnapshot {
  price: number;
  marketCap: number | null;
  volume24h: number | null;
  change24hPct: number | null;
}

export interface SharedState {
  blockHeight: number;
  remainingSeconds: number;
  completionTimeLabel: string;
  lastNoActionBlock: number | null;
  lastClaimBlock: number;
  stakeInfo: StakeInfo;
  balances: Balances;
  lastActionTaken: string;
  firstRun: boolean;
  peerCount: number;
  price: number | null;
  marketCap: number | null;
  volume24h: number | null;
  change24hPct: number | null;
  lastFailure: string | null;
}

export interface LogEntry {
  at: string;
  text: string;
}

/** What presentation consumers get: the full record plus the status log. */
export interface PresentationSnapshot {
  state: Readonly<SharedState>;
  logEntries: readonly LogEntry[];
}

export function initialState(): SharedState {
  return {
    blockHeight: 0,
    remainingSeconds: 0,
    completionTimeLabel: "--:--",
    lastNoActionBlock: null,
    lastClaimBlock: 0,
    stakeInfo: { stakeAmount: 0, reclaimableSlashedStake: 0, rewardsAmount: 0 },
    balances: { public: 0, shielded: 0 },
    lastActionTaken: "Starting Up",
    firstRun: true,
    peerCount: 0,
    price: null,
    marketCap: null,
    volume24h: null,
    change24hPct: null,
    lastFailure: null,
  };
}

// ── Ring buffer ──────────────────────────────────────────────────────────────

/** Fixed-capacity FIFO; pushing into a full buffer evicts the oldest entry. */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /** Returns the evicted entry, if any. */
  push(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.slots[this.head];
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
    }
    return evicted;
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

export const LOG_RING_CAPACITY = 20;

// ── Store ────────────────────────────────────────────────────────────────────

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export class StateStore {
  private current: Readonly<SharedState>;
  private readonly logRing: RingBuffer<LogEntry>;

  constructor(initial: SharedState = initialState(), logCapacity = LOG_RING_CAPACITY) {
    this.current = deepFreeze(structuredClone(initial));
    this.logRing = new RingBuffer<LogEntry>(logCapacity);
  }

  /** The current record. Frozen. */
  get(): Readonly<SharedState> {
    return this.current;
  }

  /**
   * Apply a mutation to a private copy, then publish the copy in one assignment.
   * The mutator must be synchronous.
   */
  update(mutate: (draft: SharedState) => void): Readonly<SharedState> {
    const draft = structuredClone(this.current);
    mutate(draft);
    this.current = deepFreeze(draft);
    return this.current;
  }

  setStakeInfo(info: StakeInfo): void {
    this.update((s) => {
      s.stakeInfo = { ...info };
    });
  }

  appendLog(text: string, at: Date = new Date()): void {
    this.logRing.push({ at: at.toISOString(), text });
  }

  logEntries(): LogEntry[] {
    return this.logRing.toArray();
  }

  /** Read-only accessor for terminal, status bar and dashboard. */
  snapshot(): PresentationSnapshot {
    return { state: this.current, logEntries: this.logRing.toArray() };
  }
}
