/**
 * Stake decision engine: one evaluation per epoch.
 *
 * Cycle: fetch height → guard → fetch stake-info → derive → decide → act → wait.
 * A shutdown requested while a query is in flight ends the cycle there.
 * Precedence: unstake/restake (reclaim slashed stake) > claim/stake rewards > no action.
 *
 * Multi-step actions are at-most-once per cycle with no rollback: the first
 * failing step ends the action and the operator is told which step failed.
 * A withdraw that succeeded followed by a failed stake leaves funds withdrawn;
 * it is reported, not retried.
 */

import type { GeneralConfig } from "./config.ts";
import type { CommandResult } from "./executor.ts";
import type { ActionJournal } from "./journal.ts";
import type { Logger } from "./log.ts";
import type { Notifier } from "./notify.ts";
import type { SharedState, StakeInfo, StateStore } from "./state.ts";
import type { ChainWallet } from "./wallet.ts";
import { BLOCK_SECONDS, EPOCH_BLOCKS, epochSleepSeconds, sleepUntilNextEpoch, sleepWithFeedback } from "./epoch.ts";
import { fiat, localTimestamp, truncateDecimals } from "./format.ts";

export const RETRY_SECONDS = 30;
export const GUARD_SECONDS = 60;
export const DOWNTIME_EPOCHS = 1;

export type EnginePolicy = Pick<
  GeneralConfig,
  | "minRewards"
  | "minSlashed"
  | "minStakeAmount"
  | "bufferBlocks"
  | "autoStakeRewards"
  | "autoReclaimFullRestakes"
  | "symbol"
>;

// ── Pure decision math ───────────────────────────────────────────────────────

export interface DecisionInputs {
  stakeAmount: number;
  reclaimableSlashedStake: number;
  rewardsAmount: number;
  rewardsPerEpoch: number;
  downtimeLoss: number;
  totalRestake: number;
}

/** Average rewards per epoch since the last claim; 0 when no epoch has elapsed. */
export function rewardsPerEpoch(rewardsAmount: number, lastClaimBlock: number, currentHeight: number): number {
  const epochsElapsed = (currentHeight - lastClaimBlock) / EPOCH_BLOCKS;
  if (epochsElapsed <= 0) return 0;
  return rewardsAmount / epochsElapsed;
}

/** Rewards forgone while the stake is out during an unstake/restake. */
export function downtimeLoss(perEpoch: number, downtimeEpochs = DOWNTIME_EPOCHS): number {
  return perEpoch * downtimeEpochs;
}

export function computeDecisionInputs(info: StakeInfo, lastClaimBlock: number, currentHeight: number): DecisionInputs {
  const perEpoch = rewardsPerEpoch(info.rewardsAmount, lastClaimBlock, currentHeight);
  return {
    stakeAmount: info.stakeAmount,
    reclaimableSlashedStake: info.reclaimableSlashedStake,
    rewardsAmount: info.rewardsAmount,
    rewardsPerEpoch: perEpoch,
    downtimeLoss: downtimeLoss(perEpoch),
    totalRestake: info.stakeAmount + info.rewardsAmount + info.reclaimableSlashedStake,
  };
}

/** Reclaiming only pays if the slashed amount outweighs an epoch of downtime. */
export function shouldUnstakeAndRestake(policy: EnginePolicy, reclaimable: number, loss: number): boolean {
  return policy.autoReclaimFullRestakes && reclaimable > policy.minSlashed && reclaimable >= loss;
}

/** Claim once at least one epoch's worth of rewards has accrued. */
export function shouldClaimAndStake(policy: EnginePolicy, rewards: number, perEpoch: number): boolean {
  return policy.autoStakeRewards && rewards > policy.minRewards && rewards >= perEpoch;
}

export type Decision = "restake" | "claim" | "none";

export function decide(policy: EnginePolicy, inputs: DecisionInputs): Decision {
  if (shouldUnstakeAndRestake(policy, inputs.reclaimableSlashedStake, inputs.downtimeLoss)) return "restake";
  if (shouldClaimAndStake(policy, inputs.rewardsAmount, inputs.rewardsPerEpoch)) return "claim";
  return "none";
}

// ── Cycle results ────────────────────────────────────────────────────────────

export type ActionStep = "withdraw" | "unstake" | "stake";
export type StakeAction = "claim" | "restake";

export type CycleOutcome =
  | { kind: "retry"; reason: "block-height" | "stake-info" }
  | { kind: "guarded"; height: number }
  | { kind: "no-action"; height: number; startup: boolean }
  | { kind: "restake-skipped"; height: number; totalRestake: number }
  | { kind: "restake"; height: number; amount: number }
  | { kind: "claim"; height: number; amount: number }
  | { kind: "failed"; height: number; action: StakeAction; step: ActionStep }
  | { kind: "interrupted"; height: number; action: StakeAction; step: ActionStep }
  | { kind: "stopped" };

/** How long to wait before the next cycle. */
export type CycleWait =
  | { kind: "fixed"; seconds: number }
  | { kind: "epoch"; height: number }
  /** Normal epoch wait plus one full epoch. */
  | { kind: "cooldown"; height: number };

export interface CycleResult {
  outcome: CycleOutcome;
  wait: CycleWait;
}

export function waitSeconds(wait: CycleWait, bufferBlocks: number): number {
  switch (wait.kind) {
    case "fixed":
      return wait.seconds;
    case "epoch":
      return epochSleepSeconds(wait.height, bufferBlocks);
    case "cooldown":
      return epochSleepSeconds(wait.height, bufferBlocks) + EPOCH_BLOCKS * BLOCK_SECONDS;
  }
}

// ── Engine ───────────────────────────────────────────────────────────────────

export interface StakeEngineDeps {
  wallet: ChainWallet;
  store: StateStore;
  notifier: Notifier;
  log: Logger;
  policy: EnginePolicy;
  journal?: ActionJournal;
}

interface ActionStepSpec {
  step: ActionStep;
  run: () => Promise<CommandResult>;
}

const STEP_LABEL: Record<ActionStep, string> = {
  withdraw: "Withdraw",
  unstake: "Unstake",
  stake: "Stake",
};

const STOPPED: CycleResult = { outcome: { kind: "stopped" }, wait: { kind: "fixed", seconds: 0 } };

export class StakeEngine {
  private readonly wallet: ChainWallet;
  private readonly store: StateStore;
  private readonly notifier: Notifier;
  private readonly log: Logger;
  private readonly policy: EnginePolicy;
  private readonly journal?: ActionJournal;

  constructor(deps: StakeEngineDeps) {
    this.wallet = deps.wallet;
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.log = deps.log;
    this.policy = deps.policy;
    this.journal = deps.journal;
  }

  /** Decision loop: cycle, wait, repeat until the signal aborts. */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let wait: CycleWait;
      try {
        wait = (await this.runCycle(signal)).wait;
      } catch (err) {
        this.log.error("[engine] cycle crashed", err);
        wait = { kind: "fixed", seconds: RETRY_SECONDS };
      }
      if (signal.aborted) break;
      await this.pause(wait, signal);
    }
    this.log.info("[engine] decision loop stopped");
  }

  private pause(wait: CycleWait, signal: AbortSignal): Promise<boolean> {
    const buffer = this.policy.bufferBlocks;
    if (wait.kind === "epoch") return sleepUntilNextEpoch(this.store, wait.height, buffer, signal);
    return sleepWithFeedback(this.store, waitSeconds(wait, buffer), signal);
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const height = await this.wallet.fetchBlockHeight();
    if (signal?.aborted) return STOPPED;
    if (height === null) {
      this.log.error(`Failed to fetch block height. Retrying in ${RETRY_SECONDS}s...`);
      return { outcome: { kind: "retry", reason: "block-height" }, wait: { kind: "fixed", seconds: RETRY_SECONDS } };
    }
    this.store.update((s) => {
      s.blockHeight = height;
    });

    if (this.store.get().lastNoActionBlock === height) {
      this.log.debug(`Already did 'No Action' at block ${height}; sleeping ${GUARD_SECONDS}s.`);
      return { outcome: { kind: "guarded", height }, wait: { kind: "fixed", seconds: GUARD_SECONDS } };
    }

    const info = await this.wallet.fetchStakeInfo();
    if (signal?.aborted) return STOPPED;
    if (info === null) {
      this.log.warn(`Stake info unavailable or incomplete. Retrying in ${RETRY_SECONDS}s...`);
      return { outcome: { kind: "retry", reason: "stake-info" }, wait: { kind: "fixed", seconds: RETRY_SECONDS } };
    }
    this.store.setStakeInfo(info);

    const inputs = computeDecisionInputs(info, this.store.get().lastClaimBlock, height);
    this.log.debug(
      `[engine] #${height} perEpoch=${truncateDecimals(inputs.rewardsPerEpoch)} downtimeLoss=${truncateDecimals(inputs.downtimeLoss)} totalRestake=${truncateDecimals(inputs.totalRestake)}`,
    );

    switch (decide(this.policy, inputs)) {
      case "restake":
        return this.unstakeAndRestake(height, inputs, signal);
      case "claim":
        return this.claimAndStake(height, inputs, signal);
      case "none":
        return this.noAction(height, inputs);
    }
  }

  // ── Branch A ──────────────────────────────────────────────────────────────

  private async unstakeAndRestake(height: number, inputs: DecisionInputs, signal?: AbortSignal): Promise<CycleResult> {
    const sym = this.policy.symbol;
    const total = inputs.totalRestake;

    if (total < this.policy.minStakeAmount) {
      this.setLastAction("Unstake/Restake Skipped (Below Min)");
      await this.logAction(`Balance Info (#${height})`, this.balanceLine(inputs));
      await this.logAction(
        `Unstake/Restake Skipped (Block #${height})`,
        `Total restake (${truncateDecimals(total)} ${sym}) < ${this.policy.minStakeAmount} ${sym}.`,
      );
      this.journal?.record({ kind: "restake-skipped", blockHeight: height, amount: total });
      return { outcome: { kind: "restake-skipped", height, totalRestake: total }, wait: { kind: "epoch", height } };
    }

    const title = `Unstake/Restake @ Block #${height}`;
    this.setLastAction(title);
    await this.logAction(`Balance Info (#${height})`, this.balanceLine(inputs));
    await this.logAction(
      title,
      `Reclaimable: ${truncateDecimals(inputs.reclaimableSlashedStake)}, Downtime Loss: ${truncateDecimals(inputs.downtimeLoss)}`,
    );

    const failure = await this.runSteps("restake", height, total, signal, [
      { step: "withdraw", run: () => this.wallet.withdraw() },
      { step: "unstake", run: () => this.wallet.unstake() },
      { step: "stake", run: () => this.wallet.stake(total) },
    ]);
    if (failure) return failure;

    await this.logAction("Restake Completed", `New Stake: ${truncateDecimals(total)} ${sym}`);
    this.markClaimed(height);
    this.journal?.record({ kind: "restake", blockHeight: height, amount: total });
    return { outcome: { kind: "restake", height, amount: total }, wait: { kind: "cooldown", height } };
  }

  // ── Branch B ──────────────────────────────────────────────────────────────

  private async claimAndStake(height: number, inputs: DecisionInputs, signal?: AbortSignal): Promise<CycleResult> {
    const rewards = inputs.rewardsAmount;
    this.setLastAction(`Claim/Stake @ Block ${height}`);
    await this.logAction(`Balance Info (#${height})`, this.balanceLine(inputs));
    await this.logAction("Claim and Stake", `Rewards: ${truncateDecimals(rewards)}`);

    const failure = await this.runSteps("claim", height, rewards, signal, [
      { step: "withdraw", run: () => this.wallet.withdraw() },
      { step: "stake", run: () => this.wallet.stake(rewards) },
    ]);
    if (failure) return failure;

    await this.logAction("Stake Completed", `New Stake: ${truncateDecimals(inputs.stakeAmount + rewards)} ${this.policy.symbol}`);
    this.markClaimed(height);
    this.journal?.record({ kind: "claim", blockHeight: height, amount: rewards });
    return { outcome: { kind: "claim", height, amount: rewards }, wait: { kind: "epoch", height } };
  }

  /**
   * Run steps strictly in order. Returns a terminal result on the first failed
   * step, or if shutdown was requested between steps; null when all succeeded.
   */
  private async runSteps(
    action: StakeAction,
    height: number,
    amount: number,
    signal: AbortSignal | undefined,
    steps: ActionStepSpec[],
  ): Promise<CycleResult | null> {
    for (const { step, run } of steps) {
      if (signal?.aborted) {
        const detail = `Shutdown before ${step}; remaining steps not issued`;
        this.setFailure(`${STEP_LABEL[step]} not attempted (shutdown) @ Block #${height}`);
        await this.logAction(`${actionTitle(action)} Interrupted (Block #${height})`, detail, "error");
        this.journal?.record({ kind: "interrupted", blockHeight: height, amount, failedStep: step, detail });
        return { outcome: { kind: "interrupted", height, action, step }, wait: { kind: "epoch", height } };
      }

      const res = await run();
      if (!res.ok) {
        const detail = `exit ${res.exitCode ?? "n/a"}: ${res.stderr || "no output"}`;
        this.setFailure(`${STEP_LABEL[step]} Failed @ Block #${height}`);
        await this.logAction(`${STEP_LABEL[step]} Failed (Block #${height})`, `${actionTitle(action)} abandoned: ${detail}`, "error");
        this.journal?.record({ kind: "failed", blockHeight: height, amount, failedStep: step, detail });
        return { outcome: { kind: "failed", height, action, step }, wait: { kind: "epoch", height } };
      }
    }
    return null;
  }

  // ── Branch C ──────────────────────────────────────────────────────────────

  private async noAction(height: number, inputs: DecisionInputs): Promise<CycleResult> {
    const startup = this.store.get().firstRun;
    this.store.update((s) => {
      s.lastNoActionBlock = height;
      s.lastActionTaken = startup ? `Startup @ Block #${height}` : `No Action @ Block ${height}`;
      s.firstRun = false;
    });
    this.journal?.record({ kind: "no-action", blockHeight: height });

    const state = this.store.get();
    if (startup) {
      this.log.info(`Startup @ Block #${height}`);
      await this.notifier.notify(startupSummary(state, inputs, this.policy.symbol), state);
    } else {
      this.store.appendLog(statusEntry(state));
      this.log.info(`No Action @ Block ${height}`);
    }
    return { outcome: { kind: "no-action", height, startup }, wait: { kind: "epoch", height } };
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private balanceLine(inputs: DecisionInputs): string {
    return `Rwd: ${truncateDecimals(inputs.rewardsAmount)}, Stk: ${truncateDecimals(inputs.stakeAmount)}, Rcl: ${truncateDecimals(inputs.reclaimableSlashedStake)}`;
  }

  private setLastAction(text: string): void {
    this.store.update((s) => {
      s.lastActionTaken = text;
    });
  }

  private setFailure(text: string): void {
    this.store.update((s) => {
      s.lastActionTaken = text;
      s.lastFailure = text;
    });
  }

  private markClaimed(height: number): void {
    this.store.update((s) => {
      s.lastClaimBlock = height;
      s.lastFailure = null;
    });
    this.journal?.setLastClaimBlock(height);
  }

  /** Log + notify, the way every decision is surfaced. */
  private async logAction(action: string, details: string, level: "info" | "error" = "info"): Promise<void> {
    const line = `${action}: ${details}`;
    if (level === "error") this.log.error(line);
    else this.log.info(line);
    await this.notifier.notify(line, this.store.get());
  }
}

function actionTitle(action: StakeAction): string {
  return action === "restake" ? "Unstake/Restake" : "Claim/Stake";
}

export function startupSummary(state: Readonly<SharedState>, inputs: DecisionInputs, symbol: string): string {
  const b = state.balances;
  const total = b.public + b.shielded;
  const p = state.price;
  return [
    "=".repeat(44),
    `  Action       : ${state.lastActionTaken}`,
    `  Balance      : ${truncateDecimals(total)} ${symbol}`,
    `    ├─ Public  :   ${truncateDecimals(b.public)} ${symbol} ($${fiat(b.public, p)})`,
    `    └─ Shielded:   ${truncateDecimals(b.shielded)} ${symbol} ($${fiat(b.shielded, p)})`,
    `  Staked       : ${truncateDecimals(inputs.stakeAmount)} ${symbol} ($${fiat(inputs.stakeAmount, p)})`,
    `  Rewards      : ${truncateDecimals(inputs.rewardsAmount)} ${symbol} ($${fiat(inputs.rewardsAmount, p)})`,
    `  Reclaimable  : ${truncateDecimals(inputs.reclaimableSlashedStake)} ${symbol} ($${fiat(inputs.reclaimableSlashedStake, p)})`,
  ].join("\n");
}

export function statusEntry(state: Readonly<SharedState>, now: Date = new Date()): string {
  const st = state.stakeInfo;
  const p = state.price;
  return [
    `=============== Log Entry @ ${localTimestamp(now)} ===============`,
    `Block Height  : #${state.blockHeight}`,
    `Last Action   : ${state.lastActionTaken}`,
    `Staked        : ${truncateDecimals(st.stakeAmount)} ($${fiat(st.stakeAmount, p)})`,
    `Rewards       : ${truncateDecimals(st.rewardsAmount)} ($${fiat(st.rewardsAmount, p)})`,
    `Reclaimable   : ${truncateDecimals(st.reclaimableSlashedStake)} ($${fiat(st.reclaimableSlashedStake, p)})`,
  ].join("\n");
}
