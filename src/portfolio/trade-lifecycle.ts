export enum TradeStage {
  VALIDATING = 'Validating',
  RECORDING = 'Recording',
  UPDATING = 'Updating',
  SETTLING = 'Settling',
  DONE = 'Done',
  REJECTED = 'Rejected',
}

// Any live stage may fall to Rejected; nothing leaves Done or Rejected.
const TRANSITIONS: Record<TradeStage, readonly TradeStage[]> = {
  [TradeStage.VALIDATING]: [TradeStage.RECORDING, TradeStage.REJECTED],
  [TradeStage.RECORDING]: [TradeStage.UPDATING, TradeStage.REJECTED],
  [TradeStage.UPDATING]: [TradeStage.SETTLING, TradeStage.REJECTED],
  [TradeStage.SETTLING]: [TradeStage.DONE, TradeStage.REJECTED],
  [TradeStage.DONE]: [],
  [TradeStage.REJECTED]: [],
};

/**
 * Tracks one trade request through its stages.
 * Validating → Recording → Updating → Settling → Done
 */
export class TradeLifecycle {
  private current: TradeStage = TradeStage.VALIDATING;
  private readonly history: TradeStage[] = [TradeStage.VALIDATING];

  get stage(): TradeStage {
    return this.current;
  }

  get stages(): readonly TradeStage[] {
    return this.history;
  }

  /** Stage the request was in before it was rejected, if it was */
  get rejectedAt(): TradeStage | undefined {
    return this.current === TradeStage.REJECTED ? this.history[this.history.length - 2] : undefined;
  }

  advance(next: TradeStage): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal trade transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }

  reject(): void {
    if (this.current !== TradeStage.REJECTED) {
      this.advance(TradeStage.REJECTED);
    }
  }
}
