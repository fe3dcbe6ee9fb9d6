import type { Position, RiskConfig } from '@perp-scalper/domain';

/** The durable part of the StateStore; history buffers are not persisted. */
export interface PersistedState {
  running: boolean;
  haltReason: string | null;
  tradingDay: string;
  realizedPnl: number;
  riskConfig: RiskConfig;
  positions: Position[];
  lastEntryAt: Record<string, number>;
}

/**
 * Write-through target for every StateStore mutation and read-through
 * source on startup.
 */
export interface StatePersistence {
  load(): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<void>;
  close(): Promise<void>;
}

export class InMemoryStatePersistence implements StatePersistence {
  private stored: PersistedState | null;
  saves = 0;

  constructor(initial: PersistedState | null = null) {
    this.stored = initial ? structuredClone(initial) : null;
  }

  async load(): Promise<PersistedState | null> {
    return this.stored ? structuredClone(this.stored) : null;
  }

  async save(state: PersistedState): Promise<void> {
    this.stored = structuredClone(state);
    this.saves += 1;
  }

  async close(): Promise<void> {}
}
