import Decimal from 'decimal.js';
import type { Position, Quote, RiskVerdict, TradeIntent } from '@perp-scalper/domain';
import type { ExitInstruction, ExitReason } from '../types';
import { HaltCondition } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { systemClock, type Clock } from '../utils/time';
import { dailyLoss, defaultRiskChecks, type RiskCheck, type RiskContext } from './risk-validators';
import type { StateStore, StoreSnapshot } from './state-store';

const logger = createLogger('risk-engine');

export type QuoteSource = (symbol: string) => Quote | null;

export interface Evaluation {
  verdict: RiskVerdict;
  halt: HaltCondition | null;
}

const protectiveLevels = (intent: TradeIntent, stopLossBps: number, takeProfitBps: number) => {
  const reference = new Decimal(intent.referencePrice);
  const stop = new Decimal(stopLossBps).div(10_000);
  const target = new Decimal(takeProfitBps).div(10_000);
  return intent.direction === 'long'
    ? { stopLoss: reference.times(new Decimal(1).minus(stop)), takeProfit: reference.times(target.plus(1)) }
    : { stopLoss: reference.times(stop.plus(1)), takeProfit: reference.times(new Decimal(1).minus(target)) };
};

/**
 * Run the checks in order over one captured context. Pure: the caller
 * applies any halt.
 */
export function evaluateIntent(context: RiskContext, checks: readonly RiskCheck[] = defaultRiskChecks): Evaluation {
  let size = context.intent.size;
  for (const check of checks) {
    const result = check(context, size);
    if (!result.ok) {
      return {
        verdict: {
          outcome: 'rejected',
          intent: context.intent,
          reason: result.reason,
          message: result.message,
          adjustedSize: 0,
          validatedAt: context.now,
        },
        halt: result.halt ?? null,
      };
    }
    size = result.size;
  }

  const { stopLoss, takeProfit } = protectiveLevels(
    context.intent,
    context.config.stopLossBps,
    context.config.takeProfitBps
  );
  return {
    verdict: {
      outcome: 'approved',
      intent: context.intent,
      adjustedSize: size,
      stopLoss: stopLoss.toDecimalPlaces(8).toNumber(),
      takeProfit: takeProfit.toDecimalPlaces(8).toNumber(),
      validatedAt: context.now,
    },
    halt: null,
  };
}

const exitReasonFor = (position: Readonly<Position>): ExitReason | null => {
  const { side, markPrice, stopLoss, takeProfit } = position;
  if (stopLoss !== null && (side === 'long' ? markPrice <= stopLoss : markPrice >= stopLoss)) {
    return 'stop-loss';
  }
  if (takeProfit !== null && (side === 'long' ? markPrice >= takeProfit : markPrice <= takeProfit)) {
    return 'take-profit';
  }
  return null;
};

/**
 * The only component that approves or rejects intents. Validation and
 * the slot reservation for an approved entry happen in the same
 * synchronous call, against one snapshot of the store.
 */
export class RiskEngine {
  constructor(
    private readonly store: StateStore,
    private readonly quotes: QuoteSource,
    private readonly checks: readonly RiskCheck[] = defaultRiskChecks,
    private readonly clock: Clock = systemClock
  ) {}

  validate(intent: TradeIntent): RiskVerdict {
    const snapshot = this.store.snapshot();
    const { verdict, halt } = evaluateIntent(
      {
        snapshot,
        config: snapshot.riskConfig,
        intent,
        quote: this.quotes(intent.symbol),
        now: this.clock(),
      },
      this.checks
    );

    if (halt) {
      this.store.halt(halt);
    }
    if (verdict.outcome === 'approved') {
      this.store.reserveSlot({
        intentId: intent.id,
        symbol: intent.symbol,
        side: intent.direction,
        notional: verdict.adjustedSize,
      });
      logger.info('Intent approved', {
        intentId: intent.id,
        symbol: intent.symbol,
        direction: intent.direction,
        requestedSize: intent.size,
        adjustedSize: verdict.adjustedSize,
      });
    } else {
      logger.info('Intent rejected', {
        intentId: intent.id,
        symbol: intent.symbol,
        reason: verdict.reason,
        message: verdict.message,
      });
    }
    this.store.recordDecision(verdict);
    return verdict;
  }

  /**
   * Loss check outside the intent flow, run after mark-price updates so a
   * breach halts trading even when no new intent arrives.
   */
  assess(snapshot: StoreSnapshot = this.store.snapshot()): HaltCondition | null {
    if (!snapshot.running) return null;
    const loss = dailyLoss(snapshot);
    if (loss < snapshot.riskConfig.dailyLossLimit) return null;

    const halt = new HaltCondition(
      `Daily loss ${loss.toFixed(2)} reached limit ${snapshot.riskConfig.dailyLossLimit}`,
      snapshot.pnl.total
    );
    this.store.halt(halt);
    return halt;
  }

  /** Exits due for stop-loss or take-profit hits, or every position when liquidating after a halt. */
  reviewPositions(snapshot: StoreSnapshot = this.store.snapshot()): ExitInstruction[] {
    const liquidate = !snapshot.running && snapshot.haltReason !== null && snapshot.riskConfig.liquidateOnHalt;
    const exits: ExitInstruction[] = [];
    for (const position of snapshot.positions) {
      const reason: ExitReason | null = liquidate ? 'liquidation' : exitReasonFor(position);
      if (!reason) continue;
      exits.push({
        positionId: position.id,
        symbol: position.symbol,
        side: position.side === 'long' ? 'sell' : 'buy',
        quantity: position.quantity,
        reason,
      });
    }
    return exits;
  }
}
