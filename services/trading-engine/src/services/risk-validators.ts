import Decimal from 'decimal.js';
import type { Quote, RejectionReason, RiskConfig, TradeIntent } from '@perp-scalper/domain';
import { HaltCondition } from '../utils/errors';
import type { StoreSnapshot } from './state-store';

/** Everything a check may look at, captured once per validation. */
export interface RiskContext {
  readonly snapshot: StoreSnapshot;
  readonly config: Readonly<RiskConfig>;
  readonly intent: TradeIntent;
  readonly quote: Quote | null;
  readonly now: number;
}

export type CheckResult =
  | { ok: true; size: number }
  | { ok: false; reason: RejectionReason; message: string; halt?: HaltCondition };

/** A check sees the size approved so far and may only pass, shrink it, or reject. */
export type RiskCheck = (context: RiskContext, size: number) => CheckResult;

const pass = (size: number): CheckResult => ({ ok: true, size });

const reject = (reason: RejectionReason, message: string, halt?: HaltCondition): CheckResult => ({
  ok: false,
  reason,
  message,
  halt,
});

export const dailyLoss = (snapshot: StoreSnapshot): number => Math.max(0, -snapshot.pnl.total);

export const checkRunning: RiskCheck = ({ snapshot }, size) => {
  if (snapshot.running) return pass(size);
  return reject(
    'stopped',
    snapshot.haltReason ? `Trading is halted: ${snapshot.haltReason}` : 'Trading is stopped'
  );
};

export const checkDailyLoss: RiskCheck = ({ snapshot, config }, size) => {
  const loss = dailyLoss(snapshot);
  if (loss < config.dailyLossLimit) return pass(size);
  const message = `Daily loss ${loss.toFixed(2)} reached limit ${config.dailyLossLimit}`;
  return reject('daily-loss', message, new HaltCondition(message, snapshot.pnl.total));
};

export const checkProfitTarget: RiskCheck = ({ snapshot, config }, size) => {
  if (config.dailyProfitTarget === undefined || snapshot.pnl.total < config.dailyProfitTarget) {
    return pass(size);
  }
  return reject(
    'daily-profit-target',
    `Daily PnL ${snapshot.pnl.total.toFixed(2)} reached target ${config.dailyProfitTarget}`
  );
};

export const checkPositionCount: RiskCheck = ({ snapshot, config, intent }, size) => {
  const sameSymbol = [
    ...snapshot.positions.filter((position) => position.symbol === intent.symbol).map((p) => p.side),
    ...snapshot.reservations.filter((entry) => entry.symbol === intent.symbol).map((r) => r.side),
  ];
  if (sameSymbol.length > 0) {
    const pyramiding = config.allowPyramiding && sameSymbol.every((side) => side === intent.direction);
    if (!pyramiding) {
      return reject('position-count', `${intent.symbol} already has an open or pending position`);
    }
    return pass(size);
  }

  const occupied = new Set([
    ...snapshot.positions.map((position) => position.symbol),
    ...snapshot.reservations.map((entry) => entry.symbol),
  ]);
  if (occupied.size >= config.maxConcurrentPositions) {
    return reject(
      'position-count',
      `${occupied.size} positions open or pending, limit is ${config.maxConcurrentPositions}`
    );
  }
  return pass(size);
};

/**
 * Clamp to the per-trade limit and to the capacity left under
 * maxRiskPerTrade × maxConcurrentPositions. Oversize requests are never
 * rejected, only shrunk.
 */
export const checkSize: RiskCheck = ({ snapshot, config }, size) => {
  const committed = [...snapshot.positions, ...snapshot.reservations].reduce(
    (sum, entry) => sum.plus(entry.notional),
    new Decimal(0)
  );
  const capacity = new Decimal(config.maxRiskPerTrade).times(config.maxConcurrentPositions).minus(committed);
  const adjusted = Decimal.min(size, config.maxRiskPerTrade, capacity);
  if (adjusted.lte(0)) {
    return reject(
      'size',
      size <= 0 ? `Requested size ${size} is not positive` : 'No risk capacity left for a new entry'
    );
  }
  return pass(adjusted.toNumber());
};

export const slippageBps = (executable: number, reference: number): number =>
  new Decimal(executable).minus(reference).abs().div(reference).times(10_000).toNumber();

export const checkSlippage: RiskCheck = ({ config, intent, quote }, size) => {
  if (!quote || quote.symbol !== intent.symbol) {
    return reject('slippage', `No quote available for ${intent.symbol}`);
  }
  const executable = intent.direction === 'long' ? quote.bestAsk : quote.bestBid;
  const deviation = slippageBps(executable, intent.referencePrice);
  if (deviation > config.maxSlippageBps) {
    return reject(
      'slippage',
      `Best price ${executable} is ${deviation.toFixed(1)} bps from reference ${intent.referencePrice}, tolerance ${config.maxSlippageBps} bps`
    );
  }
  return pass(size);
};

export const checkCooldown: RiskCheck = ({ snapshot, config, intent, now }, size) => {
  const last = snapshot.lastEntryAt[intent.symbol];
  if (last === undefined || now - last >= config.cooldownMs) return pass(size);
  return reject('cooldown', `${intent.symbol} entered ${now - last}ms ago, cooldown is ${config.cooldownMs}ms`);
};

/** Evaluation order; the first failure wins. */
export const defaultRiskChecks: readonly RiskCheck[] = [
  checkRunning,
  checkDailyLoss,
  checkProfitTarget,
  checkPositionCount,
  checkSize,
  checkSlippage,
  checkCooldown,
];
