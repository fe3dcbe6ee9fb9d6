import type { Knex } from 'knex';
import { z } from 'zod';
import { PositionSchema, RiskConfigSchema } from '@perp-scalper/domain';
import type { PersistedState, StatePersistence } from '../services/state-persistence';
import { createLogger } from '../utils/logger';

const logger = createLogger('engine-state-model');

const STATE_ROW_ID = 'engine';

// Database row interfaces
export interface DbEngineState {
  id: string;
  running: boolean | number;
  halt_reason: string | null;
  trading_day: string;
  realized_pnl: string | number;
  risk_config: unknown;
  last_entry_at: unknown;
  updated_at: Date | string;
}

export interface DbEnginePosition {
  id: string;
  symbol: string;
  side: 'long' | 'short';
  entry_price: string | number;
  quantity: string | number;
  notional: string | number;
  opened_at: string | number;
  mark_price: string | number;
  unrealized_pnl: string | number;
  realized_pnl: string | number;
  stop_loss: string | number | null;
  take_profit: string | number | null;
}

// pg returns json columns parsed and decimals as strings; other drivers may return text and numbers
const jsonColumn = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' ? JSON.parse(value) : value), schema);

const StateRowSchema = z.object({
  running: z.union([z.boolean(), z.number().transform((value) => value !== 0)]),
  halt_reason: z.string().nullable(),
  trading_day: z.string(),
  realized_pnl: z.coerce.number(),
  risk_config: jsonColumn(RiskConfigSchema),
  last_entry_at: jsonColumn(z.record(z.number())),
});

const PositionRowSchema = z
  .object({
    id: z.string(),
    symbol: z.string(),
    side: z.enum(['long', 'short']),
    entry_price: z.coerce.number(),
    quantity: z.coerce.number(),
    notional: z.coerce.number(),
    opened_at: z.coerce.number(),
    mark_price: z.coerce.number(),
    unrealized_pnl: z.coerce.number(),
    realized_pnl: z.coerce.number(),
    stop_loss: z.coerce.number().nullable(),
    take_profit: z.coerce.number().nullable(),
  })
  .transform((row) =>
    PositionSchema.parse({
      id: row.id,
      symbol: row.symbol,
      side: row.side,
      entryPrice: row.entry_price,
      quantity: row.quantity,
      notional: row.notional,
      openedAt: row.opened_at,
      markPrice: row.mark_price,
      unrealizedPnl: row.unrealized_pnl,
      realizedPnl: row.realized_pnl,
      stopLoss: row.stop_loss,
      takeProfit: row.take_profit,
    })
  );

/**
 * Knex-backed persistence: one `engine_state` row plus the open positions.
 * Each save replaces the position set inside a transaction.
 */
export class KnexStatePersistence implements StatePersistence {
  private static stateTable = 'engine_state';
  private static positionsTable = 'engine_positions';

  constructor(private readonly db: Knex) {}

  async load(): Promise<PersistedState | null> {
    const row = await this.db<DbEngineState>(KnexStatePersistence.stateTable)
      .where({ id: STATE_ROW_ID })
      .first();
    if (!row) {
      return null;
    }

    const state = StateRowSchema.parse(row);
    const positionRows = await this.db<DbEnginePosition>(KnexStatePersistence.positionsTable).orderBy(
      'opened_at',
      'asc'
    );
    const positions = positionRows.map((position) => PositionRowSchema.parse(position));

    logger.info('Loaded persisted engine state', {
      tradingDay: state.trading_day,
      positions: positions.length,
    });

    return {
      running: state.running,
      haltReason: state.halt_reason,
      tradingDay: state.trading_day,
      realizedPnl: state.realized_pnl,
      riskConfig: state.risk_config,
      positions,
      lastEntryAt: state.last_entry_at,
    };
  }

  async save(state: PersistedState): Promise<void> {
    await this.db.transaction(async (trx) => {
      await trx(KnexStatePersistence.stateTable)
        .insert({
          id: STATE_ROW_ID,
          running: state.running,
          halt_reason: state.haltReason,
          trading_day: state.tradingDay,
          realized_pnl: state.realizedPnl,
          risk_config: JSON.stringify(state.riskConfig),
          last_entry_at: JSON.stringify(state.lastEntryAt),
          updated_at: new Date(),
        })
        .onConflict('id')
        .merge();

      await trx(KnexStatePersistence.positionsTable).delete();
      if (state.positions.length > 0) {
        await trx(KnexStatePersistence.positionsTable).insert(
          state.positions.map((position) => ({
            id: position.id,
            symbol: position.symbol,
            side: position.side,
            entry_price: position.entryPrice,
            quantity: position.quantity,
            notional: position.notional,
            opened_at: position.openedAt,
            mark_price: position.markPrice,
            unrealized_pnl: position.unrealizedPnl,
            realized_pnl: position.realizedPnl,
            stop_loss: position.stopLoss,
            take_profit: position.takeProfit,
          }))
        );
      }
    });
  }

  // The pool is owned by database/connection and closed there
  async close(): Promise<void> {}
}
