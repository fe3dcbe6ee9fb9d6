import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // Engine-wide state, a single row keyed by id
  await knex.schema.createTable('engine_state', (table) => {
    table.string('id', 32).primary();
    table.boolean('running').notNullable().defaultTo(false);
    table.string('halt_reason', 255).nullable();
    table.string('trading_day', 10).notNullable();
    table.decimal('realized_pnl', 20, 8).notNullable().defaultTo(0);
    table.json('risk_config').notNullable();
    table.json('last_entry_at').notNullable();
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('engine_positions', (table) => {
    table.uuid('id').primary();
    table.string('symbol', 20).notNullable();
    table.enum('side', ['long', 'short']).notNullable();
    table.decimal('entry_price', 20, 8).notNullable();
    table.decimal('quantity', 20, 8).notNullable();
    table.decimal('notional', 20, 8).notNullable();
    table.bigInteger('opened_at').notNullable();
    table.decimal('mark_price', 20, 8).notNullable();
    table.decimal('unrealized_pnl', 20, 8).notNullable().defaultTo(0);
    table.decimal('realized_pnl', 20, 8).notNullable().defaultTo(0);
    table.decimal('stop_loss', 20, 8).nullable();
    table.decimal('take_profit', 20, 8).nullable();

    table.index('symbol');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('engine_positions');
  await knex.schema.dropTableIfExists('engine_state');
}
