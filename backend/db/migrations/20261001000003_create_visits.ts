import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('visits', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('customer_id')
      .notNullable()
      .references('id')
      .inTable('customers')
      .onDelete('RESTRICT');
    table
      .uuid('service_id')
      .notNullable()
      .references('id')
      .inTable('services')
      .onDelete('RESTRICT');
    table.date('visit_date').notNullable();
    table.time('visit_time').notNullable();
    table.decimal('amount_paid', 12, 2).notNullable();
    table
      .enu('payment_method', ['cash', 'mobile_money', 'card'], {
        useNative: false,
        enumName: 'visit_payment_method',
      })
      .notNullable()
      .defaultTo('cash');
    table.boolean('is_loyalty_reward').notNullable().defaultTo(false);
    table.text('notes');
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.check('amount_paid >= 0', undefined, 'visits_amount_paid_non_negative');
    table.check('NOT is_loyalty_reward OR amount_paid = 0', undefined, 'visits_reward_is_free');

    table.index(['visit_date'], 'idx_visits_date');
    table.index(['customer_id', 'visit_date'], 'idx_visits_customer_date');
    table.index(['service_id'], 'idx_visits_service');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('visits');
}
