import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('name', 255).notNullable();
    table.string('phone', 32).notNullable().unique();
    table.string('plate_number', 20).notNullable();
    table.string('car_model', 100);
    table.integer('total_visits').notNullable().defaultTo(0);
    table.decimal('total_spent', 12, 2).notNullable().defaultTo(0);
    table.integer('loyalty_points').notNullable().defaultTo(0);
    table.date('joined_date').notNullable();
    table.timestamp('last_visit', { useTz: false });
    table.text('notes');
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.check('total_visits >= 0', undefined, 'customers_total_visits_non_negative');
    table.check('total_spent >= 0', undefined, 'customers_total_spent_non_negative');
    table.check('loyalty_points >= 0', undefined, 'customers_loyalty_points_non_negative');

    table.index(['plate_number'], 'idx_customers_plate');
    table.index(['last_visit'], 'idx_customers_last_visit');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('customers');
}
