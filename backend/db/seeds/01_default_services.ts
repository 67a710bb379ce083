import type { Knex } from 'knex';

const DEFAULT_SERVICES = [
  { name: 'Basic Exterior Wash', description: 'Quick exterior rinse and dry', price: 200, duration_minutes: 15 },
  { name: 'Standard Wash', description: 'Exterior wash with interior vacuum', price: 350, duration_minutes: 30 },
  { name: 'Full Service Wash', description: 'Complete exterior and interior cleaning', price: 500, duration_minutes: 45 },
  { name: 'Premium Detail', description: 'Full wash plus wax and tire shine', price: 800, duration_minutes: 60 },
  { name: 'Interior Deep Clean', description: 'Seats, dashboard and carpet cleaning', price: 600, duration_minutes: 50 },
  { name: 'Engine Bay Cleaning', description: 'Engine compartment wash and degrease', price: 400, duration_minutes: 25 },
];

// Only fills an empty catalog; never touches services that already exist.
export async function seed(knex: Knex): Promise<void> {
  const row = await knex('services').count('* as count').first<{ count: string } | undefined>();
  if (parseInt(row?.count ?? '0', 10) > 0) {
    return;
  }
  await knex('services').insert(DEFAULT_SERVICES);
}
