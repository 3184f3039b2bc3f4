import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('payments')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('member_id', 'integer', (col) => col.notNull().references('members.id').onDelete('cascade'))
    .addColumn('start_date', 'date', (col) => col.notNull())
    .addColumn('end_date', 'date', (col) => col.notNull())
    .addColumn('paid_at', 'timestamptz', (col) => col.notNull())
    .addColumn('amount', 'numeric(10, 2)')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('payments_interval_ordered', sql`start_date <= end_date`)
    .execute();

  // last payment lookup: ORDER BY paid_at DESC per member
  await db.schema
    .createIndex('payments_member_id_paid_at_idx')
    .on('payments')
    .columns(['member_id', 'paid_at'])
    .execute();

  await db.schema
    .createTable('nfc_keys')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('member_id', 'integer', (col) => col.notNull().references('members.id').onDelete('cascade'))
    .addColumn('key', 'text', (col) => col.notNull().unique())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('nfc_keys').ifExists().execute();
  await db.schema.dropTable('payments').ifExists().execute();
}
