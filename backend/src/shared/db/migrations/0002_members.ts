/**
 * src/shared/db/migrations/0002_members.ts
 *
 * Guarantor rules enforced here as well as in the member service:
 * - a member cannot guarantee itself
 * - both guarantors must differ when both are set
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('members')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('first_name', 'text')
    .addColumn('last_name', 'text')
    .addColumn('hacker_comment', 'text')
    .addColumn('bepaid_number', 'integer')
    .addColumn('telegram_username', 'text')
    .addColumn('alice_greeting', 'text')
    .addColumn('github_username', 'text')
    .addColumn('ssh_public_key', 'text')
    .addColumn('is_learner', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('roles', sql`text[]`, (col) => col.notNull().defaultTo(sql`'{}'::text[]`))
    .addColumn('guarantor1_id', 'integer', (col) => col.references('members.id').onDelete('set null'))
    .addColumn('guarantor2_id', 'integer', (col) => col.references('members.id').onDelete('set null'))
    .addColumn('tariff_id', 'integer', (col) => col.references('tariffs.id').onDelete('set null'))
    .addColumn('account_suspended', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('suspended_changed_at', 'timestamptz')
    .addColumn('account_banned', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('sign_in_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_sign_in_at', 'timestamptz')
    .addColumn('last_seen_in_hackerspace', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('members_guarantor1_not_self', sql`guarantor1_id IS NULL OR guarantor1_id <> id`)
    .addCheckConstraint('members_guarantor2_not_self', sql`guarantor2_id IS NULL OR guarantor2_id <> id`)
    .addCheckConstraint(
      'members_guarantors_distinct',
      sql`guarantor1_id IS NULL OR guarantor2_id IS NULL OR guarantor1_id <> guarantor2_id`,
    )
    .execute();

  await db.schema.createIndex('members_guarantor1_id_idx').on('members').column('guarantor1_id').execute();
  await db.schema.createIndex('members_guarantor2_id_idx').on('members').column('guarantor2_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('members').ifExists().execute();
}
