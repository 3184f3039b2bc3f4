/**
 * backend/src/shared/db/schema.ts
 *
 * Kysely table interfaces. Keep aligned with ./migrations.
 *
 * - numeric columns come back from pg as strings (parsed in queries/).
 * - date columns come back as `YYYY-MM-DD` strings (see db.ts).
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type Numeric = ColumnType<string, string | number, string | number>;

export type CalendarDate = ColumnType<string, string, string>;

export interface TariffsTable {
  id: Generated<number>;
  name: string;
  monthly_price: Numeric;
  access_allowed: Generated<boolean>;
  created_at: GeneratedTimestamp;
}

export interface MembersTable {
  id: Generated<number>;
  email: string;
  first_name: string | null;
  last_name: string | null;
  hacker_comment: string | null;
  bepaid_number: number | null;
  telegram_username: string | null;
  alice_greeting: string | null;
  github_username: string | null;
  ssh_public_key: string | null;
  is_learner: Generated<boolean>;
  roles: ColumnType<string[], string[] | undefined, string[]>;

  guarantor1_id: number | null;
  guarantor2_id: number | null;
  tariff_id: number | null;

  account_suspended: Generated<boolean>;
  suspended_changed_at: Timestamp | null;
  account_banned: Generated<boolean>;

  sign_in_count: Generated<number>;
  last_sign_in_at: Timestamp | null;
  last_seen_in_hackerspace: Timestamp | null;

  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface PaymentsTable {
  id: Generated<number>;
  member_id: number;
  start_date: CalendarDate;
  end_date: CalendarDate;
  paid_at: Timestamp;
  amount: Numeric | null;
  created_at: GeneratedTimestamp;
}

export interface NfcKeysTable {
  id: Generated<number>;
  member_id: number;
  key: string;
}

export interface DB {
  tariffs: TariffsTable;
  members: MembersTable;
  payments: PaymentsTable;
  nfc_keys: NfcKeysTable;
}
