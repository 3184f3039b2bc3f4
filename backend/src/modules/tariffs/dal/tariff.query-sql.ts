/**
 * backend/src/modules/tariffs/dal/tariff.query-sql.ts
 *
 * DAL READS ONLY for tariffs.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TariffsTable } from '../../../shared/db/schema';

export type TariffRow = Selectable<TariffsTable>;

export async function selectTariffByIdSql(
  db: DbExecutor,
  tariffId: number,
): Promise<TariffRow | undefined> {
  return db.selectFrom('tariffs').selectAll().where('id', '=', tariffId).executeTakeFirst();
}

export async function selectTariffByNameSql(
  db: DbExecutor,
  name: string,
): Promise<TariffRow | undefined> {
  return db.selectFrom('tariffs').selectAll().where('name', '=', name).executeTakeFirst();
}

export async function selectAllTariffsSql(db: DbExecutor): Promise<TariffRow[]> {
  return db.selectFrom('tariffs').selectAll().orderBy('id').execute();
}
