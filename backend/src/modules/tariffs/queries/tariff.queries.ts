/**
 * backend/src/modules/tariffs/queries/tariff.queries.ts
 *
 * WHY:
 * - Shape tariff rows into the Tariff domain type.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectAllTariffsSql,
  selectTariffByIdSql,
  selectTariffByNameSql,
  type TariffRow,
} from '../dal/tariff.query-sql';
import type { Tariff } from '../tariff.types';

export function toTariff(row: TariffRow): Tariff {
  return {
    id: row.id,
    name: row.name,
    monthlyPrice: Number(row.monthly_price),
    accessAllowed: row.access_allowed,
    createdAt: row.created_at,
  };
}

export async function getTariffById(db: DbExecutor, tariffId: number): Promise<Tariff | undefined> {
  const row = await selectTariffByIdSql(db, tariffId);
  if (!row) return undefined;
  return toTariff(row);
}

export async function getTariffByName(db: DbExecutor, name: string): Promise<Tariff | undefined> {
  const row = await selectTariffByNameSql(db, name);
  if (!row) return undefined;
  return toTariff(row);
}

export async function listTariffs(db: DbExecutor): Promise<Tariff[]> {
  const rows = await selectAllTariffsSql(db);
  return rows.map(toTariff);
}
