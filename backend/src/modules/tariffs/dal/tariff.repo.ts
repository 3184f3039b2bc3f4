/**
 * backend/src/modules/tariffs/dal/tariff.repo.ts
 *
 * DAL WRITES ONLY for tariffs. Tariffs are maintained by operators (and the dev
 * seed); the member engine never writes them.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class TariffRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertTariff(params: {
    name: string;
    monthlyPrice: number;
    accessAllowed: boolean;
  }): Promise<{ id: number }> {
    const row = await this.db
      .insertInto('tariffs')
      .values({
        name: params.name,
        monthly_price: params.monthlyPrice,
        access_allowed: params.accessAllowed,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return { id: row.id };
  }
}
