/**
 * backend/src/modules/tariffs/tariff.types.ts
 *
 * A Tariff is a pricing/access plan shared by many members.
 * Read-only from the status engine's point of view.
 */

export type TariffId = number;

export type Tariff = {
  id: TariffId;
  name: string;
  /** Monthly price in major currency units. */
  monthlyPrice: number;
  accessAllowed: boolean;
  createdAt: Date;
};
