import type { RateType, RentalRate } from "@shared/schema";
import { assertValidRange, type DateRange } from "./lifecycle";
import { ValidationError } from "./errors";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const DAYS_PER_WEEK = 7;
export const DAYS_PER_MONTH = 30;

export interface RentalRates {
  dailyRate: number;
  weeklyRate?: number | null;
  monthlyRate?: number | null;
}

export interface RentalCost {
  totalDays: number;
  totalCost: number;
}

/** Started days are billed in full; a rental is at least one day. */
export function countRentalDays(range: DateRange): number {
  assertValidRange(range);
  const elapsed = range.endDate.getTime() - range.startDate.getTime();
  return Math.max(1, Math.ceil(elapsed / DAY_MS));
}

/**
 * Prices a rental period by splitting it greedily into 30-day months,
 * 7-day weeks and days. A tier without a rate falls through to the next
 * smaller one, and the leftover days never cost more than one unit of the
 * next larger tier that has a rate.
 */
export function calculateRentalCost(range: DateRange, rates: RentalRates): RentalCost {
  const totalDays = countRentalDays(range);
  const weekly = rates.weeklyRate ?? null;
  const monthly = rates.monthlyRate ?? null;

  let remaining = totalDays;
  const months = monthly !== null ? Math.floor(remaining / DAYS_PER_MONTH) : 0;
  remaining -= months * DAYS_PER_MONTH;
  const weeks = weekly !== null ? Math.floor(remaining / DAYS_PER_WEEK) : 0;
  remaining -= weeks * DAYS_PER_WEEK;

  let tail = remaining * rates.dailyRate;
  if (weekly !== null) {
    tail = Math.min(tail, weekly);
  }

  let belowMonth = (weekly !== null ? weeks * weekly : 0) + tail;
  if (monthly !== null) {
    belowMonth = Math.min(belowMonth, monthly);
  }

  const totalCost = (monthly !== null ? months * monthly : 0) + belowMonth;
  return { totalDays, totalCost };
}

export interface ResolvedRentalTerms extends RentalRates {
  securityDeposit: number;
}

/**
 * Explicit rates win over the car's active rate card. The deposit comes
 * from the explicit value, else the highest deposit on the card.
 */
export function resolveRentalTerms(
  requested: Partial<RentalRates> & { securityDeposit?: number },
  rateCard: readonly RentalRate[]
): ResolvedRentalTerms {
  const active = rateCard.filter((rate) => rate.isActive);
  const cardRate = (type: RateType): number | null =>
    active.find((rate) => rate.rateType === type)?.rate ?? null;

  const dailyRate = requested.dailyRate ?? cardRate("daily");
  if (dailyRate === null) {
    throw new ValidationError("A daily rate is required", [
      "Provide dailyRate or add an active daily rate to the car's rental rates.",
    ]);
  }

  const deposits = active.map((rate) => rate.securityDeposit);
  return {
    dailyRate,
    weeklyRate: requested.weeklyRate ?? cardRate("weekly"),
    monthlyRate: requested.monthlyRate ?? cardRate("monthly"),
    securityDeposit: requested.securityDeposit ?? (deposits.length > 0 ? Math.max(...deposits) : 0),
  };
}
