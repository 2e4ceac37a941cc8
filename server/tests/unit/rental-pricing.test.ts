import { describe, it, expect } from '@jest/globals';
import { calculateRentalCost, countRentalDays, resolveRentalTerms, DAY_MS } from '../../rental-pricing';
import { ValidationError } from '../../errors';
import type { RentalRate } from '@shared/schema';

const start = new Date(Date.UTC(2025, 2, 1));
const span = (days: number) => ({ startDate: start, endDate: new Date(start.getTime() + days * DAY_MS) });

const rates = { dailyRate: 100, weeklyRate: 600, monthlyRate: 2000 };

function rateCardEntry(overrides: Partial<RentalRate>): RentalRate {
  return {
    id: 'rate-1',
    carId: 'car-1',
    rateType: 'daily',
    rate: 100,
    securityDeposit: 0,
    isActive: true,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('Rental pricing - Unit Tests', () => {
  describe('countRentalDays', () => {
    it('should bill a started day in full', () => {
      expect(countRentalDays(span(3.5))).toBe(4);
      expect(countRentalDays(span(0.1))).toBe(1);
    });

    it('should reject an empty range', () => {
      expect(() => countRentalDays(span(0))).toThrow(ValidationError);
    });
  });

  describe('calculateRentalCost', () => {
    it('should charge daily rates for short rentals', () => {
      expect(calculateRentalCost(span(4), rates)).toEqual({ totalDays: 4, totalCost: 400 });
    });

    it('should cap leftover days at the weekly rate', () => {
      expect(calculateRentalCost(span(6), rates)).toEqual({ totalDays: 6, totalCost: 600 });
    });

    it('should combine weeks and days', () => {
      expect(calculateRentalCost(span(10), rates)).toEqual({ totalDays: 10, totalCost: 900 });
    });

    it('should cap a period shorter than a month at the monthly rate', () => {
      expect(calculateRentalCost(span(29), rates)).toEqual({ totalDays: 29, totalCost: 2000 });
    });

    it('should combine months, weeks and days', () => {
      expect(calculateRentalCost(span(45), rates)).toEqual({ totalDays: 45, totalCost: 3300 });
    });

    it('should fall back to days when no weekly or monthly rate exists', () => {
      expect(calculateRentalCost(span(10), { dailyRate: 100 })).toEqual({ totalDays: 10, totalCost: 1000 });
    });
  });

  describe('resolveRentalTerms', () => {
    it('should prefer explicit rates over the rate card', () => {
      const terms = resolveRentalTerms({ dailyRate: 80 }, [
        rateCardEntry({ rateType: 'daily', rate: 100, securityDeposit: 500 }),
        rateCardEntry({ id: 'rate-2', rateType: 'weekly', rate: 550, securityDeposit: 700 }),
      ]);

      expect(terms).toEqual({ dailyRate: 80, weeklyRate: 550, monthlyRate: null, securityDeposit: 700 });
    });

    it('should ignore inactive rate card entries', () => {
      expect(() => resolveRentalTerms({}, [rateCardEntry({ isActive: false })]))
        .toThrow('A daily rate is required');
    });

    it('should keep an explicit zero deposit', () => {
      const terms = resolveRentalTerms({ securityDeposit: 0 }, [rateCardEntry({ securityDeposit: 300 })]);
      expect(terms.securityDeposit).toBe(0);
      expect(terms.dailyRate).toBe(100);
    });
  });
});
