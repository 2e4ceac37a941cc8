import { describe, it, expect } from '@jest/globals';
import {
  SALE_TRANSITIONS,
  RENTAL_TRANSITIONS,
  TEST_DRIVE_TRANSITIONS,
  assertTransition,
  assertInquiryTransition,
  canTransition,
  isTerminal,
  carAcceptsSale,
  carAcceptsRental,
  saleClaimsCar,
  isOpenRental,
  assertValidRange,
  rangesOverlap,
  findOverlappingRental,
  formatRange,
} from '../../lifecycle';
import { InvalidTransitionError, ValidationError } from '../../errors';
import type { RentalStatus } from '@shared/schema';

const day = (n: number) => new Date(Date.UTC(2025, 0, n));

describe('Lifecycle rules - Unit Tests', () => {
  describe('transition tables', () => {
    it('should allow a pending sale to complete or cancel', () => {
      expect(canTransition(SALE_TRANSITIONS, 'pending', 'completed')).toBe(true);
      expect(canTransition(SALE_TRANSITIONS, 'pending', 'cancelled')).toBe(true);
      expect(canTransition(SALE_TRANSITIONS, 'completed', 'cancelled')).toBe(false);
    });

    it('should let an active rental be returned or cancelled but never reserved again', () => {
      expect(canTransition(RENTAL_TRANSITIONS, 'active', 'returned')).toBe(true);
      expect(canTransition(RENTAL_TRANSITIONS, 'active', 'cancelled')).toBe(true);
      expect(canTransition(RENTAL_TRANSITIONS, 'active', 'reserved')).toBe(false);
      expect(canTransition(RENTAL_TRANSITIONS, 'reserved', 'returned')).toBe(false);
    });

    it('should treat finished statuses as terminal', () => {
      expect(isTerminal(SALE_TRANSITIONS, 'completed')).toBe(true);
      expect(isTerminal(RENTAL_TRANSITIONS, 'returned')).toBe(true);
      expect(isTerminal(TEST_DRIVE_TRANSITIONS, 'no_show')).toBe(true);
      expect(isTerminal(TEST_DRIVE_TRANSITIONS, 'scheduled')).toBe(false);
    });
  });

  describe('assertTransition', () => {
    it('should reject leaving a final status with a descriptive message', () => {
      expect(() => assertTransition('sale', SALE_TRANSITIONS, 'completed', 'cancelled'))
        .toThrow('Cannot move sale from "completed" to "cancelled": "completed" is a final status');
    });

    it('should reject a repeated status', () => {
      expect(() => assertTransition('rental', RENTAL_TRANSITIONS, 'active', 'active'))
        .toThrow('Cannot move rental from "active" to "active": the rental is already active');
    });

    it('should list the allowed next statuses', () => {
      expect(() => assertTransition('rental', RENTAL_TRANSITIONS, 'reserved', 'returned'))
        .toThrow('Cannot move rental from "reserved" to "returned": allowed next statuses are active, cancelled');
    });

    it('should carry from and to on the error', () => {
      try {
        assertTransition('sale', SALE_TRANSITIONS, 'cancelled', 'completed');
        throw new Error('expected a transition error');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidTransitionError);
        if (error instanceof InvalidTransitionError) {
          expect(error.from).toBe('cancelled');
          expect(error.to).toBe('completed');
          expect(error.status).toBe(409);
          expect(error.code).toBe('INVALID_TRANSITION');
        }
      }
    });
  });

  describe('assertInquiryTransition', () => {
    it('should require a close reason when closing a new inquiry', () => {
      expect(() => assertInquiryTransition('new', 'closed')).toThrow(InvalidTransitionError);
      expect(() => assertInquiryTransition('new', 'closed', 'spam')).not.toThrow();
    });

    it('should allow closing a contacted inquiry without a reason', () => {
      expect(() => assertInquiryTransition('contacted', 'closed')).not.toThrow();
    });

    it('should not reopen a closed inquiry', () => {
      expect(() => assertInquiryTransition('closed', 'contacted')).toThrow(InvalidTransitionError);
    });
  });

  describe('car status rules', () => {
    it('should accept sales on available and reserved cars only', () => {
      expect(carAcceptsSale('available')).toBe(true);
      expect(carAcceptsSale('reserved')).toBe(true);
      expect(carAcceptsSale('sold')).toBe(false);
      expect(carAcceptsSale('rented')).toBe(false);
    });

    it('should accept rentals on available cars only', () => {
      expect(carAcceptsRental('available')).toBe(true);
      expect(carAcceptsRental('reserved')).toBe(false);
      expect(carAcceptsRental('rented')).toBe(false);
    });

    it('should count pending and completed sales as claims on the car', () => {
      expect(saleClaimsCar('pending')).toBe(true);
      expect(saleClaimsCar('completed')).toBe(true);
      expect(saleClaimsCar('cancelled')).toBe(false);
    });

    it('should count reserved and active rentals as open', () => {
      expect(isOpenRental('reserved')).toBe(true);
      expect(isOpenRental('active')).toBe(true);
      expect(isOpenRental('returned')).toBe(false);
      expect(isOpenRental('cancelled')).toBe(false);
    });
  });

  describe('date ranges', () => {
    it('should reject an empty or inverted range', () => {
      expect(() => assertValidRange({ startDate: day(5), endDate: day(5) })).toThrow(ValidationError);
      expect(() => assertValidRange({ startDate: day(6), endDate: day(5) }))
        .toThrow('Rental end date must be after the start date');
    });

    it('should reject invalid dates', () => {
      expect(() => assertValidRange({ startDate: new Date('not a date'), endDate: day(5) }))
        .toThrow('Rental dates must be valid dates');
    });

    it('should treat ranges that only touch as not overlapping', () => {
      expect(rangesOverlap({ startDate: day(1), endDate: day(5) }, { startDate: day(5), endDate: day(8) })).toBe(false);
      expect(rangesOverlap({ startDate: day(1), endDate: day(5) }, { startDate: day(4), endDate: day(8) })).toBe(true);
      expect(rangesOverlap({ startDate: day(1), endDate: day(10) }, { startDate: day(3), endDate: day(4) })).toBe(true);
    });

    it('should ignore closed rentals and the excluded rental when looking for overlaps', () => {
      const rentals: Array<{ id: string; status: RentalStatus; startDate: Date; endDate: Date }> = [
        { id: 'r-cancelled', status: 'cancelled', startDate: day(1), endDate: day(10) },
        { id: 'r-self', status: 'reserved', startDate: day(2), endDate: day(6) },
        { id: 'r-active', status: 'active', startDate: day(8), endDate: day(12) },
      ];

      expect(findOverlappingRental(rentals, { startDate: day(3), endDate: day(5) }, 'r-self')).toBeUndefined();
      expect(findOverlappingRental(rentals, { startDate: day(9), endDate: day(11) })?.id).toBe('r-active');
    });

    it('should format ranges as half-open ISO intervals', () => {
      expect(formatRange({ startDate: day(1), endDate: day(3) }))
        .toBe('[2025-01-01T00:00:00.000Z, 2025-01-03T00:00:00.000Z)');
    });
  });
});
