import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DatabaseStorage } from '../../database-storage';
import {
  ConflictError,
  InvalidTransitionError,
  ReferentialIntegrityError,
  UniqueConstraintError,
  ValidationError,
} from '../../errors';
import { FakeDatabase } from '../helpers/fake-database';
import type { Brand, Car, Customer, Rental, RentalRate, Sale } from '@shared/schema';

let mockDatabase = new FakeDatabase();

jest.mock('../../db', () => ({
  getDb: () => mockDatabase,
}));

const created = new Date('2025-01-01T00:00:00Z');
const march = (day: number) => new Date(Date.UTC(2025, 2, day));

function brandRow(overrides: Partial<Brand> = {}): Brand {
  return {
    id: 'brand-1',
    name: 'Toyota',
    slug: 'toyota',
    countryOfOrigin: null,
    description: null,
    isActive: true,
    createdAt: created,
    ...overrides,
  };
}

function carRow(overrides: Partial<Car> = {}): Car {
  return {
    id: 'car-1',
    carModelId: 'model-1',
    categoryId: 'category-1',
    year: 2022,
    conditionType: 'new',
    stockNumber: 'STK-1',
    vin: null,
    msrp: null,
    sellingPrice: 24000,
    dealerDiscount: 0,
    status: 'available',
    title: '2022 Toyota Corolla',
    slug: 'toyota-corolla-2022-stk-1',
    color: null,
    mileage: null,
    transmission: null,
    fuelType: null,
    description: null,
    location: null,
    isFeatured: false,
    isForSale: true,
    isForRent: true,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

function customerRow(): Customer {
  return {
    id: 'customer-1',
    firstName: 'Ada',
    lastName: 'Driver',
    email: 'ada@example.com',
    phone: '+1 555 0100',
    address: null,
    city: null,
    country: null,
    drivingLicenseNumber: null,
    preferredContact: 'email',
    createdAt: created,
  };
}

function saleRow(overrides: Partial<Sale> = {}): Sale {
  return {
    id: 'sale-1',
    customerId: 'customer-1',
    carId: 'car-1',
    inquiryId: null,
    paymentMethod: 'cash',
    finalPrice: 24000,
    depositAmount: 0,
    tradeInValue: 0,
    financingAmount: 0,
    status: 'pending',
    saleDate: null,
    notes: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

function rentalRow(overrides: Partial<Rental> = {}): Rental {
  return {
    id: 'rental-1',
    customerId: 'customer-1',
    carId: 'car-1',
    inquiryId: null,
    startDate: march(1),
    endDate: march(5),
    pickupLocation: 'Showroom',
    returnLocation: 'Showroom',
    dailyRate: 100,
    weeklyRate: null,
    monthlyRate: null,
    totalDays: 4,
    totalCost: 400,
    securityDeposit: 0,
    status: 'reserved',
    notes: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

function dailyRate(): RentalRate {
  return {
    id: 'rate-1',
    carId: 'car-1',
    rateType: 'daily',
    rate: 100,
    securityDeposit: 250,
    isActive: true,
    createdAt: created,
  };
}

function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`postgres error ${code}`), { code, constraint });
}

const rentalRequest = (startDay: number, endDay: number) => ({
  customerId: 'customer-1',
  carId: 'car-1',
  startDate: march(startDay),
  endDate: march(endDay),
  pickupLocation: 'Showroom',
  returnLocation: 'Airport',
});

describe('DatabaseStorage - Unit Tests', () => {
  let storage: DatabaseStorage;

  beforeEach(() => {
    mockDatabase = new FakeDatabase();
    storage = new DatabaseStorage();
  });

  it('should ping the database', async () => {
    await storage.ping();
    expect(mockDatabase.argsOf('execute')).toHaveLength(1);
  });

  describe('catalog', () => {
    it('should cache brand lists until a catalog write', async () => {
      mockDatabase.queue([brandRow()]);
      await storage.getBrands();
      const brands = await storage.getBrands();

      expect(brands.map((brand) => brand.name)).toEqual(['Toyota']);
      expect(mockDatabase.argsOf('select')).toHaveLength(1);

      mockDatabase.queue([], [brandRow({ id: 'brand-2', name: 'Honda', slug: 'honda' })]);
      await storage.createBrand({ name: 'Honda' });

      mockDatabase.queue([brandRow(), brandRow({ id: 'brand-2', name: 'Honda', slug: 'honda' })]);
      expect(await storage.getBrands()).toHaveLength(2);
      expect(mockDatabase.argsOf('select')).toHaveLength(3);
    });

    it('should write brands in a serializable transaction with a free slug', async () => {
      mockDatabase.queue([{ slug: 'toyota' }, { slug: 'toyota-tsusho' }], [brandRow({ slug: 'toyota-2' })]);

      const brand = await storage.createBrand({ name: 'Toyota' });

      expect(brand.slug).toBe('toyota-2');
      expect(mockDatabase.argsOf('values')).toEqual([[{ name: 'Toyota', slug: 'toyota-2' }]]);
      expect(mockDatabase.transaction).toHaveBeenCalledWith(expect.any(Function), { isolationLevel: 'serializable' });
    });

    it('should report unique violations as domain errors', async () => {
      mockDatabase.transaction.mockRejectedValueOnce(pgError('23505', 'brands_name_unique'));

      await expect(storage.createBrand({ name: 'Toyota' })).rejects.toThrow('A brand with this name already exists.');
      mockDatabase.transaction.mockRejectedValueOnce(pgError('23505', 'brands_name_unique'));
      await expect(storage.createBrand({ name: 'Toyota' })).rejects.toBeInstanceOf(UniqueConstraintError);
    });

    it('should refuse to delete a customer with history', async () => {
      mockDatabase.queue([customerRow()], [{ count: 1 }], [{ count: 0 }], [{ count: 2 }], [{ count: 0 }]);

      await expect(storage.deleteCustomer('customer-1')).rejects.toThrow(
        'Cannot delete customer "Ada Driver": it is referenced by 3 inquiry, test drive, sale or rental record(s).'
      );
      expect(mockDatabase.argsOf('delete')).toHaveLength(0);
    });

    it('should refuse to cascade over cars with history', async () => {
      mockDatabase.queue(
        [brandRow()],
        [{ id: 'model-1' }],
        [{ id: 'car-1' }],
        [{ count: 0 }], [{ count: 1 }], [{ count: 0 }], [{ count: 0 }]
      );

      await expect(storage.deleteBrand('brand-1', { cascade: true })).rejects.toBeInstanceOf(ReferentialIntegrityError);
      expect(mockDatabase.argsOf('delete')).toHaveLength(0);
    });
  });

  describe('sales', () => {
    it('should lock the sale and car, then mark both', async () => {
      const completed = saleRow({ status: 'completed', saleDate: created });
      mockDatabase.queue([saleRow()], [carRow({ status: 'reserved' })], [{ count: 0 }], [completed], []);

      const result = await storage.completeSale('sale-1');

      expect(result).toBe(completed);
      expect(mockDatabase.argsOf('for')).toEqual([['update'], ['update']]);
      expect(mockDatabase.argsOf('set')).toEqual([
        [expect.objectContaining({ status: 'completed', saleDate: expect.any(Date) })],
        [expect.objectContaining({ status: 'sold' })],
      ]);
    });

    it('should not complete a sale while rentals are open', async () => {
      mockDatabase.queue([saleRow()], [carRow({ status: 'reserved' })], [{ count: 2 }]);

      await expect(storage.completeSale('sale-1')).rejects.toThrow(
        'Car STK-1 has 2 open rental(s); return or cancel them before completing the sale'
      );
      expect(mockDatabase.argsOf('update')).toHaveLength(0);
    });

    it('should reject completing a sale twice', async () => {
      mockDatabase.queue([saleRow({ status: 'completed' })]);

      await expect(storage.completeSale('sale-1')).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('should surface serialization failures as conflicts', async () => {
      mockDatabase.transaction.mockRejectedValueOnce(pgError('40001'));

      await expect(storage.completeSale('sale-1')).rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject a second claim on the car', async () => {
      mockDatabase.queue([customerRow()], [carRow({ status: 'reserved' })], [saleRow({ id: 'sale-9' })]);

      await expect(storage.createSale({ customerId: 'customer-1', carId: 'car-1', paymentMethod: 'cash' }))
        .rejects.toThrow('Car STK-1 already has a pending sale (sale-9)');
    });
  });

  describe('rentals', () => {
    it('should reject overlapping bookings', async () => {
      mockDatabase.queue([customerRow()], [carRow()], [rentalRow()]);

      await expect(storage.createRental(rentalRequest(4, 6))).rejects.toThrow(
        'Car STK-1 is already booked for [2025-03-01T00:00:00.000Z, 2025-03-05T00:00:00.000Z) by rental rental-1'
      );
      expect(mockDatabase.argsOf('insert')).toHaveLength(0);
    });

    it('should report the overlap with an active rental before the rented status', async () => {
      const active = rentalRow({ startDate: march(12), endDate: march(20), status: 'active' });
      mockDatabase.queue([customerRow()], [carRow({ status: 'rented' })], [active]);

      await expect(storage.createRental(rentalRequest(10, 15))).rejects.toThrow(
        'Car STK-1 is already booked for [2025-03-12T00:00:00.000Z, 2025-03-20T00:00:00.000Z) by rental rental-1'
      );
      expect(mockDatabase.argsOf('insert')).toHaveLength(0);
    });

    it('should price new rentals from the rate card', async () => {
      const inserted = rentalRow({ id: 'rental-2' });
      mockDatabase.queue([customerRow()], [carRow()], [], [dailyRate()], [inserted]);

      const rental = await storage.createRental(rentalRequest(5, 8));

      expect(rental).toBe(inserted);
      expect(mockDatabase.argsOf('values')).toEqual([[expect.objectContaining({
        dailyRate: 100,
        weeklyRate: null,
        monthlyRate: null,
        securityDeposit: 250,
        totalDays: 3,
        totalCost: 300,
        status: 'reserved',
      })]]);
    });

    it('should not book a sold car', async () => {
      mockDatabase.queue([customerRow()], [carRow({ status: 'sold' })]);

      await expect(storage.createRental(rentalRequest(1, 2))).rejects.toThrow('Car STK-1 is already sold');
    });

    it('should reject an unknown car as a validation error', async () => {
      mockDatabase.queue([customerRow()], []);

      await expect(storage.createRental(rentalRequest(1, 2))).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
