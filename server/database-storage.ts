import { LRUCache } from "lru-cache";
import { and, asc, desc, eq, gte, ilike, inArray, like, lte, ne, or, sql, type SQL } from "drizzle-orm";
import {
  RATE_TYPES,
  brands,
  carModels,
  categories,
  features,
  cars,
  carFeatures,
  carImages,
  rentalRates,
  customers,
  inquiries,
  testDrives,
  sales,
  rentals,
  blogPosts,
  type Brand,
  type InsertBrand,
  type CarModel,
  type InsertCarModel,
  type Category,
  type InsertCategory,
  type Feature,
  type InsertFeature,
  type Car,
  type InsertCar,
  type UpdateCar,
  type CarWithDetails,
  type CarImage,
  type InsertCarImage,
  type RentalRate,
  type UpsertRentalRate,
  type Customer,
  type InsertCustomer,
  type Inquiry,
  type InsertInquiry,
  type InquiryStatus,
  type InquiryCloseReason,
  type TestDrive,
  type InsertTestDrive,
  type TestDriveStatus,
  type Sale,
  type InsertSale,
  type Rental,
  type InsertRental,
  type RentalQuoteRequest,
  type RentalStatus,
  type BlogPost,
  type InsertBlogPost,
  type UpdateBlogPost,
} from "@shared/schema";
import { getDb, type Transaction } from "./db";
import { mapDatabaseError, type DatabaseAction } from "./database-errors";
import { NotFoundError, ReferentialIntegrityError, ValidationError } from "./errors";
import {
  RENTAL_TRANSITIONS,
  SALE_TRANSITIONS,
  TEST_DRIVE_TRANSITIONS,
  assertInquiryTransition,
  assertTransition,
  assertValidRange,
  carAcceptsRental,
  carAcceptsSale,
  describeCarStatus,
  findOverlappingRental,
  formatRange,
  type DateRange,
} from "./lifecycle";
import {
  assertCarPricing,
  buildCarTitle,
  carFinalPrice,
  carSlugBase,
  pickUniqueSlug,
  slugify,
} from "./catalog-rules";
import { calculateRentalCost, resolveRentalTerms } from "./rental-pricing";
import {
  appendNote,
  assembleCarDetails,
  carHistoryMessage,
  carsInUseMessage,
  clampPageSize,
  containsPattern,
  definedFields,
  type BlogPostFilterOptions,
  type CarFilterOptions,
  type CarListResult,
  type DeleteOptions,
  type IStorage,
  type InquiryFilterOptions,
  type RentalFilterOptions,
  type RentalQuote,
  type SaleFilterOptions,
  type TestDriveFilterOptions,
} from "./storage";

const ALL = "all";
const OPEN_RENTAL_STATUSES: RentalStatus[] = ["reserved", "active"];

const countRows = () => sql<number>`cast(count(*) as integer)`;

const CAR_SORT_COLUMNS = {
  sellingPrice: cars.sellingPrice,
  year: cars.year,
  mileage: cars.mileage,
  createdAt: cars.createdAt,
};

export class DatabaseStorage implements IStorage {
  readonly kind = "postgres" as const;

  // Catalog lists change rarely and are read on every inventory page
  private brandCache: LRUCache<string, Brand[]>;
  private categoryCache: LRUCache<string, Category[]>;
  private featureCache: LRUCache<string, Feature[]>;

  constructor() {
    const cacheOptions = { max: 10, ttl: 1000 * 60 * 5 };
    this.brandCache = new LRUCache<string, Brand[]>(cacheOptions);
    this.categoryCache = new LRUCache<string, Category[]>(cacheOptions);
    this.featureCache = new LRUCache<string, Feature[]>(cacheOptions);
  }

  async ping(): Promise<void> {
    const db = getDb();
    await db.execute(sql`select 1`);
  }

  private invalidateCatalogCache(): void {
    this.brandCache.clear();
    this.categoryCache.clear();
    this.featureCache.clear();
  }

  /**
   * Runs `work` in a SERIALIZABLE transaction and reports Postgres failures
   * as domain errors. Serialization failures surface as ConflictError.
   */
  private async inTransaction<T>(action: DatabaseAction, work: (tx: Transaction) => Promise<T>): Promise<T> {
    const db = getDb();
    try {
      return await db.transaction(work, { isolationLevel: "serializable" });
    } catch (error) {
      throw mapDatabaseError(error, action);
    }
  }

  private async lockCar(tx: Transaction, id: string): Promise<Car> {
    const [car] = await tx.select().from(cars).where(eq(cars.id, id)).for("update");
    if (!car) {
      throw new NotFoundError("Car", id);
    }
    return car;
  }

  // Same lock, for ids that arrive in a request body
  private async lockReferencedCar(tx: Transaction, id: string): Promise<Car> {
    const [car] = await tx.select().from(cars).where(eq(cars.id, id)).for("update");
    if (!car) {
      throw new ValidationError(`Car ${id} does not exist`);
    }
    return car;
  }

  private async referenceCustomer(tx: Transaction, id: string): Promise<Customer> {
    const [customer] = await tx.select().from(customers).where(eq(customers.id, id)).limit(1);
    if (!customer) {
      throw new ValidationError(`Customer ${id} does not exist`);
    }
    return customer;
  }

  private async assertInquiryMatches(tx: Transaction, inquiryId: string, carId: string): Promise<void> {
    const [inquiry] = await tx.select().from(inquiries).where(eq(inquiries.id, inquiryId)).limit(1);
    if (!inquiry) {
      throw new ValidationError(`Inquiry ${inquiryId} does not exist`);
    }
    if (inquiry.carId !== carId) {
      throw new ValidationError(`Inquiry ${inquiryId} is about a different car`);
    }
  }

  private async countCarReferences(tx: Transaction, carIds: string[]): Promise<number> {
    const [inquiryCount] = await tx.select({ count: countRows() }).from(inquiries).where(inArray(inquiries.carId, carIds));
    const [testDriveCount] = await tx.select({ count: countRows() }).from(testDrives).where(inArray(testDrives.carId, carIds));
    const [saleCount] = await tx.select({ count: countRows() }).from(sales).where(inArray(sales.carId, carIds));
    const [rentalCount] = await tx.select({ count: countRows() }).from(rentals).where(inArray(rentals.carId, carIds));
    return inquiryCount.count + testDriveCount.count + saleCount.count + rentalCount.count;
  }

  private async countCustomerReferences(tx: Transaction, customerId: string): Promise<number> {
    const [inquiryCount] = await tx.select({ count: countRows() }).from(inquiries).where(eq(inquiries.customerId, customerId));
    const [testDriveCount] = await tx.select({ count: countRows() }).from(testDrives).where(eq(testDrives.customerId, customerId));
    const [saleCount] = await tx.select({ count: countRows() }).from(sales).where(eq(sales.customerId, customerId));
    const [rentalCount] = await tx.select({ count: countRows() }).from(rentals).where(eq(rentals.customerId, customerId));
    return inquiryCount.count + testDriveCount.count + saleCount.count + rentalCount.count;
  }

  // Images, feature links and rate cards go with the car through ON DELETE CASCADE
  private async deleteCatalogCars(
    tx: Transaction,
    resource: string,
    name: string,
    carIds: string[],
    options: DeleteOptions
  ): Promise<void> {
    if (carIds.length === 0) {
      return;
    }
    if (!options.cascade) {
      throw new ReferentialIntegrityError(carsInUseMessage(resource, name, carIds.length));
    }

    const references = await this.countCarReferences(tx, carIds);
    if (references > 0) {
      throw new ReferentialIntegrityError(carHistoryMessage(references));
    }
    await tx.delete(cars).where(inArray(cars.id, carIds));
  }

  // Brands
  async getBrands(): Promise<Brand[]> {
    const cached = this.brandCache.get(ALL);
    if (cached) {
      return cached;
    }

    const db = getDb();
    const result = await db.select().from(brands).orderBy(asc(brands.name));
    this.brandCache.set(ALL, result);
    return result;
  }

  async getBrand(id: string): Promise<Brand | undefined> {
    const db = getDb();
    const result = await db.select().from(brands).where(eq(brands.id, id)).limit(1);
    return result[0];
  }

  async createBrand(data: InsertBrand): Promise<Brand> {
    const brand = await this.inTransaction("write", async (tx) => {
      const base = slugify(data.name);
      const taken = await tx.select({ slug: brands.slug }).from(brands).where(like(brands.slug, `${base}%`));
      const result = await tx.insert(brands)
        .values({ ...data, slug: pickUniqueSlug(base, taken.map((row) => row.slug)) })
        .returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return brand;
  }

  async updateBrand(id: string, updates: Partial<InsertBrand>): Promise<Brand> {
    const brand = await this.inTransaction("write", async (tx) => {
      const [current] = await tx.select().from(brands).where(eq(brands.id, id)).for("update");
      if (!current) {
        throw new NotFoundError("Brand", id);
      }

      const changes = definedFields(updates);
      let slug = current.slug;
      if (changes.name !== undefined && changes.name !== current.name) {
        const base = slugify(changes.name);
        const taken = await tx.select({ slug: brands.slug }).from(brands)
          .where(and(like(brands.slug, `${base}%`), ne(brands.id, id)));
        slug = pickUniqueSlug(base, taken.map((row) => row.slug));
      }

      const result = await tx.update(brands).set({ ...changes, slug }).where(eq(brands.id, id)).returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return brand;
  }

  async deleteBrand(id: string, options: DeleteOptions = {}): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const [brand] = await tx.select().from(brands).where(eq(brands.id, id)).for("update");
      if (!brand) {
        throw new NotFoundError("Brand", id);
      }

      const modelIds = (await tx.select({ id: carModels.id }).from(carModels).where(eq(carModels.brandId, id)))
        .map((row) => row.id);
      const carIds = modelIds.length > 0
        ? (await tx.select({ id: cars.id }).from(cars).where(inArray(cars.carModelId, modelIds))).map((row) => row.id)
        : [];

      if (modelIds.length > 0 && carIds.length === 0 && !options.cascade) {
        throw new ReferentialIntegrityError(
          `Cannot delete brand "${brand.name}": it still has ${modelIds.length} car model(s). Remove them first or request a cascading delete.`
        );
      }

      await this.deleteCatalogCars(tx, "brand", brand.name, carIds, options);
      if (modelIds.length > 0) {
        await tx.delete(carModels).where(inArray(carModels.id, modelIds));
      }
      await tx.delete(brands).where(eq(brands.id, id));
    });
    this.invalidateCatalogCache();
  }

  // Car models
  async getCarModels(brandId?: string): Promise<CarModel[]> {
    const db = getDb();
    return db.select().from(carModels)
      .where(brandId ? eq(carModels.brandId, brandId) : undefined)
      .orderBy(asc(carModels.name));
  }

  async getCarModel(id: string): Promise<CarModel | undefined> {
    const db = getDb();
    const result = await db.select().from(carModels).where(eq(carModels.id, id)).limit(1);
    return result[0];
  }

  async createCarModel(data: InsertCarModel): Promise<CarModel> {
    return this.inTransaction("write", async (tx) => {
      const [brand] = await tx.select({ id: brands.id }).from(brands).where(eq(brands.id, data.brandId)).limit(1);
      if (!brand) {
        throw new ValidationError(`Brand ${data.brandId} does not exist`);
      }

      const result = await tx.insert(carModels).values({ ...data, slug: slugify(data.name) }).returning();
      return result[0];
    });
  }

  async updateCarModel(id: string, updates: Partial<InsertCarModel>): Promise<CarModel> {
    return this.inTransaction("write", async (tx) => {
      const [current] = await tx.select().from(carModels).where(eq(carModels.id, id)).for("update");
      if (!current) {
        throw new NotFoundError("Car model", id);
      }

      const changes = definedFields(updates);
      if (changes.brandId !== undefined && changes.brandId !== current.brandId) {
        const [brand] = await tx.select({ id: brands.id }).from(brands).where(eq(brands.id, changes.brandId)).limit(1);
        if (!brand) {
          throw new ValidationError(`Brand ${changes.brandId} does not exist`);
        }
      }

      const result = await tx.update(carModels)
        .set({ ...changes, slug: slugify(changes.name ?? current.name) })
        .where(eq(carModels.id, id))
        .returning();
      return result[0];
    });
  }

  async deleteCarModel(id: string, options: DeleteOptions = {}): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const [carModel] = await tx.select().from(carModels).where(eq(carModels.id, id)).for("update");
      if (!carModel) {
        throw new NotFoundError("Car model", id);
      }

      const carIds = (await tx.select({ id: cars.id }).from(cars).where(eq(cars.carModelId, id))).map((row) => row.id);
      await this.deleteCatalogCars(tx, "car model", carModel.name, carIds, options);
      await tx.delete(carModels).where(eq(carModels.id, id));
    });
  }

  // Categories
  async getCategories(): Promise<Category[]> {
    const cached = this.categoryCache.get(ALL);
    if (cached) {
      return cached;
    }

    const db = getDb();
    const result = await db.select().from(categories).orderBy(asc(categories.name));
    this.categoryCache.set(ALL, result);
    return result;
  }

  async getCategory(id: string): Promise<Category | undefined> {
    const db = getDb();
    const result = await db.select().from(categories).where(eq(categories.id, id)).limit(1);
    return result[0];
  }

  async createCategory(data: InsertCategory): Promise<Category> {
    const category = await this.inTransaction("write", async (tx) => {
      const base = slugify(data.name);
      const taken = await tx.select({ slug: categories.slug }).from(categories).where(like(categories.slug, `${base}%`));
      const result = await tx.insert(categories)
        .values({ ...data, slug: pickUniqueSlug(base, taken.map((row) => row.slug)) })
        .returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return category;
  }

  async updateCategory(id: string, updates: Partial<InsertCategory>): Promise<Category> {
    const category = await this.inTransaction("write", async (tx) => {
      const [current] = await tx.select().from(categories).where(eq(categories.id, id)).for("update");
      if (!current) {
        throw new NotFoundError("Category", id);
      }

      const changes = definedFields(updates);
      let slug = current.slug;
      if (changes.name !== undefined && changes.name !== current.name) {
        const base = slugify(changes.name);
        const taken = await tx.select({ slug: categories.slug }).from(categories)
          .where(and(like(categories.slug, `${base}%`), ne(categories.id, id)));
        slug = pickUniqueSlug(base, taken.map((row) => row.slug));
      }

      const result = await tx.update(categories).set({ ...changes, slug }).where(eq(categories.id, id)).returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return category;
  }

  async deleteCategory(id: string, options: DeleteOptions = {}): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const [category] = await tx.select().from(categories).where(eq(categories.id, id)).for("update");
      if (!category) {
        throw new NotFoundError("Category", id);
      }

      const carIds = (await tx.select({ id: cars.id }).from(cars).where(eq(cars.categoryId, id))).map((row) => row.id);
      await this.deleteCatalogCars(tx, "category", category.name, carIds, options);
      await tx.delete(categories).where(eq(categories.id, id));
    });
    this.invalidateCatalogCache();
  }

  // Features
  async getFeatures(): Promise<Feature[]> {
    const cached = this.featureCache.get(ALL);
    if (cached) {
      return cached;
    }

    const db = getDb();
    const result = await db.select().from(features).orderBy(asc(features.category), asc(features.name));
    this.featureCache.set(ALL, result);
    return result;
  }

  async getFeature(id: string): Promise<Feature | undefined> {
    const db = getDb();
    const result = await db.select().from(features).where(eq(features.id, id)).limit(1);
    return result[0];
  }

  async createFeature(data: InsertFeature): Promise<Feature> {
    const feature = await this.inTransaction("write", async (tx) => {
      const result = await tx.insert(features).values(data).returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return feature;
  }

  async updateFeature(id: string, updates: Partial<InsertFeature>): Promise<Feature> {
    const feature = await this.inTransaction("write", async (tx) => {
      const changes = definedFields(updates);
      const [current] = await tx.select().from(features).where(eq(features.id, id)).for("update");
      if (!current) {
        throw new NotFoundError("Feature", id);
      }
      if (Object.keys(changes).length === 0) {
        return current;
      }

      const result = await tx.update(features).set(changes).where(eq(features.id, id)).returning();
      return result[0];
    });
    this.invalidateCatalogCache();
    return feature;
  }

  async deleteFeature(id: string): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const result = await tx.delete(features).where(eq(features.id, id)).returning({ id: features.id });
      if (result.length === 0) {
        throw new NotFoundError("Feature", id);
      }
    });
    this.invalidateCatalogCache();
  }

  // Cars
  async getCars(filters: CarFilterOptions = {}): Promise<CarListResult> {
    const db = getDb();
    const conditions: SQL[] = [];

    if (filters.brandId) {
      conditions.push(inArray(
        cars.carModelId,
        db.select({ id: carModels.id }).from(carModels).where(eq(carModels.brandId, filters.brandId))
      ));
    }
    if (filters.carModelId) conditions.push(eq(cars.carModelId, filters.carModelId));
    if (filters.categoryId) conditions.push(eq(cars.categoryId, filters.categoryId));
    if (filters.conditionType) conditions.push(eq(cars.conditionType, filters.conditionType));
    if (filters.status) conditions.push(eq(cars.status, filters.status));
    if (filters.year !== undefined) conditions.push(eq(cars.year, filters.year));
    if (filters.minPrice !== undefined) conditions.push(gte(cars.sellingPrice, filters.minPrice));
    if (filters.maxPrice !== undefined) conditions.push(lte(cars.sellingPrice, filters.maxPrice));
    if (filters.forSale !== undefined) conditions.push(eq(cars.isForSale, filters.forSale));
    if (filters.forRent !== undefined) conditions.push(eq(cars.isForRent, filters.forRent));
    if (filters.featured !== undefined) conditions.push(eq(cars.isFeatured, filters.featured));

    const search = filters.search?.trim();
    if (search) {
      const pattern = containsPattern(search);
      const match = or(ilike(cars.title, pattern), ilike(cars.description, pattern));
      if (match) conditions.push(match);
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;
    const sortColumn = CAR_SORT_COLUMNS[filters.sortBy ?? "createdAt"];
    const order = filters.sortOrder === "asc" ? asc(sortColumn) : desc(sortColumn);
    const limit = clampPageSize(filters.limit);
    const offset = Math.max(0, Math.floor(filters.offset ?? 0));

    const rows = await db.select().from(cars).where(where).orderBy(order, asc(cars.id)).limit(limit).offset(offset);
    const [{ total }] = await db.select({ total: countRows() }).from(cars).where(where);

    return {
      cars: rows,
      total,
      hasMore: offset + rows.length < total,
    };
  }

  async getCar(id: string): Promise<Car | undefined> {
    const db = getDb();
    const result = await db.select().from(cars).where(eq(cars.id, id)).limit(1);
    return result[0];
  }

  async getCarBySlug(slug: string): Promise<Car | undefined> {
    const db = getDb();
    const result = await db.select().from(cars).where(eq(cars.slug, slug)).limit(1);
    return result[0];
  }

  async getCarWithDetails(id: string): Promise<CarWithDetails | undefined> {
    const db = getDb();
    const [row] = await db
      .select({ car: cars, carModel: carModels, brand: brands, category: categories })
      .from(cars)
      .innerJoin(carModels, eq(cars.carModelId, carModels.id))
      .innerJoin(brands, eq(carModels.brandId, brands.id))
      .innerJoin(categories, eq(cars.categoryId, categories.id))
      .where(eq(cars.id, id))
      .limit(1);

    if (!row) {
      return undefined;
    }

    return assembleCarDetails(row.car, {
      carModel: row.carModel,
      brand: row.brand,
      category: row.category,
      features: await this.getCarFeatures(id),
      images: await this.getCarImages(id),
      rentalRates: await this.getRentalRates(id),
    });
  }

  private async referenceFeatures(tx: Transaction, featureIds: string[]): Promise<string[]> {
    const unique = Array.from(new Set(featureIds));
    if (unique.length === 0) {
      return [];
    }

    const found = new Set(
      (await tx.select({ id: features.id }).from(features).where(inArray(features.id, unique))).map((row) => row.id)
    );
    const missing = unique.filter((featureId) => !found.has(featureId));
    if (missing.length > 0) {
      throw new ValidationError(
        "Unknown feature(s)",
        missing.map((featureId) => `Feature ${featureId} does not exist`)
      );
    }
    return unique;
  }

  private async carIdentity(tx: Transaction, carModelId: string): Promise<{ carModel: CarModel; brand: Brand }> {
    const [row] = await tx
      .select({ carModel: carModels, brand: brands })
      .from(carModels)
      .innerJoin(brands, eq(carModels.brandId, brands.id))
      .where(eq(carModels.id, carModelId))
      .limit(1);

    if (!row) {
      throw new ValidationError(`Car model ${carModelId} does not exist`);
    }
    return row;
  }

  private async assertCategoryExists(tx: Transaction, categoryId: string): Promise<void> {
    const [category] = await tx.select({ id: categories.id }).from(categories).where(eq(categories.id, categoryId)).limit(1);
    if (!category) {
      throw new ValidationError(`Category ${categoryId} does not exist`);
    }
  }

  private async freeCarSlug(tx: Transaction, base: string, excludeId?: string): Promise<string> {
    const taken = await tx.select({ slug: cars.slug }).from(cars)
      .where(excludeId ? and(like(cars.slug, `${base}%`), ne(cars.id, excludeId)) : like(cars.slug, `${base}%`));
    return pickUniqueSlug(base, taken.map((row) => row.slug));
  }

  async createCar(data: InsertCar): Promise<Car> {
    return this.inTransaction("write", async (tx) => {
      const { carModel, brand } = await this.carIdentity(tx, data.carModelId);
      await this.assertCategoryExists(tx, data.categoryId);

      const { featureIds: requestedFeatures = [], title, ...columns } = data;
      const featureIds = await this.referenceFeatures(tx, requestedFeatures);

      const dealerDiscount = data.dealerDiscount ?? 0;
      assertCarPricing({ msrp: data.msrp, sellingPrice: data.sellingPrice, dealerDiscount });

      const slug = await this.freeCarSlug(tx, carSlugBase(brand.name, carModel.name, data.year, data.stockNumber));
      const [car] = await tx.insert(cars).values({
        ...columns,
        dealerDiscount,
        title: title || buildCarTitle(data.year, brand.name, carModel.name),
        slug,
      }).returning();

      if (featureIds.length > 0) {
        await tx.insert(carFeatures).values(featureIds.map((featureId) => ({ carId: car.id, featureId })));
      }
      return car;
    });
  }

  async updateCar(id: string, updates: UpdateCar): Promise<Car> {
    return this.inTransaction("write", async (tx) => {
      const car = await this.lockCar(tx, id);
      const changes = definedFields(updates);
      const merged: Car = { ...car, ...changes };

      const { carModel, brand } = await this.carIdentity(tx, merged.carModelId);
      if (changes.categoryId !== undefined) {
        await this.assertCategoryExists(tx, changes.categoryId);
      }
      assertCarPricing(merged);

      let { slug, title } = merged;
      const identityChanged =
        merged.carModelId !== car.carModelId ||
        merged.year !== car.year ||
        merged.stockNumber !== car.stockNumber;

      if (identityChanged) {
        slug = await this.freeCarSlug(tx, carSlugBase(brand.name, carModel.name, merged.year, merged.stockNumber), id);

        const previous = await this.carIdentity(tx, car.carModelId);
        const hadGeneratedTitle = car.title === buildCarTitle(car.year, previous.brand.name, previous.carModel.name);
        if (!changes.title && hadGeneratedTitle) {
          title = buildCarTitle(merged.year, brand.name, carModel.name);
        }
      }

      const result = await tx.update(cars)
        .set({ ...changes, slug, title, updatedAt: new Date() })
        .where(eq(cars.id, id))
        .returning();
      return result[0];
    });
  }

  async deleteCar(id: string): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      await this.lockCar(tx, id);
      const references = await this.countCarReferences(tx, [id]);
      if (references > 0) {
        throw new ReferentialIntegrityError(carHistoryMessage(references));
      }
      await tx.delete(cars).where(eq(cars.id, id));
    });
  }

  async getCarFeatures(carId: string): Promise<Feature[]> {
    const db = getDb();
    const rows = await db
      .select({ feature: features })
      .from(carFeatures)
      .innerJoin(features, eq(carFeatures.featureId, features.id))
      .where(eq(carFeatures.carId, carId))
      .orderBy(asc(features.name));
    return rows.map((row) => row.feature);
  }

  async setCarFeatures(carId: string, featureIds: string[]): Promise<Feature[]> {
    return this.inTransaction("write", async (tx) => {
      await this.lockCar(tx, carId);
      const unique = await this.referenceFeatures(tx, featureIds);

      await tx.delete(carFeatures).where(eq(carFeatures.carId, carId));
      if (unique.length > 0) {
        await tx.insert(carFeatures).values(unique.map((featureId) => ({ carId, featureId })));
      }

      const rows = await tx
        .select({ feature: features })
        .from(carFeatures)
        .innerJoin(features, eq(carFeatures.featureId, features.id))
        .where(eq(carFeatures.carId, carId))
        .orderBy(asc(features.name));
      return rows.map((row) => row.feature);
    });
  }

  // Images. Main-image changes lock the car row so two requests cannot both
  // clear and set the flag.
  async getCarImages(carId: string): Promise<CarImage[]> {
    const db = getDb();
    return db.select().from(carImages)
      .where(eq(carImages.carId, carId))
      .orderBy(asc(carImages.displayOrder), asc(carImages.createdAt));
  }

  async addCarImage(data: InsertCarImage): Promise<CarImage> {
    return this.inTransaction("write", async (tx) => {
      await this.lockCar(tx, data.carId);
      const existing = await tx.select().from(carImages).where(eq(carImages.carId, data.carId));
      const isMain = existing.length === 0 || data.isMain === true;

      if (isMain) {
        await tx.update(carImages).set({ isMain: false })
          .where(and(eq(carImages.carId, data.carId), eq(carImages.isMain, true)));
      }

      const displayOrder = data.displayOrder
        ?? (existing.length > 0 ? Math.max(...existing.map((image) => image.displayOrder)) + 1 : 0);
      const result = await tx.insert(carImages).values({ ...data, isMain, displayOrder }).returning();
      return result[0];
    });
  }

  private async findImage(tx: Transaction, carId: string, imageId: string): Promise<CarImage> {
    const [image] = await tx.select().from(carImages)
      .where(and(eq(carImages.id, imageId), eq(carImages.carId, carId)))
      .limit(1);
    if (!image) {
      throw new NotFoundError("Car image", imageId);
    }
    return image;
  }

  async setCarImageMain(carId: string, imageId: string): Promise<CarImage> {
    return this.inTransaction("write", async (tx) => {
      await this.lockCar(tx, carId);
      await this.findImage(tx, carId, imageId);

      await tx.update(carImages).set({ isMain: false })
        .where(and(eq(carImages.carId, carId), eq(carImages.isMain, true)));
      const result = await tx.update(carImages).set({ isMain: true }).where(eq(carImages.id, imageId)).returning();
      return result[0];
    });
  }

  async updateCarImageOrder(carId: string, imageId: string, displayOrder: number): Promise<CarImage> {
    return this.inTransaction("write", async (tx) => {
      const result = await tx.update(carImages)
        .set({ displayOrder })
        .where(and(eq(carImages.id, imageId), eq(carImages.carId, carId)))
        .returning();
      if (result.length === 0) {
        throw new NotFoundError("Car image", imageId);
      }
      return result[0];
    });
  }

  async deleteCarImage(carId: string, imageId: string): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      await this.lockCar(tx, carId);
      const image = await this.findImage(tx, carId, imageId);
      await tx.delete(carImages).where(eq(carImages.id, imageId));

      if (image.isMain) {
        const [next] = await tx.select().from(carImages)
          .where(eq(carImages.carId, carId))
          .orderBy(asc(carImages.displayOrder), asc(carImages.createdAt))
          .limit(1);
        if (next) {
          await tx.update(carImages).set({ isMain: true }).where(eq(carImages.id, next.id));
        }
      }
    });
  }

  // Rental rate card
  async getRentalRates(carId: string): Promise<RentalRate[]> {
    const db = getDb();
    const rows = await db.select().from(rentalRates).where(eq(rentalRates.carId, carId));
    return rows.sort((a, b) => RATE_TYPES.indexOf(a.rateType) - RATE_TYPES.indexOf(b.rateType));
  }

  async setRentalRate(carId: string, data: UpsertRentalRate): Promise<RentalRate> {
    return this.inTransaction("write", async (tx) => {
      await this.lockCar(tx, carId);
      const values = {
        carId,
        rateType: data.rateType,
        rate: data.rate,
        securityDeposit: data.securityDeposit ?? 0,
        isActive: data.isActive ?? true,
      };

      const result = await tx.insert(rentalRates)
        .values(values)
        .onConflictDoUpdate({
          target: [rentalRates.carId, rentalRates.rateType],
          set: { rate: values.rate, securityDeposit: values.securityDeposit, isActive: values.isActive },
        })
        .returning();
      return result[0];
    });
  }

  // Customers
  async getCustomers(search?: string): Promise<Customer[]> {
    const db = getDb();
    const term = search?.trim();
    const pattern = term ? containsPattern(term) : undefined;

    return db.select().from(customers)
      .where(pattern
        ? or(
            ilike(customers.firstName, pattern),
            ilike(customers.lastName, pattern),
            ilike(customers.email, pattern),
            ilike(customers.phone, pattern)
          )
        : undefined)
      .orderBy(desc(customers.createdAt));
  }

  async getCustomer(id: string): Promise<Customer | undefined> {
    const db = getDb();
    const result = await db.select().from(customers).where(eq(customers.id, id)).limit(1);
    return result[0];
  }

  async createCustomer(data: InsertCustomer): Promise<Customer> {
    return this.inTransaction("write", async (tx) => {
      const result = await tx.insert(customers).values(data).returning();
      return result[0];
    });
  }

  async updateCustomer(id: string, updates: Partial<InsertCustomer>): Promise<Customer> {
    return this.inTransaction("write", async (tx) => {
      const changes = definedFields(updates);
      const [current] = await tx.select().from(customers).where(eq(customers.id, id)).for("update");
      if (!current) {
        throw new NotFoundError("Customer", id);
      }
      if (Object.keys(changes).length === 0) {
        return current;
      }

      const result = await tx.update(customers).set(changes).where(eq(customers.id, id)).returning();
      return result[0];
    });
  }

  async deleteCustomer(id: string): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const [customer] = await tx.select().from(customers).where(eq(customers.id, id)).for("update");
      if (!customer) {
        throw new NotFoundError("Customer", id);
      }

      const references = await this.countCustomerReferences(tx, id);
      if (references > 0) {
        throw new ReferentialIntegrityError(
          `Cannot delete customer "${customer.firstName} ${customer.lastName}": it is referenced by ${references} inquiry, test drive, sale or rental record(s).`
        );
      }
      await tx.delete(customers).where(eq(customers.id, id));
    });
  }

  // Inquiries
  async getInquiries(filters: InquiryFilterOptions = {}): Promise<Inquiry[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(inquiries.status, filters.status));
    if (filters.carId) conditions.push(eq(inquiries.carId, filters.carId));
    if (filters.customerId) conditions.push(eq(inquiries.customerId, filters.customerId));

    return db.select().from(inquiries)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(inquiries.createdAt));
  }

  async getInquiry(id: string): Promise<Inquiry | undefined> {
    const db = getDb();
    const result = await db.select().from(inquiries).where(eq(inquiries.id, id)).limit(1);
    return result[0];
  }

  async createInquiry(data: InsertInquiry): Promise<Inquiry> {
    return this.inTransaction("write", async (tx) => {
      await this.referenceCustomer(tx, data.customerId);
      const [car] = await tx.select({ id: cars.id }).from(cars).where(eq(cars.id, data.carId)).limit(1);
      if (!car) {
        throw new ValidationError(`Car ${data.carId} does not exist`);
      }

      const result = await tx.insert(inquiries).values(data).returning();
      return result[0];
    });
  }

  async transitionInquiry(id: string, status: InquiryStatus, closeReason?: InquiryCloseReason): Promise<Inquiry> {
    return this.inTransaction("write", async (tx) => {
      const [inquiry] = await tx.select().from(inquiries).where(eq(inquiries.id, id)).for("update");
      if (!inquiry) {
        throw new NotFoundError("Inquiry", id);
      }
      assertInquiryTransition(inquiry.status, status, closeReason);

      const result = await tx.update(inquiries)
        .set({
          status,
          closeReason: status === "closed" ? closeReason ?? null : inquiry.closeReason,
          updatedAt: new Date(),
        })
        .where(eq(inquiries.id, id))
        .returning();
      return result[0];
    });
  }

  // Test drives
  async getTestDrives(filters: TestDriveFilterOptions = {}): Promise<TestDrive[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(testDrives.status, filters.status));
    if (filters.carId) conditions.push(eq(testDrives.carId, filters.carId));
    if (filters.customerId) conditions.push(eq(testDrives.customerId, filters.customerId));

    return db.select().from(testDrives)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(testDrives.scheduledAt));
  }

  async getTestDrive(id: string): Promise<TestDrive | undefined> {
    const db = getDb();
    const result = await db.select().from(testDrives).where(eq(testDrives.id, id)).limit(1);
    return result[0];
  }

  async createTestDrive(data: InsertTestDrive): Promise<TestDrive> {
    return this.inTransaction("write", async (tx) => {
      await this.referenceCustomer(tx, data.customerId);
      const [car] = await tx.select({ id: cars.id }).from(cars).where(eq(cars.id, data.carId)).limit(1);
      if (!car) {
        throw new ValidationError(`Car ${data.carId} does not exist`);
      }

      const result = await tx.insert(testDrives).values(data).returning();
      return result[0];
    });
  }

  async transitionTestDrive(id: string, status: TestDriveStatus, feedback?: string): Promise<TestDrive> {
    return this.inTransaction("write", async (tx) => {
      const [testDrive] = await tx.select().from(testDrives).where(eq(testDrives.id, id)).for("update");
      if (!testDrive) {
        throw new NotFoundError("Test drive", id);
      }
      assertTransition("test drive", TEST_DRIVE_TRANSITIONS, testDrive.status, status);

      const result = await tx.update(testDrives)
        .set({ status, feedback: feedback ?? testDrive.feedback, updatedAt: new Date() })
        .where(eq(testDrives.id, id))
        .returning();
      return result[0];
    });
  }

  // Sales
  async getSales(filters: SaleFilterOptions = {}): Promise<Sale[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(sales.status, filters.status));
    if (filters.carId) conditions.push(eq(sales.carId, filters.carId));
    if (filters.customerId) conditions.push(eq(sales.customerId, filters.customerId));

    return db.select().from(sales)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(sales.createdAt));
  }

  async getSale(id: string): Promise<Sale | undefined> {
    const db = getDb();
    const result = await db.select().from(sales).where(eq(sales.id, id)).limit(1);
    return result[0];
  }

  private async lockSale(tx: Transaction, id: string): Promise<Sale> {
    const [sale] = await tx.select().from(sales).where(eq(sales.id, id)).for("update");
    if (!sale) {
      throw new NotFoundError("Sale", id);
    }
    return sale;
  }

  async createSale(data: InsertSale): Promise<Sale> {
    return this.inTransaction("write", async (tx) => {
      await this.referenceCustomer(tx, data.customerId);
      const car = await this.lockReferencedCar(tx, data.carId);
      if (data.inquiryId) {
        await this.assertInquiryMatches(tx, data.inquiryId, data.carId);
      }

      const [claim] = await tx.select().from(sales)
        .where(and(eq(sales.carId, car.id), ne(sales.status, "cancelled")))
        .limit(1);
      if (claim) {
        throw new ValidationError(`Car ${car.stockNumber} already has a ${claim.status} sale (${claim.id})`);
      }
      if (!carAcceptsSale(car.status)) {
        throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
      }

      const now = new Date();
      const [sale] = await tx.insert(sales).values({
        ...data,
        finalPrice: data.finalPrice ?? carFinalPrice(car),
        status: "pending",
      }).returning();
      await tx.update(cars).set({ status: "reserved", updatedAt: now }).where(eq(cars.id, car.id));
      return sale;
    });
  }

  async completeSale(id: string): Promise<Sale> {
    return this.inTransaction("write", async (tx) => {
      const sale = await this.lockSale(tx, id);
      assertTransition("sale", SALE_TRANSITIONS, sale.status, "completed");

      const car = await this.lockCar(tx, sale.carId);
      if (!carAcceptsSale(car.status)) {
        throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
      }
      const [{ count: openRentals }] = await tx.select({ count: countRows() }).from(rentals)
        .where(and(eq(rentals.carId, car.id), inArray(rentals.status, OPEN_RENTAL_STATUSES)));
      if (openRentals > 0) {
        throw new ValidationError(
          `Car ${car.stockNumber} has ${openRentals} open rental(s); return or cancel them before completing the sale`
        );
      }

      const now = new Date();
      const [completed] = await tx.update(sales)
        .set({ status: "completed", saleDate: now, updatedAt: now })
        .where(eq(sales.id, id))
        .returning();
      await tx.update(cars).set({ status: "sold", updatedAt: now }).where(eq(cars.id, car.id));
      return completed;
    });
  }

  async cancelSale(id: string, reason?: string): Promise<Sale> {
    return this.inTransaction("write", async (tx) => {
      const sale = await this.lockSale(tx, id);
      assertTransition("sale", SALE_TRANSITIONS, sale.status, "cancelled");
      await this.lockCar(tx, sale.carId);

      const now = new Date();
      const [cancelled] = await tx.update(sales)
        .set({
          status: "cancelled",
          notes: appendNote(sale.notes, reason && `Cancelled: ${reason}`),
          updatedAt: now,
        })
        .where(eq(sales.id, id))
        .returning();
      await tx.update(cars)
        .set({ status: "available", updatedAt: now })
        .where(and(eq(cars.id, sale.carId), eq(cars.status, "reserved")));
      return cancelled;
    });
  }

  // Rentals
  async getRentals(filters: RentalFilterOptions = {}): Promise<Rental[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(rentals.status, filters.status));
    if (filters.carId) conditions.push(eq(rentals.carId, filters.carId));
    if (filters.customerId) conditions.push(eq(rentals.customerId, filters.customerId));

    return db.select().from(rentals)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(rentals.startDate));
  }

  async getRental(id: string): Promise<Rental | undefined> {
    const db = getDb();
    const result = await db.select().from(rentals).where(eq(rentals.id, id)).limit(1);
    return result[0];
  }

  private async lockRental(tx: Transaction, id: string): Promise<Rental> {
    const [rental] = await tx.select().from(rentals).where(eq(rentals.id, id)).for("update");
    if (!rental) {
      throw new NotFoundError("Rental", id);
    }
    return rental;
  }

  private async assertNoOverlap(tx: Transaction, car: Car, range: DateRange, excludeRentalId?: string): Promise<void> {
    const open = await tx.select().from(rentals)
      .where(and(eq(rentals.carId, car.id), inArray(rentals.status, OPEN_RENTAL_STATUSES)));
    const overlapping = findOverlappingRental(open, range, excludeRentalId);
    if (overlapping) {
      throw new ValidationError(
        `Car ${car.stockNumber} is already booked for ${formatRange(overlapping)} by rental ${overlapping.id}`
      );
    }
  }

  async quoteRental(request: RentalQuoteRequest): Promise<RentalQuote> {
    let rateCard: RentalRate[] = [];
    if (request.carId) {
      const car = await this.getCar(request.carId);
      if (!car) {
        throw new ValidationError(`Car ${request.carId} does not exist`);
      }
      rateCard = await this.getRentalRates(request.carId);
    }

    const terms = resolveRentalTerms(request, rateCard);
    return { ...terms, ...calculateRentalCost(request, terms) };
  }

  async createRental(data: InsertRental): Promise<Rental> {
    return this.inTransaction("write", async (tx) => {
      await this.referenceCustomer(tx, data.customerId);
      const car = await this.lockReferencedCar(tx, data.carId);
      if (data.inquiryId) {
        await this.assertInquiryMatches(tx, data.inquiryId, data.carId);
      }

      assertValidRange(data);
      await this.assertNoOverlap(tx, car, data);
      if (!carAcceptsRental(car.status)) {
        throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
      }

      const rateCard = await tx.select().from(rentalRates).where(eq(rentalRates.carId, car.id));
      const terms = resolveRentalTerms(data, rateCard);
      const cost = calculateRentalCost(data, terms);

      const result = await tx.insert(rentals).values({
        ...data,
        ...terms,
        ...cost,
        status: "reserved",
      }).returning();
      return result[0];
    });
  }

  async activateRental(id: string): Promise<Rental> {
    return this.inTransaction("write", async (tx) => {
      const rental = await this.lockRental(tx, id);
      assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "active");

      const car = await this.lockCar(tx, rental.carId);
      if (!carAcceptsRental(car.status)) {
        throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
      }
      await this.assertNoOverlap(tx, car, rental, rental.id);

      const now = new Date();
      const [active] = await tx.update(rentals)
        .set({ status: "active", updatedAt: now })
        .where(eq(rentals.id, id))
        .returning();
      await tx.update(cars).set({ status: "rented", updatedAt: now }).where(eq(cars.id, car.id));
      return active;
    });
  }

  async returnRental(id: string): Promise<Rental> {
    return this.inTransaction("write", async (tx) => {
      const rental = await this.lockRental(tx, id);
      assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "returned");
      await this.lockCar(tx, rental.carId);

      const now = new Date();
      const [returned] = await tx.update(rentals)
        .set({ status: "returned", updatedAt: now })
        .where(eq(rentals.id, id))
        .returning();
      await this.releaseRentedCar(tx, rental.carId, now);
      return returned;
    });
  }

  async cancelRental(id: string, reason?: string): Promise<Rental> {
    return this.inTransaction("write", async (tx) => {
      const rental = await this.lockRental(tx, id);
      assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "cancelled");
      await this.lockCar(tx, rental.carId);

      const now = new Date();
      const [cancelled] = await tx.update(rentals)
        .set({
          status: "cancelled",
          notes: appendNote(rental.notes, reason && `Cancelled: ${reason}`),
          updatedAt: now,
        })
        .where(eq(rentals.id, id))
        .returning();
      if (rental.status === "active") {
        await this.releaseRentedCar(tx, rental.carId, now);
      }
      return cancelled;
    });
  }

  private async releaseRentedCar(tx: Transaction, carId: string, now: Date): Promise<void> {
    await tx.update(cars)
      .set({ status: "available", updatedAt: now })
      .where(and(eq(cars.id, carId), eq(cars.status, "rented")));
  }

  // Blog
  async getBlogPosts(filters: BlogPostFilterOptions = {}): Promise<BlogPost[]> {
    const db = getDb();
    return db.select().from(blogPosts)
      .where(filters.publishedOnly ? eq(blogPosts.isPublished, true) : undefined)
      .orderBy(sql`${blogPosts.publishedAt} desc nulls last`, desc(blogPosts.createdAt));
  }

  async getBlogPost(id: string): Promise<BlogPost | undefined> {
    const db = getDb();
    const result = await db.select().from(blogPosts).where(eq(blogPosts.id, id)).limit(1);
    return result[0];
  }

  async getBlogPostBySlug(slug: string): Promise<BlogPost | undefined> {
    const db = getDb();
    const result = await db.select().from(blogPosts).where(eq(blogPosts.slug, slug)).limit(1);
    return result[0];
  }

  async createBlogPost(data: InsertBlogPost): Promise<BlogPost> {
    return this.inTransaction("write", async (tx) => {
      let slug = data.slug;
      if (!slug) {
        const base = slugify(data.title);
        const taken = await tx.select({ slug: blogPosts.slug }).from(blogPosts).where(like(blogPosts.slug, `${base}%`));
        slug = pickUniqueSlug(base, taken.map((row) => row.slug));
      }

      const isPublished = data.isPublished ?? false;
      const result = await tx.insert(blogPosts).values({
        ...data,
        slug,
        isPublished,
        publishedAt: isPublished ? new Date() : null,
      }).returning();
      return result[0];
    });
  }

  async updateBlogPost(id: string, updates: UpdateBlogPost): Promise<BlogPost> {
    return this.inTransaction("write", async (tx) => {
      const result = await tx.update(blogPosts)
        .set({ ...definedFields(updates), updatedAt: new Date() })
        .where(eq(blogPosts.id, id))
        .returning();
      if (result.length === 0) {
        throw new NotFoundError("Blog post", id);
      }
      return result[0];
    });
  }

  async setBlogPostPublished(id: string, isPublished: boolean): Promise<BlogPost> {
    return this.inTransaction("write", async (tx) => {
      const [post] = await tx.select().from(blogPosts).where(eq(blogPosts.id, id)).for("update");
      if (!post) {
        throw new NotFoundError("Blog post", id);
      }

      const now = new Date();
      const result = await tx.update(blogPosts)
        .set({
          isPublished,
          publishedAt: isPublished ? post.publishedAt ?? now : post.publishedAt,
          updatedAt: now,
        })
        .where(eq(blogPosts.id, id))
        .returning();
      return result[0];
    });
  }

  async deleteBlogPost(id: string): Promise<void> {
    await this.inTransaction("delete", async (tx) => {
      const result = await tx.delete(blogPosts).where(eq(blogPosts.id, id)).returning({ id: blogPosts.id });
      if (result.length === 0) {
        throw new NotFoundError("Blog post", id);
      }
    });
  }
}
