import { randomUUID } from "crypto";
import {
  RATE_TYPES,
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
  type BlogPost,
  type InsertBlogPost,
  type UpdateBlogPost,
} from "@shared/schema";
import {
  NotFoundError,
  ReferentialIntegrityError,
  UniqueConstraintError,
  ValidationError,
} from "./errors";
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
  isOpenRental,
  saleClaimsCar,
} from "./lifecycle";
import {
  assertCarPricing,
  buildCarTitle,
  carFinalPrice,
  carSlugBase,
  pickUniqueSlug,
  slugify,
  sortCarImages,
} from "./catalog-rules";
import { calculateRentalCost, resolveRentalTerms } from "./rental-pricing";
import {
  appendNote,
  assembleCarDetails,
  carHistoryMessage,
  carsInUseMessage,
  clampPageSize,
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

type CarSortField = NonNullable<CarFilterOptions["sortBy"]>;

function newestFirst(a: { createdAt: Date }, b: { createdAt: Date }): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

function compareCars(a: Car, b: Car, field: CarSortField): number {
  switch (field) {
    case "sellingPrice":
      return a.sellingPrice - b.sellingPrice;
    case "year":
      return a.year - b.year;
    case "mileage":
      return (a.mileage ?? 0) - (b.mileage ?? 0);
    case "createdAt":
      return a.createdAt.getTime() - b.createdAt.getTime();
  }
}

function countByKey<K extends string>(
  rows: Iterable<Record<K, string>>,
  key: K,
  ids: ReadonlySet<string>
): number {
  let count = 0;
  for (const row of rows) {
    if (ids.has(row[key])) {
      count++;
    }
  }
  return count;
}

/**
 * In-process store used when no database is configured and by the tests.
 * Each mutating method runs all of its checks and writes without awaiting
 * in between, so two calls can never interleave inside one transition.
 */
export class MemStorage implements IStorage {
  readonly kind = "memory" as const;

  private brands: Map<string, Brand> = new Map();
  private carModels: Map<string, CarModel> = new Map();
  private categories: Map<string, Category> = new Map();
  private features: Map<string, Feature> = new Map();
  private cars: Map<string, Car> = new Map();
  private carFeatureLinks: Map<string, Set<string>> = new Map();
  private carImages: Map<string, CarImage> = new Map();
  private rentalRates: Map<string, RentalRate> = new Map();
  private customers: Map<string, Customer> = new Map();
  private inquiries: Map<string, Inquiry> = new Map();
  private testDrives: Map<string, TestDrive> = new Map();
  private sales: Map<string, Sale> = new Map();
  private rentals: Map<string, Rental> = new Map();
  private blogPosts: Map<string, BlogPost> = new Map();

  private require<T>(rows: Map<string, T>, resource: string, id: string): T {
    const row = rows.get(id);
    if (!row) {
      throw new NotFoundError(resource, id);
    }
    return row;
  }

  // Like require, but for ids supplied in a request body
  private reference<T>(rows: Map<string, T>, resource: string, id: string): T {
    const row = rows.get(id);
    if (!row) {
      throw new ValidationError(`${resource} ${id} does not exist`);
    }
    return row;
  }

  private assertUnique<T extends { id: string }>(
    rows: Iterable<T>,
    resource: string,
    field: string,
    value: string,
    read: (row: T) => string | null,
    excludeId?: string
  ): void {
    for (const row of rows) {
      if (row.id !== excludeId && read(row) === value) {
        throw new UniqueConstraintError(resource, field, value);
      }
    }
  }

  private slugsOf(rows: Iterable<{ id: string; slug: string }>, excludeId?: string): string[] {
    const slugs: string[] = [];
    for (const row of rows) {
      if (row.id !== excludeId) {
        slugs.push(row.slug);
      }
    }
    return slugs;
  }

  private carsWhere(predicate: (car: Car) => boolean): Car[] {
    return Array.from(this.cars.values()).filter(predicate);
  }

  private assertCarsDeletable(carsToDelete: Car[]): void {
    const ids = new Set(carsToDelete.map((car) => car.id));
    if (ids.size === 0) {
      return;
    }

    const references =
      countByKey(this.inquiries.values(), "carId", ids) +
      countByKey(this.testDrives.values(), "carId", ids) +
      countByKey(this.sales.values(), "carId", ids) +
      countByKey(this.rentals.values(), "carId", ids);

    if (references > 0) {
      throw new ReferentialIntegrityError(carHistoryMessage(references));
    }
  }

  private removeCars(carsToDelete: Car[]): void {
    const ids = new Set(carsToDelete.map((car) => car.id));
    for (const [imageId, image] of this.carImages) {
      if (ids.has(image.carId)) this.carImages.delete(imageId);
    }
    for (const [rateId, rate] of this.rentalRates) {
      if (ids.has(rate.carId)) this.rentalRates.delete(rateId);
    }
    for (const id of ids) {
      this.carFeatureLinks.delete(id);
      this.cars.delete(id);
    }
  }

  private deleteCatalogEntry(
    resource: string,
    name: string,
    dependents: Car[],
    options: DeleteOptions
  ): void {
    if (dependents.length > 0 && !options.cascade) {
      throw new ReferentialIntegrityError(carsInUseMessage(resource, name, dependents.length));
    }
    this.assertCarsDeletable(dependents);
    this.removeCars(dependents);
  }

  // Brands
  async getBrands(): Promise<Brand[]> {
    return Array.from(this.brands.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async getBrand(id: string): Promise<Brand | undefined> {
    return this.brands.get(id);
  }

  async createBrand(data: InsertBrand): Promise<Brand> {
    this.assertUnique(this.brands.values(), "brand", "name", data.name, (brand) => brand.name);

    const brand: Brand = {
      id: randomUUID(),
      name: data.name,
      slug: pickUniqueSlug(slugify(data.name), this.slugsOf(this.brands.values())),
      countryOfOrigin: data.countryOfOrigin ?? null,
      description: data.description ?? null,
      isActive: data.isActive ?? true,
      createdAt: new Date(),
    };
    this.brands.set(brand.id, brand);
    return brand;
  }

  async updateBrand(id: string, updates: Partial<InsertBrand>): Promise<Brand> {
    const brand = this.require(this.brands, "Brand", id);
    const changes = definedFields(updates);
    const renamed = changes.name !== undefined && changes.name !== brand.name;

    if (renamed && changes.name !== undefined) {
      this.assertUnique(this.brands.values(), "brand", "name", changes.name, (row) => row.name, id);
    }

    const updated: Brand = {
      ...brand,
      ...changes,
      slug: renamed
        ? pickUniqueSlug(slugify(changes.name), this.slugsOf(this.brands.values(), id))
        : brand.slug,
    };
    this.brands.set(id, updated);
    return updated;
  }

  async deleteBrand(id: string, options: DeleteOptions = {}): Promise<void> {
    const brand = this.require(this.brands, "Brand", id);
    const modelIds = new Set(
      Array.from(this.carModels.values())
        .filter((model) => model.brandId === id)
        .map((model) => model.id)
    );
    const dependents = this.carsWhere((car) => modelIds.has(car.carModelId));

    if (modelIds.size > 0 && dependents.length === 0 && !options.cascade) {
      throw new ReferentialIntegrityError(
        `Cannot delete brand "${brand.name}": it still has ${modelIds.size} car model(s). Remove them first or request a cascading delete.`
      );
    }

    this.deleteCatalogEntry("brand", brand.name, dependents, options);
    for (const modelId of modelIds) {
      this.carModels.delete(modelId);
    }
    this.brands.delete(id);
  }

  // Car models
  async getCarModels(brandId?: string): Promise<CarModel[]> {
    return Array.from(this.carModels.values())
      .filter((model) => !brandId || model.brandId === brandId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getCarModel(id: string): Promise<CarModel | undefined> {
    return this.carModels.get(id);
  }

  private assertModelNameFree(brandId: string, name: string, excludeId?: string): void {
    const sameBrand = Array.from(this.carModels.values()).filter((model) => model.brandId === brandId);
    this.assertUnique(sameBrand, "car model", "name", name, (model) => model.name, excludeId);
  }

  async createCarModel(data: InsertCarModel): Promise<CarModel> {
    this.reference(this.brands, "Brand", data.brandId);
    this.assertModelNameFree(data.brandId, data.name);

    const carModel: CarModel = {
      id: randomUUID(),
      brandId: data.brandId,
      name: data.name,
      slug: slugify(data.name),
      isActive: data.isActive ?? true,
      createdAt: new Date(),
    };
    this.carModels.set(carModel.id, carModel);
    return carModel;
  }

  async updateCarModel(id: string, updates: Partial<InsertCarModel>): Promise<CarModel> {
    const carModel = this.require(this.carModels, "Car model", id);
    const changes = definedFields(updates);
    const merged: CarModel = { ...carModel, ...changes };

    if (changes.brandId !== undefined) {
      this.reference(this.brands, "Brand", changes.brandId);
    }
    if (merged.brandId !== carModel.brandId || merged.name !== carModel.name) {
      this.assertModelNameFree(merged.brandId, merged.name, id);
    }

    const updated: CarModel = { ...merged, slug: slugify(merged.name) };
    this.carModels.set(id, updated);
    return updated;
  }

  async deleteCarModel(id: string, options: DeleteOptions = {}): Promise<void> {
    const carModel = this.require(this.carModels, "Car model", id);
    const dependents = this.carsWhere((car) => car.carModelId === id);

    this.deleteCatalogEntry("car model", carModel.name, dependents, options);
    this.carModels.delete(id);
  }

  // Categories
  async getCategories(): Promise<Category[]> {
    return Array.from(this.categories.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async getCategory(id: string): Promise<Category | undefined> {
    return this.categories.get(id);
  }

  async createCategory(data: InsertCategory): Promise<Category> {
    this.assertUnique(this.categories.values(), "category", "name", data.name, (category) => category.name);

    const category: Category = {
      id: randomUUID(),
      name: data.name,
      slug: pickUniqueSlug(slugify(data.name), this.slugsOf(this.categories.values())),
      description: data.description ?? null,
      createdAt: new Date(),
    };
    this.categories.set(category.id, category);
    return category;
  }

  async updateCategory(id: string, updates: Partial<InsertCategory>): Promise<Category> {
    const category = this.require(this.categories, "Category", id);
    const changes = definedFields(updates);
    const renamed = changes.name !== undefined && changes.name !== category.name;

    if (renamed && changes.name !== undefined) {
      this.assertUnique(this.categories.values(), "category", "name", changes.name, (row) => row.name, id);
    }

    const updated: Category = {
      ...category,
      ...changes,
      slug: renamed
        ? pickUniqueSlug(slugify(changes.name), this.slugsOf(this.categories.values(), id))
        : category.slug,
    };
    this.categories.set(id, updated);
    return updated;
  }

  async deleteCategory(id: string, options: DeleteOptions = {}): Promise<void> {
    const category = this.require(this.categories, "Category", id);
    const dependents = this.carsWhere((car) => car.categoryId === id);

    this.deleteCatalogEntry("category", category.name, dependents, options);
    this.categories.delete(id);
  }

  // Features
  async getFeatures(): Promise<Feature[]> {
    return Array.from(this.features.values()).sort(
      (a, b) => a.category.localeCompare(b.category) || a.name.localeCompare(b.name)
    );
  }

  async getFeature(id: string): Promise<Feature | undefined> {
    return this.features.get(id);
  }

  async createFeature(data: InsertFeature): Promise<Feature> {
    this.assertUnique(this.features.values(), "feature", "name", data.name, (feature) => feature.name);

    const feature: Feature = {
      id: randomUUID(),
      name: data.name,
      category: data.category,
      icon: data.icon ?? null,
      description: data.description ?? null,
      isActive: data.isActive ?? true,
    };
    this.features.set(feature.id, feature);
    return feature;
  }

  async updateFeature(id: string, updates: Partial<InsertFeature>): Promise<Feature> {
    const feature = this.require(this.features, "Feature", id);
    const changes = definedFields(updates);

    if (changes.name !== undefined && changes.name !== feature.name) {
      this.assertUnique(this.features.values(), "feature", "name", changes.name, (row) => row.name, id);
    }

    const updated: Feature = { ...feature, ...changes };
    this.features.set(id, updated);
    return updated;
  }

  async deleteFeature(id: string): Promise<void> {
    this.require(this.features, "Feature", id);
    for (const links of this.carFeatureLinks.values()) {
      links.delete(id);
    }
    this.features.delete(id);
  }

  // Cars
  async getCars(filters: CarFilterOptions = {}): Promise<CarListResult> {
    const search = filters.search?.trim().toLowerCase();

    const matches = this.carsWhere((car) => {
      if (filters.brandId && this.carModels.get(car.carModelId)?.brandId !== filters.brandId) return false;
      if (filters.carModelId && car.carModelId !== filters.carModelId) return false;
      if (filters.categoryId && car.categoryId !== filters.categoryId) return false;
      if (filters.conditionType && car.conditionType !== filters.conditionType) return false;
      if (filters.status && car.status !== filters.status) return false;
      if (filters.year !== undefined && car.year !== filters.year) return false;
      if (filters.minPrice !== undefined && car.sellingPrice < filters.minPrice) return false;
      if (filters.maxPrice !== undefined && car.sellingPrice > filters.maxPrice) return false;
      if (filters.forSale !== undefined && car.isForSale !== filters.forSale) return false;
      if (filters.forRent !== undefined && car.isForRent !== filters.forRent) return false;
      if (filters.featured !== undefined && car.isFeatured !== filters.featured) return false;
      if (search) {
        const haystack = `${car.title} ${car.description ?? ""}`.toLowerCase();
        if (!haystack.includes(search)) return false;
      }
      return true;
    });

    const sortBy = filters.sortBy ?? "createdAt";
    const direction = filters.sortOrder === "asc" ? 1 : -1;
    matches.sort((a, b) => direction * compareCars(a, b, sortBy));

    const limit = clampPageSize(filters.limit);
    const offset = Math.max(0, Math.floor(filters.offset ?? 0));
    const page = matches.slice(offset, offset + limit);

    return {
      cars: page,
      total: matches.length,
      hasMore: offset + page.length < matches.length,
    };
  }

  async getCar(id: string): Promise<Car | undefined> {
    return this.cars.get(id);
  }

  async getCarBySlug(slug: string): Promise<Car | undefined> {
    return Array.from(this.cars.values()).find((car) => car.slug === slug);
  }

  async getCarWithDetails(id: string): Promise<CarWithDetails | undefined> {
    const car = this.cars.get(id);
    if (!car) {
      return undefined;
    }

    const carModel = this.require(this.carModels, "Car model", car.carModelId);
    return assembleCarDetails(car, {
      carModel,
      brand: this.require(this.brands, "Brand", carModel.brandId),
      category: this.require(this.categories, "Category", car.categoryId),
      features: await this.getCarFeatures(id),
      images: await this.getCarImages(id),
      rentalRates: await this.getRentalRates(id),
    });
  }

  private referenceFeatures(featureIds: string[]): string[] {
    const unique = Array.from(new Set(featureIds));
    const missing = unique.filter((featureId) => !this.features.has(featureId));
    if (missing.length > 0) {
      throw new ValidationError(
        "Unknown feature(s)",
        missing.map((featureId) => `Feature ${featureId} does not exist`)
      );
    }
    return unique;
  }

  async createCar(data: InsertCar): Promise<Car> {
    const carModel = this.reference(this.carModels, "Car model", data.carModelId);
    const brand = this.require(this.brands, "Brand", carModel.brandId);
    this.reference(this.categories, "Category", data.categoryId);
    const featureIds = this.referenceFeatures(data.featureIds ?? []);

    this.assertUnique(this.cars.values(), "car", "stock number", data.stockNumber, (car) => car.stockNumber);
    if (data.vin) {
      this.assertUnique(this.cars.values(), "car", "VIN", data.vin, (car) => car.vin);
    }

    const dealerDiscount = data.dealerDiscount ?? 0;
    assertCarPricing({ msrp: data.msrp, sellingPrice: data.sellingPrice, dealerDiscount });

    const now = new Date();
    const car: Car = {
      id: randomUUID(),
      carModelId: data.carModelId,
      categoryId: data.categoryId,
      year: data.year,
      conditionType: data.conditionType,
      stockNumber: data.stockNumber,
      vin: data.vin ?? null,
      msrp: data.msrp ?? null,
      sellingPrice: data.sellingPrice,
      dealerDiscount,
      status: "available",
      title: data.title || buildCarTitle(data.year, brand.name, carModel.name),
      slug: pickUniqueSlug(
        carSlugBase(brand.name, carModel.name, data.year, data.stockNumber),
        this.slugsOf(this.cars.values())
      ),
      color: data.color ?? null,
      mileage: data.mileage ?? null,
      transmission: data.transmission ?? null,
      fuelType: data.fuelType ?? null,
      description: data.description ?? null,
      location: data.location ?? null,
      isFeatured: data.isFeatured ?? false,
      isForSale: data.isForSale ?? true,
      isForRent: data.isForRent ?? false,
      createdAt: now,
      updatedAt: now,
    };

    this.cars.set(car.id, car);
    this.carFeatureLinks.set(car.id, new Set(featureIds));
    return car;
  }

  async updateCar(id: string, updates: UpdateCar): Promise<Car> {
    const car = this.require(this.cars, "Car", id);
    const changes = definedFields(updates);
    const merged: Car = { ...car, ...changes, updatedAt: new Date() };

    const carModel = this.reference(this.carModels, "Car model", merged.carModelId);
    const brand = this.require(this.brands, "Brand", carModel.brandId);
    if (changes.categoryId !== undefined) {
      this.reference(this.categories, "Category", changes.categoryId);
    }
    if (merged.stockNumber !== car.stockNumber) {
      this.assertUnique(this.cars.values(), "car", "stock number", merged.stockNumber, (row) => row.stockNumber, id);
    }
    if (merged.vin && merged.vin !== car.vin) {
      this.assertUnique(this.cars.values(), "car", "VIN", merged.vin, (row) => row.vin, id);
    }
    assertCarPricing(merged);

    const identityChanged =
      merged.carModelId !== car.carModelId ||
      merged.year !== car.year ||
      merged.stockNumber !== car.stockNumber;

    if (identityChanged) {
      merged.slug = pickUniqueSlug(
        carSlugBase(brand.name, carModel.name, merged.year, merged.stockNumber),
        this.slugsOf(this.cars.values(), id)
      );

      const previousModel = this.carModels.get(car.carModelId);
      const previousBrand = previousModel ? this.brands.get(previousModel.brandId) : undefined;
      const hadGeneratedTitle =
        previousModel !== undefined &&
        previousBrand !== undefined &&
        car.title === buildCarTitle(car.year, previousBrand.name, previousModel.name);

      if (!changes.title && hadGeneratedTitle) {
        merged.title = buildCarTitle(merged.year, brand.name, carModel.name);
      }
    }

    this.cars.set(id, merged);
    return merged;
  }

  async deleteCar(id: string): Promise<void> {
    const car = this.require(this.cars, "Car", id);
    this.assertCarsDeletable([car]);
    this.removeCars([car]);
  }

  async getCarFeatures(carId: string): Promise<Feature[]> {
    const links = this.carFeatureLinks.get(carId) ?? new Set<string>();
    return Array.from(links)
      .map((featureId) => this.features.get(featureId))
      .filter((feature): feature is Feature => feature !== undefined)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async setCarFeatures(carId: string, featureIds: string[]): Promise<Feature[]> {
    this.require(this.cars, "Car", carId);
    const unique = this.referenceFeatures(featureIds);
    this.carFeatureLinks.set(carId, new Set(unique));
    return this.getCarFeatures(carId);
  }

  // Images
  private imagesOf(carId: string): CarImage[] {
    return Array.from(this.carImages.values()).filter((image) => image.carId === carId);
  }

  private requireImage(carId: string, imageId: string): CarImage {
    const image = this.carImages.get(imageId);
    if (!image || image.carId !== carId) {
      throw new NotFoundError("Car image", imageId);
    }
    return image;
  }

  private clearMainImage(carId: string): void {
    for (const image of this.imagesOf(carId)) {
      if (image.isMain) {
        this.carImages.set(image.id, { ...image, isMain: false });
      }
    }
  }

  async getCarImages(carId: string): Promise<CarImage[]> {
    return sortCarImages(this.imagesOf(carId));
  }

  async addCarImage(data: InsertCarImage): Promise<CarImage> {
    this.require(this.cars, "Car", data.carId);
    const existing = this.imagesOf(data.carId);
    const isMain = existing.length === 0 || data.isMain === true;

    const image: CarImage = {
      id: randomUUID(),
      carId: data.carId,
      url: data.url,
      altText: data.altText ?? null,
      isMain,
      displayOrder: data.displayOrder ?? (existing.length > 0 ? Math.max(...existing.map((row) => row.displayOrder)) + 1 : 0),
      createdAt: new Date(),
    };

    if (isMain) {
      this.clearMainImage(data.carId);
    }
    this.carImages.set(image.id, image);
    return image;
  }

  async setCarImageMain(carId: string, imageId: string): Promise<CarImage> {
    const image = this.requireImage(carId, imageId);
    this.clearMainImage(carId);

    const updated: CarImage = { ...image, isMain: true };
    this.carImages.set(imageId, updated);
    return updated;
  }

  async updateCarImageOrder(carId: string, imageId: string, displayOrder: number): Promise<CarImage> {
    const image = this.requireImage(carId, imageId);
    const updated: CarImage = { ...image, displayOrder };
    this.carImages.set(imageId, updated);
    return updated;
  }

  async deleteCarImage(carId: string, imageId: string): Promise<void> {
    const image = this.requireImage(carId, imageId);
    this.carImages.delete(imageId);

    if (image.isMain) {
      const [next] = sortCarImages(this.imagesOf(carId));
      if (next) {
        this.carImages.set(next.id, { ...next, isMain: true });
      }
    }
  }

  // Rental rate card
  async getRentalRates(carId: string): Promise<RentalRate[]> {
    return Array.from(this.rentalRates.values())
      .filter((rate) => rate.carId === carId)
      .sort((a, b) => RATE_TYPES.indexOf(a.rateType) - RATE_TYPES.indexOf(b.rateType));
  }

  async setRentalRate(carId: string, data: UpsertRentalRate): Promise<RentalRate> {
    this.require(this.cars, "Car", carId);
    const existing = Array.from(this.rentalRates.values()).find(
      (rate) => rate.carId === carId && rate.rateType === data.rateType
    );

    const rate: RentalRate = {
      id: existing?.id ?? randomUUID(),
      carId,
      rateType: data.rateType,
      rate: data.rate,
      securityDeposit: data.securityDeposit ?? 0,
      isActive: data.isActive ?? true,
      createdAt: existing?.createdAt ?? new Date(),
    };
    this.rentalRates.set(rate.id, rate);
    return rate;
  }

  // Customers
  async getCustomers(search?: string): Promise<Customer[]> {
    const term = search?.trim().toLowerCase();
    return Array.from(this.customers.values())
      .filter((customer) => {
        if (!term) return true;
        return [customer.firstName, customer.lastName, customer.email, customer.phone]
          .some((value) => value.toLowerCase().includes(term));
      })
      .sort(newestFirst);
  }

  async getCustomer(id: string): Promise<Customer | undefined> {
    return this.customers.get(id);
  }

  async createCustomer(data: InsertCustomer): Promise<Customer> {
    const customer: Customer = {
      id: randomUUID(),
      firstName: data.firstName,
      lastName: data.lastName,
      email: data.email,
      phone: data.phone,
      address: data.address ?? null,
      city: data.city ?? null,
      country: data.country ?? null,
      drivingLicenseNumber: data.drivingLicenseNumber ?? null,
      preferredContact: data.preferredContact ?? "email",
      createdAt: new Date(),
    };
    this.customers.set(customer.id, customer);
    return customer;
  }

  async updateCustomer(id: string, updates: Partial<InsertCustomer>): Promise<Customer> {
    const customer = this.require(this.customers, "Customer", id);
    const updated: Customer = { ...customer, ...definedFields(updates) };
    this.customers.set(id, updated);
    return updated;
  }

  async deleteCustomer(id: string): Promise<void> {
    const customer = this.require(this.customers, "Customer", id);
    const ids = new Set([id]);
    const references =
      countByKey(this.inquiries.values(), "customerId", ids) +
      countByKey(this.testDrives.values(), "customerId", ids) +
      countByKey(this.sales.values(), "customerId", ids) +
      countByKey(this.rentals.values(), "customerId", ids);

    if (references > 0) {
      throw new ReferentialIntegrityError(
        `Cannot delete customer "${customer.firstName} ${customer.lastName}": it is referenced by ${references} inquiry, test drive, sale or rental record(s).`
      );
    }
    this.customers.delete(id);
  }

  // Inquiries
  async getInquiries(filters: InquiryFilterOptions = {}): Promise<Inquiry[]> {
    return Array.from(this.inquiries.values())
      .filter((inquiry) =>
        (!filters.status || inquiry.status === filters.status) &&
        (!filters.carId || inquiry.carId === filters.carId) &&
        (!filters.customerId || inquiry.customerId === filters.customerId)
      )
      .sort(newestFirst);
  }

  async getInquiry(id: string): Promise<Inquiry | undefined> {
    return this.inquiries.get(id);
  }

  async createInquiry(data: InsertInquiry): Promise<Inquiry> {
    this.reference(this.customers, "Customer", data.customerId);
    this.reference(this.cars, "Car", data.carId);

    const now = new Date();
    const inquiry: Inquiry = {
      id: randomUUID(),
      customerId: data.customerId,
      carId: data.carId,
      inquiryType: data.inquiryType ?? "general",
      message: data.message,
      status: "new",
      closeReason: null,
      createdAt: now,
      updatedAt: now,
    };
    this.inquiries.set(inquiry.id, inquiry);
    return inquiry;
  }

  async transitionInquiry(id: string, status: InquiryStatus, closeReason?: InquiryCloseReason): Promise<Inquiry> {
    const inquiry = this.require(this.inquiries, "Inquiry", id);
    assertInquiryTransition(inquiry.status, status, closeReason);

    const updated: Inquiry = {
      ...inquiry,
      status,
      closeReason: status === "closed" ? closeReason ?? null : inquiry.closeReason,
      updatedAt: new Date(),
    };
    this.inquiries.set(id, updated);
    return updated;
  }

  // Test drives
  async getTestDrives(filters: TestDriveFilterOptions = {}): Promise<TestDrive[]> {
    return Array.from(this.testDrives.values())
      .filter((testDrive) =>
        (!filters.status || testDrive.status === filters.status) &&
        (!filters.carId || testDrive.carId === filters.carId) &&
        (!filters.customerId || testDrive.customerId === filters.customerId)
      )
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
  }

  async getTestDrive(id: string): Promise<TestDrive | undefined> {
    return this.testDrives.get(id);
  }

  async createTestDrive(data: InsertTestDrive): Promise<TestDrive> {
    this.reference(this.customers, "Customer", data.customerId);
    this.reference(this.cars, "Car", data.carId);

    const now = new Date();
    const testDrive: TestDrive = {
      id: randomUUID(),
      customerId: data.customerId,
      carId: data.carId,
      scheduledAt: data.scheduledAt,
      durationMinutes: data.durationMinutes ?? 30,
      pickupLocation: data.pickupLocation ?? "Main showroom",
      status: "scheduled",
      notes: data.notes ?? null,
      feedback: null,
      createdAt: now,
      updatedAt: now,
    };
    this.testDrives.set(testDrive.id, testDrive);
    return testDrive;
  }

  async transitionTestDrive(id: string, status: TestDriveStatus, feedback?: string): Promise<TestDrive> {
    const testDrive = this.require(this.testDrives, "Test drive", id);
    assertTransition("test drive", TEST_DRIVE_TRANSITIONS, testDrive.status, status);

    const updated: TestDrive = {
      ...testDrive,
      status,
      feedback: feedback ?? testDrive.feedback,
      updatedAt: new Date(),
    };
    this.testDrives.set(id, updated);
    return updated;
  }

  // Sales
  private assertInquiryMatches(inquiryId: string, carId: string): void {
    const inquiry = this.reference(this.inquiries, "Inquiry", inquiryId);
    if (inquiry.carId !== carId) {
      throw new ValidationError(`Inquiry ${inquiryId} is about a different car`);
    }
  }

  async getSales(filters: SaleFilterOptions = {}): Promise<Sale[]> {
    return Array.from(this.sales.values())
      .filter((sale) =>
        (!filters.status || sale.status === filters.status) &&
        (!filters.carId || sale.carId === filters.carId) &&
        (!filters.customerId || sale.customerId === filters.customerId)
      )
      .sort(newestFirst);
  }

  async getSale(id: string): Promise<Sale | undefined> {
    return this.sales.get(id);
  }

  async createSale(data: InsertSale): Promise<Sale> {
    this.reference(this.customers, "Customer", data.customerId);
    const car = this.reference(this.cars, "Car", data.carId);
    if (data.inquiryId) {
      this.assertInquiryMatches(data.inquiryId, data.carId);
    }

    const claim = Array.from(this.sales.values()).find(
      (sale) => sale.carId === car.id && saleClaimsCar(sale.status)
    );
    if (claim) {
      throw new ValidationError(`Car ${car.stockNumber} already has a ${claim.status} sale (${claim.id})`);
    }
    if (!carAcceptsSale(car.status)) {
      throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
    }

    const now = new Date();
    const sale: Sale = {
      id: randomUUID(),
      customerId: data.customerId,
      carId: data.carId,
      inquiryId: data.inquiryId ?? null,
      paymentMethod: data.paymentMethod,
      finalPrice: data.finalPrice ?? carFinalPrice(car),
      depositAmount: data.depositAmount ?? 0,
      tradeInValue: data.tradeInValue ?? 0,
      financingAmount: data.financingAmount ?? 0,
      status: "pending",
      saleDate: null,
      notes: data.notes ?? null,
      createdAt: now,
      updatedAt: now,
    };

    this.sales.set(sale.id, sale);
    this.cars.set(car.id, { ...car, status: "reserved", updatedAt: now });
    return sale;
  }

  async completeSale(id: string): Promise<Sale> {
    const sale = this.require(this.sales, "Sale", id);
    assertTransition("sale", SALE_TRANSITIONS, sale.status, "completed");

    const car = this.require(this.cars, "Car", sale.carId);
    if (!carAcceptsSale(car.status)) {
      throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
    }
    const openRentals = Array.from(this.rentals.values()).filter(
      (rental) => rental.carId === car.id && isOpenRental(rental.status)
    );
    if (openRentals.length > 0) {
      throw new ValidationError(
        `Car ${car.stockNumber} has ${openRentals.length} open rental(s); return or cancel them before completing the sale`
      );
    }

    const now = new Date();
    const completed: Sale = { ...sale, status: "completed", saleDate: now, updatedAt: now };
    this.sales.set(id, completed);
    this.cars.set(car.id, { ...car, status: "sold", updatedAt: now });
    return completed;
  }

  async cancelSale(id: string, reason?: string): Promise<Sale> {
    const sale = this.require(this.sales, "Sale", id);
    assertTransition("sale", SALE_TRANSITIONS, sale.status, "cancelled");

    const now = new Date();
    const cancelled: Sale = {
      ...sale,
      status: "cancelled",
      notes: appendNote(sale.notes, reason && `Cancelled: ${reason}`),
      updatedAt: now,
    };
    this.sales.set(id, cancelled);

    const car = this.cars.get(sale.carId);
    if (car && car.status === "reserved") {
      this.cars.set(car.id, { ...car, status: "available", updatedAt: now });
    }
    return cancelled;
  }

  // Rentals
  private rentalsOf(carId: string): Rental[] {
    return Array.from(this.rentals.values()).filter((rental) => rental.carId === carId);
  }

  private assertNoOverlap(car: Car, range: { startDate: Date; endDate: Date }, excludeRentalId?: string): void {
    const overlapping = findOverlappingRental(this.rentalsOf(car.id), range, excludeRentalId);
    if (overlapping) {
      throw new ValidationError(
        `Car ${car.stockNumber} is already booked for ${formatRange(overlapping)} by rental ${overlapping.id}`
      );
    }
  }

  async getRentals(filters: RentalFilterOptions = {}): Promise<Rental[]> {
    return Array.from(this.rentals.values())
      .filter((rental) =>
        (!filters.status || rental.status === filters.status) &&
        (!filters.carId || rental.carId === filters.carId) &&
        (!filters.customerId || rental.customerId === filters.customerId)
      )
      .sort((a, b) => a.startDate.getTime() - b.startDate.getTime());
  }

  async getRental(id: string): Promise<Rental | undefined> {
    return this.rentals.get(id);
  }

  async quoteRental(request: RentalQuoteRequest): Promise<RentalQuote> {
    let rateCard: RentalRate[] = [];
    if (request.carId) {
      this.reference(this.cars, "Car", request.carId);
      rateCard = await this.getRentalRates(request.carId);
    }
    const terms = resolveRentalTerms(request, rateCard);
    return { ...terms, ...calculateRentalCost(request, terms) };
  }

  async createRental(data: InsertRental): Promise<Rental> {
    this.reference(this.customers, "Customer", data.customerId);
    const car = this.reference(this.cars, "Car", data.carId);
    if (data.inquiryId) {
      this.assertInquiryMatches(data.inquiryId, data.carId);
    }

    assertValidRange(data);
    this.assertNoOverlap(car, data);
    if (!carAcceptsRental(car.status)) {
      throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
    }

    const rateCard = Array.from(this.rentalRates.values()).filter((rate) => rate.carId === car.id);
    const terms = resolveRentalTerms(data, rateCard);
    const cost = calculateRentalCost(data, terms);

    const now = new Date();
    const rental: Rental = {
      id: randomUUID(),
      customerId: data.customerId,
      carId: data.carId,
      inquiryId: data.inquiryId ?? null,
      startDate: data.startDate,
      endDate: data.endDate,
      pickupLocation: data.pickupLocation,
      returnLocation: data.returnLocation,
      dailyRate: terms.dailyRate,
      weeklyRate: terms.weeklyRate ?? null,
      monthlyRate: terms.monthlyRate ?? null,
      totalDays: cost.totalDays,
      totalCost: cost.totalCost,
      securityDeposit: terms.securityDeposit,
      status: "reserved",
      notes: data.notes ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.rentals.set(rental.id, rental);
    return rental;
  }

  async activateRental(id: string): Promise<Rental> {
    const rental = this.require(this.rentals, "Rental", id);
    assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "active");

    const car = this.require(this.cars, "Car", rental.carId);
    if (!carAcceptsRental(car.status)) {
      throw new ValidationError(`Car ${car.stockNumber} is ${describeCarStatus(car.status)}`);
    }
    this.assertNoOverlap(car, rental, rental.id);

    const now = new Date();
    const active: Rental = { ...rental, status: "active", updatedAt: now };
    this.rentals.set(id, active);
    this.cars.set(car.id, { ...car, status: "rented", updatedAt: now });
    return active;
  }

  async returnRental(id: string): Promise<Rental> {
    const rental = this.require(this.rentals, "Rental", id);
    assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "returned");

    const now = new Date();
    const returned: Rental = { ...rental, status: "returned", updatedAt: now };
    this.rentals.set(id, returned);
    this.releaseRentedCar(rental.carId, now);
    return returned;
  }

  async cancelRental(id: string, reason?: string): Promise<Rental> {
    const rental = this.require(this.rentals, "Rental", id);
    assertTransition("rental", RENTAL_TRANSITIONS, rental.status, "cancelled");

    const now = new Date();
    const cancelled: Rental = {
      ...rental,
      status: "cancelled",
      notes: appendNote(rental.notes, reason && `Cancelled: ${reason}`),
      updatedAt: now,
    };
    this.rentals.set(id, cancelled);
    if (rental.status === "active") {
      this.releaseRentedCar(rental.carId, now);
    }
    return cancelled;
  }

  private releaseRentedCar(carId: string, now: Date): void {
    const car = this.cars.get(carId);
    if (car && car.status === "rented") {
      this.cars.set(carId, { ...car, status: "available", updatedAt: now });
    }
  }

  // Blog
  async getBlogPosts(filters: BlogPostFilterOptions = {}): Promise<BlogPost[]> {
    const published = (post: BlogPost) => post.publishedAt?.getTime() ?? 0;
    return Array.from(this.blogPosts.values())
      .filter((post) => !filters.publishedOnly || post.isPublished)
      .sort((a, b) => published(b) - published(a) || newestFirst(a, b));
  }

  async getBlogPost(id: string): Promise<BlogPost | undefined> {
    return this.blogPosts.get(id);
  }

  async getBlogPostBySlug(slug: string): Promise<BlogPost | undefined> {
    return Array.from(this.blogPosts.values()).find((post) => post.slug === slug);
  }

  async createBlogPost(data: InsertBlogPost): Promise<BlogPost> {
    let slug: string;
    if (data.slug) {
      this.assertUnique(this.blogPosts.values(), "blog post", "slug", data.slug, (post) => post.slug);
      slug = data.slug;
    } else {
      slug = pickUniqueSlug(slugify(data.title), this.slugsOf(this.blogPosts.values()));
    }

    const now = new Date();
    const isPublished = data.isPublished ?? false;
    const post: BlogPost = {
      id: randomUUID(),
      title: data.title,
      slug,
      body: data.body,
      excerpt: data.excerpt ?? null,
      authorName: data.authorName ?? null,
      isPublished,
      publishedAt: isPublished ? now : null,
      createdAt: now,
      updatedAt: now,
    };
    this.blogPosts.set(post.id, post);
    return post;
  }

  async updateBlogPost(id: string, updates: UpdateBlogPost): Promise<BlogPost> {
    const post = this.require(this.blogPosts, "Blog post", id);
    const changes = definedFields(updates);

    if (changes.slug !== undefined && changes.slug !== post.slug) {
      this.assertUnique(this.blogPosts.values(), "blog post", "slug", changes.slug, (row) => row.slug, id);
    }

    const updated: BlogPost = { ...post, ...changes, updatedAt: new Date() };
    this.blogPosts.set(id, updated);
    return updated;
  }

  async setBlogPostPublished(id: string, isPublished: boolean): Promise<BlogPost> {
    const post = this.require(this.blogPosts, "Blog post", id);
    const now = new Date();

    const updated: BlogPost = {
      ...post,
      isPublished,
      publishedAt: isPublished ? post.publishedAt ?? now : post.publishedAt,
      updatedAt: now,
    };
    this.blogPosts.set(id, updated);
    return updated;
  }

  async deleteBlogPost(id: string): Promise<void> {
    this.require(this.blogPosts, "Blog post", id);
    this.blogPosts.delete(id);
  }
}
