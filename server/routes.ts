import type { Express, Request } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  CAR_CONDITIONS,
  CAR_STATUSES,
  INQUIRY_STATUSES,
  RENTAL_STATUSES,
  SALE_STATUSES,
  TEST_DRIVE_STATUSES,
  insertBrandSchema,
  insertCarModelSchema,
  insertCategorySchema,
  insertFeatureSchema,
  insertCarSchema,
  updateCarSchema,
  insertCarImageSchema,
  upsertRentalRateSchema,
  insertCustomerSchema,
  insertInquirySchema,
  inquiryTransitionSchema,
  insertTestDriveSchema,
  testDriveTransitionSchema,
  insertSaleSchema,
  cancelTransactionSchema,
  insertRentalSchema,
  rentalQuoteSchema,
  insertBlogPostSchema,
  updateBlogPostSchema,
  publishBlogPostSchema,
} from "@shared/schema";
import { getStorage, clampPageSize, type IStorage } from "./storage";
import { NotFoundError } from "./errors";
import { asyncRoute } from "./route-helpers";
import {
  healthCheckLimiter,
  leadCreationLimiter,
  searchQueryLimiter,
  transactionLimiter,
  writeLimiter,
} from "./rate-limiters";
import {
  sanitizeAddress,
  sanitizeEmail,
  sanitizeFields,
  sanitizeMessage,
  sanitizePhone,
  sanitizeRichText,
  sanitizeText,
  sanitizeUrl,
  type FieldSanitizers,
} from "./sanitization";
import { sendSuccess, sendCreated, sendDeleted, sendPage, sendNotFound } from "./response-utils";

const booleanQuery = z.enum(["true", "false"]).transform((value) => value === "true");
const integerQuery = z.coerce.number().int();

const carListQuerySchema = z.object({
  brandId: z.string().min(1).optional(),
  carModelId: z.string().min(1).optional(),
  categoryId: z.string().min(1).optional(),
  conditionType: z.enum(CAR_CONDITIONS).optional(),
  status: z.enum(CAR_STATUSES).optional(),
  year: integerQuery.optional(),
  minPrice: integerQuery.nonnegative().optional(),
  maxPrice: integerQuery.nonnegative().optional(),
  forSale: booleanQuery.optional(),
  forRent: booleanQuery.optional(),
  featured: booleanQuery.optional(),
  search: z.string().trim().max(100).optional(),
  sortBy: z.enum(["sellingPrice", "year", "mileage", "createdAt"]).optional(),
  sortOrder: z.enum(["asc", "desc"]).optional(),
  offset: integerQuery.nonnegative().optional(),
  limit: integerQuery.positive().optional(),
});

const relationQuery = {
  carId: z.string().min(1).optional(),
  customerId: z.string().min(1).optional(),
};

const inquiryListQuerySchema = z.object({ status: z.enum(INQUIRY_STATUSES).optional(), ...relationQuery });
const testDriveListQuerySchema = z.object({ status: z.enum(TEST_DRIVE_STATUSES).optional(), ...relationQuery });
const saleListQuerySchema = z.object({ status: z.enum(SALE_STATUSES).optional(), ...relationQuery });
const rentalListQuerySchema = z.object({ status: z.enum(RENTAL_STATUSES).optional(), ...relationQuery });

const carFeaturesSchema = z.object({
  featureIds: z.array(z.string().min(1)),
});

const imageOrderSchema = z.object({
  displayOrder: z.number().int().nonnegative(),
});

const newCarImageSchema = insertCarImageSchema.omit({ carId: true });

function cascadeRequested(req: Request): boolean {
  return req.query.cascade === "true";
}

// Free-text fields per resource, cleaned before the body is validated
const brandText: FieldSanitizers = { name: sanitizeText, countryOfOrigin: sanitizeText, description: sanitizeMessage };
const carModelText: FieldSanitizers = { name: sanitizeText };
const categoryText: FieldSanitizers = { name: sanitizeText, description: sanitizeMessage };
const featureText: FieldSanitizers = { name: sanitizeText, icon: sanitizeText, description: sanitizeText };
const carText: FieldSanitizers = {
  title: sanitizeText,
  description: sanitizeMessage,
  location: sanitizeText,
  color: sanitizeText,
  transmission: sanitizeText,
  fuelType: sanitizeText,
};
const carImageText: FieldSanitizers = { url: sanitizeUrl, altText: sanitizeText };
const customerText: FieldSanitizers = {
  firstName: sanitizeText,
  lastName: sanitizeText,
  email: sanitizeEmail,
  phone: sanitizePhone,
  address: sanitizeAddress,
  city: sanitizeText,
  country: sanitizeText,
  drivingLicenseNumber: sanitizeText,
};
const inquiryText: FieldSanitizers = { message: sanitizeMessage };
const testDriveText: FieldSanitizers = { pickupLocation: sanitizeText, notes: sanitizeMessage };
const feedbackText: FieldSanitizers = { feedback: sanitizeMessage };
const saleText: FieldSanitizers = { notes: sanitizeMessage };
const rentalText: FieldSanitizers = { pickupLocation: sanitizeText, returnLocation: sanitizeText, notes: sanitizeMessage };
const cancelText: FieldSanitizers = { reason: sanitizeText };
const blogText: FieldSanitizers = {
  title: sanitizeText,
  body: sanitizeRichText,
  excerpt: sanitizeText,
  authorName: sanitizeText,
};

export async function registerRoutes(app: Express, storageOverride?: IStorage): Promise<Server> {
  const storage = storageOverride ?? await getStorage();

  app.get("/api/health", healthCheckLimiter, (_req, res) => {
    sendSuccess(res, {
      status: "ok",
      storage: storage.kind,
      timestamp: new Date().toISOString(),
    });
  });

  // Brands
  app.get("/api/brands", asyncRoute("fetch brands", async (_req, res) => {
    sendSuccess(res, await storage.getBrands());
  }));

  app.get("/api/brands/:id", asyncRoute("fetch brand", async (req, res) => {
    const brand = await storage.getBrand(req.params.id);
    if (!brand) {
      return sendNotFound(res, "Brand");
    }
    sendSuccess(res, brand);
  }));

  app.post("/api/brands", writeLimiter, asyncRoute("create brand", async (req, res) => {
    const data = insertBrandSchema.parse(sanitizeFields(req.body, brandText));
    const brand = await storage.createBrand(data);
    sendCreated(res, brand, "Brand created successfully");
  }));

  app.patch("/api/brands/:id", writeLimiter, asyncRoute("update brand", async (req, res) => {
    const data = insertBrandSchema.partial().parse(sanitizeFields(req.body, brandText));
    const brand = await storage.updateBrand(req.params.id, data);
    sendSuccess(res, brand, "Brand updated successfully");
  }));

  app.delete("/api/brands/:id", writeLimiter, asyncRoute("delete brand", async (req, res) => {
    await storage.deleteBrand(req.params.id, { cascade: cascadeRequested(req) });
    sendDeleted(res, "Brand deleted successfully");
  }));

  // Car models
  app.get("/api/car-models", asyncRoute("fetch car models", async (req, res) => {
    const brandId = typeof req.query.brandId === "string" ? req.query.brandId : undefined;
    sendSuccess(res, await storage.getCarModels(brandId));
  }));

  app.get("/api/car-models/:id", asyncRoute("fetch car model", async (req, res) => {
    const carModel = await storage.getCarModel(req.params.id);
    if (!carModel) {
      return sendNotFound(res, "Car model");
    }
    sendSuccess(res, carModel);
  }));

  app.post("/api/car-models", writeLimiter, asyncRoute("create car model", async (req, res) => {
    const data = insertCarModelSchema.parse(sanitizeFields(req.body, carModelText));
    const carModel = await storage.createCarModel(data);
    sendCreated(res, carModel, "Car model created successfully");
  }));

  app.patch("/api/car-models/:id", writeLimiter, asyncRoute("update car model", async (req, res) => {
    const data = insertCarModelSchema.partial().parse(sanitizeFields(req.body, carModelText));
    const carModel = await storage.updateCarModel(req.params.id, data);
    sendSuccess(res, carModel, "Car model updated successfully");
  }));

  app.delete("/api/car-models/:id", writeLimiter, asyncRoute("delete car model", async (req, res) => {
    await storage.deleteCarModel(req.params.id, { cascade: cascadeRequested(req) });
    sendDeleted(res, "Car model deleted successfully");
  }));

  // Categories
  app.get("/api/categories", asyncRoute("fetch categories", async (_req, res) => {
    sendSuccess(res, await storage.getCategories());
  }));

  app.get("/api/categories/:id", asyncRoute("fetch category", async (req, res) => {
    const category = await storage.getCategory(req.params.id);
    if (!category) {
      return sendNotFound(res, "Category");
    }
    sendSuccess(res, category);
  }));

  app.post("/api/categories", writeLimiter, asyncRoute("create category", async (req, res) => {
    const data = insertCategorySchema.parse(sanitizeFields(req.body, categoryText));
    const category = await storage.createCategory(data);
    sendCreated(res, category, "Category created successfully");
  }));

  app.patch("/api/categories/:id", writeLimiter, asyncRoute("update category", async (req, res) => {
    const data = insertCategorySchema.partial().parse(sanitizeFields(req.body, categoryText));
    const category = await storage.updateCategory(req.params.id, data);
    sendSuccess(res, category, "Category updated successfully");
  }));

  app.delete("/api/categories/:id", writeLimiter, asyncRoute("delete category", async (req, res) => {
    await storage.deleteCategory(req.params.id, { cascade: cascadeRequested(req) });
    sendDeleted(res, "Category deleted successfully");
  }));

  // Features
  app.get("/api/features", asyncRoute("fetch features", async (_req, res) => {
    sendSuccess(res, await storage.getFeatures());
  }));

  app.get("/api/features/:id", asyncRoute("fetch feature", async (req, res) => {
    const feature = await storage.getFeature(req.params.id);
    if (!feature) {
      return sendNotFound(res, "Feature");
    }
    sendSuccess(res, feature);
  }));

  app.post("/api/features", writeLimiter, asyncRoute("create feature", async (req, res) => {
    const data = insertFeatureSchema.parse(sanitizeFields(req.body, featureText));
    const feature = await storage.createFeature(data);
    sendCreated(res, feature, "Feature created successfully");
  }));

  app.patch("/api/features/:id", writeLimiter, asyncRoute("update feature", async (req, res) => {
    const data = insertFeatureSchema.partial().parse(sanitizeFields(req.body, featureText));
    const feature = await storage.updateFeature(req.params.id, data);
    sendSuccess(res, feature, "Feature updated successfully");
  }));

  app.delete("/api/features/:id", writeLimiter, asyncRoute("delete feature", async (req, res) => {
    await storage.deleteFeature(req.params.id);
    sendDeleted(res, "Feature deleted successfully");
  }));

  // Cars
  app.get("/api/cars", searchQueryLimiter, asyncRoute("fetch cars", async (req, res) => {
    const filters = carListQuerySchema.parse(req.query);
    const result = await storage.getCars(filters);
    sendPage(res, result.cars, { offset: filters.offset ?? 0, limit: clampPageSize(filters.limit) }, result.total);
  }));

  app.get("/api/cars/slug/:slug", asyncRoute("fetch car", async (req, res) => {
    const car = await storage.getCarBySlug(req.params.slug);
    const details = car ? await storage.getCarWithDetails(car.id) : undefined;
    if (!details) {
      return sendNotFound(res, "Car");
    }
    sendSuccess(res, details);
  }));

  app.get("/api/cars/:id", asyncRoute("fetch car", async (req, res) => {
    const details = await storage.getCarWithDetails(req.params.id);
    if (!details) {
      return sendNotFound(res, "Car");
    }
    sendSuccess(res, details);
  }));

  app.post("/api/cars", writeLimiter, asyncRoute("create car", async (req, res) => {
    const data = insertCarSchema.parse(sanitizeFields(req.body, carText));
    const car = await storage.createCar(data);
    sendCreated(res, car, "Car created successfully");
  }));

  app.patch("/api/cars/:id", writeLimiter, asyncRoute("update car", async (req, res) => {
    const data = updateCarSchema.parse(sanitizeFields(req.body, carText));
    const car = await storage.updateCar(req.params.id, data);
    sendSuccess(res, car, "Car updated successfully");
  }));

  app.delete("/api/cars/:id", writeLimiter, asyncRoute("delete car", async (req, res) => {
    await storage.deleteCar(req.params.id);
    sendDeleted(res, "Car deleted successfully");
  }));

  app.put("/api/cars/:id/features", writeLimiter, asyncRoute("set car features", async (req, res) => {
    const { featureIds } = carFeaturesSchema.parse(req.body);
    sendSuccess(res, await storage.setCarFeatures(req.params.id, featureIds), "Car features updated");
  }));

  app.get("/api/cars/:id/images", asyncRoute("fetch car images", async (req, res) => {
    const car = await storage.getCar(req.params.id);
    if (!car) {
      return sendNotFound(res, "Car");
    }
    sendSuccess(res, await storage.getCarImages(car.id));
  }));

  app.post("/api/cars/:id/images", writeLimiter, asyncRoute("add car image", async (req, res) => {
    const data = newCarImageSchema.parse(sanitizeFields(req.body, carImageText));
    const image = await storage.addCarImage({ ...data, carId: req.params.id });
    sendCreated(res, image, "Image added successfully");
  }));

  app.patch("/api/cars/:id/images/:imageId/main", writeLimiter, asyncRoute("set main image", async (req, res) => {
    const image = await storage.setCarImageMain(req.params.id, req.params.imageId);
    sendSuccess(res, image, "Main image updated");
  }));

  app.patch("/api/cars/:id/images/:imageId/order", writeLimiter, asyncRoute("reorder car image", async (req, res) => {
    const { displayOrder } = imageOrderSchema.parse(req.body);
    const image = await storage.updateCarImageOrder(req.params.id, req.params.imageId, displayOrder);
    sendSuccess(res, image, "Image order updated");
  }));

  app.delete("/api/cars/:id/images/:imageId", writeLimiter, asyncRoute("delete car image", async (req, res) => {
    await storage.deleteCarImage(req.params.id, req.params.imageId);
    sendDeleted(res, "Image deleted successfully");
  }));

  app.get("/api/cars/:id/rental-rates", asyncRoute("fetch rental rates", async (req, res) => {
    const car = await storage.getCar(req.params.id);
    if (!car) {
      return sendNotFound(res, "Car");
    }
    sendSuccess(res, await storage.getRentalRates(car.id));
  }));

  app.put("/api/cars/:id/rental-rates", writeLimiter, asyncRoute("set rental rate", async (req, res) => {
    const data = upsertRentalRateSchema.parse(req.body);
    sendSuccess(res, await storage.setRentalRate(req.params.id, data), "Rental rate saved");
  }));

  // Customers
  app.get("/api/customers", asyncRoute("fetch customers", async (req, res) => {
    const search = typeof req.query.search === "string" ? req.query.search : undefined;
    sendSuccess(res, await storage.getCustomers(search));
  }));

  app.get("/api/customers/:id", asyncRoute("fetch customer", async (req, res) => {
    const customer = await storage.getCustomer(req.params.id);
    if (!customer) {
      return sendNotFound(res, "Customer");
    }
    sendSuccess(res, customer);
  }));

  app.post("/api/customers", writeLimiter, asyncRoute("create customer", async (req, res) => {
    const data = insertCustomerSchema.parse(sanitizeFields(req.body, customerText));
    const customer = await storage.createCustomer(data);
    sendCreated(res, customer, "Customer created successfully");
  }));

  app.patch("/api/customers/:id", writeLimiter, asyncRoute("update customer", async (req, res) => {
    const data = insertCustomerSchema.partial().parse(sanitizeFields(req.body, customerText));
    const customer = await storage.updateCustomer(req.params.id, data);
    sendSuccess(res, customer, "Customer updated successfully");
  }));

  app.delete("/api/customers/:id", writeLimiter, asyncRoute("delete customer", async (req, res) => {
    await storage.deleteCustomer(req.params.id);
    sendDeleted(res, "Customer deleted successfully");
  }));

  // Inquiries
  app.get("/api/inquiries", asyncRoute("fetch inquiries", async (req, res) => {
    sendSuccess(res, await storage.getInquiries(inquiryListQuerySchema.parse(req.query)));
  }));

  app.get("/api/inquiries/:id", asyncRoute("fetch inquiry", async (req, res) => {
    const inquiry = await storage.getInquiry(req.params.id);
    if (!inquiry) {
      return sendNotFound(res, "Inquiry");
    }
    sendSuccess(res, inquiry);
  }));

  app.post("/api/inquiries", leadCreationLimiter, asyncRoute("create inquiry", async (req, res) => {
    const data = insertInquirySchema.parse(sanitizeFields(req.body, inquiryText));
    const inquiry = await storage.createInquiry(data);
    sendCreated(res, inquiry, "Inquiry received");
  }));

  app.patch("/api/inquiries/:id/status", transactionLimiter, asyncRoute("update inquiry status", async (req, res) => {
    const { status, closeReason } = inquiryTransitionSchema.parse(req.body);
    const inquiry = await storage.transitionInquiry(req.params.id, status, closeReason);
    sendSuccess(res, inquiry, `Inquiry marked as ${status}`);
  }));

  // Test drives
  app.get("/api/test-drives", asyncRoute("fetch test drives", async (req, res) => {
    sendSuccess(res, await storage.getTestDrives(testDriveListQuerySchema.parse(req.query)));
  }));

  app.get("/api/test-drives/:id", asyncRoute("fetch test drive", async (req, res) => {
    const testDrive = await storage.getTestDrive(req.params.id);
    if (!testDrive) {
      return sendNotFound(res, "Test drive");
    }
    sendSuccess(res, testDrive);
  }));

  app.post("/api/test-drives", leadCreationLimiter, asyncRoute("schedule test drive", async (req, res) => {
    const data = insertTestDriveSchema.parse(sanitizeFields(req.body, testDriveText));
    const testDrive = await storage.createTestDrive(data);
    sendCreated(res, testDrive, "Test drive scheduled");
  }));

  app.patch("/api/test-drives/:id/status", transactionLimiter, asyncRoute("update test drive status", async (req, res) => {
    const { status, feedback } = testDriveTransitionSchema.parse(sanitizeFields(req.body, feedbackText));
    const testDrive = await storage.transitionTestDrive(req.params.id, status, feedback);
    sendSuccess(res, testDrive, `Test drive marked as ${status}`);
  }));

  // Sales
  app.get("/api/sales", asyncRoute("fetch sales", async (req, res) => {
    sendSuccess(res, await storage.getSales(saleListQuerySchema.parse(req.query)));
  }));

  app.get("/api/sales/:id", asyncRoute("fetch sale", async (req, res) => {
    const sale = await storage.getSale(req.params.id);
    if (!sale) {
      return sendNotFound(res, "Sale");
    }
    sendSuccess(res, sale);
  }));

  app.post("/api/sales", transactionLimiter, asyncRoute("create sale", async (req, res) => {
    const data = insertSaleSchema.parse(sanitizeFields(req.body, saleText));
    const sale = await storage.createSale(data);
    sendCreated(res, sale, "Sale opened; the car is now reserved");
  }));

  app.post("/api/sales/:id/complete", transactionLimiter, asyncRoute("complete sale", async (req, res) => {
    sendSuccess(res, await storage.completeSale(req.params.id), "Sale completed");
  }));

  app.post("/api/sales/:id/cancel", transactionLimiter, asyncRoute("cancel sale", async (req, res) => {
    const { reason } = cancelTransactionSchema.parse(sanitizeFields(req.body, cancelText));
    const sale = await storage.cancelSale(req.params.id, reason);
    sendSuccess(res, sale, "Sale cancelled");
  }));

  // Rentals
  app.get("/api/rentals", asyncRoute("fetch rentals", async (req, res) => {
    sendSuccess(res, await storage.getRentals(rentalListQuerySchema.parse(req.query)));
  }));

  app.post("/api/rentals/quote", asyncRoute("quote rental", async (req, res) => {
    sendSuccess(res, await storage.quoteRental(rentalQuoteSchema.parse(req.body)));
  }));

  app.get("/api/rentals/:id", asyncRoute("fetch rental", async (req, res) => {
    const rental = await storage.getRental(req.params.id);
    if (!rental) {
      return sendNotFound(res, "Rental");
    }
    sendSuccess(res, rental);
  }));

  app.post("/api/rentals", transactionLimiter, asyncRoute("create rental", async (req, res) => {
    const data = insertRentalSchema.parse(sanitizeFields(req.body, rentalText));
    const rental = await storage.createRental(data);
    sendCreated(res, rental, "Rental reserved");
  }));

  app.post("/api/rentals/:id/activate", transactionLimiter, asyncRoute("activate rental", async (req, res) => {
    sendSuccess(res, await storage.activateRental(req.params.id), "Rental started");
  }));

  app.post("/api/rentals/:id/return", transactionLimiter, asyncRoute("return rental", async (req, res) => {
    sendSuccess(res, await storage.returnRental(req.params.id), "Rental returned");
  }));

  app.post("/api/rentals/:id/cancel", transactionLimiter, asyncRoute("cancel rental", async (req, res) => {
    const { reason } = cancelTransactionSchema.parse(sanitizeFields(req.body, cancelText));
    const rental = await storage.cancelRental(req.params.id, reason);
    sendSuccess(res, rental, "Rental cancelled");
  }));

  // Blog
  app.get("/api/blog", asyncRoute("fetch blog posts", async (req, res) => {
    const all = req.query.all === "true";
    sendSuccess(res, await storage.getBlogPosts({ publishedOnly: !all }));
  }));

  app.get("/api/blog/:slug", asyncRoute("fetch blog post", async (req, res) => {
    const post = await storage.getBlogPostBySlug(req.params.slug);
    if (!post || !post.isPublished) {
      throw new NotFoundError("Blog post", req.params.slug);
    }
    sendSuccess(res, post);
  }));

  app.post("/api/blog", writeLimiter, asyncRoute("create blog post", async (req, res) => {
    const data = insertBlogPostSchema.parse(sanitizeFields(req.body, blogText));
    const post = await storage.createBlogPost(data);
    sendCreated(res, post, "Blog post created");
  }));

  app.patch("/api/blog/:id", writeLimiter, asyncRoute("update blog post", async (req, res) => {
    const data = updateBlogPostSchema.parse(sanitizeFields(req.body, blogText));
    const post = await storage.updateBlogPost(req.params.id, data);
    sendSuccess(res, post, "Blog post updated");
  }));

  app.patch("/api/blog/:id/publish", writeLimiter, asyncRoute("publish blog post", async (req, res) => {
    const { isPublished } = publishBlogPostSchema.parse(req.body);
    const post = await storage.setBlogPostPublished(req.params.id, isPublished);
    sendSuccess(res, post, isPublished ? "Blog post published" : "Blog post unpublished");
  }));

  app.delete("/api/blog/:id", writeLimiter, asyncRoute("delete blog post", async (req, res) => {
    await storage.deleteBlogPost(req.params.id);
    sendDeleted(res, "Blog post deleted");
  }));

  const httpServer = createServer(app);
  return httpServer;
}
