import type { Express } from "express";
import accountRouter from "./routes/account.js";
import additivesRouter from "./routes/additives.js";
import apiClientsRouter from "./routes/apiClients.js";
import brandsRouter from "./routes/brands.js";
import checkingsRouter from "./routes/checkings.js";
import cosmeticsRouter from "./routes/cosmetics.js";
import errorReportsRouter from "./routes/errorReports.js";
import externalRouter from "./routes/external.js";
import healthRouter from "./routes/health.js";
import householdCleanersRouter from "./routes/householdCleaners.js";
import interestingProductsRouter from "./routes/interestingProducts.js";
import partnerCategoriesRouter from "./routes/partnerCategories.js";
import partnersRouter from "./routes/partners.js";
import productCategoriesRouter from "./routes/productCategories.js";
import productsRouter from "./routes/products.js";
import scanEventsRouter from "./routes/scanEvents.js";
import scoringRouter from "./routes/scoring.js";
import shopsRouter from "./routes/shops.js";
import usersRouter from "./routes/users.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";

export function registerRoutes(app: Express): void {
  // API routes
  app.use("/api/v1/account", accountRouter);
  app.use("/api/v1/users", usersRouter);
  app.use("/api/v1/api-clients", apiClientsRouter);
  app.use("/api/v1/brands", brandsRouter);
  app.use("/api/v1/products", productsRouter);
  app.use("/api/v1/external", externalRouter);
  app.use("/api/v1/checkings", checkingsRouter);
  app.use("/api/v1/additives", additivesRouter);
  app.use("/api/v1/cosmetics", cosmeticsRouter);
  app.use("/api/v1/household-cleaners", householdCleanersRouter);
  app.use("/api/v1/error-reports", errorReportsRouter);
  app.use("/api/v1/product-categories", productCategoriesRouter);
  app.use("/api/v1/interesting-products", interestingProductsRouter);
  app.use("/api/v1/partners", partnersRouter);
  app.use("/api/v1/partner-categories", partnerCategoriesRouter);
  app.use("/api/v1/scoring", scoringRouter);
  app.use("/api/v1/shops", shopsRouter);
  app.use("/api/v1/scan-events", scanEventsRouter);
  // Health checks (no /api prefix)
  app.use("/", healthRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);
}
