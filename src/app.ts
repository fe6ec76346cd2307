import express from "express";
import bodyParser from "body-parser";
import { Store, store } from "./models/store";
import { createMetrics } from "./metrics";
import { createServices } from "./services";
import { requireAuth } from "./middleware/auth";
import { errorHandler } from "./middleware/errorHandler";
import { metricsEndpoint, trackRequests } from "./middleware/metrics";
import { createAuthRoutes } from "./routes/auth";
import { createPvzRoutes } from "./routes/pvz";
import { createReceptionRoutes } from "./routes/receptions";

export function createApp(dataStore: Store = new Store()) {
  const app = express();
  const metrics = createMetrics();
  const services = createServices(dataStore, metrics);
  const auth = requireAuth(services.identity);

  app.use(trackRequests(metrics));
  app.use(bodyParser.json());

  app.get('/metrics', metricsEndpoint(metrics));

  app.get('/health', (_req, res) => {
    res.json({
      status: "healthy",
      pickupPoints: dataStore.pickupPoints.size,
      receptions: dataStore.receptions.size,
      products: dataStore.countProducts()
    });
  });

  app.use('/', createAuthRoutes(services.identity));
  app.use('/', createPvzRoutes(services, auth));
  app.use('/', createReceptionRoutes(services.receptions, services.products, auth));

  app.use(errorHandler);

  return app;
}

const app = createApp(store);

export default app
