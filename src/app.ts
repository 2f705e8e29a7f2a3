import express, { Express } from "express";
import cors from "cors";
import { createRoutes } from "./routes";
import { ActivityStore } from "./db/store";
import { EnrollmentService } from "./services/activities/enrollmentService";
import loggerMiddleware from "./middlewares/logger";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { swaggerUi, swaggerSpec } from "./config/swagger";

/**
 * Build the Express application on top of an opened store
 */
export const createApp = (store: ActivityStore): Express => {
  const app = express();

  // Middleware
  app.use(cors());

  // Request logging middleware
  app.use(loggerMiddleware);

  // Swagger documentation
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  // Routes
  app.use('/', createRoutes({ enrollment: new EnrollmentService(store) }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
