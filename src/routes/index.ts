import { Router } from "express";
import { healthController, rootController } from "../controllers/health";
import { createActivitiesController } from "../controllers/activities";
import { EnrollmentService } from "../services/activities/enrollmentService";
import { createActivitiesRouter } from "./activities/activities";

export interface RouteServices {
  enrollment: EnrollmentService;
}

export const createRoutes = (services: RouteServices): Router => {
  const router = Router();

  /**
   * @swagger
   * /:
   *   get:
   *     summary: Redirect to the landing page
   *     tags: [System]
   *     responses:
   *       307:
   *         description: Redirect to /static/index.html
   */
  router.get("/", rootController);

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check endpoint
   *     description: Check if the API is running properly
   *     tags: [System]
   *     responses:
   *       200:
   *         description: API is healthy
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 status:
   *                   type: string
   *                   example: ok
   *                 timestamp:
   *                   type: string
   *                   format: date-time
   *                 version:
   *                   type: string
   *                 environment:
   *                   type: string
   */
  router.get("/health", healthController);

  // Activities routes
  router.use("/activities", createActivitiesRouter(createActivitiesController(services.enrollment)));

  return router;
};

export default createRoutes;
