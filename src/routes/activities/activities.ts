import { Router, Request, Response, NextFunction } from "express";
import { ActivitiesController } from "../../controllers/activities";

/**
 * @swagger
 * components:
 *   schemas:
 *     ActivityDetails:
 *       type: object
 *       properties:
 *         description:
 *           type: string
 *           description: What the activity is about
 *         schedule:
 *           type: string
 *           description: When the activity meets
 *         max_participants:
 *           type: integer
 *           description: Advisory capacity of the activity
 *         participants:
 *           type: array
 *           items:
 *             type: string
 *             format: email
 *           description: Emails of the enrolled students
 *       example:
 *         description: Learn strategies and compete in chess tournaments
 *         schedule: Fridays, 3:30 PM - 5:00 PM
 *         max_participants: 12
 *         participants: [michael@mergington.edu, daniel@mergington.edu]
 *     Message:
 *       type: object
 *       properties:
 *         message:
 *           type: string
 *   parameters:
 *     ActivityName:
 *       in: path
 *       name: activityName
 *       schema:
 *         type: string
 *       required: true
 *       description: The activity name, URL-encoded
 *     Email:
 *       in: query
 *       name: email
 *       schema:
 *         type: string
 *       required: true
 *       description: The student's email
 */
export const createActivitiesRouter = (controller: ActivitiesController): Router => {
  const router = Router();

  /**
   * @swagger
   * /activities:
   *   get:
   *     summary: Get all activities
   *     tags: [Activities]
   *     responses:
   *       200:
   *         description: Activities keyed by name
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               additionalProperties:
   *                 $ref: '#/components/schemas/ActivityDetails'
   */
  router.get("/", (req: Request, res: Response, next: NextFunction): void => {
    controller.getActivities(req, res).catch(next);
  });

  /**
   * @swagger
   * /activities/{activityName}/signup:
   *   post:
   *     summary: Sign up a student for an activity
   *     tags: [Activities]
   *     parameters:
   *       - $ref: '#/components/parameters/ActivityName'
   *       - $ref: '#/components/parameters/Email'
   *     responses:
   *       200:
   *         description: Student signed up
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Message'
   *             example:
   *               message: Signed up new@mergington.edu for Chess Club
   *       400:
   *         $ref: '#/components/responses/BadRequestError'
   *       404:
   *         $ref: '#/components/responses/NotFoundError'
   *       422:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.post("/:activityName/signup", (req: Request, res: Response, next: NextFunction): void => {
    controller.signup(req, res).catch(next);
  });

  /**
   * @swagger
   * /activities/{activityName}/unregister:
   *   delete:
   *     summary: Unregister a student from an activity
   *     tags: [Activities]
   *     parameters:
   *       - $ref: '#/components/parameters/ActivityName'
   *       - $ref: '#/components/parameters/Email'
   *     responses:
   *       200:
   *         description: Student unregistered
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Message'
   *             example:
   *               message: Unregistered michael@mergington.edu from Chess Club
   *       400:
   *         $ref: '#/components/responses/BadRequestError'
   *       404:
   *         $ref: '#/components/responses/NotFoundError'
   *       422:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.delete("/:activityName/unregister", (req: Request, res: Response, next: NextFunction): void => {
    controller.unregister(req, res).catch(next);
  });

  return router;
};

export default createActivitiesRouter;
