import { Request, Response } from "express";
import { EnrollmentService } from "../../services/activities/enrollmentService";
import { ValidationError } from "../../utils/errors";

/**
 * Read the required `email` query parameter.
 * An empty value is accepted; when the parameter repeats, the last one wins.
 */
export const requireEmail = (req: Request): string => {
  const { email } = req.query;

  if (typeof email === "string") {
    return email;
  }
  if (Array.isArray(email)) {
    const last = email[email.length - 1];
    if (typeof last === "string") {
      return last;
    }
  }
  throw new ValidationError("Query parameter 'email' is required");
};

export interface ActivitiesController {
  getActivities: (req: Request, res: Response) => Promise<void>;
  signup: (req: Request, res: Response) => Promise<void>;
  unregister: (req: Request, res: Response) => Promise<void>;
}

/**
 * Activity handlers bound to an enrollment service.
 * Errors propagate to the error middleware.
 */
export const createActivitiesController = (service: EnrollmentService): ActivitiesController => ({
  /**
   * Get all activities with their details
   */
  getActivities: async (req, res) => {
    const activities = await service.listActivities();
    res.status(200).json(activities);
  },

  /**
   * Sign up a student for an activity
   */
  signup: async (req, res) => {
    const email = requireEmail(req);
    const result = await service.signup(req.params.activityName, email);
    res.status(200).json(result);
  },

  /**
   * Unregister a student from an activity
   */
  unregister: async (req, res) => {
    const email = requireEmail(req);
    const result = await service.unregister(req.params.activityName, email);
    res.status(200).json(result);
  },
});

export default createActivitiesController;
