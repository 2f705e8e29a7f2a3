import { UniqueConstraintError } from 'sequelize';
import { ActivityStore } from '../../db/store';
import { BadRequestError, ConflictError, NotFoundError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('enrollment');

export interface ActivityDetails {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityCatalog = Record<string, ActivityDetails>;

export interface EnrollmentResult {
  message: string;
}

export const ACTIVITY_NOT_FOUND = 'Activity not found';
export const ALREADY_SIGNED_UP = 'Student is already signed up';
export const NOT_SIGNED_UP = 'Student is not signed up for this activity';

/**
 * Enrollment rules on top of the store. Each call runs in a single session.
 */
export class EnrollmentService {
  constructor(private readonly store: ActivityStore) {}

  /**
   * Every activity keyed by name, with its participants' emails
   */
  async listActivities(): Promise<ActivityCatalog> {
    const activities = await this.store.session((session) => session.listActivities());

    const catalog: ActivityCatalog = {};
    for (const activity of activities) {
      catalog[activity.name] = {
        description: activity.description,
        schedule: activity.schedule,
        max_participants: activity.maxParticipants,
        participants: activity.participants,
      };
    }
    return catalog;
  }

  /**
   * Enroll `email` in the named activity, creating the participant on first signup.
   * Capacity is advisory and not checked here.
   */
  async signup(activityName: string, email: string): Promise<EnrollmentResult> {
    try {
      await this.store.session(async (session) => {
        const activity = await session.findActivityByName(activityName);
        if (!activity) {
          throw new NotFoundError(ACTIVITY_NOT_FOUND);
        }

        const existing = await session.findParticipantByEmail(email);
        if (existing && await session.isEnrolled(activity, existing)) {
          throw new ConflictError(ALREADY_SIGNED_UP);
        }

        const participant = existing ?? await session.ensureParticipant(email);
        await session.addAssociation(activity, participant);
      });
    } catch (error) {
      // A concurrent signup for the same pair got there first
      if (error instanceof UniqueConstraintError) {
        log.warn(`Duplicate enrollment rejected by the store for ${email} in ${activityName}`);
        throw new ConflictError(ALREADY_SIGNED_UP);
      }
      throw error;
    }

    log.info(`Signed up ${email} for ${activityName}`);
    return { message: `Signed up ${email} for ${activityName}` };
  }

  /**
   * Remove `email` from the named activity. The participant row itself is kept.
   */
  async unregister(activityName: string, email: string): Promise<EnrollmentResult> {
    await this.store.session(async (session) => {
      const activity = await session.findActivityByName(activityName);
      if (!activity) {
        throw new NotFoundError(ACTIVITY_NOT_FOUND);
      }

      const participant = await session.findParticipantByEmail(email);
      if (!participant || !(await session.isEnrolled(activity, participant))) {
        throw new BadRequestError(NOT_SIGNED_UP);
      }

      await session.removeAssociation(activity, participant);
    });

    log.info(`Unregistered ${email} from ${activityName}`);
    return { message: `Unregistered ${email} from ${activityName}` };
  }
}

export default EnrollmentService;
