import { Sequelize, Transaction } from 'sequelize';
import { DatabaseConfig } from '../config';
import { initModels, Models, Activity, Participant } from '../models';
import createConnection from './connection';

export interface NewActivity {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
}

export interface ActivityWithParticipants extends NewActivity {
  id: number;
  participants: string[];
}

/**
 * Queries bound to one transaction. Every read and write of a request goes
 * through the same session so they commit or roll back together.
 */
export class StoreSession {
  constructor(
    private readonly models: Models,
    public readonly transaction: Transaction
  ) {}

  findActivityByName(name: string): Promise<Activity | null> {
    return this.models.Activity.findOne({
      where: { name },
      transaction: this.transaction,
    });
  }

  findParticipantByEmail(email: string): Promise<Participant | null> {
    return this.models.Participant.findByPk(email, { transaction: this.transaction });
  }

  /**
   * Fetch the participant, creating the row when it does not exist yet
   */
  async ensureParticipant(email: string): Promise<Participant> {
    const [participant] = await this.models.Participant.findOrCreate({
      where: { email },
      transaction: this.transaction,
    });
    return participant;
  }

  createActivity(input: NewActivity): Promise<Activity> {
    return this.models.Activity.create(input, { transaction: this.transaction });
  }

  countActivities(): Promise<number> {
    return this.models.Activity.count({ transaction: this.transaction });
  }

  /**
   * All activities ordered by id, each with its participants' emails
   * in enrollment order
   */
  async listActivities(): Promise<ActivityWithParticipants[]> {
    const activities = await this.models.Activity.findAll({
      order: [['id', 'ASC']],
      transaction: this.transaction,
    });
    const enrollments = await this.models.ActivityParticipant.findAll({
      order: [['id', 'ASC']],
      transaction: this.transaction,
    });

    const emailsByActivity = new Map<number, string[]>();
    for (const enrollment of enrollments) {
      const emails = emailsByActivity.get(enrollment.activityId) ?? [];
      emails.push(enrollment.email);
      emailsByActivity.set(enrollment.activityId, emails);
    }

    return activities.map((activity) => ({
      id: activity.id,
      name: activity.name,
      description: activity.description,
      schedule: activity.schedule,
      maxParticipants: activity.maxParticipants,
      participants: emailsByActivity.get(activity.id) ?? [],
    }));
  }

  async isEnrolled(activity: Activity, participant: Participant): Promise<boolean> {
    const enrollment = await this.models.ActivityParticipant.findOne({
      where: { activityId: activity.id, email: participant.email },
      transaction: this.transaction,
    });
    return enrollment !== null;
  }

  async addAssociation(activity: Activity, participant: Participant): Promise<void> {
    await this.models.ActivityParticipant.create(
      { activityId: activity.id, email: participant.email },
      { transaction: this.transaction }
    );
  }

  async removeAssociation(activity: Activity, participant: Participant): Promise<void> {
    await this.models.ActivityParticipant.destroy({
      where: { activityId: activity.id, email: participant.email },
      transaction: this.transaction,
    });
  }
}

/**
 * Process-wide handle on the relational store. Created once at startup and
 * passed to whoever needs it.
 */
export class ActivityStore {
  public readonly models: Models;

  constructor(public readonly sequelize: Sequelize) {
    this.models = initModels(sequelize);
  }

  /**
   * Create the activities, participants and activity_participants tables
   * when they are missing. Existing tables are left untouched.
   */
  async createSchema(): Promise<void> {
    await this.sequelize.sync();
  }

  /**
   * Run `work` in its own transaction. Commits when it resolves, rolls back
   * when it rejects, and releases the connection in both cases.
   */
  session<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.sequelize.transaction((transaction) =>
      work(new StoreSession(this.models, transaction))
    );
  }

  close(): Promise<void> {
    return this.sequelize.close();
  }
}

export const createStore = (config: DatabaseConfig): ActivityStore =>
  new ActivityStore(createConnection(config));

export default createStore;
