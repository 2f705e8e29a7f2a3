import { Sequelize } from "sequelize";
import { defineActivity, ActivityModel } from "./Activity";
import { defineParticipant, ParticipantModel } from "./Participant";
import { defineActivityParticipant, ActivityParticipantModel } from "./ActivityParticipant";

export interface Models {
  Activity: ActivityModel;
  Participant: ParticipantModel;
  ActivityParticipant: ActivityParticipantModel;
}

/**
 * Define the models on a connection. Every call returns fresh classes,
 * so two stores never share model state.
 *
 * There are no belongsToMany associations: enrollment rows are queried
 * directly from activity_participants in both directions, and the foreign
 * keys are declared on the join model's attributes.
 */
export const initModels = (sequelize: Sequelize): Models => ({
  Activity: defineActivity(sequelize),
  Participant: defineParticipant(sequelize),
  ActivityParticipant: defineActivityParticipant(sequelize),
});

export type { Activity } from "./Activity";
export type { Participant } from "./Participant";
export type { ActivityParticipant } from "./ActivityParticipant";
