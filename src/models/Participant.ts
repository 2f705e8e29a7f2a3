import {
  Model,
  DataTypes,
  Sequelize,
  CreationOptional,
  InferAttributes,
  InferCreationAttributes,
} from "sequelize";

/**
 * A student, identified by email. Created on first signup and never deleted.
 */
export const defineParticipant = (sequelize: Sequelize) => {
  class Participant extends Model<InferAttributes<Participant>, InferCreationAttributes<Participant>> {
    declare email: string;

    declare readonly createdAt: CreationOptional<Date>;
    declare readonly updatedAt: CreationOptional<Date>;
  }

  return Participant.init(
    {
      email: {
        type: DataTypes.STRING,
        primaryKey: true,
      },
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      modelName: "participant",
      tableName: "participants",
      underscored: true,
      timestamps: true,
    }
  );
};

export type ParticipantModel = ReturnType<typeof defineParticipant>;
export type Participant = InstanceType<ParticipantModel>;
