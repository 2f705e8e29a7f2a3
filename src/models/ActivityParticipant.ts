import {
  Model,
  DataTypes,
  Sequelize,
  CreationOptional,
  InferAttributes,
  InferCreationAttributes,
} from "sequelize";

/**
 * Enrollment of one participant in one activity.
 * The id follows insertion order; the unique index keeps each
 * (activity, participant) pair at most once.
 */
export const defineActivityParticipant = (sequelize: Sequelize) => {
  class ActivityParticipant extends Model<
    InferAttributes<ActivityParticipant>,
    InferCreationAttributes<ActivityParticipant>
  > {
    declare id: CreationOptional<number>;
    declare activityId: number;
    declare email: string;

    declare readonly enrolledAt: CreationOptional<Date>;
  }

  return ActivityParticipant.init(
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      activityId: {
        type: DataTypes.INTEGER,
        allowNull: false,
        references: {
          model: "activities",
          key: "id",
        },
        onDelete: "CASCADE",
      },
      email: {
        type: DataTypes.STRING,
        allowNull: false,
        references: {
          model: "participants",
          key: "email",
        },
        onDelete: "CASCADE",
      },
      enrolledAt: DataTypes.DATE,
    },
    {
      sequelize,
      modelName: "activityParticipant",
      tableName: "activity_participants",
      underscored: true,
      timestamps: true,
      createdAt: "enrolledAt",
      updatedAt: false,
      indexes: [
        {
          unique: true,
          fields: ["activity_id", "email"],
        },
      ],
    }
  );
};

export type ActivityParticipantModel = ReturnType<typeof defineActivityParticipant>;
export type ActivityParticipant = InstanceType<ActivityParticipantModel>;
