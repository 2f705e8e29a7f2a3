import {
  Model,
  DataTypes,
  Sequelize,
  CreationOptional,
  InferAttributes,
  InferCreationAttributes,
} from "sequelize";

/**
 * Define the Activity model on one connection. Each store gets its own class.
 */
export const defineActivity = (sequelize: Sequelize) => {
  class Activity extends Model<InferAttributes<Activity>, InferCreationAttributes<Activity>> {
    declare id: CreationOptional<number>;
    declare name: string;
    declare description: string;
    declare schedule: string;
    // Advisory capacity, signup does not check it
    declare maxParticipants: number;

    // Timestamps
    declare readonly createdAt: CreationOptional<Date>;
    declare readonly updatedAt: CreationOptional<Date>;
  }

  return Activity.init(
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      name: {
        type: DataTypes.STRING,
        allowNull: false,
        unique: true,
      },
      description: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      schedule: {
        type: DataTypes.STRING,
        allowNull: false,
      },
      maxParticipants: {
        type: DataTypes.INTEGER,
        allowNull: false,
        validate: {
          min: 1,
        },
      },
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      modelName: "activity",
      tableName: "activities",
      underscored: true,
      timestamps: true,
    }
  );
};

export type ActivityModel = ReturnType<typeof defineActivity>;
export type Activity = InstanceType<ActivityModel>;
