import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Owner of exactly one organization. The email never changes after creation.
 */
export interface Administrator {
	readonly id: string;
	readonly email: string;
	readonly passwordHash: string;
	/** Set once the organization record exists */
	readonly organizationId: string | null;
	readonly createdAt: Date;
}

export type NewAdministrator = Pick<Administrator, "email" | "passwordHash">;

export function defineAdministrators(sequelize: Sequelize): ModelDef<Administrator, NewAdministrator> {
	const existing = sequelize.models?.Administrator;
	if (existing) {
		return existing as ModelDef<Administrator, NewAdministrator>;
	}
	return sequelize.define("Administrator", schema, {
		tableName: "administrators",
		timestamps: true,
		updatedAt: false,
		underscored: true,
		indexes,
	});
}

const indexes = [
	{
		name: "administrators_email_key",
		unique: true,
		fields: ["email"],
	},
];

const schema = {
	id: {
		type: DataTypes.UUID,
		defaultValue: DataTypes.UUIDV4,
		primaryKey: true,
	},
	email: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	passwordHash: {
		type: DataTypes.TEXT,
		allowNull: false,
		field: "password_hash",
	},
	organizationId: {
		type: DataTypes.UUID,
		allowNull: true,
		field: "organization_id",
	},
};
