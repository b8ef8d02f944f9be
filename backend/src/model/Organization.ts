import type { ModelDef } from "../util/ModelDef";
import { MAX_SLUG_LENGTH, STORAGE_RESOURCE_PREFIX } from "orgspace-common";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Directory record of a tenant organization.
 */
export interface Organization {
	readonly id: string;
	readonly name: string;
	readonly slug: string;
	readonly storageResourceName: string;
	readonly adminId: string;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOrganization = Pick<Organization, "name" | "slug" | "storageResourceName" | "adminId">;

export function defineOrganizations(sequelize: Sequelize): ModelDef<Organization, NewOrganization> {
	const existing = sequelize.models?.Organization;
	if (existing) {
		return existing as ModelDef<Organization, NewOrganization>;
	}
	return sequelize.define("Organization", schema, {
		tableName: "organizations",
		timestamps: true,
		underscored: true,
		indexes,
	});
}

const indexes = [
	{
		name: "organizations_slug_key",
		unique: true,
		fields: ["slug"],
	},
];

const schema = {
	id: {
		type: DataTypes.UUID,
		defaultValue: DataTypes.UUIDV4,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	slug: {
		type: DataTypes.STRING(MAX_SLUG_LENGTH),
		allowNull: false,
	},
	storageResourceName: {
		type: DataTypes.STRING(STORAGE_RESOURCE_PREFIX.length + MAX_SLUG_LENGTH),
		allowNull: false,
		field: "storage_resource_name",
	},
	adminId: {
		type: DataTypes.UUID,
		allowNull: false,
		field: "admin_id",
	},
};
