import type { InferAttributes, Model, ModelStatic } from "sequelize";

/**
 * Static side of a model defined with `sequelize.define`, typed by its plain record interface
 * and, where generated columns make them differ, by the attributes `create` takes.
 */
export type ModelDef<T, TCreation extends {} = InferAttributes<T & Model>> = ModelStatic<
	T & Model<InferAttributes<T & Model>, TCreation>
>;
