export * from "./auth/AuthorizationGate";
export * from "./auth/CredentialService";
export * from "./config/Config";
export * from "./core/Database";
export * from "./dao/TenantDirectoryDao";
export * from "./dao/TenantStorageDao";
export type { Administrator, NewAdministrator } from "./model/Administrator";
export type { NewOrganization, Organization } from "./model/Organization";
export * from "./ServiceFactory";
export * from "./services/OrganizationAdminService";
export * from "./tenant/TenantErrors";
export * from "./tenant/TenantProvisioningEngine";
export * from "./tenant/TenantReconciler";
export * from "./util/Sequelize";
