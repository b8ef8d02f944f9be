export type { OrganizationView, RenameProgress, RenameResult, StorageSentinel } from "./tenant";
export * from "./util/LoggerCommon";
export * from "./util/SlugUtils";
