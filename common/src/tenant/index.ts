export type { OrganizationView, RenameProgress, RenameResult, StorageSentinel } from "./Organization";
