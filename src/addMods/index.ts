export { addMods } from "./addMods";
export type { AddModsOptions, AddModsResult } from "./addMods.types";
