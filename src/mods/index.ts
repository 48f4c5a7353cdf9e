export * from "./mods.types";
export * from "./side";
export * from "./naming";
export * from "./reference";
