export { exportCurseForgeZip, curseForgeZipName } from "./curseforge";
export { exportModrinthPack, modrinthPackName, bundleDirFor } from "./modrinth";
export { exportServerDirectory } from "./server";
export { OutputLayout, replaceAtomically, writeZipAtomically, writeDirectoryAtomically } from "./layout";
export * from "./manifest";
export type { ExportContext, ExportInput, ExportOptions, ExportResult, OutputFormat } from "./export.types";
