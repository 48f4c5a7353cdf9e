export {
  OVERRIDE_DIRS,
  loadOverrideTree,
  loadOverrideTrees,
  inlineOverrideTree,
  mergeOverrides,
  rawModFiles,
  readOverride,
  sortedEntries,
} from "./overrides";
export type { OverrideSource, OverrideTree, OverrideTrees, OverrideScope } from "./overrides.types";
