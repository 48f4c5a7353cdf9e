/**
 * Where an override file's bytes come from
 */
export type OverrideSource =
  | { kind: "disk"; absolutePath: string }
  | { kind: "inline"; content: Buffer };

/**
 * Relative POSIX path → source. Paths never start with "/" or contain "..".
 */
export type OverrideTree = ReadonlyMap<string, OverrideSource>;

export interface OverrideTrees {
  common: OverrideTree;
  client: OverrideTree;
  server: OverrideTree;
}

export type OverrideScope = keyof OverrideTrees;
