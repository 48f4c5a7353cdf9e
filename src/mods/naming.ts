/**
 * Derive a config key from a project's display name.
 *
 * Apostrophes are dropped, every other non-alphanumeric run becomes a single
 * underscore, and leading/trailing underscores are trimmed.
 *
 * @example modKeyFromName("Sodium Extra") → "sodium_extra"
 * @example modKeyFromName("Farmer's Delight") → "farmers_delight"
 * @example modKeyFromName("(Hidden) Mod!!") → "hidden_mod"
 */
export function modKeyFromName(name: string): string {
  const key = name
    .replace(/'/g, "")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .toLowerCase()
    .replace(/^_+|_+$/g, "");

  return key || "mod";
}

/**
 * Pick a key for a generated entry, appending the project id on collision.
 *
 * @example uniqueModKey("Fabric API", "P7dR8mSH", new Set(["fabric_api"])) → "fabric_api_p7dr8msh"
 */
export function uniqueModKey(name: string, projectId: string | number, taken: ReadonlySet<string>): string {
  const base = modKeyFromName(name);
  if (!taken.has(base)) {
    return base;
  }
  const withId = `${base}_${modKeyFromName(String(projectId))}`;
  let candidate = withId;
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${withId}_${n}`;
  }
  return candidate;
}
