import type { GameSide, SideOverride, SideRequirement, SideRequirements } from "./mods.types";
import type { SideOverrideConfig } from "#/schemas";

const RANK: Record<SideRequirement, number> = {
  unsupported: 0,
  optional: 1,
  required: 2,
};

export const REQUIRED_BOTH: SideRequirements = Object.freeze({
  client: "required",
  server: "required",
});

/**
 * Least upper bound: the broader of two requirements.
 *
 * @example joinSide("optional", "required") → "required"
 */
export function joinSide(a: SideRequirement, b: SideRequirement): SideRequirement {
  return RANK[a] >= RANK[b] ? a : b;
}

/**
 * Greatest lower bound: the narrower of two requirements.
 *
 * @example meetSide("optional", "required") → "optional"
 */
export function meetSide(a: SideRequirement, b: SideRequirement): SideRequirement {
  return RANK[a] <= RANK[b] ? a : b;
}

export function joinSides(a: SideRequirements, b: SideRequirements): SideRequirements {
  return { client: joinSide(a.client, b.client), server: joinSide(a.server, b.server) };
}

export function meetSides(a: SideRequirements, b: SideRequirements): SideRequirements {
  return { client: meetSide(a.client, b.client), server: meetSide(a.server, b.server) };
}

/**
 * Per side: explicit override, then platform hint, then required.
 */
export function effectiveSide(override?: SideOverride, hint?: SideOverride): SideRequirements {
  return {
    client: override?.client ?? hint?.client ?? "required",
    server: override?.server ?? hint?.server ?? "required",
  };
}

/**
 * Normalize the config shorthand into per-side requirements.
 *
 * @example sideOverrideFromConfig("client") → { client: "required", server: "unsupported" }
 */
export function sideOverrideFromConfig(config: SideOverrideConfig | undefined): SideOverride | undefined {
  if (config === undefined) return undefined;
  switch (config) {
    case "both":
      return { client: "required", server: "required" };
    case "client":
      return { client: "required", server: "unsupported" };
    case "server":
      return { client: "unsupported", server: "required" };
    default:
      return { ...config };
  }
}

/**
 * Should a mod with these requirements be part of an output for `side`?
 */
export function includedOnSide(
  sides: SideRequirements,
  side: GameSide,
  includeOptional: boolean
): boolean {
  const requirement = sides[side];
  if (requirement === "required") return true;
  if (requirement === "optional") return includeOptional;
  return false;
}
