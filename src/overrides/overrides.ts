import { join, posix } from "path";
import type { FileSystem } from "#/core";
import { CLIENT_OVERRIDES_DIR, MODS_DIR, OVERRIDES_DIR, SERVER_OVERRIDES_DIR } from "#/constants";
import { withFilesystem } from "#/errors";
import { compareKeys, type GameSide } from "#/mods";
import type { OverrideScope, OverrideSource, OverrideTree, OverrideTrees } from "./overrides.types";

export const OVERRIDE_DIRS: Record<OverrideScope, string> = {
  common: OVERRIDES_DIR,
  client: CLIENT_OVERRIDES_DIR,
  server: SERVER_OVERRIDES_DIR,
};

function walk(fs: FileSystem, dir: string, prefix: string, into: Map<string, OverrideSource>): void {
  const entries = [...fs.readdir(dir)].sort();
  for (const entry of entries) {
    const fullPath = join(dir, entry);
    const relativePath = prefix ? posix.join(prefix, entry) : entry;

    if (fs.stat(fullPath).isDirectory) {
      walk(fs, fullPath, relativePath, into);
    } else {
      into.set(relativePath, { kind: "disk", absolutePath: fullPath });
    }
  }
}

/**
 * Collect every file under `dir`. A missing directory is an empty tree.
 */
export function loadOverrideTree(fs: FileSystem, dir: string): OverrideTree {
  const tree = new Map<string, OverrideSource>();
  if (!fs.exists(dir)) {
    return tree;
  }
  withFilesystem(dir, () => walk(fs, dir, "", tree));
  return tree;
}

export function loadOverrideTrees(fs: FileSystem, sourceDir: string): OverrideTrees {
  return {
    common: loadOverrideTree(fs, join(sourceDir, OVERRIDE_DIRS.common)),
    client: loadOverrideTree(fs, join(sourceDir, OVERRIDE_DIRS.client)),
    server: loadOverrideTree(fs, join(sourceDir, OVERRIDE_DIRS.server)),
  };
}

/**
 * Build a tree from in-memory contents.
 *
 * @example inlineOverrideTree({ "config/a.toml": "x = 1" })
 */
export function inlineOverrideTree(files: Record<string, string | Buffer>): OverrideTree {
  const tree = new Map<string, OverrideSource>();
  for (const [path, content] of Object.entries(files)) {
    tree.set(path, { kind: "inline", content: typeof content === "string" ? Buffer.from(content) : content });
  }
  return tree;
}

/**
 * Effective tree for one side: common first, then the side's own tree.
 * A side file replaces the common file at the same path.
 */
export function mergeOverrides(trees: OverrideTrees, side: GameSide): OverrideTree {
  const merged = new Map<string, OverrideSource>(trees.common);
  for (const [path, source] of trees[side]) {
    merged.set(path, source);
  }
  return merged;
}

/**
 * Paths of unmanaged mod jars shipped in a tree, sorted.
 */
export function rawModFiles(tree: OverrideTree): string[] {
  return [...tree.keys()].filter((path) => path.startsWith(`${MODS_DIR}/`)).sort();
}

export function readOverride(fs: FileSystem, source: OverrideSource): Buffer {
  if (source.kind === "inline") {
    return source.content;
  }
  return withFilesystem(source.absolutePath, () => fs.readFileBinary(source.absolutePath));
}

/**
 * Tree entries in path order, so output never depends on directory listing order.
 */
export function sortedEntries(tree: OverrideTree): Array<[string, OverrideSource]> {
  return [...tree.entries()].sort(([a], [b]) => compareKeys(a, b));
}
