/**
 * packsmith-engine
 *
 * Modpack builder core: resolves a modpack.yaml against CurseForge and
 * Modrinth, then exports CurseForge zips, Modrinth packs and server folders.
 * Portable, testable, dependency-injected.
 */

// Core interfaces and Node-backed implementations
export * from '#/core';

export * from '#/constants';

// Error taxonomy
export * from '#/errors';

// Schemas (Zod validation)
export * from '#/schemas';
export * from '#/friendly-errors';

// Formatters (pure utilities)
export * from '#/formatters';

// Mod references, sides, key naming
export * from '#/mods';

// Platform clients (CurseForge, Modrinth)
export * from '#/platform';

// Dependency resolution
export * from '#/resolver';

// Override trees
export * from '#/overrides';

// Content-addressed download cache
export * from '#/cache';

// Output formats
export * from '#/export';

// Pack config loading
export * from '#/config';

// Operations
export * from '#/generate';
export * from '#/addMods';
