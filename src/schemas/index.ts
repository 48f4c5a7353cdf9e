import { z } from "zod";
import {
  DEFAULT_MAX_CONCURRENT_DOWNLOADS,
  DEFAULT_MAX_CONCURRENT_REQUESTS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
} from "#/constants";

// Side requirement, applied independently to client and server
export const SideRequirementSchema = z.enum(["required", "optional", "unsupported"]);

// Explicit side override: shorthand ("client" = client only) or per-side requirements
export const SideOverrideSchema = z.union([
  z.enum(["both", "client", "server"]),
  z
    .object({
      client: SideRequirementSchema.optional(),
      server: SideRequirementSchema.optional(),
    })
    .strict(),
]);
export type SideOverrideConfig = z.infer<typeof SideOverrideSchema>;

// CurseForge ids are 32-bit signed integers on the wire, always positive in practice
export const CurseForgeIdSchema = z.number().int().positive().max(2_147_483_647);
export const ModrinthIdSchema = z.string().trim().min(1);

// Ignored dependency: bare value = project id, or an explicit project/version id
function ignoredDependenciesSchema<T extends z.ZodTypeAny>(idSchema: T) {
  return z
    .array(
      z.union([
        idSchema,
        z.object({ projectId: idSchema }).strict(),
        z.object({ versionId: idSchema }).strict(),
      ])
    )
    .default([]);
}

export const CurseForgeModSchema = z
  .object({
    projectId: CurseForgeIdSchema,
    versionId: CurseForgeIdSchema,
    side: SideOverrideSchema.optional(),
    ignoredDeps: ignoredDependenciesSchema(CurseForgeIdSchema),
  })
  .strict();
export type CurseForgeModConfig = z.infer<typeof CurseForgeModSchema>;

export const ModrinthModSchema = z
  .object({
    projectId: ModrinthIdSchema,
    versionId: ModrinthIdSchema,
    side: SideOverrideSchema.optional(),
    ignoredDeps: ignoredDependenciesSchema(ModrinthIdSchema),
  })
  .strict();
export type ModrinthModConfig = z.infer<typeof ModrinthModSchema>;

// Mod keys are user-chosen but must be usable as file-safe identifiers in logs and errors
export const ModKeySchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "Mod key must be alphanumeric with _ . or -");

export const ModsConfigSchema = z
  .object({
    curseforge: z.record(ModKeySchema, CurseForgeModSchema).default({}),
    modrinth: z.record(ModKeySchema, ModrinthModSchema).default({}),
  })
  .strict();
export type ModsConfig = z.infer<typeof ModsConfigSchema>;

export const ModLoaderTypeSchema = z.enum(["forge", "neoforge", "fabric", "quilt"]);
export type ModLoaderType = z.infer<typeof ModLoaderTypeSchema>;

export const ModLoaderSchema = z
  .object({
    id: ModLoaderTypeSchema,
    version: z.string().trim().min(1),
  })
  .strict();
export type ModLoader = z.infer<typeof ModLoaderSchema>;

// Pack config (modpack.yaml)
export const PackConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(""),
    author: z.string().trim().min(1),
    version: z.string().trim().min(1),
    minecraftVersion: z.string().trim().min(1),
    modLoader: ModLoaderSchema,
    mods: ModsConfigSchema.default({}),
  })
  .strict();
export type PackConfig = z.infer<typeof PackConfigSchema>;
export type PackConfigInput = z.input<typeof PackConfigSchema>;

export type PackMetadata = Omit<PackConfig, "mods">;

// Engine settings (network caps, retry budget). Supplied by the CLI, all optional.
export const EngineSettingsSchema = z.object({
  maxConcurrentRequests: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_REQUESTS),
  maxConcurrentDownloads: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_DOWNLOADS),
  retryAttempts: z.number().int().positive().default(DEFAULT_RETRY_ATTEMPTS),
  retryDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
});
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;
