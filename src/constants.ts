/**
 * Global constants for the packsmith engine
 */

export const ENGINE_NAME = "packsmith";
export const ENGINE_VERSION = "0.1.0";
export const USER_AGENT = `${ENGINE_NAME}/${ENGINE_VERSION}`;

export const CURSEFORGE_API_URL = "https://api.curseforge.com/v1";
export const MODRINTH_API_URL = "https://api.modrinth.com/v2";

// Source directory layout
export const PACK_CONFIG_FILE = "modpack.yaml";
export const OVERRIDES_DIR = "overrides";
export const CLIENT_OVERRIDES_DIR = "client-overrides";
export const SERVER_OVERRIDES_DIR = "server-overrides";
export const MODS_DIR = "mods";

// Output manifests
export const CURSEFORGE_MANIFEST_FILE = "manifest.json";
export const MODRINTH_MANIFEST_FILE = "modrinth.index.json";
export const MODLOADER_REFERENCE_FILE = "modloader.json";

// Network defaults
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 8;
export const DEFAULT_MAX_CONCURRENT_DOWNLOADS = 5;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 250;

// ZIP entries get a fixed timestamp so identical inputs give identical archives
export const ARCHIVE_TIMESTAMP = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));
