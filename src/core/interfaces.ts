/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string): void;
  writeFileBinary(path: string, content: Buffer): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
  unlink(path: string): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
  copyFile(src: string, dest: string): void;
  rename(src: string, dest: string): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export type PlatformName = "curseforge" | "modrinth";

export interface TokenProvider {
  /** API key for a mod platform. Modrinth works without one. */
  getApiKey(platform: PlatformName): string | undefined;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface PathConfig {
  /** Modpack source directory (holds modpack.yaml and the override trees) */
  sourceDir: string;
  configFile: string;
  /** Content-addressed download cache, shared across runs */
  cacheDir: string;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  tokens: TokenProvider;
  logger: Logger;
  paths: PathConfig;
}
