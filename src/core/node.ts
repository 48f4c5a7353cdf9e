/**
 * Node.js implementations of the core interfaces.
 * The CLI wires these into an EngineContext; tests use the in-memory mocks instead.
 */

import * as nodeFs from "fs";
import type { FileSystem, HttpClient, PlatformName, TokenProvider } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => nodeFs.readFileSync(path, "utf-8"),
    readFileBinary: (path) => nodeFs.readFileSync(path),
    writeFile: (path, content) => nodeFs.writeFileSync(path, content, "utf-8"),
    writeFileBinary: (path, content) => nodeFs.writeFileSync(path, content),
    exists: (path) => nodeFs.existsSync(path),
    mkdir: (path, options) => {
      nodeFs.mkdirSync(path, { recursive: options?.recursive ?? false });
    },
    readdir: (path) => nodeFs.readdirSync(path),
    stat: (path) => {
      const stats = nodeFs.statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
    unlink: (path) => nodeFs.unlinkSync(path),
    rmdir: (path, options) => {
      nodeFs.rmSync(path, { recursive: options?.recursive ?? false, force: true });
    },
    copyFile: (src, dest) => nodeFs.copyFileSync(src, dest),
    rename: (src, dest) => nodeFs.renameSync(src, dest),
  };
}

/**
 * HttpClient over the global fetch. `timeoutMs` bounds the whole exchange,
 * body included: the signal stays armed after the headers arrive.
 */
export function createNodeHttpClient(timeoutMs = 30_000): HttpClient {
  return {
    fetch(url: string, options: RequestInit = {}): Promise<Response> {
      return fetch(url, { ...options, signal: options.signal ?? AbortSignal.timeout(timeoutMs) });
    },
  };
}

/**
 * Reads platform API keys from the environment (e.g. CURSEFORGE_API_KEY).
 */
export function createEnvTokenProvider(env: NodeJS.ProcessEnv = process.env): TokenProvider {
  return {
    getApiKey(platform: PlatformName): string | undefined {
      const value = env[`${platform.toUpperCase()}_API_KEY`];
      return value ? value : undefined;
    },
  };
}
