/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { FileSystem, HttpClient, Logger, LogLevel, PlatformName, TokenProvider } from "#/core";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
}

function trimSlash(path: string): string {
  return path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Directories exist implicitly when a file lives beneath them.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry> } {
  const files = new Map<string, MockFileEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = trimSlash(path) + "/";
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  const readEntry = (path: string, op: string): MockFileEntry => {
    const entry = files.get(path);
    if (!entry || entry.isDirectory) {
      throw new Error(`ENOENT: no such file or directory, ${op} '${path}'`);
    }
    return entry;
  };

  return {
    files,

    readFile(path: string): string {
      const entry = readEntry(path, "open");
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = readEntry(path, "open");
      return typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false });
    },

    writeFileBinary(path: string, content: Buffer): void {
      files.set(path, { content, isDirectory: false });
    },

    exists(path: string): boolean {
      return files.has(trimSlash(path)) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = trimSlash(path);
      if (!files.has(normalizedPath)) {
        files.set(normalizedPath, { content: "", isDirectory: true });
      }
    },

    readdir(path: string): string[] {
      const normalizedPath = trimSlash(path);
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(trimSlash(path));
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      const size = typeof entry.content === "string" ? Buffer.byteLength(entry.content) : entry.content.length;
      return { isDirectory: false, isFile: true, size };
    },

    unlink(path: string): void {
      files.delete(path);
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = trimSlash(path);
      for (const filePath of [...files.keys()]) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },

    copyFile(src: string, dest: string): void {
      const entry = readEntry(src, "copyfile");
      files.set(dest, { ...entry });
    },

    rename(src: string, dest: string): void {
      const from = trimSlash(src);
      const to = trimSlash(dest);
      const entry = files.get(from);
      if (!entry && !hasChildren(from)) {
        throw new Error(`ENOENT: no such file or directory, rename '${src}'`);
      }

      for (const filePath of [...files.keys()]) {
        if (filePath === to || filePath.startsWith(to + "/")) {
          files.delete(filePath);
        }
      }
      for (const [filePath, child] of [...files.entries()]) {
        if (filePath === from || filePath.startsWith(from + "/")) {
          files.set(to + filePath.slice(from.length), child);
          files.delete(filePath);
        }
      }
    },
  };
}

export type MockResponse = Response | (() => Response | Promise<Response>);

/**
 * Create a mock HttpClient with predefined responses.
 * Unknown URLs answer 404. Every requested URL is recorded in `calls`.
 */
export function createMockHttpClient(
  responses: Map<string, MockResponse> = new Map()
): HttpClient & { responses: Map<string, MockResponse>; calls: string[]; callCount(url: string): number } {
  const calls: string[] = [];

  return {
    responses,
    calls,

    callCount(url: string): number {
      return calls.filter((call) => call === url).length;
    },

    async fetch(url: string, _options?: RequestInit): Promise<Response> {
      calls.push(url);
      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function" ? responseOrFactory() : responseOrFactory.clone();
    },
  };
}

/**
 * Create a mock TokenProvider
 */
export function createMockTokenProvider(apiKeys: Partial<Record<PlatformName, string>> = {}): TokenProvider {
  return {
    getApiKey(platform: PlatformName): string | undefined {
      return apiKeys[platform];
    },
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Create a Logger that records every message
 */
export function createMockLogger(): Logger & { entries: LogEntry[]; messages(level: LogLevel): string[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    messages(level: LogLevel): string[] {
      return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    },
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Buffer | Uint8Array, status = 200): Response {
  return new Response(new Uint8Array(data), {
    status,
    headers: { "Content-Type": "application/octet-stream" },
  });
}
