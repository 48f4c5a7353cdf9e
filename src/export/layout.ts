/**
 * Output layout and atomic output writing
 *
 * Exporters describe their output as path → content, then write it in one
 * step: as a ZIP archive or as a directory tree, always through a temporary
 * sibling that is renamed into place on success.
 */

import { randomUUID } from "crypto";
import { basename, dirname, join } from "path";
import JSZip from "jszip";
import type { FileSystem } from "#/core";
import { ARCHIVE_TIMESTAMP } from "#/constants";
import { ConfigurationError, withFilesystem } from "#/errors";
import { compareKeys } from "#/mods";

interface LayoutEntry {
  owner: string;
  /** Absent for reserved paths that other files must not take */
  content?: () => Buffer;
}

export class OutputLayout {
  private entries = new Map<string, LayoutEntry>();

  private claim(path: string, entry: LayoutEntry): void {
    const existing = this.entries.get(path);
    if (existing) {
      throw new ConfigurationError(`Output path ${path} is claimed by both ${existing.owner} and ${entry.owner}`);
    }
    this.entries.set(path, entry);
  }

  add(path: string, owner: string, content: () => Buffer): void {
    this.claim(path, { owner, content });
  }

  /**
   * Claim a path without writing it: the file reaches that location some other way.
   */
  reserve(path: string, owner: string): void {
    this.claim(path, { owner });
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  /** Written paths, sorted */
  paths(): string[] {
    return [...this.entries.entries()]
      .filter(([, entry]) => entry.content !== undefined)
      .map(([path]) => path)
      .sort(compareKeys);
  }

  private sortedFiles(): Array<[string, () => Buffer]> {
    const files: Array<[string, () => Buffer]> = [];
    for (const path of this.paths()) {
      const content = this.entries.get(path)?.content;
      if (content) {
        files.push([path, content]);
      }
    }
    return files;
  }

  /**
   * Entries in sorted order with a fixed timestamp: same layout, same bytes.
   */
  async toZip(): Promise<Buffer> {
    const zip = new JSZip();
    for (const [path, content] of this.sortedFiles()) {
      zip.file(path, content(), { date: ARCHIVE_TIMESTAMP, createFolders: false });
    }
    return zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      compressionOptions: { level: 9 },
      platform: "UNIX",
    });
  }

  writeDirectory(fs: FileSystem, root: string): void {
    fs.mkdir(root, { recursive: true });
    for (const [path, content] of this.sortedFiles()) {
      const target = join(root, ...path.split("/"));
      fs.mkdir(dirname(target), { recursive: true });
      fs.writeFileBinary(target, content());
    }
  }
}

function removePath(fs: FileSystem, path: string): void {
  if (!fs.exists(path)) return;
  if (fs.stat(path).isDirectory) {
    fs.rmdir(path, { recursive: true });
  } else {
    fs.unlink(path);
  }
}

/**
 * Build `finalPath` through a temporary sibling. The previous output, if any,
 * is replaced only once the new one is complete; the temporary path never
 * outlives the call.
 */
export function replaceAtomically(fs: FileSystem, finalPath: string, build: (tempPath: string) => void): void {
  const tempPath = join(dirname(finalPath), `.${basename(finalPath)}.partial-${randomUUID()}`);

  withFilesystem(finalPath, () => {
    fs.mkdir(dirname(finalPath), { recursive: true });
    try {
      build(tempPath);
      removePath(fs, finalPath);
      fs.rename(tempPath, finalPath);
    } finally {
      removePath(fs, tempPath);
    }
  });
}

export async function writeZipAtomically(fs: FileSystem, finalPath: string, layout: OutputLayout): Promise<void> {
  const archive = await layout.toZip();
  replaceAtomically(fs, finalPath, (tempPath) => fs.writeFileBinary(tempPath, archive));
}

export function writeDirectoryAtomically(fs: FileSystem, finalPath: string, layout: OutputLayout): void {
  replaceAtomically(fs, finalPath, (tempPath) => layout.writeDirectory(fs, tempPath));
}
