/**
 * Archive extraction for `.zip`, `.tar`, `.tar.gz` and `.tgz` files.
 *
 * Zip files are read with jszip, tar files with tar. Entries that would
 * land outside the destination folder are rejected.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import JSZip from "jszip";
import * as tar from "tar";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export interface ArchiveService {
  /** Extensions (lower case, with leading dot) the service can extract */
  readonly extensions: readonly string[];

  extract(archivePath: string, destDir: string): Promise<void>;
}

type ArchiveKind = "zip" | "tar";

const KIND_BY_SUFFIX: ReadonlyArray<readonly [string, ArchiveKind]> = [
  [".zip", "zip"],
  [".tar.gz", "tar"],
  [".tgz", "tar"],
  [".tar", "tar"],
];

export function archiveKindOf(archivePath: string): ArchiveKind | undefined {
  const lower = archivePath.toLowerCase();
  return KIND_BY_SUFFIX.find(([suffix]) => lower.endsWith(suffix))?.[1];
}

/**
 * True for `root` itself and anything below it. `..data` is a child;
 * `..` and `../data` are not.
 */
function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function unsafeEntry(entryPath: string, archivePath: string): WorkflowError {
  return new WorkflowError(
    `Archive entry "${entryPath}" resolves outside the destination folder`,
    ErrorCode.ARCHIVE_EXTRACT_FAILED,
    { archivePath, entry: entryPath },
  );
}

export class ArchiveExtractor implements ArchiveService {
  readonly extensions = KIND_BY_SUFFIX.map(([suffix]) => suffix);

  async extract(archivePath: string, destDir: string): Promise<void> {
    const kind = archiveKindOf(archivePath);
    if (!kind) {
      throw new WorkflowError(
        `Unsupported archive type: ${path.basename(archivePath)}`,
        ErrorCode.ARCHIVE_UNSUPPORTED,
        { archivePath },
        undefined,
        `Supported extensions: ${this.extensions.join(", ")}`,
      );
    }

    const root = path.resolve(destDir);
    await fs.mkdir(root, { recursive: true });

    try {
      if (kind === "zip") {
        await this.extractZip(archivePath, root);
      } else {
        await this.extractTar(archivePath, root);
      }
    } catch (error) {
      if (error instanceof WorkflowError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new WorkflowError(
        `Failed to extract ${path.basename(archivePath)}`,
        ErrorCode.ARCHIVE_EXTRACT_FAILED,
        { archivePath, destDir: root, reason: cause.message },
        undefined,
        undefined,
        cause,
      );
    }
  }

  private async extractZip(archivePath: string, root: string): Promise<void> {
    const zip = await JSZip.loadAsync(await fs.readFile(archivePath));

    for (const entry of Object.values(zip.files)) {
      const target = path.resolve(root, entry.name);
      if (!isInside(root, target)) {
        throw unsafeEntry(entry.name, archivePath);
      }
      if (target === root) {
        continue;
      }
      if (entry.dir) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await entry.async("nodebuffer"));
    }
  }

  private async extractTar(archivePath: string, root: string): Promise<void> {
    await tar.x({
      file: archivePath,
      cwd: root,
      strict: true,
      preservePaths: false,
      filter: (entryPath) => {
        const target = path.resolve(root, entryPath);
        if (!isInside(root, target)) {
          throw unsafeEntry(entryPath, archivePath);
        }
        return target !== root;
      },
    });
  }
}
