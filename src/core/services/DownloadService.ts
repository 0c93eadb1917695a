/**
 * HTTP download through undici.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fetch } from "undici";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export interface DownloadResult {
  readonly status: number;
  readonly bytes: number;
}

export interface DownloadService {
  download(url: string, destPath: string): Promise<DownloadResult>;
}

export class UndiciDownloader implements DownloadService {
  async download(url: string, destPath: string): Promise<DownloadResult> {
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new WorkflowError(
        `Request to ${url} failed`,
        ErrorCode.DOWNLOAD_FAILED,
        { url, reason: cause.message },
        undefined,
        "Check the URL and the network connection.",
        cause,
      );
    }

    if (!response.ok) {
      throw new WorkflowError(
        `Request to ${url} returned HTTP ${response.status}`,
        ErrorCode.DOWNLOAD_FAILED,
        { url, status: response.status },
      );
    }

    const body = Buffer.from(await response.arrayBuffer());
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.writeFile(destPath, body);
    return { status: response.status, bytes: body.length };
  }
}
