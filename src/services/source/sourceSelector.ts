import fs from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { ConfigError, SourceNotFoundError } from "../../domain/errors";
import type { CsvCandidate, ResolvedSource, SourceRequest, StorageClient } from "./types";

const timestampOf = (candidate: CsvCandidate): number => {
  const value = candidate.modifiedTime.getTime();
  return Number.isNaN(value) ? Number.NEGATIVE_INFINITY : value;
};

/**
 * Newest candidate by modification time. Ties keep the earliest entry in the
 * listing, so the result is stable for a given listing order.
 */
export function pickNewest(candidates: readonly CsvCandidate[]): CsvCandidate | undefined {
  let newest: CsvCandidate | undefined;
  for (const candidate of candidates) {
    if (!newest || timestampOf(candidate) > timestampOf(newest)) {
      newest = candidate;
    }
  }
  return newest;
}

export class SourceSelector {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly storage?: StorageClient,
  ) {
    this.logger = logger.child({ service: "SourceSelector" });
  }

  async select(request: SourceRequest): Promise<ResolvedSource> {
    if (request.kind === "local") {
      return this.readLocal(request.path);
    }
    return this.downloadNewest(request.folderId);
  }

  private async readLocal(filePath: string): Promise<ResolvedSource> {
    const absolutePath = path.resolve(process.cwd(), filePath);
    if (!fs.existsSync(absolutePath) || !fs.statSync(absolutePath).isFile()) {
      throw new SourceNotFoundError(`Local CSV not found: ${absolutePath}`);
    }

    const content = await readFile(absolutePath);
    this.logger.info({ path: absolutePath, bytes: content.length }, "Read local CSV");
    return { origin: "local", name: path.basename(absolutePath), content };
  }

  private async downloadNewest(folderId: string): Promise<ResolvedSource> {
    if (!this.storage) {
      throw new ConfigError("Folder sources need storage credentials (--credentials)");
    }

    const candidates = await this.storage.listCsvCandidates(folderId);
    const newest = pickNewest(candidates);
    if (!newest) {
      throw new SourceNotFoundError(`No CSV found in folder ${folderId}`);
    }

    this.logger.info(
      {
        folderId,
        candidates: candidates.length,
        fileId: newest.id,
        name: newest.name,
        modifiedTime: Number.isFinite(timestampOf(newest)) ? newest.modifiedTime.toISOString() : null,
      },
      "Selected newest CSV",
    );

    const content = await this.storage.download(newest);
    return { origin: "folder", name: newest.name, content };
  }
}
