import type { CsvCandidate, StorageClient } from "../../services/source/types";

/** Folder listing + downloads served from memory. */
export class MockStorageClient implements StorageClient {
  readonly downloads: string[] = [];

  constructor(
    private readonly candidates: CsvCandidate[],
    private readonly contents: Record<string, string> = {},
  ) {}

  async listCsvCandidates(_folderId: string): Promise<CsvCandidate[]> {
    return [...this.candidates];
  }

  async download(candidate: CsvCandidate): Promise<Buffer> {
    this.downloads.push(candidate.id);
    return Buffer.from(this.contents[candidate.id] ?? "", "utf8");
  }
}

export const candidate = (id: string, modifiedTime: string, name = `${id}.csv`): CsvCandidate => ({
  id,
  name,
  mimeType: "text/csv",
  modifiedTime: new Date(modifiedTime),
});
