export interface CsvCandidate {
  id: string;
  name: string;
  mimeType: string;
  modifiedTime: Date;
}

/** Cloud folder that holds inventory CSVs. */
export interface StorageClient {
  listCsvCandidates(folderId: string): Promise<CsvCandidate[]>;
  download(candidate: CsvCandidate): Promise<Buffer>;
}

export type SourceRequest = { kind: "local"; path: string } | { kind: "folder"; folderId: string };

export interface ResolvedSource {
  origin: SourceRequest["kind"];
  name: string;
  content: Buffer;
}
