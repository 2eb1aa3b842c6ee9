/**
 * Google Drive v3 client for the import folder.
 *
 * CSV candidates are files with MIME type text/csv, any file named *.csv,
 * and Google Sheets (exported as CSV on download). Listing is ordered by
 * modifiedTime desc and follows nextPageToken.
 */

import { GoogleAuth } from "google-auth-library";
import type { Logger } from "pino";
import { z } from "zod";
import type { FetchLike } from "../catalog/types";
import type { CsvCandidate, StorageClient } from "./types";

const DRIVE_API_BASE = "https://www.googleapis.com/drive/v3";
export const DRIVE_READONLY_SCOPE = "https://www.googleapis.com/auth/drive.readonly";
export const SHEETS_MIME_TYPE = "application/vnd.google-apps.spreadsheet";
const CSV_MIME_TYPE = "text/csv";
const PAGE_SIZE = 100;

const DriveFileSchema = z.object({
  id: z.string(),
  name: z.string(),
  mimeType: z.string().default(""),
  modifiedTime: z.string().optional(),
});

const DriveFileListSchema = z.object({
  files: z.array(DriveFileSchema).default([]),
  nextPageToken: z.string().optional(),
});

export type DriveFile = z.infer<typeof DriveFileSchema>;

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export interface DriveClientOptions {
  timeoutMs: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

/** Access tokens for a service-account key file, read-only Drive scope. */
export function serviceAccountTokenProvider(keyFile: string): AccessTokenProvider {
  const auth = new GoogleAuth({ keyFile, scopes: [DRIVE_READONLY_SCOPE] });
  return {
    async getAccessToken(): Promise<string> {
      const token = await auth.getAccessToken();
      if (!token) {
        throw new Error(`No access token issued for credentials ${keyFile}`);
      }
      return token;
    },
  };
}

export const isCsvCandidate = (file: DriveFile): boolean =>
  file.mimeType === CSV_MIME_TYPE ||
  file.name.toLowerCase().endsWith(".csv") ||
  file.mimeType === SHEETS_MIME_TYPE;

const escapeQueryValue = (value: string): string => value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");

export class DriveClient implements StorageClient {
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly tokens: AccessTokenProvider,
    logger: Logger,
    private readonly options: DriveClientOptions,
  ) {
    this.logger = logger.child({ service: "DriveClient" });
    this.baseUrl = (options.baseUrl ?? DRIVE_API_BASE).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Every non-trashed file in the folder, newest first. */
  async listFiles(folderId: string): Promise<DriveFile[]> {
    const files: DriveFile[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${this.baseUrl}/files`);
      url.searchParams.set("q", `'${escapeQueryValue(folderId)}' in parents and trashed=false`);
      url.searchParams.set("orderBy", "modifiedTime desc");
      url.searchParams.set("pageSize", String(PAGE_SIZE));
      url.searchParams.set("fields", "nextPageToken, files(id,name,mimeType,modifiedTime)");
      url.searchParams.set("supportsAllDrives", "true");
      url.searchParams.set("includeItemsFromAllDrives", "true");
      if (pageToken) url.searchParams.set("pageToken", pageToken);

      const response = await this.request(url.toString());
      const parsed = DriveFileListSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Drive returned an unexpected file list for folder ${folderId}`);
      }

      files.push(...parsed.data.files);
      pageToken = parsed.data.nextPageToken;
    } while (pageToken);

    this.logger.debug({ folderId, files: files.length }, "Listed Drive folder");
    return files;
  }

  async listCsvCandidates(folderId: string): Promise<CsvCandidate[]> {
    const files = await this.listFiles(folderId);
    return files.filter(isCsvCandidate).map((file) => ({
      id: file.id,
      name: file.name,
      mimeType: file.mimeType,
      modifiedTime: new Date(file.modifiedTime ?? Number.NaN),
    }));
  }

  async download(candidate: CsvCandidate): Promise<Buffer> {
    const fileId = encodeURIComponent(candidate.id);
    const exportUrl = `${this.baseUrl}/files/${fileId}/export?mimeType=${encodeURIComponent(CSV_MIME_TYPE)}`;

    if (candidate.mimeType === SHEETS_MIME_TYPE) {
      return this.fetchBytes(exportUrl);
    }

    try {
      return await this.fetchBytes(`${this.baseUrl}/files/${fileId}?alt=media&supportsAllDrives=true`);
    } catch (error) {
      // Some Drive-native files only support export.
      this.logger.warn({ err: error, fileId: candidate.id, name: candidate.name }, "Drive media download failed; trying export");
      try {
        return await this.fetchBytes(exportUrl);
      } catch {
        throw error;
      }
    }
  }

  private async fetchBytes(url: string): Promise<Buffer> {
    const response = await this.request(url);
    return Buffer.from(await response.arrayBuffer());
  }

  private async request(url: string): Promise<Response> {
    const token = await this.tokens.getAccessToken();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Authorization: `Bearer ${token}` },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Drive API returned ${response.status}: ${response.statusText}`);
      }
      return response;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Drive API timeout after ${this.options.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
