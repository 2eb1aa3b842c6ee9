#!/usr/bin/env tsx
/**
 * List what the service account can see in a Drive folder.
 *
 * Usage:
 *   npm run list-drive-files -- --credentials sa.json --folder-id FOLDER_ID
 *
 * --credentials and --folder-id fall back to GOOGLE_APPLICATION_CREDENTIALS
 * and DRIVE_FOLDER_ID.
 */

import { parseArgs } from "node:util";
import { createLogger } from "../src/app/context";
import { loadRuntimeConfig } from "../src/config";
import { DriveClient, isCsvCandidate, serviceAccountTokenProvider } from "../src/services/source/driveClient";

async function main() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      credentials: { type: "string" },
      "folder-id": { type: "string" },
    },
  });

  const config = loadRuntimeConfig();
  const credentials = values.credentials ?? config.drive.credentialsPath;
  const folderId = values["folder-id"] ?? config.drive.folderId;
  if (!credentials || !folderId) {
    console.error("Usage: list_drive_files --credentials <file> --folder-id <id>");
    process.exitCode = 2;
    return;
  }

  const logger = createLogger(config.logLevel);
  const drive = new DriveClient(serviceAccountTokenProvider(credentials), logger, {
    timeoutMs: config.drive.timeoutMs,
  });

  const files = await drive.listFiles(folderId);
  if (files.length === 0) {
    console.log("No files visible in folder (the service account may lack access, or the folder id is wrong).");
    return;
  }

  console.log(`Found ${files.length} files:`);
  for (const file of files) {
    const marker = isCsvCandidate(file) ? "*" : " ";
    console.log(
      `${marker} id=${file.id} name=${file.name} mimeType=${file.mimeType} modifiedTime=${file.modifiedTime ?? "unknown"}`,
    );
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
