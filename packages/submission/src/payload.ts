import { existsSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";
import AdmZip from "adm-zip";

import type { ProcessResult, UserMeta } from "./processor";

export interface SubmissionManifest {
  wechat: string;
  email: string;
  original_filename: string;
  folder_name: string;
  timestamp: string;
  html_files: string[];
}

/**
 * Packs `out/<name>.html`, `meta.json` and `uploads/<original name>` into
 * `<workDir>/payload.zip`. Files that no longer exist are left out.
 */
export function buildPayloadZip(result: ProcessResult): string {
  const zipPath = join(result.workDir, "payload.zip");
  const zip = new AdmZip();
  for (const htmlPath of result.htmlFiles) {
    if (existsSync(htmlPath)) {
      zip.addFile(`out/${basename(htmlPath)}`, readFileSync(htmlPath));
    }
  }
  if (existsSync(result.metaPath)) {
    zip.addFile("meta.json", readFileSync(result.metaPath));
  }
  if (existsSync(result.originalFilePath)) {
    zip.addFile(`uploads/${basename(result.originalFilePath)}`, readFileSync(result.originalFilePath));
  }
  zip.writeZip(zipPath);
  return zipPath;
}

export function buildManifest(result: ProcessResult, userMeta: UserMeta): SubmissionManifest {
  return {
    wechat: userMeta.wechat ?? "",
    email: userMeta.email ?? "",
    original_filename: basename(result.originalFilePath),
    folder_name: result.folderName,
    timestamp: result.timestamp,
    html_files: result.htmlFiles.map((path) => `out/${basename(path)}`),
  };
}
