import { existsSync, readdirSync } from "node:fs";
import { copyFile, mkdir, mkdtemp, readFile, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, parse as parsePath, relative } from "node:path";
import AdmZip from "adm-zip";
import { loadTemplates, renderWechatHtml, type TemplateSet } from "md2wechat-converter";

import { UploadError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export interface UserMeta {
  email?: string;
  wechat?: string;
}

export interface ProcessOptions {
  /** Parent of the per-upload work directory. Defaults to the OS temp dir. */
  workRoot?: string;
  templatesDir?: string;
  templates?: TemplateSet;
  now?: Date;
  logger?: Logger;
}

export interface ProcessResult {
  workDir: string;
  outDir: string;
  mdFiles: string[];
  htmlFiles: string[];
  metaPath: string;
  folderName: string;
  timestamp: string;
  originalFilePath: string;
}

export interface UploadMeta {
  user: UserMeta;
  timestamp: string;
  original_file_name: string;
  md_files: string[];
  html_files: string[];
}

export async function processUpload(
  originalFilePath: string,
  userMeta: UserMeta,
  options: ProcessOptions = {},
): Promise<ProcessResult> {
  const log = options.logger ?? defaultLogger;
  if (!existsSync(originalFilePath) || !(await stat(originalFilePath)).isFile()) {
    throw new UploadError(`Upload not found: ${originalFilePath}`, originalFilePath);
  }

  const workRoot = options.workRoot ?? tmpdir();
  await mkdir(workRoot, { recursive: true });
  const workDir = await mkdtemp(join(workRoot, "wxblog_"));
  const uploadsDir = join(workDir, "uploads");
  const outDir = join(workDir, "out");
  await mkdir(uploadsDir, { recursive: true });
  await mkdir(outDir, { recursive: true });

  const sourceName = basename(originalFilePath);
  let mdPaths: string[] = [];
  if (sourceName.toLowerCase().endsWith(".zip")) {
    new AdmZip(originalFilePath).extractAllTo(uploadsDir, true);
    mdPaths = listMarkdownFiles(uploadsDir);
  } else {
    const destination = join(uploadsDir, safeFilename(sourceName));
    await copyFile(originalFilePath, destination);
    if (isMarkdownFile(sourceName)) {
      mdPaths = [destination];
    }
  }
  log.debug(`Found ${mdPaths.length} markdown file(s) in ${sourceName}`);

  const htmlFiles: string[] = [];
  if (mdPaths.length > 0) {
    const templates = options.templates ?? loadTemplates(options.templatesDir);
    for (const mdPath of mdPaths) {
      const markdown = await readFile(mdPath, "utf-8");
      const html = renderWechatHtml(markdown, { templates });
      const htmlPath = join(outDir, `${parsePath(mdPath).name}.html`);
      await writeFile(htmlPath, html, "utf-8");
      htmlFiles.push(htmlPath);
      log.debug(`Converted ${relative(workDir, mdPath)} -> ${relative(workDir, htmlPath)}`);
    }
  }

  const timestamp = formatTimestamp(options.now ?? new Date());
  const meta: UploadMeta = {
    user: userMeta,
    timestamp,
    original_file_name: sourceName,
    md_files: mdPaths.map((path) => relative(workDir, path)),
    html_files: htmlFiles.map((path) => relative(workDir, path)),
  };
  const metaPath = join(workDir, "meta.json");
  await writeFile(metaPath, JSON.stringify(meta, null, 2), "utf-8");
  log.info(`Processed ${sourceName}: ${htmlFiles.length} html file(s) in ${workDir}`);

  return {
    workDir,
    outDir,
    mdFiles: mdPaths,
    htmlFiles,
    metaPath,
    folderName: folderNameFor(timestamp, userMeta),
    timestamp,
    originalFilePath,
  };
}

export function listMarkdownFiles(dirPath: string): string[] {
  const allPaths: string[] = [];
  function recursiveRead(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        recursiveRead(join(currentDir, entry.name));
      } else if (entry.isFile() && isMarkdownFile(entry.name)) {
        allPaths.push(join(currentDir, entry.name));
      }
    }
  }
  recursiveRead(dirPath);
  return allPaths.sort();
}

function isMarkdownFile(name: string): boolean {
  return name.toLowerCase().endsWith(".md");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function folderNameFor(timestamp: string, userMeta: UserMeta): string {
  return `${timestamp}_${(userMeta.email || "unknown").replace(/@/g, "_")}`;
}

export function safeFilename(name: string): string {
  return name.replace(/ /g, "_").replace(/[^\p{L}\p{N}_.-]/gu, "_");
}
