import { promises as fs, type Dirent } from "fs";
import { extname, join, relative, sep } from "path";
import { imageSize } from "image-size";
import mammoth from "mammoth";
import { extractText, getDocumentProxy } from "unpdf";
import type {
  ExtractionResult,
  ExtractionWarning,
  FileEntry,
  FileType,
} from "./types.js";

export const DEFAULT_PREVIEW_LENGTH = 500;

const TYPE_BY_EXTENSION: Record<string, FileType> = {
  ".pdf": "PDF",
  ".docx": "DOCX",
  ".txt": "TXT",
  ".md": "MD",
  ".markdown": "MD",
  ".png": "IMAGE",
  ".jpg": "IMAGE",
  ".jpeg": "IMAGE",
  ".gif": "IMAGE",
  ".webp": "IMAGE",
};

export interface ExtractOptions {
  depth: number;
  previewLength?: number;
}

export function detectFileType(filePath: string): FileType | "unsupported" {
  return TYPE_BY_EXTENSION[extname(filePath).toLowerCase()] ?? "unsupported";
}

// collapse whitespace so previews stay on one line in the prompt.
export function toPreview(text: string, maxLength: number): string {
  return text.replace(/\s+/g, " ").trim().slice(0, maxLength);
}

async function readPdfText(filePath: string): Promise<string> {
  const data = await fs.readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(data));
  try {
    const { text } = await extractText(pdf, { mergePages: true });
    return text;
  } finally {
    await pdf.destroy();
  }
}

async function readDocxText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

async function describeImage(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  const { width, height, type } = imageSize(buffer);
  if (width === undefined || height === undefined) {
    throw new Error("Image dimensions could not be read");
  }
  return `${(type ?? "unknown").toUpperCase()} image, ${width}x${height} px`;
}

export async function readFileText(
  filePath: string,
  type: FileType
): Promise<string> {
  switch (type) {
    case "PDF":
      return readPdfText(filePath);
    case "DOCX":
      return readDocxText(filePath);
    case "IMAGE":
      return describeImage(filePath);
    case "TXT":
    case "MD":
      return fs.readFile(filePath, "utf-8");
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Walk `root` up to `depth` levels and build a preview for every supported
 * file. Depth 1 covers the files directly inside `root`.
 *
 * A file that cannot be read still gets an entry (with an empty preview) and a
 * warning; unsupported files, hidden entries and symlinks are skipped.
 */
export async function extractDirectory(
  root: string,
  options: ExtractOptions
): Promise<ExtractionResult> {
  const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
  const entries: FileEntry[] = [];
  const warnings: ExtractionWarning[] = [];

  const toRelative = (absolutePath: string) =>
    relative(root, absolutePath).split(sep).join("/");

  async function visit(dir: string, level: number): Promise<void> {
    let children: Dirent[];
    try {
      children = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root) throw err;
      warnings.push({
        path: toRelative(dir),
        message: `Directory could not be read: ${errorMessage(err)}`,
      });
      return;
    }

    children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const child of children) {
      if (child.name.startsWith(".")) continue;
      const childPath = join(dir, child.name);

      if (child.isDirectory()) {
        if (level < options.depth) await visit(childPath, level + 1);
        continue;
      }
      if (!child.isFile()) continue;

      const type = detectFileType(child.name);
      if (type === "unsupported") continue;

      const path = toRelative(childPath);
      let size = 0;
      let preview = "";
      try {
        size = (await fs.stat(childPath)).size;
        preview = toPreview(await readFileText(childPath, type), previewLength);
      } catch (err) {
        warnings.push({
          path,
          message: `Could not extract ${type} content: ${errorMessage(err)}`,
        });
      }
      entries.push({ path, type, size, preview });
    }
  }

  await visit(root, 1);
  return { entries, warnings };
}
