import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { normalizeText } from "../../utils/text.js";

const execFileAsync = promisify(execFile);
const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf"]);

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".md" || ext === ".txt") {
    const content = await fs.readFile(filePath, "utf-8");
    return normalizeText(content);
  }

  if (ext === ".pdf") {
    return loadPdfText(filePath);
  }

  throw new Error(
    `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
  );
}

async function loadPdfText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);

  let libraryError: unknown = null;
  try {
    const text = await parsePdfWithLibrary(buffer);
    if (text) {
      return text;
    }
  } catch (error) {
    libraryError = error;
  }

  const viaPdftotext = await tryParsePdfWithPdftotext(filePath);
  if (viaPdftotext) {
    return viaPdftotext;
  }

  throw new Error(
    libraryError instanceof Error
      ? `PDF text extraction failed for ${filePath}: ${libraryError.message}`
      : `PDF ${filePath} contains no extractable text.`,
    { cause: libraryError ?? undefined },
  );
}

async function parsePdfWithLibrary(buffer: Buffer): Promise<string> {
  // Loaded lazily: the PDF stack is heavy and only needed for .pdf corpora.
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data: buffer });
  try {
    const parsed = await parser.getText();
    return normalizeText(parsed.text);
  } finally {
    await parser.destroy();
  }
}

async function tryParsePdfWithPdftotext(filePath: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    const text = normalizeText(stdout);
    return text || null;
  } catch {
    // pdftotext is optional; absence just means no fallback.
    return null;
  }
}
