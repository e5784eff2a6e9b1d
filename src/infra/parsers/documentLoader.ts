import { promises as fs } from "node:fs";
import path from "node:path";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".markdown", ".txt"]);

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  assertSupported(filePath);
  const content = await fs.readFile(filePath, "utf-8");
  return normalizeText(content);
}

function assertSupported(sourceName: string): void {
  if (!isSupportedDocumentExtension(sourceName)) {
    throw new Error(
      `Unsupported extension: ${path.extname(sourceName) || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }
}
