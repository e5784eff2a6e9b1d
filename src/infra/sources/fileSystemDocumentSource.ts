import { promises as fs } from "node:fs";
import path from "node:path";
import { DocumentSource } from "../../domain/ports.js";
import { DocumentRecord } from "../../domain/types.js";
import { isSupportedDocumentExtension, loadDocumentText } from "../parsers/documentLoader.js";

/**
 * Treats a directory tree as the source of truth for the corpus. Document ids
 * are paths relative to the root, with `/` separators on every platform.
 */
export class FileSystemDocumentSource implements DocumentSource {
  readonly description: string;

  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.description = `file://${this.rootDir}`;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    const files = await this.walk(this.rootDir);
    const documents: DocumentRecord[] = [];

    for (const filePath of files) {
      const [text, stat] = await Promise.all([loadDocumentText(filePath), fs.stat(filePath)]);
      const id = path.relative(this.rootDir, filePath).split(path.sep).join("/");
      documents.push({
        id,
        text,
        metadata: {
          path: id,
          extension: path.extname(filePath).toLowerCase(),
          size_bytes: stat.size,
        },
      });
    }

    return documents;
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const names = entries.map((entry) => entry.name).sort();
    const byName = new Map(entries.map((entry) => [entry.name, entry]));
    const files: string[] = [];

    for (const name of names) {
      const entry = byName.get(name);
      if (!entry || name.startsWith(".")) {
        continue;
      }
      const fullPath = path.join(dir, name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile() && isSupportedDocumentExtension(name)) {
        files.push(fullPath);
      }
    }

    return files;
  }
}
