import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { PublicationMetadata } from "../src/content/types";
import type { ArchiveWriter, ContentType } from "../src/epub/types";

export const METADATA_YAML = "title: Test Book\nlanguage:\n  - ru\n  - en\nidentifier: urn:test:book\n";

/**
 * Create a temporary directory containing the given files
 */
export async function createTree(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "quire-test-"));
  for (const [path, content] of Object.entries(files)) {
    const filePath = join(root, path);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export interface RecordedEntry {
  name: string;
  contentType: ContentType;
  properties: string[];
  data?: string;
  sourcePath?: string;
}

/**
 * In-memory archive writer that records every call
 */
export class RecordingWriter implements ArchiveWriter {
  metadata: PublicationMetadata | null = null;
  entries: RecordedEntry[] = [];
  closeCount = 0;

  async add(name: string, contentType: ContentType, data: string | Uint8Array, ...properties: string[]) {
    this.entries.push({
      name,
      contentType,
      properties,
      data: typeof data === "string" ? data : Buffer.from(data).toString("utf-8"),
    });
  }

  async addFile(sourcePath: string, destName: string, contentType: ContentType, ...properties: string[]) {
    this.entries.push({ name: destName, contentType, properties, sourcePath });
  }

  async close() {
    this.closeCount++;
  }

  entry(name: string): RecordedEntry | undefined {
    return this.entries.find((entry) => entry.name === name);
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }
}
