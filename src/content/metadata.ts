import matter from "gray-matter";
import { readFile } from "node:fs/promises";
import type { FileContent } from "./types";

const TRUTHY = new Set(["true", "yes", "on", "1"]);

/**
 * Front matter of a single document.
 *
 * Keeps the key order of the source file. The compiler adds derived keys
 * (resolved title and language, rendered content, stylesheet path) before the
 * mapping is handed to a template.
 */
export class FileMetadata {
  private data: Map<string, unknown>;

  constructor(entries: Record<string, unknown> = {}) {
    this.data = new Map(Object.entries(entries));
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  get(key: string): unknown {
    return this.data.get(key);
  }

  set(key: string, value: unknown): this {
    this.data.set(key, value);
    return this;
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  getString(key: string): string {
    const value = this.data.get(key);
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    return "";
  }

  getBool(key: string): boolean {
    const value = this.data.get(key);
    if (typeof value === "boolean") return value;
    if (typeof value === "string") return TRUTHY.has(value.trim().toLowerCase());
    return false;
  }

  getInt(key: string): number {
    const value = this.data.get(key);
    if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : 0;
    if (typeof value === "string") {
      const parsed = parseInt(value, 10);
      return isNaN(parsed) ? 0 : parsed;
    }
    return 0;
  }

  /**
   * Read a list value. Accepts a YAML sequence or a single string with
   * items separated by whitespace or commas ("cover-image, nav").
   */
  getList(key: string): string[] {
    const value = this.data.get(key);
    if (Array.isArray(value)) {
      return value
        .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
        .map(String);
    }
    if (typeof value === "string") {
      return value.split(/[\s,]+/).filter(Boolean);
    }
    return [];
  }
}

/**
 * Read a markdown file and split it into front matter and body
 */
export async function readFileMetadata(filePath: string): Promise<FileContent> {
  const raw = await readFile(filePath, "utf-8");
  const { data, content } = matter(raw);
  return {
    meta: new FileMetadata(data),
    body: content,
  };
}
