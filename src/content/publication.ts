import { load } from "js-yaml";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { PublicationMetadata } from "./types";

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

const publicationSchema = z.object({
  identifier: z.string().min(1).optional(),
  title: z.string().min(1),
  subtitle: z.string().optional(),
  language: stringList.refine((langs) => langs.length > 0, {
    message: "at least one language is required",
  }),
  creator: stringList.optional(),
  publisher: z.string().optional(),
  description: z.string().optional(),
  rights: z.string().optional(),
  // YAML turns bare dates into Date objects
  date: z
    .union([z.string(), z.date()])
    .transform((value) => (typeof value === "string" ? value : value.toISOString().slice(0, 10)))
    .optional(),
  subject: stringList.optional(),
});

/**
 * Validate a parsed metadata document
 */
export function parsePublicationMetadata(
  value: unknown,
  source: string
): PublicationMetadata {
  const result = publicationSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid publication metadata in ${source}: ${issues}`);
  }

  return {
    ...result.data,
    identifier: result.data.identifier ?? `urn:uuid:${uuidv4()}`,
  };
}

export interface LoadedPublication {
  metadata: PublicationMetadata;
  /** Path of the metadata file relative to the source root */
  filename: string;
}

/**
 * Load publication metadata from the first candidate file found in the root.
 * JSON files go through the same YAML loader.
 */
export async function loadPublicationMetadata(
  rootPath: string,
  candidates: string[]
): Promise<LoadedPublication> {
  for (const filename of candidates) {
    const filePath = join(rootPath, filename);
    if (!existsSync(filePath)) continue;

    const raw = await readFile(filePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = load(raw, { filename });
    } catch (e) {
      throw new Error(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }

    return { metadata: parsePublicationMetadata(parsed, filename), filename };
  }

  throw new Error(
    `No publication metadata found in ${rootPath} (looked for ${candidates.join(", ")})`
  );
}
