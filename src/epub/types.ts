import type { PublicationMetadata } from "../content/types";

/**
 * How an entry takes part in the publication:
 * - primary: in the spine, linear reading order
 * - auxiliary: in the spine with linear="no"
 * - media: manifest only (images, fonts, stylesheets)
 */
export type ContentType = "primary" | "auxiliary" | "media";

export interface ArchiveWriter {
  /** Must be assigned before the writer is closed */
  metadata: PublicationMetadata | null;

  /** Add an entry from memory */
  add(
    name: string,
    contentType: ContentType,
    data: string | Uint8Array,
    ...properties: string[]
  ): Promise<void>;

  /** Copy a file from disk into the publication unchanged */
  addFile(
    sourcePath: string,
    destName: string,
    contentType: ContentType,
    ...properties: string[]
  ): Promise<void>;

  /** Finalize the package and release the output file */
  close(): Promise<void>;
}
