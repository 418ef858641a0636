import type { ContentType } from "../epub/types";
import type { FileMetadata } from "./metadata";

export interface NavigationItem {
  /** Resolved title (front matter title or the untitled placeholder) */
  readonly title: string;
  /** Front matter subtitle, empty when absent */
  readonly subtitle: string;
  /** Nesting level from front matter, 0 when absent */
  readonly level: number;
  /** Output filename inside the publication (e.g. part-1/chapter.xhtml) */
  readonly filename: string;
  /** Whether the page is in the linear reading order */
  readonly contentType: ContentType;
}

/** Table of contents in traversal discovery order */
export type Navigation = readonly NavigationItem[];

export interface FileContent {
  /** Parsed frontmatter */
  meta: FileMetadata;
  /** Markdown body without frontmatter */
  body: string;
}

export interface PublicationMetadata {
  identifier: string;
  title: string;
  subtitle?: string;
  /** Declared languages; the first one is the publication language */
  language: string[];
  creator?: string[];
  publisher?: string;
  description?: string;
  rights?: string;
  date?: string;
  subject?: string[];
}
