import { join, posix } from "node:path";
import { readFileMetadata } from "../content/metadata";
import type { ContentType } from "../epub/types";
import { renderMarkdown } from "../render/markdown";
import { CONTENT_KEY, STYLESHEET_KEY, XML_HEADER } from "../render/templates";
import type { CompileContext } from "./context";
import { normalize } from "./normalize";

/** Title used when a document has none */
export const UNTITLED = "* * *";

export const PAGE_EXTENSION = ".xhtml";

/**
 * Replace the source extension with .xhtml
 * e.g. "part-1/intro.md" -> "part-1/intro.xhtml"
 */
export function outputFilename(path: string): string {
  const ext = posix.extname(path);
  return path.slice(0, path.length - ext.length) + PAGE_EXTENSION;
}

export class DocumentProcessor {
  constructor(private context: CompileContext) {}

  /**
   * Compile one markdown file into a page of the publication.
   * Any failure rejects and aborts the whole compile.
   */
  async process(path: string): Promise<string> {
    const { config, navigation, stylesheet, templates, writer } = this.context;
    const { meta, body } = await readFileMetadata(join(this.context.rootPath, path));

    const lang = meta.getString("lang") || this.context.language;
    meta.set("lang", lang);

    const title = meta.getString("title") || UNTITLED;
    meta.set("title", title);

    const contentType: ContentType = meta.getBool("hidden") ? "auxiliary" : "primary";

    if (stylesheet) {
      meta.set(STYLESHEET_KEY, posix.relative(posix.dirname(path), stylesheet));
    }

    const html = await renderMarkdown(body, {
      extensions: config.markdown,
      theme: config.highlightTheme,
    });
    meta.set(CONTENT_KEY, normalize(html));

    // "cover-image" only applies to media; on a page it means "cover"
    const properties = meta
      .getList("properties")
      .map((property) => (property === "cover-image" ? "cover" : property));

    let template: "page" | "nav" = "page";
    if (properties.includes("nav")) {
      template = "nav";
      if (!navigation.declareNav()) {
        console.warn(`Warning: ${path} declares the nav role, but an earlier document already did`);
      }
    }

    const page = XML_HEADER + templates[template](meta);
    const filename = outputFilename(path);

    navigation.add({
      title,
      subtitle: meta.getString("subtitle"),
      level: meta.getInt("level"),
      filename,
      contentType,
    });

    await writer.add(filename, contentType, page, ...properties);
    return filename;
  }
}
