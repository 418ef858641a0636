import { Marked, type Tokens } from "marked";
import { escapeCode, highlightCode } from "./highlight";

export interface RenderOptions {
  /** Source extensions whose links are rewritten to .xhtml */
  extensions: string[];
  /** Shiki theme for fenced code blocks */
  theme: string;
}

interface PendingCodeBlock {
  placeholder: string;
  code: string;
  lang: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Point links to other documents at their compiled pages
 * e.g. "part-2/intro.md#start" -> "part-2/intro.xhtml#start"
 */
export function resolveLink(href: string, extensions: string[]): string {
  // External links (http:, mailto:, ...) - leave unchanged
  if (/^[a-z][a-z0-9+.-]*:/i.test(href)) {
    return href;
  }

  // Anchor links - leave unchanged
  if (href.startsWith("#")) {
    return href;
  }

  const [path, ...rest] = href.split("#");
  const anchor = rest.length > 0 ? `#${rest.join("#")}` : "";
  const pattern = new RegExp(`(${extensions.map(escapeRegExp).join("|")})$`, "i");

  if (extensions.length === 0 || !pattern.test(path)) {
    return href;
  }

  return path.replace(pattern, ".xhtml") + anchor;
}

/**
 * Generate a slug from heading text for anchor links
 */
function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\w\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .trim();
}

function escapeAttribute(value: string): string {
  return escapeCode(value).replace(/"/g, "&quot;");
}

/**
 * Create a configured Marked instance along with the code blocks it
 * defers for asynchronous highlighting
 */
export function createMarkdownRenderer(options: RenderOptions): {
  marked: Marked;
  codeBlocks: PendingCodeBlock[];
} {
  const marked = new Marked();
  const codeBlocks: PendingCodeBlock[] = [];
  let blockCounter = 0;
  // Heading ids must be unique within one page
  const headingIds = new Set<string>();

  marked.use({
    renderer: {
      // Highlighting is async, so leave a placeholder for now
      code({ text, lang }: Tokens.Code): string {
        const placeholder = `__CODE_BLOCK_${blockCounter++}__`;
        codeBlocks.push({ placeholder, code: text, lang: lang || "plaintext" });
        return `${placeholder}\n`;
      },

      link({ href, title, tokens }: Tokens.Link): string {
        const resolvedHref = resolveLink(href, options.extensions);
        const text = this.parser.parseInline(tokens);
        const titleAttr = title ? ` title="${escapeAttribute(title)}"` : "";
        return `<a href="${escapeAttribute(resolvedHref)}"${titleAttr}>${text}</a>`;
      },

      heading({ tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);
        const slug = slugify(text);
        if (!slug) {
          return `<h${depth}>${text}</h${depth}>\n`;
        }
        let id = slug;
        for (let n = 1; headingIds.has(id); n++) {
          id = `${slug}-${n}`;
        }
        headingIds.add(id);
        return `<h${depth} id="${id}">${text}</h${depth}>\n`;
      },
    },
  });

  return { marked, codeBlocks };
}

/**
 * Render markdown to HTML
 */
export async function renderMarkdown(
  markdown: string,
  options: RenderOptions
): Promise<string> {
  const { marked, codeBlocks } = createMarkdownRenderer(options);
  let html = await marked.parse(markdown);

  // Process code blocks with syntax highlighting
  for (const block of codeBlocks) {
    const highlighted = await highlightCode(block.code, block.lang, options.theme);
    html = html.replace(block.placeholder, () => highlighted);
  }

  return html;
}
