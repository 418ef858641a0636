import type { FileMetadata } from "../content/metadata";
import type { Navigation, NavigationItem } from "../content/types";

/** Front matter key that carries the rendered, normalized body */
export const CONTENT_KEY = "content";

/** Front matter key that carries the stylesheet path relative to the page */
export const STYLESHEET_KEY = "_stylesheet_";

export const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>\n';

export interface Templates {
  /** Regular document */
  page(data: FileMetadata): string;
  /** Document that declares the "nav" role */
  nav(data: FileMetadata): string;
  /** Table of contents synthesized from the navigation */
  toc(data: FileMetadata, toc: Navigation): string;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Percent-encode each segment of an internal filename for use in href
 */
export function encodeHref(filename: string): string {
  return filename.split("/").map(encodeURIComponent).join("/");
}

function renderDocument(data: FileMetadata, body: string): string {
  const lang = escapeXml(data.getString("lang"));
  const title = escapeXml(data.getString("title"));
  const stylesheet = data.getString(STYLESHEET_KEY);
  const link = stylesheet
    ? `\n  <link rel="stylesheet" type="text/css" href="${escapeXml(encodeHref(stylesheet))}"/>`
    : "";

  return `<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${lang}" xml:lang="${lang}">
<head>
  <meta charset="UTF-8"/>
  <title>${title}</title>${link}
</head>
<body>
${body}
</body>
</html>
`;
}

interface TocNode {
  item: NavigationItem;
  children: TocNode[];
}

/**
 * Nest a flat navigation by level: each item goes under the closest
 * preceding item with a lower level
 */
export function buildTocTree(items: Navigation): TocNode[] {
  const roots: TocNode[] = [];
  const stack: TocNode[] = [];

  for (const item of items) {
    const node: TocNode = { item, children: [] };
    while (stack.length > 0 && (stack.at(-1)?.item.level ?? 0) >= item.level) {
      stack.pop();
    }

    const parent = stack.at(-1);
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}

function renderTocList(nodes: TocNode[], depth = 0): string {
  const indent = "  ".repeat(depth);
  const items = nodes
    .map(({ item, children }) => {
      const subtitle = item.subtitle
        ? `<br/><small>${escapeXml(item.subtitle)}</small>`
        : "";
      const link = `<a href="${escapeXml(encodeHref(item.filename))}">${escapeXml(item.title)}${subtitle}</a>`;
      const nested = children.length > 0
        ? `\n${renderTocList(children, depth + 1)}\n${indent}  `
        : "";
      return `${indent}  <li>${link}${nested}</li>`;
    })
    .join("\n");

  return `${indent}<ol>\n${items}\n${indent}</ol>`;
}

export const defaultTemplates: Templates = {
  page(data) {
    return renderDocument(data, data.getString(CONTENT_KEY));
  },

  nav(data) {
    return renderDocument(
      data,
      `<nav epub:type="toc" id="toc">\n${data.getString(CONTENT_KEY)}\n</nav>`
    );
  },

  toc(data, toc) {
    const heading = `<h1>${escapeXml(data.getString("title"))}</h1>`;
    const list = toc.length > 0 ? renderTocList(buildTocTree(toc)) : "<ol/>";
    return renderDocument(data, `<nav epub:type="toc" id="toc">\n${heading}\n${list}\n</nav>`);
  },
};
