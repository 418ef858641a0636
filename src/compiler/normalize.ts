import render from "dom-serializer";
import { isTag, isText, type ChildNode } from "domhandler";
import { parseDocument } from "htmlparser2";
import { escapeCode } from "../render/highlight";

const MULTI_NEWLINES = /^\n{2,}$/;
const RAW_TEXT_ELEMENTS = new Set(["script", "style"]);

function escapeAttribute(value: string): string {
  return escapeCode(value).replace(/"/g, "&quot;");
}

// Entities were decoded by the parser; put back only what XML reserves.
function escapeNode(node: ChildNode): void {
  if (isText(node)) {
    node.data = escapeCode(node.data);
    return;
  }
  if (!isTag(node)) {
    return;
  }
  for (const [name, value] of Object.entries(node.attribs)) {
    node.attribs[name] = escapeAttribute(value);
  }
  if (!RAW_TEXT_ELEMENTS.has(node.name)) {
    node.children.forEach(escapeNode);
  }
}

/**
 * Rewrite a rendered markdown fragment as canonical XHTML markup.
 *
 * Only top-level nodes are inspected: a text node made of nothing but two or
 * more line breaks becomes a single line break, everything else is
 * serialized as parsed. Named entities are decoded to UTF-8 text and only
 * `& < > "` are escaped again, void elements are self-closed. Blank-line
 * runs inside nested elements stay as they are.
 */
export function normalize(raw: string): string {
  const fragment = parseDocument(raw);
  let output = "";

  for (const node of fragment.children) {
    if (isText(node) && MULTI_NEWLINES.test(node.data)) {
      output += "\n";
      continue;
    }
    escapeNode(node);
    output += render(node, {
      encodeEntities: false,
      selfClosingTags: true,
      emptyAttrs: true,
    });
  }

  return output;
}
