import { createHighlighter, type Highlighter } from "shiki";

const LANGS = [
  "typescript",
  "javascript",
  "json",
  "bash",
  "shell",
  "markdown",
  "html",
  "css",
  "yaml",
  "python",
  "go",
  "rust",
  "sql",
  "graphql",
  "jsx",
  "tsx",
  "diff",
  "plaintext",
];

const highlighters = new Map<string, Promise<Highlighter>>();

/**
 * Get or create the Shiki highlighter for a theme
 */
export async function getHighlighter(theme: string): Promise<Highlighter> {
  let highlighter = highlighters.get(theme);
  if (!highlighter) {
    highlighter = createHighlighter({ themes: [theme], langs: LANGS });
    highlighters.set(theme, highlighter);
  }

  return highlighter;
}

export function escapeCode(code: string): string {
  return code
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Highlight code using Shiki
 */
export async function highlightCode(
  code: string,
  lang: string,
  theme: string
): Promise<string> {
  const highlighter = await getHighlighter(theme);
  const validLangs = highlighter.getLoadedLanguages();

  // Fall back to plaintext if language not supported
  const language = validLangs.includes(lang) ? lang : "plaintext";

  try {
    return highlighter.codeToHtml(code, { lang: language, theme });
  } catch {
    // If highlighting fails, return escaped code
    return `<pre><code class="language-${language}">${escapeCode(code)}</code></pre>`;
  }
}
