import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import JSZip from "jszip";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { compile, DEFAULT_CONFIG, TOC_FILENAME, TOC_TITLE, type Config } from "../src";
import { createTree, METADATA_YAML, RecordingWriter, removeTree } from "./helpers";

describe("compile", () => {
  let root = "";
  let writer: RecordingWriter;

  beforeEach(() => {
    writer = new RecordingWriter();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (root) await removeTree(root);
    root = "";
  });

  async function run(files: Record<string, string>, config: Config = DEFAULT_CONFIG) {
    root = await createTree({ "metadata.yaml": METADATA_YAML, ...files });
    return compile(root, join(root, "out", "book.epub"), config, {
      createWriter: async () => writer,
    });
  }

  it("compiles a single titled document and synthesizes the table of contents", async () => {
    const result = await run({
      "index.md": "---\ntitle: Home\n---\n# Welcome\n",
      "style.css": "body { margin: 0 }",
    });

    expect(result.navigation).toEqual([
      { title: "Home", subtitle: "", level: 0, filename: "index.xhtml", contentType: "primary" },
    ]);
    expect(writer.names()).toEqual(["index.xhtml", "style.css", TOC_FILENAME]);
    expect(writer.metadata?.title).toBe("Test Book");

    const page = writer.entry("index.xhtml");
    expect(page?.data).toMatch(/^<\?xml version="1.0" encoding="UTF-8"\?>\n<!DOCTYPE html>/);
    expect(page?.data).toContain('<link rel="stylesheet" type="text/css" href="style.css"/>');
    expect(page?.data).toContain('<h1 id="welcome">Welcome</h1>');

    const toc = writer.entry(TOC_FILENAME);
    expect(toc?.contentType).toBe("auxiliary");
    expect(toc?.properties).toEqual(["nav"]);
    expect(toc?.data).toContain(`<h1>${TOC_TITLE}</h1>`);
    expect(toc?.data).toContain('<li><a href="index.xhtml">Home</a></li>');
    expect(result.generatedToc).toBe(true);
    expect(writer.closeCount).toBe(1);
  });

  it("marks only the first matching media entry as the cover", async () => {
    await run(
      { "cover.jpg": "jpg", "photo.jpg": "jpg" },
      { ...DEFAULT_CONFIG, covers: ["*.jpg"] }
    );

    expect(writer.entry("cover.jpg")?.properties).toEqual(["cover-image"]);
    expect(writer.entry("photo.jpg")?.properties).toEqual([]);
    expect(writer.entry("photo.jpg")?.contentType).toBe("media");
    expect(writer.entry("photo.jpg")?.sourcePath).toBe(join(root, "photo.jpg"));
  });

  it("uses the nav template and skips the fallback when a document declares nav", async () => {
    const result = await run({
      "chapter.md": "---\ntitle: Contents\nproperties: [nav]\n---\n1. [One](one.md)\n",
    });

    expect(writer.names()).toEqual(["chapter.xhtml"]);
    expect(writer.entry("chapter.xhtml")?.properties).toEqual(["nav"]);
    expect(writer.entry("chapter.xhtml")?.data).toContain('<nav epub:type="toc" id="toc">');
    expect(writer.entry("chapter.xhtml")?.data).toContain('<a href="one.xhtml">One</a>');
    expect(result.navigation.map((item) => item.filename)).toEqual(["chapter.xhtml"]);
    expect(result.generatedToc).toBe(false);
  });

  it("never lets hidden or backup entries through", async () => {
    const result = await run({
      ".draft/notes.md": "---\ntitle: Draft\n---\n",
      ".hidden.md": "Hidden",
      "~backup.md": "Backup",
      "part/.DS_Store": "x",
      "part/one.md": "---\ntitle: One\n---\n",
    });

    expect(writer.names()).toEqual(["part/one.xhtml", TOC_FILENAME]);
    expect(result.navigation.map((item) => item.title)).toEqual(["One"]);
  });

  it("skips every publication metadata candidate at the root", async () => {
    await run({
      "metadata.json": '{"title": "Unused"}',
      "notes/metadata.yaml": "kept: true\n",
      "one.md": "One",
    });

    expect(writer.names()).toEqual(["notes/metadata.yaml", "one.xhtml", TOC_FILENAME]);
    expect(writer.metadata?.title).toBe("Test Book");
  });

  it("writes named entities as UTF-8 text", async () => {
    await run({ "a.md": "Copyright &copy; 2024 and&nbsp;more &mdash; end\n" });

    const body = writer.entry("a.xhtml")?.data ?? "";
    expect(body).toContain("<p>Copyright \u00a9 2024 and\u00a0more \u2014 end</p>");
    expect(body).not.toMatch(/&(copy|nbsp|mdash);/);
  });

  it("rewrites cover-image on documents to cover", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await run({
      "cover.md": "---\ntitle: Cover\nproperties: [cover-image, nav]\n---\n",
    });

    expect(writer.entry("cover.xhtml")?.properties).toEqual(["cover", "nav"]);
  });

  it("falls back to the placeholder title and the publication language", async () => {
    const result = await run({
      "a.md": "Untitled text\n",
      "b.md": "---\nlang: de\ntitle: Zwei\n---\n",
    });

    expect(result.navigation.map((item) => item.title)).toEqual(["* * *", "Zwei"]);
    expect(writer.entry("a.xhtml")?.data).toContain('lang="ru" xml:lang="ru"');
    expect(writer.entry("a.xhtml")?.data).toContain("<title>* * *</title>");
    expect(writer.entry("b.xhtml")?.data).toContain('lang="de" xml:lang="de"');
  });

  it("records subtitle, level and hidden documents", async () => {
    const result = await run({
      "notes.md": "---\ntitle: Notes\nsubtitle: Extra\nlevel: 2\nhidden: true\n---\n",
    });

    expect(result.navigation).toEqual([
      { title: "Notes", subtitle: "Extra", level: 2, filename: "notes.xhtml", contentType: "auxiliary" },
    ]);
    expect(writer.entry("notes.xhtml")?.contentType).toBe("auxiliary");
    expect(writer.entry(TOC_FILENAME)?.data).toContain(
      '<li><a href="notes.xhtml">Notes<br/><small>Extra</small></a></li>'
    );
  });

  it("walks depth-first in lexical order", async () => {
    const result = await run({
      "b.md": "---\ntitle: B\n---\n",
      "a.md": "---\ntitle: A\n---\n",
      "a/z.md": "---\ntitle: Z\n---\n",
    });

    expect(result.navigation.map((item) => item.filename)).toEqual(["a/z.xhtml", "a.xhtml", "b.xhtml"]);
  });

  it("links the stylesheet relative to nested documents", async () => {
    await run({
      "part-1/chapter.md": "Text\n",
      "style.css": "",
    });

    expect(writer.entry("part-1/chapter.xhtml")?.data).toContain('href="../style.css"');
    expect(writer.entry(TOC_FILENAME)?.data).toContain('href="style.css"');
  });

  it("leaves out the stylesheet link when the file is missing", async () => {
    await run({ "chapter.md": "Text\n" });
    expect(writer.entry("chapter.xhtml")?.data).not.toContain("<link");
  });

  it("aborts on the first broken document and still closes the archive", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    await expect(
      run({
        "a.md": "---\ntitle: A\n---\n",
        "b.md": "---\ntitle: [broken\n---\n",
        "c.md": "---\ntitle: C\n---\n",
      })
    ).rejects.toThrow();

    expect(writer.names()).toEqual(["a.xhtml"]);
    expect(writer.closeCount).toBe(1);
  });

  it("fails before opening the archive when metadata is missing", async () => {
    root = await createTree({ "chapter.md": "Text\n" });
    const createWriter = vi.fn(async () => writer);

    await expect(
      compile(root, join(root, "book.epub"), DEFAULT_CONFIG, { createWriter })
    ).rejects.toThrow(/^No publication metadata found/);
    expect(createWriter).not.toHaveBeenCalled();
  });

  it("keeps every nav declaration but warns about the second one", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const result = await run({
      "a.md": "---\nproperties: [nav]\n---\n",
      "b.md": "---\nproperties: [nav]\n---\n",
    });

    expect(writer.entry("b.xhtml")?.properties).toEqual(["nav"]);
    expect(result.generatedToc).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      "Warning: b.md declares the nav role, but an earlier document already did"
    );
  });
});

describe("compile to EPUB", () => {
  let root = "";

  afterEach(async () => {
    await removeTree(root);
  });

  it("writes a complete package and skips its own output file", async () => {
    root = await createTree({
      "metadata.yaml": METADATA_YAML,
      "cover.png": "png",
      "chapter-1.md": "---\ntitle: First\n---\nHello\n",
    });
    const output = join(root, "book.epub");

    const result = await compile(root, output, DEFAULT_CONFIG);
    expect(result.documents).toBe(1);
    expect(result.media).toBe(1);

    const zip = await JSZip.loadAsync(await readFile(output));
    expect(zip.file("OEBPS/book.epub")).toBeNull();
    expect(zip.file("OEBPS/metadata.yaml")).toBeNull();
    expect(await zip.file("OEBPS/chapter-1.xhtml")?.async("string")).toContain("<p>Hello</p>");

    const opf = await zip.file("OEBPS/content.opf")?.async("string");
    expect(opf).toContain('<item id="item1" href="chapter-1.xhtml" media-type="application/xhtml+xml"/>');
    expect(opf).toContain('<item id="item2" href="cover.png" media-type="image/png" properties="cover-image"/>');
    expect(opf).toContain('<item id="item3" href="_toc.xhtml" media-type="application/xhtml+xml" properties="nav"/>');
    expect(opf).toContain('<dc:identifier id="uid">urn:test:book</dc:identifier>');
  });
});
