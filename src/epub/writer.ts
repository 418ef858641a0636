import JSZip from "jszip";
import { open, readFile, type FileHandle } from "node:fs/promises";
import { extname } from "node:path";
import type { PublicationMetadata } from "../content/types";
import { encodeHref, escapeXml, XML_HEADER } from "../render/templates";
import type { ArchiveWriter, ContentType } from "./types";

const CONTENT_DIR = "OEBPS";
const PACKAGE_FILE = `${CONTENT_DIR}/content.opf`;

const MEDIA_TYPES: Record<string, string> = {
  xhtml: "application/xhtml+xml",
  html: "application/xhtml+xml",
  css: "text/css",
  js: "application/javascript",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  svg: "image/svg+xml",
  webp: "image/webp",
  ttf: "font/ttf",
  otf: "font/otf",
  woff: "font/woff",
  woff2: "font/woff2",
  mp3: "audio/mpeg",
  m4a: "audio/mp4",
  mp4: "video/mp4",
  xml: "application/xml",
  ncx: "application/x-dtbncx+xml",
  smil: "application/smil+xml",
  txt: "text/plain",
};

/** Document property marking the cover page; goes to the OPF guide */
const COVER_PAGE = "cover";

export function getMediaType(filename: string): string {
  const ext = extname(filename).slice(1).toLowerCase();
  return MEDIA_TYPES[ext] || "application/octet-stream";
}

export interface ManifestItem {
  id: string;
  name: string;
  mediaType: string;
  contentType: ContentType;
  properties: string[];
}

const CONTAINER_XML = `${XML_HEADER}<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${PACKAGE_FILE}" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

/**
 * Writes an EPUB 3 package with JSZip.
 *
 * Entries are kept in memory in the order they are added; the manifest and
 * spine follow that order. The output file is opened by create() and written
 * in full by close().
 */
export class EpubWriter implements ArchiveWriter {
  metadata: PublicationMetadata | null = null;

  private zip = new JSZip();
  private items: ManifestItem[] = [];
  private names = new Set<string>();
  private closed = false;

  private constructor(
    private handle: FileHandle,
    readonly path: string
  ) {
    // Must be the first entry and stored uncompressed
    this.zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  }

  static async create(path: string): Promise<EpubWriter> {
    const handle = await open(path, "w");
    return new EpubWriter(handle, path);
  }

  async add(
    name: string,
    contentType: ContentType,
    data: string | Uint8Array,
    ...properties: string[]
  ): Promise<void> {
    if (this.closed) {
      throw new Error(`Cannot add ${name}: ${this.path} is already closed`);
    }
    if (this.names.has(name)) {
      throw new Error(`Duplicate entry in publication: ${name}`);
    }

    this.names.add(name);
    this.items.push({
      id: `item${this.items.length + 1}`,
      name,
      mediaType: getMediaType(name),
      contentType,
      properties,
    });
    this.zip.file(`${CONTENT_DIR}/${name}`, data);
  }

  async addFile(
    sourcePath: string,
    destName: string,
    contentType: ContentType,
    ...properties: string[]
  ): Promise<void> {
    const data = await readFile(sourcePath);
    await this.add(destName, contentType, data, ...properties);
  }

  async close(): Promise<void> {
    if (this.closed) {
      throw new Error(`${this.path} is already closed`);
    }
    this.closed = true;

    try {
      if (!this.metadata) {
        throw new Error(`Publication metadata was not set for ${this.path}`);
      }
      this.zip.file("META-INF/container.xml", CONTAINER_XML);
      this.zip.file(PACKAGE_FILE, renderPackage(this.metadata, this.items));

      const buffer = await this.zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
        compressionOptions: { level: 9 },
        mimeType: "application/epub+zip",
      });
      await this.handle.writeFile(buffer);
    } finally {
      await this.handle.close();
    }
  }
}

function element(tag: string, value: string | undefined, attrs = ""): string[] {
  return value ? [`    <${tag}${attrs}>${escapeXml(value)}</${tag}>`] : [];
}

/**
 * Render OEBPS/content.opf
 */
export function renderPackage(
  metadata: PublicationMetadata,
  items: ManifestItem[],
  modified = new Date()
): string {
  const cover = items.find((item) => item.properties.includes("cover-image"));
  const coverPage = items.find(
    (item) => item.contentType !== "media" && item.properties.includes(COVER_PAGE)
  );

  const meta = [
    ...element("dc:identifier", metadata.identifier, ' id="uid"'),
    ...element("dc:title", metadata.title),
    ...element("dc:title", metadata.subtitle),
    ...metadata.language.flatMap((lang) => element("dc:language", lang)),
    ...(metadata.creator ?? []).flatMap((creator) => element("dc:creator", creator)),
    ...element("dc:publisher", metadata.publisher),
    ...element("dc:description", metadata.description),
    ...element("dc:rights", metadata.rights),
    ...element("dc:date", metadata.date),
    ...(metadata.subject ?? []).flatMap((subject) => element("dc:subject", subject)),
    `    <meta property="dcterms:modified">${modified.toISOString().replace(/\.\d{3}Z$/, "Z")}</meta>`,
    ...(cover ? [`    <meta name="cover" content="${cover.id}"/>`] : []),
  ];

  const manifest = items.map((item) => {
    const properties = item.properties.filter((property) => property !== COVER_PAGE);
    const propertiesAttr = properties.length > 0
      ? ` properties="${escapeXml(properties.join(" "))}"`
      : "";
    return `    <item id="${item.id}" href="${escapeXml(encodeHref(item.name))}" media-type="${item.mediaType}"${propertiesAttr}/>`;
  });

  const spine = items
    .filter((item) => item.contentType !== "media")
    .map((item) =>
      item.contentType === "auxiliary"
        ? `    <itemref idref="${item.id}" linear="no"/>`
        : `    <itemref idref="${item.id}"/>`
    );

  const guide = coverPage
    ? `\n  <guide>\n    <reference type="cover" title="Cover" href="${escapeXml(encodeHref(coverPage.name))}"/>\n  </guide>`
    : "";

  return `${XML_HEADER}<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="uid" xml:lang="${escapeXml(metadata.language[0])}">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
${meta.join("\n")}
  </metadata>
  <manifest>
${manifest.join("\n")}
  </manifest>
  <spine>
${spine.join("\n")}
  </spine>${guide}
</package>
`;
}
