/**
 * Compiler
 *
 * Walks a source directory and packages it as an EPUB publication:
 * markdown documents become pages, everything else is copied as media,
 * and a table of contents is synthesized when no document provides one.
 */

import { stat } from "node:fs/promises";
import { relative, resolve, sep } from "node:path";
import type { Config } from "../config";
import { loadPublicationMetadata } from "../content/publication";
import type { Navigation } from "../content/types";
import type { ArchiveWriter } from "../epub/types";
import { EpubWriter } from "../epub/writer";
import { defaultTemplates, XML_HEADER, type Templates } from "../render/templates";
import { classify } from "./classify";
import type { CompileContext } from "./context";
import { DocumentProcessor } from "./document";
import { MediaProcessor } from "./media";
import { NavigationBuilder, TOC_FILENAME } from "./navigation";
import { OneShot } from "./once";
import { walkTree, type WalkAction, type WalkEntry } from "./walk";

export interface CompileOptions {
  templates?: Templates;
  /** Print every compiled entry */
  verbose?: boolean;
  /** Override how the output archive is opened */
  createWriter?: (outputPath: string) => Promise<ArchiveWriter>;
}

export interface CompileResult {
  output: string;
  navigation: Navigation;
  documents: number;
  media: number;
  /** Whether the table of contents was synthesized */
  generatedToc: boolean;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Compile the directory at sourcePath into outputPath.
 *
 * Setup (source root, publication metadata, output file) is checked before
 * anything is written. The first processing error aborts the compile; the
 * archive is closed either way.
 */
export async function compile(
  sourcePath: string,
  outputPath: string,
  config: Config,
  options: CompileOptions = {}
): Promise<CompileResult> {
  const rootPath = resolve(sourcePath);
  const rootStats = await stat(rootPath);
  if (!rootStats.isDirectory()) {
    throw new Error(`Not a directory: ${rootPath}`);
  }

  const { metadata } = await loadPublicationMetadata(
    rootPath,
    config.metadata
  );

  const output = resolve(outputPath);
  const createWriter = options.createWriter ?? EpubWriter.create;
  const writer = await createWriter(output);
  writer.metadata = metadata;

  const stylesheet = config.css && (await isFile(resolve(rootPath, config.css)))
    ? config.css.split(sep).join("/")
    : null;

  const compiler = new Compiler(
    {
      rootPath,
      config,
      language: metadata.language[0],
      stylesheet,
      templates: options.templates ?? defaultTemplates,
      writer,
      navigation: new NavigationBuilder(),
      cover: new OneShot(),
    },
    relative(rootPath, output).split(sep).join("/"),
    options.verbose ?? false
  );

  let result: CompileResult;
  try {
    result = await compiler.run(output);
  } catch (e) {
    await writer.close().catch((closeError: unknown) => {
      console.warn(`Warning: failed to close ${output}: ${closeError}`);
    });
    throw e;
  }

  await writer.close();
  return result;
}

/**
 * One traversal of a source tree. Not reusable.
 */
export class Compiler {
  private documents: DocumentProcessor;
  private media: MediaProcessor;
  private documentCount = 0;
  private mediaCount = 0;

  constructor(
    private context: CompileContext,
    private outputEntry: string,
    private verbose: boolean
  ) {
    this.documents = new DocumentProcessor(context);
    this.media = new MediaProcessor(context);
  }

  async run(output: string): Promise<CompileResult> {
    const { navigation, templates, language, stylesheet, writer } = this.context;

    await walkTree(this.context.rootPath, (entry) => this.visit(entry));
    const items = navigation.freeze();

    const toc = navigation.renderFallback(templates, language, stylesheet);
    if (toc !== null) {
      await writer.add(TOC_FILENAME, "auxiliary", XML_HEADER + toc, "nav");
      this.log(`  + ${TOC_FILENAME} (generated)`);
    }

    return {
      output,
      navigation: items,
      documents: this.documentCount,
      media: this.mediaCount,
      generatedToc: toc !== null,
    };
  }

  private async visit(entry: WalkEntry): Promise<WalkAction> {
    if (entry.error) {
      console.warn(`Warning: skipping ${entry.path}: ${entry.error.message}`);
      return "skip-subtree";
    }

    // The output file may live inside the source tree
    if (entry.path === this.outputEntry) {
      return "skip-entry";
    }

    switch (classify(entry.path, entry.isDirectory, this.context.config)) {
      case "skip-subtree":
        return "skip-subtree";
      case "skip":
        return "skip-entry";
      case "document": {
        const filename = await this.documents.process(entry.path);
        this.documentCount++;
        this.log(`  + ${entry.path} -> ${filename}`);
        return "continue";
      }
      case "media": {
        const properties = await this.media.process(entry.path);
        this.mediaCount++;
        this.log(`  + ${entry.path}${properties.length > 0 ? ` (${properties.join(" ")})` : ""}`);
        return "continue";
      }
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}
