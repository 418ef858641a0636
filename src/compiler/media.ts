import { minimatch } from "minimatch";
import { join, posix } from "node:path";
import type { CompileContext } from "./context";

export function isCover(path: string, patterns: string[]): boolean {
  const name = posix.basename(path);
  return patterns.some((pattern) => minimatch(name, pattern, { nocase: true, dot: true }));
}

export class MediaProcessor {
  constructor(private context: CompileContext) {}

  /**
   * Copy an asset into the publication. The first asset whose name matches
   * a cover pattern becomes the cover image.
   */
  async process(path: string): Promise<string[]> {
    const { config, cover, writer } = this.context;
    const properties: string[] = [];

    if (!cover.isSet && isCover(path, config.covers) && cover.trySet()) {
      properties.push("cover-image");
    }

    await writer.addFile(join(this.context.rootPath, path), path, "media", ...properties);
    return properties;
  }
}
