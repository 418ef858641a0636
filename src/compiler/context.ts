import type { Config } from "../config";
import type { ArchiveWriter } from "../epub/types";
import type { Templates } from "../render/templates";
import type { NavigationBuilder } from "./navigation";
import type { OneShot } from "./once";

/** State shared by the processors for the duration of one compile */
export interface CompileContext {
  rootPath: string;
  config: Config;
  /** Publication language, the first declared one */
  language: string;
  /** Global stylesheet relative to the root, null when there is none */
  stylesheet: string | null;
  templates: Templates;
  writer: ArchiveWriter;
  navigation: NavigationBuilder;
  cover: OneShot;
}
