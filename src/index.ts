export { compile, Compiler } from "./compiler/compiler";
export type { CompileOptions, CompileResult } from "./compiler/compiler";
export { classify } from "./compiler/classify";
export type { EntryKind } from "./compiler/classify";
export { normalize } from "./compiler/normalize";
export { DocumentProcessor, UNTITLED, outputFilename } from "./compiler/document";
export { MediaProcessor, isCover } from "./compiler/media";
export { NavigationBuilder, TOC_FILENAME, TOC_TITLE } from "./compiler/navigation";
export type { NavigationState } from "./compiler/navigation";
export { OneShot } from "./compiler/once";
export { walkTree } from "./compiler/walk";
export type { WalkAction, WalkEntry, Visitor } from "./compiler/walk";
export { DEFAULT_CONFIG, findConfig, loadConfig, parseConfig } from "./config";
export type { Config } from "./config";
export { FileMetadata, readFileMetadata } from "./content/metadata";
export { loadPublicationMetadata, parsePublicationMetadata } from "./content/publication";
export type { Navigation, NavigationItem, PublicationMetadata } from "./content/types";
export { EpubWriter } from "./epub/writer";
export type { ArchiveWriter, ContentType } from "./epub/types";
export { renderMarkdown } from "./render/markdown";
export { defaultTemplates } from "./render/templates";
export type { Templates } from "./render/templates";
