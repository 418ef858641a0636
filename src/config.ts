import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export const CONFIG_FILENAME = ".quire.json";

export interface Config {
  /** Extensions of files compiled as documents (lowercase, with leading dot) */
  markdown: string[];
  /** Glob patterns matched against media base names to find the cover */
  covers: string[];
  /** Global stylesheet, relative to the source root; empty to disable */
  css: string;
  /** Candidate publication metadata files in the source root */
  metadata: string[];
  /** Shiki theme used for fenced code blocks */
  highlightTheme: string;
}

export const DEFAULT_CONFIG: Config = {
  markdown: [".md", ".markdown", ".mdown"],
  covers: ["cover.*", "*-cover.*", "*_cover.*"],
  css: "style.css",
  metadata: ["metadata.yaml", "metadata.yml", "metadata.json"],
  highlightTheme: "github-light",
};

/**
 * Find config file by walking up from the source directory
 */
export function findConfig(startDir: string): string | null {
  let current = resolve(startDir);
  const root = resolve("/");

  while (current !== root) {
    const configPath = join(current, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Merge a parsed config object over the defaults
 */
export function parseConfig(raw: unknown, source: string): Config {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Config in ${source} must be a JSON object`);
  }

  const config: Config = { ...DEFAULT_CONFIG };
  const entries = new Map(Object.entries(raw));

  for (const key of ["markdown", "covers", "metadata"] as const) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (!isStringArray(value) || value.length === 0) {
      throw new Error(`Config "${key}" in ${source} must be a non-empty array of strings`);
    }
    config[key] = value;
  }

  for (const key of ["css", "highlightTheme"] as const) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new Error(`Config "${key}" in ${source} must be a string`);
    }
    config[key] = value;
  }

  config.markdown = config.markdown.map(normalizeExtension);
  return config;
}

/**
 * Load and parse config file
 */
export function loadConfig(configPath: string): Config {
  const raw = readFileSync(configPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in ${configPath}: ${e}`);
  }

  return parseConfig(parsed, configPath);
}
