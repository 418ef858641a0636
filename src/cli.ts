#!/usr/bin/env tsx

import { parseArgs } from "node:util";
import { existsSync, statSync } from "node:fs";
import { basename, relative, resolve } from "node:path";
import { watch, type FSWatcher } from "chokidar";
import { CONFIG_FILENAME, DEFAULT_CONFIG, findConfig, loadConfig, type Config } from "./config";
import { compile } from "./compiler/compiler";

const HELP = `
quire - Compile a directory of markdown chapters into an EPUB book

USAGE:
  quire <source> [options]

ARGUMENTS:
  <source>              Directory with markdown files, media and metadata.yaml

OPTIONS:
  -o, --output <file>   Output file (default: <source name>.epub)
  -c, --config <file>   Path to config file (default: find ${CONFIG_FILENAME})
      --css <file>      Global stylesheet relative to the source directory
  -w, --watch           Recompile when files change
  -v, --verbose         List every compiled entry
  -h, --help            Show this help message

CONFIG FILE (${CONFIG_FILENAME}):
  {
    "markdown": [".md", ".markdown"],
    "covers": ["cover.*"],
    "css": "style.css",
    "metadata": ["metadata.yaml"],
    "highlightTheme": "github-light"
  }

EXAMPLES:
  quire ./book                        # Writes book.epub
  quire ./book -o dist/novel.epub     # Explicit output
  quire ./book --watch                # Rebuild on every change
`;

const WATCH_DEBOUNCE_MS = 200;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      output: { type: "string", short: "o" },
      config: { type: "string", short: "c" },
      css: { type: "string" },
      watch: { type: "boolean", short: "w", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  const source = positionals[0];
  if (!source) {
    console.error("Error: No source directory provided\n");
    console.log(HELP);
    process.exit(1);
  }

  const sourcePath = resolve(source);
  if (!existsSync(sourcePath) || !statSync(sourcePath).isDirectory()) {
    console.error(`Error: Not a directory: ${sourcePath}`);
    process.exit(1);
  }

  const configPath = values.config ? resolve(values.config) : findConfig(sourcePath);
  let config: Config = DEFAULT_CONFIG;
  if (configPath) {
    if (!existsSync(configPath)) {
      console.error(`Error: Config file not found: ${configPath}`);
      process.exit(1);
    }
    console.log(`Using config: ${configPath}`);
    config = loadConfig(configPath);
  }

  // CLI args override config values
  if (values.css !== undefined) {
    config = { ...config, css: values.css };
  }

  const output = resolve(values.output ?? `${basename(sourcePath)}.epub`);

  const build = async () => {
    const started = Date.now();
    console.log(`Compiling ${sourcePath} -> ${output}`);

    const result = await compile(sourcePath, output, config, {
      verbose: values.verbose,
    });

    console.log(
      `  ${result.documents} documents, ${result.media} media files` +
        (result.generatedToc ? ", table of contents generated" : "") +
        ` (${Date.now() - started}ms)`
    );
  };

  if (!values.watch) {
    await build();
    return;
  }

  // In watch mode a failed build is reported and the next change retried
  const rebuild = async () => {
    try {
      await build();
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
    }
  };

  let queue = rebuild();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const watcher: FSWatcher = watch(sourcePath, {
    ignored: (path: string) =>
      path === output || /(^|[\/\\])[.~]/.test(relative(sourcePath, path)),
    persistent: true,
    ignoreInitial: true,
  });

  const handleChange = () => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      console.log("Change detected, recompiling...");
      queue = queue.then(rebuild);
    }, WATCH_DEBOUNCE_MS);
  };

  watcher.on("add", handleChange);
  watcher.on("change", handleChange);
  watcher.on("unlink", handleChange);
  watcher.on("addDir", handleChange);
  watcher.on("unlinkDir", handleChange);

  console.log("\nWatching for changes. Press Ctrl+C to stop\n");

  const shutdown = () => {
    if (timer) clearTimeout(timer);
    watcher.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => {
    console.log("\nShutting down...");
    shutdown();
  });

  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
