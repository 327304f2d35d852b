#!/usr/bin/env node
/**
 * Slides CLI
 *
 * Usage:
 *   npm run slides create <outline.md> <output.json>   Compose a deck from an outline
 *   npm run slides convert <input> <output.json>       Rebuild a PDF or image as slides
 */

import fs from "node:fs";
import {
  createConsoleProgress,
  createConvertPipeline,
  createDeckPipeline,
} from "../pipeline/runner";
import { describeError } from "../pipeline/core/errors";

const USAGE = `Usage: npm run slides <command> [args] [options]

Commands:
  create <outline.md> <output.json>    Compose a deck from a markdown outline
  convert <input> <output.json>        Convert a PDF or page image into slides

Options:
  --config <path>         Config file (default: ./config.yaml)
  --concurrency <n>       Max parallel model calls
  --theme <name>          Deck theme
  --generate-images       Generate requested images (create)
  --no-generate-images    Skip image generation (create)
  --skip-cache            Skip LLM cache
  --keep-staging          Keep the staging directory when a run fails
  --verbose               Log every step attempt`;

interface ParsedFlags {
  positional: string[];
  configPath?: string;
  concurrency?: number;
  theme?: string;
  generateImages?: boolean;
  skipCache: boolean;
  keepStaging: boolean;
  verbose: boolean;
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const [source, outputPath] = flags.positional;
  if (!source || !outputPath) {
    console.error(`Usage: npm run slides ${command} <input> <output.json>`);
    process.exit(1);
  }
  if (!fs.existsSync(source)) {
    console.error(`Input not found: ${source}`);
    process.exit(1);
  }

  const options = {
    outputPath,
    configPath: flags.configPath,
    overrides: buildOverrides(flags),
    progress: createConsoleProgress({ verbose: flags.verbose }),
    skipCache: flags.skipCache,
  };

  switch (command) {
    case "create": {
      const { pipeline } = createDeckPipeline(options);
      const document = await pipeline.run({ outlinePath: source });
      console.log(`\n${document.pageCount} slides -> ${document.path}`);
      break;
    }

    case "convert": {
      const { pipeline } = createConvertPipeline(options);
      const document = await pipeline.run({ source });
      console.log(`\n${document.pageCount} slides -> ${document.path}`);
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

function buildOverrides(flags: ParsedFlags): Record<string, unknown> {
  const pipeline: Record<string, unknown> = {};
  if (flags.concurrency !== undefined) pipeline.concurrency = flags.concurrency;
  if (flags.generateImages !== undefined) pipeline.generate_images = flags.generateImages;

  const overrides: Record<string, unknown> = { pipeline };
  if (flags.theme) overrides.slide = { theme: flags.theme };
  if (flags.keepStaging) overrides.assets = { keep_staging: true };
  return overrides;
}

function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  let configPath: string | undefined;
  let concurrency: number | undefined;
  let theme: string | undefined;
  let generateImages: boolean | undefined;
  let skipCache = false;
  let keepStaging = false;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--concurrency" && args[i + 1]) {
      concurrency = parseInt(args[++i], 10);
    } else if (arg === "--theme" && args[i + 1]) {
      theme = args[++i];
    } else if (arg === "--generate-images") {
      generateImages = true;
    } else if (arg === "--no-generate-images") {
      generateImages = false;
    } else if (arg === "--skip-cache") {
      skipCache = true;
    } else if (arg === "--keep-staging") {
      keepStaging = true;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, configPath, concurrency, theme, generateImages, skipCache, keepStaging, verbose };
}

main().catch((err) => {
  console.error("\nFailed:", describeError(err));
  process.exit(1);
});
