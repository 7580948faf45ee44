#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  BatchGenerator,
  type BatchGeneratorOptions,
} from "../generator/batch/batch_generator.js";
import { AggregateGeneratorError } from "../generator/errors/generator_errors.js";

export interface CliOptions {
  project: string | null;
  output: string | null;
  stubDirs: string[];
  config: string | null;
  verbose: boolean;
  strict: boolean;
  cache: boolean;
  help: boolean;
}

export const DEFAULT_OUTPUT_DIR = "Generated/Bridges";

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    project: null,
    output: null,
    stubDirs: [],
    config: null,
    verbose: false,
    strict: false,
    cache: true,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-p" || arg === "--project") {
      opts.project = requireValue(argv, i, "-p/--project");
      i += 1;
      continue;
    }
    if (arg === "-o" || arg === "--output") {
      opts.output = requireValue(argv, i, "-o/--output");
      i += 1;
      continue;
    }
    if (arg === "--stubs") {
      opts.stubDirs.push(requireValue(argv, i, "--stubs"));
      i += 1;
      continue;
    }
    if (arg === "--config") {
      opts.config = requireValue(argv, i, "--config");
      i += 1;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "--strict") {
      opts.strict = true;
      continue;
    }
    if (arg === "--no-cache") {
      opts.cache = false;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (!arg.startsWith("-") && opts.project === null) {
      opts.project = arg;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith("-")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function printHelp(): void {
  console.log(`Usage: gdscript-bridge -p <project> [options]

Options:
  -p, --project <dir>   Godot project directory
  -o, --output <dir>    Output directory (default: <project>/${DEFAULT_OUTPUT_DIR})
  --stubs <dir>         Additional engine stub directory (repeatable)
  --config <file>       Configuration file (default: first gdbridge.config.json found)
  -v, --verbose         Verbose logging
  --strict              Fail on error diagnostics such as cyclic inheritance
  --no-cache            Regenerate even when inputs are unchanged
  -h, --help            Show this help

Examples:
  gdscript-bridge -p game
  gdscript-bridge -p game -o game/Scripts/Generated --stubs stubs/addons
`);
}

/** Run the CLI; returns the process exit code. */
export function run(argv: string[]): number {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    return 1;
  }

  if (opts.help) {
    printHelp();
    return 0;
  }
  if (opts.project === null) {
    printHelp();
    return 1;
  }

  const projectDir = path.resolve(opts.project);
  if (!fs.existsSync(projectDir) || !fs.statSync(projectDir).isDirectory()) {
    console.error(`Project directory not found: ${projectDir}`);
    return 1;
  }

  const options: BatchGeneratorOptions = {
    projectDir,
    outputDir: path.resolve(opts.output ?? path.join(projectDir, DEFAULT_OUTPUT_DIR)),
    stubDirs: opts.stubDirs.map((dir) => path.resolve(dir)),
    ...(opts.config ? { configPath: path.resolve(opts.config) } : {}),
    verbose: opts.verbose,
    strict: opts.strict,
    useCache: opts.cache,
  };

  if (opts.verbose) {
    console.log(`Generating bridges for ${projectDir} -> ${options.outputDir}`);
  }

  try {
    const result = new BatchGenerator().generate(options);
    const written = result.outputs.filter((output) => output.written).length;
    console.log(
      result.skipped
        ? `Up to date (${result.outputs.length} unit(s))`
        : `Generated ${result.outputs.length} unit(s), ${written} written`,
    );
    if (!opts.verbose) {
      for (const diagnostic of result.diagnostics) {
        console.warn(AggregateGeneratorError.formatLine(diagnostic));
      }
    }
    return 0;
  } catch (err) {
    console.error(`Error generating bridges for ${projectDir}:`);
    if (err instanceof Error) console.error(err.message);
    else console.error(err);
    return 1;
  }
}

function isMainModule(): boolean {
  const invokedPath = process.argv[1];
  if (!invokedPath || !fs.existsSync(invokedPath)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(invokedPath)).href;
}

if (isMainModule()) {
  process.exitCode = run(process.argv.slice(2));
}
