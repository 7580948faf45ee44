/**
 * Batch generator: reads a project from disk, generates every unit and
 * writes the results with an incremental cache.
 */

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { generateBridges, type GeneratedUnit } from "../bridge_generator.js";
import { loadStubSources } from "../catalog/native_stub_reader.js";
import { buildCatalog } from "../catalog/type_catalog.js";
import {
  type BridgeConfiguration,
  loadConfiguration,
} from "../config/configuration.js";
import { ErrorCollector } from "../errors/error_collector.js";
import {
  AggregateGeneratorError,
  GENERATOR_ERROR_CODES,
  GENERATOR_ERROR_SEVERITIES,
  GeneratorError,
} from "../errors/generator_errors.js";
import { normalizeSourcePath, type SourceText } from "../frontend/types.js";
import {
  discoverProjectFiles,
  findConfigurationFile,
} from "./file_discovery.js";

export const CACHE_FILE_NAME = ".bridge-cache.json";
const CACHE_VERSION = 2;

export interface BatchGeneratorOptions {
  projectDir: string;
  outputDir: string;
  /** Extra stub directories, read after the built-in engine stubs. */
  stubDirs?: string[];
  /** Configuration file; found in the project when omitted. */
  configPath?: string;
  verbose?: boolean;
  /** Throw AggregateGeneratorError for error diagnostics. */
  strict?: boolean;
  useCache?: boolean;
}

export interface BatchFileResult {
  typeName: string;
  kind: GeneratedUnit["kind"];
  outputPath: string;
  /** False when the file already had this content. */
  written: boolean;
}

export interface BatchResult {
  outputs: BatchFileResult[];
  /** True when the cache showed nothing changed. */
  skipped: boolean;
  diagnostics: GeneratorError[];
}

const CacheSnapshotSchema = z.object({
  version: z.literal(CACHE_VERSION),
  fingerprint: z.string(),
  units: z.array(
    z.object({
      hintName: z.string(),
      typeName: z.string(),
      kind: z.enum(["bridge", "proxy"]),
    }),
  ),
  /** Generation diagnostics, replayed when the cache is hit. */
  diagnostics: z.array(
    z.object({
      code: z.enum(GENERATOR_ERROR_CODES),
      severity: z.enum(GENERATOR_ERROR_SEVERITIES),
      message: z.string(),
      location: z.object({
        filePath: z.string(),
        line: z.number().int(),
        column: z.number().int(),
      }),
      suggestion: z.string().optional(),
    }),
  ),
});

type CacheSnapshot = z.infer<typeof CacheSnapshotSchema>;

export class BatchGenerator {
  generate(options: BatchGeneratorOptions): BatchResult {
    const projectDir = path.resolve(options.projectDir);
    const outputDir = path.resolve(options.outputDir);
    const cachePath = path.join(outputDir, CACHE_FILE_NAME);
    const errorCollector = new ErrorCollector();

    const files = discoverProjectFiles({
      projectDir,
      excludePaths: [outputDir],
    });
    const configuration = this.readConfiguration(
      projectDir,
      options,
      errorCollector,
    );
    const scripts = files.scripts.map((file) => readSource(projectDir, file));
    const projectSources = files.csharpSources.map((file) =>
      readSource(projectDir, file),
    );
    const stubSources = loadStubSources(options.stubDirs ?? []);

    const fingerprint = computeFingerprint(configuration, [
      ["script", scripts],
      ["project", projectSources],
      ["stub", stubSources.map((stub) => ({ ...stub, path: path.basename(stub.path) }))],
    ]);
    const cache = this.loadCache(cachePath);

    if (
      options.useCache !== false &&
      cache?.fingerprint === fingerprint &&
      cache.units.every((unit) => fs.existsSync(path.join(outputDir, unit.hintName)))
    ) {
      if (options.verbose) {
        console.log(`Bridges in ${outputDir} are up to date`);
      }
      for (const entry of cache.diagnostics) {
        errorCollector.add(
          new GeneratorError(
            entry.code,
            entry.severity,
            entry.message,
            entry.location,
            entry.suggestion,
          ),
        );
      }
      const outputs = cache.units.map((unit) => ({
        typeName: unit.typeName,
        kind: unit.kind,
        outputPath: path.join(outputDir, unit.hintName),
        written: false,
      }));
      return this.finish(errorCollector, outputs, true, options);
    }

    const catalog = buildCatalog({ stubSources, projectSources });
    const result = generateBridges({ scripts, catalog, configuration });
    for (const diagnostic of result.diagnostics) errorCollector.add(diagnostic);

    fs.mkdirSync(outputDir, { recursive: true });
    const outputs = result.units.map((unit) => {
      const outputPath = path.join(outputDir, unit.hintName);
      const written = writeIfChanged(outputPath, unit.source);
      if (options.verbose && written) {
        console.log(`Generated ${unit.typeName} -> ${outputPath}`);
      }
      return { typeName: unit.typeName, kind: unit.kind, outputPath, written };
    });

    this.removeStaleUnits(outputDir, cache, result.units, options.verbose);
    this.saveCache(cachePath, {
      version: CACHE_VERSION,
      fingerprint,
      units: result.units.map(({ hintName, typeName, kind }) => ({
        hintName,
        typeName,
        kind,
      })),
      diagnostics: result.diagnostics.map(
        ({ code, severity, message, location, suggestion }) => ({
          code,
          severity,
          message,
          location: { ...location },
          ...(suggestion !== undefined ? { suggestion } : {}),
        }),
      ),
    });

    return this.finish(errorCollector, outputs, false, options);
  }

  private finish(
    errorCollector: ErrorCollector,
    outputs: BatchFileResult[],
    skipped: boolean,
    options: BatchGeneratorOptions,
  ): BatchResult {
    const diagnostics = errorCollector.getDiagnostics();
    if (options.verbose) {
      for (const diagnostic of diagnostics) {
        console.warn(AggregateGeneratorError.formatLine(diagnostic));
      }
    }
    if (options.strict) errorCollector.throwIfErrors();

    return { outputs, skipped, diagnostics };
  }

  private readConfiguration(
    projectDir: string,
    options: BatchGeneratorOptions,
    errorCollector: ErrorCollector,
  ): Readonly<BridgeConfiguration> {
    const configPath =
      options.configPath ?? findConfigurationFile({ projectDir }) ?? undefined;
    const { configuration, problem } = loadConfiguration(configPath);
    if (problem !== undefined && configPath) {
      errorCollector.add(
        new GeneratorError(
          "ConfigurationError",
          "warning",
          `Ignoring configuration: ${problem}`,
          { filePath: configPath, line: 1, column: 1 },
          "Default settings were used for this run.",
        ),
      );
    }
    return configuration;
  }

  private removeStaleUnits(
    outputDir: string,
    cache: CacheSnapshot | null,
    units: GeneratedUnit[],
    verbose?: boolean,
  ): void {
    if (!cache) return;
    const current = new Set(units.map((unit) => unit.hintName));
    for (const unit of cache.units) {
      if (current.has(unit.hintName)) continue;
      const stalePath = path.join(outputDir, unit.hintName);
      if (!fs.existsSync(stalePath)) continue;
      fs.unlinkSync(stalePath);
      if (verbose) console.log(`Removed stale ${stalePath}`);
    }
  }

  private loadCache(cachePath: string): CacheSnapshot | null {
    if (!fs.existsSync(cachePath)) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(cachePath, "utf8"));
    } catch {
      return null;
    }
    const parsed = CacheSnapshotSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private saveCache(cachePath: string, snapshot: CacheSnapshot): void {
    fs.writeFileSync(cachePath, JSON.stringify(snapshot, null, 2), "utf8");
  }
}

/** Source text with a forward-slash path relative to the project. */
function readSource(projectDir: string, filePath: string): SourceText {
  return {
    path: normalizeSourcePath(path.relative(projectDir, filePath)),
    text: fs.readFileSync(filePath, "utf8"),
  };
}

function writeIfChanged(filePath: string, content: string): boolean {
  if (fs.existsSync(filePath) && fs.readFileSync(filePath, "utf8") === content) {
    return false;
  }
  fs.writeFileSync(filePath, content, "utf8");
  return true;
}

export function computeFingerprint(
  configuration: Readonly<BridgeConfiguration>,
  groups: Array<[string, SourceText[]]>,
): string {
  const hash = createHash("sha256");
  hash.update(JSON.stringify(configuration));
  for (const [label, sources] of groups) {
    for (const source of sources) {
      hash.update(`\0${label}\0${source.path}\0${source.text}`);
    }
  }
  return hash.digest("hex");
}
