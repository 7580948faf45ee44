/**
 * Generation settings read from `gdbridge.config.json`
 */

import fs from "node:fs";
import { z } from "zod";

export const CONFIG_FILE_NAME = "gdbridge.config.json";

export const BridgeConfigurationSchema = z.object({
  appendSuffixToClassNames: z.boolean().default(false),
  generateOnlyForExistingPartial: z.boolean().default(false),
  defaultNamespace: z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    }),
});

export type BridgeConfiguration = z.infer<typeof BridgeConfigurationSchema>;

export const DEFAULT_CONFIGURATION: Readonly<BridgeConfiguration> =
  Object.freeze({
    appendSuffixToClassNames: false,
    generateOnlyForExistingPartial: false,
  });

export interface ConfigurationResult {
  configuration: Readonly<BridgeConfiguration>;
  /** Why the defaults were used, when the document was rejected. */
  problem?: string;
}

/**
 * Parse a configuration document. Anything malformed yields the defaults;
 * a document is never partially applied.
 */
export function parseConfiguration(text: string): ConfigurationResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { configuration: DEFAULT_CONFIGURATION, problem: `Invalid JSON: ${reason}` };
  }

  const parsed = BridgeConfigurationSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return {
      configuration: DEFAULT_CONFIGURATION,
      problem: `${where}${issue?.message ?? "invalid configuration"}`,
    };
  }
  return { configuration: Object.freeze(parsed.data) };
}

/** Read and parse the configuration file; no path means defaults. */
export function loadConfiguration(configPath?: string): ConfigurationResult {
  if (!configPath) return { configuration: DEFAULT_CONFIGURATION };
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { configuration: DEFAULT_CONFIGURATION, problem: reason };
  }
  return parseConfiguration(text);
}
