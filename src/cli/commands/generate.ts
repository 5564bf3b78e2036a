import { defineCommand } from "citty";

import { loadStructgenConfig, parseConfig } from "../../core/config";
import { getExitCode } from "../../core/errors";
import { defaultCommand, generate } from "../../core/generator";
import { createConsolaLogger } from "../../utils/logger";

import type { ArgsDef } from "citty";
import type { StructgenConfig } from "../../core/config";
import type { GenerateResult } from "../../core/generator";
import type { StructgenLogger } from "../../utils/logger";

interface GenerateArgs {
  input?: string;
  config?: string;
  console?: boolean;
  "out-file"?: string;
  package?: string;
  "root-type"?: string;
  prefix?: string;
}

/**
 * Build a single-target config from command line flags
 */
export function configFromArgs(args: GenerateArgs & { input: string }): StructgenConfig {
  return parseConfig(
    {
      schemas: [
        {
          input: args.input,
          output: args["out-file"],
          console: args.console ?? false,
          package: args.package,
          rootType: args["root-type"],
          prefix: args.prefix,
        },
      ],
    },
    "command line arguments",
  );
}

/**
 * Resolve the config either from a positional schema file or a config file
 */
async function resolveConfig(args: GenerateArgs): Promise<StructgenConfig> {
  if (args.input) {
    return configFromArgs({ ...args, input: args.input });
  }
  const { config } = await loadStructgenConfig({ configPath: args.config });
  return config;
}

/**
 * Display a summary of generated targets
 */
function displaySummary(logger: StructgenLogger, result: GenerateResult): void {
  const written = result.targets.filter((target) => target.output);
  if (written.length === 0) return;

  logger.box({
    title: "structgen",
    message: written
      .map((target) => `${target.input} -> ${target.rootTypeName} (${target.typeCount} types)`)
      .join("\n"),
  });
}

export const generateArgs = {
  input: {
    type: "positional",
    required: false,
    description: "File containing a valid JSON schema (omit to use the config file)",
  },
  config: {
    type: "string",
    description: "Path to config file",
  },
  console: {
    type: "boolean",
    alias: "c",
    description: "Output to console instead of file",
    default: false,
  },
  "out-file": {
    type: "string",
    alias: "o",
    description: "Filename for output; default is <schema>_schematype.go",
  },
  package: {
    type: "string",
    description: 'Package name for generated file; default is "main"',
  },
  "root-type": {
    type: "string",
    description: "Name of root type; default is generated from the filename",
  },
  prefix: {
    type: "string",
    description: "Prefix for non-root types",
  },
} satisfies ArgsDef;

export const generateCommand = defineCommand({
  meta: {
    name: "generate",
    description: "Generate Go types from JSON Schema files",
  },
  args: generateArgs,
  async run({ args }) {
    // stdout carries generated code in console mode, so diagnostics go to stderr
    const logger = createConsolaLogger({ stderr: args.console });

    try {
      const config = await resolveConfig(args);
      const command = [defaultCommand, ...process.argv.slice(2)].join(" ");

      if (!args.console) {
        logger.start("Generating Go types...");
      }
      const result = await generate({ config, logger, command });
      displaySummary(logger, result);
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      } else {
        logger.error("An unexpected error occurred");
      }
      process.exit(getExitCode(error));
    }
  },
});
