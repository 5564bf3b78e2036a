import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import { generateDefaultConfig } from "../../core/config";

export const configFileName = "structgen.config.ts";

/**
 * Write the default config file into a directory
 *
 * @returns the path of the written file
 * @throws when the file exists and `force` isn't set
 */
export async function writeDefaultConfig(options: {
  cwd: string;
  force?: boolean;
}): Promise<string> {
  const configPath = join(options.cwd, configFileName);

  if (existsSync(configPath) && !options.force) {
    throw new Error(
      `Config file already exists at ${configPath}. Use --force to overwrite.`,
    );
  }

  await writeFile(configPath, generateDefaultConfig(), "utf-8");
  return configPath;
}

export const initCommand = defineCommand({
  meta: {
    name: "init",
    description: "Initialize a structgen configuration file",
  },
  args: {
    force: {
      type: "boolean",
      alias: "f",
      description: "Overwrite existing config file",
      default: false,
    },
  },
  async run({ args }) {
    try {
      await writeDefaultConfig({ cwd: process.cwd(), force: args.force });
    } catch (error) {
      consola.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }

    consola.success(`Created ${configFileName}`);
    consola.info("Next steps:");
    consola.info(`  1. Point "input" at your JSON Schema file in ${configFileName}`);
    consola.info("  2. Run `structgen generate` to generate Go types");
  },
});
