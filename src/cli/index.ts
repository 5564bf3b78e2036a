import { defineCommand, runMain } from "citty";

import { generateCommand } from "./commands/generate";
import { initCommand } from "./commands/init";

const main = defineCommand({
  meta: {
    name: "structgen",
    version: "0.1.0",
    description: "Generate Go types from JSON Schema",
  },
  subCommands: {
    init: initCommand,
    generate: generateCommand,
  },
});

export function run() {
  return runMain(main);
}
