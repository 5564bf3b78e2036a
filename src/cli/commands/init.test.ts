import { existsSync } from "node:fs";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { configFileName, writeDefaultConfig } from "./init";

// We test the logic directly rather than the citty command
// to avoid mocking process.cwd() and process.exit()

describe("init command logic", () => {
  const testDir = join(__dirname, ".test-init");
  const configPath = join(testDir, configFileName);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("when config file does not exist", () => {
    it("creates a config file with template content", async () => {
      const written = await writeDefaultConfig({ cwd: testDir });

      expect(written).toBe(configPath);
      expect(existsSync(configPath)).toBe(true);
      const content = await readFile(configPath, "utf-8");
      expect(content).toContain("export default defineConfig");
    });
  });

  describe("when config file already exists", () => {
    beforeEach(async () => {
      await writeFile(configPath, "existing content", "utf-8");
    });

    it("refuses to overwrite it", async () => {
      await expect(writeDefaultConfig({ cwd: testDir })).rejects.toThrow(
        `Config file already exists at ${configPath}. Use --force to overwrite.`,
      );
      expect(await readFile(configPath, "utf-8")).toBe("existing content");
    });

    it("can be forced to overwrite", async () => {
      await writeDefaultConfig({ cwd: testDir, force: true });

      const content = await readFile(configPath, "utf-8");
      expect(content).toContain("defineConfig");
    });
  });
});
