/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import type { MapweaveConfig } from "./types.js";

const root = resolve("/work/project");

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should use config values as defaults", () => {
      const config: MapweaveConfig = {
        outputDirectory: "src/generated",
        nullValueStrategy: "mapToDefault",
        unmappedTargetPolicy: "error",
        emit: { indent: 4, header: "Generated code" },
      };

      const result = resolveConfig(config, {}, root, join(root, "src"), "user-mapper.ts");
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.outputDirectory).to.equal(join(root, "src", "generated"));
      expect(result.value.sourceFile).to.equal(join(root, "src", "user-mapper.ts"));
      expect(result.value.nullValueStrategy).to.equal("mapToDefault");
      expect(result.value.unmappedTargetPolicy).to.equal("error");
      expect(result.value.indent).to.equal(4);
      expect(result.value.header).to.equal("Generated code");
      expect(result.value.verbose).to.equal(false);
    });

    it("should override config with CLI options", () => {
      const config: MapweaveConfig = {
        outputDirectory: "src/generated",
        unmappedTargetPolicy: "error",
      };

      const result = resolveConfig(
        config,
        { out: "out", unmappedTargetPolicy: "ignore", verbose: true },
        root,
        join(root, "packages")
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.outputDirectory).to.equal(join(root, "packages", "out"));
      expect(result.value.unmappedTargetPolicy).to.equal("ignore");
      expect(result.value.verbose).to.equal(true);
      expect(result.value.sourceFile).to.equal(undefined);
    });

    it("should leave unset values to the mapper", () => {
      const result = resolveConfig({}, {}, root, root);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.outputDirectory).to.equal(undefined);
      expect(result.value.nullValueStrategy).to.equal(undefined);
      expect(result.value.indent).to.equal(2);
    });

    it("should reject unknown strategies", () => {
      const result = resolveConfig({}, { nullValueStrategy: "skip" }, root, root);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "--null-value-strategy must be one of propagate, mapToDefault, got 'skip'"
      );
    });
  });

  describe("validateConfig", () => {
    it("should accept an empty object", () => {
      const result = validateConfig({});
      expect(result.ok).to.equal(true);
    });

    it("should reject a non-object", () => {
      const result = validateConfig(["generate"]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal("mapweave.json: expected a JSON object");
    });

    it("should reject a wrong policy", () => {
      const result = validateConfig({ unmappedTargetPolicy: "loud" });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "mapweave.json: 'unmappedTargetPolicy' must be one of ignore, warn, error"
      );
    });

    it("should reject a negative indent", () => {
      const result = validateConfig({ emit: { indent: -1 } });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "mapweave.json: 'emit.indent' must be a non-negative integer"
      );
    });
  });

  describe("loadConfig and findConfig", () => {
    it("should find the nearest mapweave.json above a directory", () => {
      const projectRoot = mkdtempSync(join(tmpdir(), "mapweave-config-"));

      try {
        const nested = join(projectRoot, "src", "mappers");
        mkdirSync(nested, { recursive: true });
        writeFileSync(
          join(projectRoot, "mapweave.json"),
          JSON.stringify({ outputDirectory: "generated" }),
          "utf-8"
        );

        const found = findConfig(nested);
        expect(found).to.equal(join(projectRoot, "mapweave.json"));
        if (!found) return;

        const loaded = loadConfig(found);
        expect(loaded.ok).to.equal(true);
        if (!loaded.ok) return;
        expect(loaded.value.outputDirectory).to.equal("generated");
      } finally {
        rmSync(projectRoot, { recursive: true, force: true });
      }
    });

    it("should report malformed JSON", () => {
      const projectRoot = mkdtempSync(join(tmpdir(), "mapweave-config-"));

      try {
        const configPath = join(projectRoot, "mapweave.json");
        writeFileSync(configPath, "{ outputDirectory: ", "utf-8");

        const loaded = loadConfig(configPath);
        expect(loaded.ok).to.equal(false);
        if (loaded.ok) return;
        expect(loaded.error.startsWith("Failed to parse mapweave.json: ")).to.equal(true);
      } finally {
        rmSync(projectRoot, { recursive: true, force: true });
      }
    });

    it("should report a missing file", () => {
      const loaded = loadConfig(join(root, "missing.json"));
      expect(loaded.ok).to.equal(false);
      if (loaded.ok) return;
      expect(loaded.error).to.equal(`Config file not found: ${join(root, "missing.json")}`);
    });
  });
});
