/**
 * Tests for the generate and check commands
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveConfig } from "../config.js";
import type { CliOptions, ResolvedConfig } from "../types.js";
import { generateCommand } from "./generate.js";
import { checkCommand } from "./check.js";
import { importPathFor, outputFileFor } from "./pipeline.js";

const orderMapper = `
export interface Order { id: number; items: number[] }
export interface OrderDto { id: string; items: string[] }

/** @mapper */
export interface OrderMapper {
  toDto(order: Order): OrderDto;
}
`;

const brokenMapper = `
export interface Event { when: Date }
export interface EventDto { when: boolean }

/** @mapper */
export interface EventMapper {
  toDto(event: Event): EventDto;
}
`;

const withProject = (
  fileName: string,
  source: string,
  options: CliOptions,
  run: (config: ResolvedConfig, projectRoot: string) => void
): void => {
  const projectRoot = mkdtempSync(join(tmpdir(), "mapweave-generate-"));
  try {
    writeFileSync(join(projectRoot, fileName), source, "utf-8");
    const config = resolveConfig(
      {},
      { quiet: true, ...options },
      projectRoot,
      projectRoot,
      fileName
    );
    if (!config.ok) {
      throw new Error(config.error);
    }
    run(config.value, projectRoot);
  } finally {
    rmSync(projectRoot, { recursive: true, force: true });
  }
};

describe("Generate Command", () => {
  it("should write the implementation beside the source file", () => {
    withProject("order-mapper.ts", orderMapper, {}, (config, projectRoot) => {
      const result = generateCommand(config);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.outputFile).to.equal(join(projectRoot, "order-mapper.impl.ts"));
      expect(result.value.mapperCount).to.equal(1);

      const lines = readFileSync(result.value.outputFile, "utf-8").split("\n");
      expect(lines.slice(0, 6)).to.deep.equal([
        "// Generated by mapweave from order-mapper.ts",
        "// WARNING: Do not modify this file manually",
        "",
        'import type { Order, OrderDto, OrderMapper } from "./order-mapper.js";',
        "",
        "export class OrderMapperImpl implements OrderMapper {",
      ]);
    });
  });

  it("should import the mapper relative to the output directory", () => {
    withProject("order-mapper.ts", orderMapper, { out: "generated" }, (config, projectRoot) => {
      const result = generateCommand(config);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const outputFile = join(projectRoot, "generated", "order-mapper.impl.ts");
      expect(result.value.outputFile).to.equal(outputFile);
      expect(readFileSync(outputFile, "utf-8").split("\n")[3]).to.equal(
        'import type { Order, OrderDto, OrderMapper } from "../order-mapper.js";'
      );
    });
  });

  it("should fail with diagnostics and write nothing", () => {
    withProject("event-mapper.ts", brokenMapper, {}, (config, projectRoot) => {
      const result = generateCommand(config);

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("diagnostics");
      if (result.error.kind !== "diagnostics") return;
      expect(result.error.diagnostics.diagnostics.map((d) => d.code)).to.deep.equal([
        "MWV1001",
      ]);
      expect(existsSync(join(projectRoot, "event-mapper.impl.ts"))).to.equal(false);
    });
  });

  it("should report unreadable source files", () => {
    withProject("order-mapper.ts", orderMapper, {}, (config) => {
      const result = generateCommand({ ...config, sourceFile: `${config.sourceFile}.missing` });

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("io");
    });
  });
});

describe("Check Command", () => {
  it("should resolve without writing", () => {
    withProject("order-mapper.ts", orderMapper, {}, (config, projectRoot) => {
      const result = checkCommand(config);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.equal(1);
      expect(existsSync(join(projectRoot, "order-mapper.impl.ts"))).to.equal(false);
    });
  });
});

describe("Output paths", () => {
  it("should name the implementation after the source", () => {
    expect(outputFileFor(join("/work", "src", "user-mapper.ts"), undefined)).to.equal(
      join("/work", "src", "user-mapper.impl.ts")
    );
  });

  it("should import siblings with a leading ./", () => {
    expect(
      importPathFor(join("/work", "src", "user-mapper.ts"), join("/work", "src", "user-mapper.impl.ts"))
    ).to.equal("./user-mapper.js");
  });
});
