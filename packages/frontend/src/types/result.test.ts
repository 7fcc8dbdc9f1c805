/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Result, ok, error } from "./result.js";

const parsePort = (text: string): Result<number, string> => {
  const port = Number(text);
  return Number.isInteger(port) && port > 0 ? ok(port) : error(`Invalid port '${text}'`);
};

describe("Result", () => {
  it("should carry the value of a success", () => {
    const result = parsePort("8080");

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value).to.equal(8080);
    }
  });

  it("should carry the error of a failure", () => {
    const result = parsePort("http");

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.equal("Invalid port 'http'");
    }
  });
});
