/**
 * Tests for name-similarity scoring
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  levenshteinDistance,
  levenshteinSimilarity,
  stripMappingVerb,
} from "./name-similarity.js";

describe("Name similarity", () => {
  it("should compute edit distances", () => {
    expect(levenshteinDistance("kitten", "sitting")).to.equal(3);
    expect(levenshteinDistance("", "abc")).to.equal(3);
    expect(levenshteinDistance("same", "same")).to.equal(0);
  });

  it("should strip a leading mapping verb", () => {
    expect(stripMappingVerb("toUpperCase")).to.equal("uppercase");
    expect(stripMappingVerb("mapTitle")).to.equal("title");
    expect(stripMappingVerb("map")).to.equal("map");
  });

  it("should keep verbs that are part of a longer word", () => {
    expect(stripMappingVerb("totalPrice")).to.equal("totalprice");
    expect(stripMappingVerb("mapping")).to.equal("mapping");
    expect(stripMappingVerb("assignee")).to.equal("assignee");
    expect(stripMappingVerb("fromage")).to.equal("fromage");
  });

  it("should prefer the method named after the property", () => {
    const title = levenshteinSimilarity("toTitle", "title");
    const name = levenshteinSimilarity("toName", "title");

    expect(title).to.equal(1);
    expect(name).to.be.lessThan(title);
  });

  it("should score identical names equally", () => {
    expect(levenshteinSimilarity("mapA", "x")).to.equal(
      levenshteinSimilarity("mapB", "x")
    );
  });
});
