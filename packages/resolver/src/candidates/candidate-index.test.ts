/**
 * Tests for candidate method selection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { numberType, objectType, stringType } from "@mapweave/frontend";
import { ResolutionOutcome, createCandidateIndex } from "./candidate-index.js";
import { contextFor, iface, method } from "../tests/fixtures.js";

const A = iface("A", []);
const B = iface("B", []);
const caller = method("mapOrder", A, B);

const names = (outcome: ResolutionOutcome): readonly string[] => {
  switch (outcome.kind) {
    case "noMatch":
      return [];
    case "unique":
      return [outcome.method.name];
    case "ambiguous":
      return outcome.methods.map((m) => m.name);
  }
};

describe("Candidate index", () => {
  describe("qualifier precedence", () => {
    const plain = method("toText", numberType, stringType);
    const fancy = method("toFancyText", numberType, stringType, {
      qualifiers: ["fancy"],
    });
    const index = createCandidateIndex([plain, fancy]);

    it("should pick the only method carrying the requested qualifier", () => {
      const outcome = index.find(
        numberType,
        stringType,
        contextFor(caller, { qualifiers: ["fancy"] })
      );
      expect(outcome.kind).to.equal("unique");
      expect(names(outcome)).to.deep.equal(["toFancyText"]);
    });

    it("should pick the qualified method over a better named one", () => {
      const outcome = index.find(
        numberType,
        stringType,
        contextFor(caller, { qualifiers: ["fancy"], targetPropertyName: "text" })
      );
      expect(outcome.kind).to.equal("unique");
      expect(names(outcome)).to.deep.equal(["toFancyText"]);
    });

    it("should prefer unqualified methods without qualifiers", () => {
      const outcome = index.find(numberType, stringType, contextFor(caller));
      expect(names(outcome)).to.deep.equal(["toText"]);
    });

    it("should drop the filter when no method carries the qualifier", () => {
      const outcome = index.find(
        numberType,
        stringType,
        contextFor(caller, { qualifiers: ["unknown"] })
      );
      expect(outcome.kind).to.equal("ambiguous");
      expect(names(outcome)).to.deep.equal(["toText", "toFancyText"]);
    });
  });

  describe("tie-breaking", () => {
    it("should report equally named candidates as ambiguous", () => {
      const index = createCandidateIndex([
        method("mapA", A, B),
        method("mapB", A, B),
      ]);

      const outcome = index.find(A, B, contextFor(caller, { targetPropertyName: "x" }));
      expect(outcome.kind).to.equal("ambiguous");
      expect(names(outcome)).to.deep.equal(["mapA", "mapB"]);
    });

    it("should pick the method named after the target property", () => {
      const index = createCandidateIndex([
        method("toName", A, B),
        method("toTitle", A, B),
      ]);

      const outcome = index.find(
        A,
        B,
        contextFor(caller, { targetPropertyName: "title" })
      );
      expect(names(outcome)).to.deep.equal(["toTitle"]);
    });

    it("should prefer the exact signature over a super type", () => {
      const Base = objectType("class", "Base");
      const Sub = objectType("class", "Sub", { superTypes: [Base] });
      const index = createCandidateIndex([
        method("fromBase", Base, B),
        method("fromSub", Sub, B),
      ]);

      expect(names(index.find(Sub, B, contextFor(caller)))).to.deep.equal([
        "fromSub",
      ]);
      expect(names(index.find(Base, B, contextFor(caller)))).to.deep.equal([
        "fromBase",
      ]);
    });

    it("should ignore update and lifecycle methods", () => {
      const index = createCandidateIndex([
        method("after", A, B, { role: "afterMapping" }),
      ]);
      expect(index.find(A, B, contextFor(caller)).kind).to.equal("noMatch");
    });
  });

  describe("registration", () => {
    it("should return the method registered first for a known signature", () => {
      const first = method("toText", numberType, stringType);
      const again = method("toText", numberType, stringType);
      const index = createCandidateIndex([first]);

      expect(index.register(again)).to.equal(first);
      expect(index.methods()).to.have.length(1);
    });

    it("should reserve names not taken by registered methods", () => {
      const index = createCandidateIndex([method("toText", numberType, stringType)]);

      expect(index.reserveName("toText")).to.equal("toText1");
      expect(index.reserveName("toText")).to.equal("toText2");
      expect(index.reserveName("other")).to.equal("other");
    });
  });

  describe("findFactory", () => {
    it("should find zero-argument factories for a type", () => {
      const factory = method("createB", undefined, B, { role: "factory" });
      const index = createCandidateIndex([factory]);

      expect(names(index.findFactory(B, contextFor(caller)))).to.deep.equal([
        "createB",
      ]);
      expect(index.findFactory(A, contextFor(caller)).kind).to.equal("noMatch");
    });
  });
});
