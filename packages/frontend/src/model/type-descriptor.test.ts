/**
 * Tests for type descriptors
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  TypeDescriptor,
  arrayType,
  describeType,
  elementType,
  getTypeBound,
  isAssignableTo,
  iterableType,
  keyType,
  mapType,
  objectType,
  primitiveType,
  readonlyArrayType,
  typeEquals,
  typeKey,
  typeVariable,
  valueType,
} from "./type-descriptor.js";
import { defaultValueFor } from "./default-value.js";

const number = primitiveType("number");
const string = primitiveType("string");

describe("Type descriptors", () => {
  describe("typeKey and typeEquals", () => {
    it("should compare by name and type parameters", () => {
      expect(typeEquals(arrayType(number), arrayType(number))).to.equal(true);
      expect(typeEquals(arrayType(number), arrayType(string))).to.equal(false);
      expect(typeKey(mapType(string, arrayType(number)))).to.equal(
        "Map<string,Array<number>>"
      );
    });

    it("should terminate on self-referential descriptors", () => {
      const params: TypeDescriptor[] = [];
      const nested: TypeDescriptor = {
        kind: "builtin",
        name: "Array",
        typeParameters: params,
        container: "array",
        superTypes: [],
        properties: [],
      };
      params.push(nested);

      expect(typeKey(nested)).to.equal("Array<^0>");
      expect(describeType(nested)).to.equal("Array<Array>");
    });

    it("should include the bound of type variables", () => {
      const base = objectType("interface", "Base");
      expect(typeKey(typeVariable("T", base))).to.equal("?T extends Base");
      expect(typeKey(typeVariable("T"))).to.equal("?T");
    });
  });

  describe("getTypeBound", () => {
    it("should return the bound of a bounded variable", () => {
      const base = objectType("interface", "Base");
      expect(getTypeBound(typeVariable("T", base))).to.equal(base);
    });

    it("should return an unbounded variable itself", () => {
      const t = typeVariable("T");
      expect(getTypeBound(t)).to.equal(t);
    });

    it("should resolve container elements through their bounds", () => {
      const base = objectType("interface", "Base");
      const list = arrayType(typeVariable("T", base));
      expect(elementType(list)).to.equal(base);
      expect(keyType(mapType(string, number))).to.equal(string);
      expect(valueType(mapType(string, number))).to.equal(number);
      expect(elementType(number)).to.equal(undefined);
    });
  });

  describe("isAssignableTo", () => {
    it("should accept sub types through super types", () => {
      const person = objectType("interface", "Person");
      const employee = objectType("class", "Employee", {
        superTypes: [person],
      });
      expect(isAssignableTo(employee, person)).to.equal(true);
      expect(isAssignableTo(person, employee)).to.equal(false);
    });

    it("should accept implementation types for abstract containers", () => {
      expect(
        isAssignableTo(arrayType(number), readonlyArrayType(number))
      ).to.equal(true);
      expect(
        isAssignableTo(arrayType(number), iterableType(number))
      ).to.equal(true);
    });

    it("should keep container type parameters invariant", () => {
      const person = objectType("interface", "Person");
      const employee = objectType("class", "Employee", {
        superTypes: [person],
      });
      expect(
        isAssignableTo(arrayType(employee), arrayType(person))
      ).to.equal(false);
    });

    it("should accept anything for an unbounded variable", () => {
      expect(isAssignableTo(number, typeVariable("T"))).to.equal(true);
      expect(
        isAssignableTo(number, typeVariable("T", string))
      ).to.equal(false);
    });
  });

  describe("defaultValueFor", () => {
    it("should use literals for primitives", () => {
      expect(defaultValueFor(number)).to.deep.equal({
        kind: "literal",
        text: "0",
      });
      expect(defaultValueFor(string)).to.deep.equal({
        kind: "literal",
        text: '""',
      });
    });

    it("should build abstract containers through their implementation", () => {
      const value = defaultValueFor(readonlyArrayType(number));
      expect(value.kind).to.equal("emptyContainer");
      if (value.kind === "emptyContainer") {
        expect(typeKey(value.type)).to.equal("Array<number>");
      }
    });
  });
});
