/**
 * Tests for mapper generation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  TypeDescriptor,
  arrayType,
  bigintType,
  mapType,
  numberType,
  stringType,
} from "@mapweave/frontend";
import { generateMapper, resolveMapper } from "./mapper-generator.js";
import {
  BeanMappingMethod,
  ContainerMappingMethod,
  MappingMethod,
} from "./builders/types.js";
import { abstractMethod, iface, mapper, method, prop } from "./tests/fixtures.js";

const beanOf = (m: MappingMethod | undefined): BeanMappingMethod => {
  if (m?.kind !== "bean") {
    throw new Error("Expected a bean mapping method");
  }
  return m;
};

const containerOf = (m: MappingMethod | undefined): ContainerMappingMethod => {
  if (m?.kind !== "container") {
    throw new Error("Expected a container mapping method");
  }
  return m;
};

/** `Array<Array<...>>` whose element is the type itself */
const selfContaining = (name: "Array" | "Set"): TypeDescriptor => {
  const typeParameters: TypeDescriptor[] = [];
  const type: TypeDescriptor = {
    kind: "builtin",
    name,
    typeParameters,
    container: name === "Array" ? "array" : "set",
    superTypes: [],
    properties: [],
  };
  typeParameters.push(type);
  return type;
};

const codes = (m: ReturnType<typeof resolveMapper>): readonly string[] =>
  m.diagnostics.diagnostics.map((d) => d.code);

describe("Mapper generation", () => {
  describe("lists", () => {
    const Source = iface("Source", [
      prop("tags", arrayType(numberType)),
      prop("codes", arrayType(numberType)),
    ]);
    const Target = iface("Target", [
      prop("tags", arrayType(stringType)),
      prop("codes", arrayType(stringType)),
    ]);

    it("should forge one element-wise method for both properties", () => {
      const { generated, diagnostics } = resolveMapper(
        mapper([abstractMethod("toTarget", Source, Target)])
      );

      expect(diagnostics.diagnostics).to.deep.equal([]);
      expect(generated.methods.map((m) => m.method.name)).to.deep.equal([
        "toTarget",
        "numberArrayToStringArray",
      ]);

      const bean = beanOf(generated.methods[0]);
      const forged = containerOf(generated.methods[1]);
      for (const mapping of bean.propertyMappings) {
        expect(mapping.assignment.kind).to.equal("methodCall");
        if (mapping.assignment.kind === "methodCall") {
          expect(mapping.assignment.method).to.equal(forged.method);
        }
      }
    });

    it("should convert every element in the forged body", () => {
      const { generated } = resolveMapper(
        mapper([abstractMethod("toTarget", Source, Target)])
      );
      const forged = containerOf(generated.methods[1]);
      const shape = forged.mapping.shape;

      expect(shape.kind).to.equal("iterable");
      if (shape.kind === "iterable") {
        expect(shape.elementVariable).to.equal("number");
        expect(shape.element.kind).to.equal("converted");
        expect(shape.element.sourceReference).to.equal("number");
      }
      expect(forged.mapping.sourceReference).to.equal("array");
      expect(forged.mapping.construction.kind).to.equal("default");
    });
  });

  describe("maps", () => {
    it("should resolve keys and values separately", () => {
      const { generated, diagnostics } = resolveMapper(
        mapper([
          abstractMethod(
            "toLabels",
            mapType(stringType, numberType),
            mapType(stringType, stringType)
          ),
        ])
      );

      expect(diagnostics.hasErrors).to.equal(false);
      expect(generated.methods).to.have.length(1);
      const shape = containerOf(generated.methods[0]).mapping.shape;
      if (shape.kind !== "map") {
        throw new Error("Expected a map shape");
      }

      expect(shape.entryVariable).to.equal("entry");
      expect(shape.key.name).to.equal("key");
      expect(shape.key.inner.kind).to.equal("direct");
      expect(shape.key.inner.sourceReference).to.equal("entry[0]");
      expect(shape.value.name).to.equal("value");
      expect(shape.value.inner.kind).to.equal("converted");
      expect(shape.value.inner.sourceReference).to.equal("entry[1]");
    });

    it("should report an unmappable map value on the declared method", () => {
      const A = iface("A", []);
      const B = iface("B", []);
      const result = resolveMapper(
        mapper([abstractMethod("toBs", mapType(stringType, A), mapType(stringType, B))])
      );

      expect(codes(result)).to.deep.equal(["MWV1005"]);
      expect(result.generated.methods).to.have.length(0);
    });
  });

  describe("ambiguity", () => {
    it("should report mapA and mapB as candidates", () => {
      const A = iface("A", []);
      const B = iface("B", []);
      const Source = iface("Source", [prop("x", A)]);
      const Target = iface("Target", [prop("x", B)]);

      const result = resolveMapper(
        mapper([
          abstractMethod("toTarget", Source, Target),
          method("mapA", A, B),
          method("mapB", A, B),
        ])
      );

      const [diagnostic] = result.diagnostics.diagnostics;
      expect(codes(result)).to.deep.equal(["MWV1002"]);
      expect(diagnostic?.candidates).to.deep.equal(["mapA", "mapB"]);
      expect(diagnostic?.message).to.equal(
        `Ambiguous mapping methods found for mapping property 'x' "A" to "B" in method 'toTarget'.`
      );
    });
  });

  describe("forged failures", () => {
    it("should report an unmappable element once on the declared method", () => {
      const A = iface("A", []);
      const B = iface("B", []);
      const Source = iface("Source", [prop("items", arrayType(A))]);
      const Target = iface("Target", [prop("items", arrayType(B))]);

      const result = resolveMapper(mapper([abstractMethod("toTarget", Source, Target)]));

      expect(codes(result)).to.deep.equal(["MWV1003"]);
      expect(result.diagnostics.diagnostics[0]?.message).to.equal(
        `Can't map iterable element "A" to "B" in method 'toTarget'.`
      );
      expect(result.generated.methods.map((m) => m.method.name)).to.deep.equal([
        "toTarget",
      ]);
    });

    it("should name the innermost element of nested containers", () => {
      const A = iface("A", []);
      const B = iface("B", []);
      const Source = iface("Source", [prop("items", arrayType(arrayType(A)))]);
      const Target = iface("Target", [prop("items", arrayType(arrayType(B)))]);

      const result = resolveMapper(mapper([abstractMethod("toTarget", Source, Target)]));

      expect(codes(result)).to.deep.equal(["MWV1003"]);
      expect(result.diagnostics.diagnostics[0]?.message).to.equal(
        `Can't map iterable element "A" to "B" in method 'toTarget'.`
      );
      expect(result.generated.methods).to.have.length(1);
    });

    it("should reject a container that contains itself", () => {
      const Source = iface("Source", [prop("items", selfContaining("Array"))]);
      const Target = iface("Target", [prop("items", selfContaining("Set"))]);

      const result = resolveMapper(mapper([abstractMethod("toTarget", Source, Target)]));

      expect(codes(result)).to.deep.equal(["MWV1006", "MWV1003"]);
      expect(result.generated.methods).to.have.length(1);
    });
  });

  describe("thrown types", () => {
    it("should propagate thrown types through forged callers", () => {
      const Source = iface("Source", [prop("ids", arrayType(arrayType(stringType)))]);
      const Target = iface("Target", [prop("ids", arrayType(arrayType(bigintType)))]);

      const { generated } = resolveMapper(
        mapper([abstractMethod("toTarget", Source, Target)])
      );

      expect(generated.methods.map((m) => m.method.name)).to.deep.equal([
        "toTarget",
        "stringArrayArrayToBigintArrayArray",
        "stringArrayToBigintArray",
      ]);
      for (const forged of generated.methods.slice(1)) {
        expect([...forged.method.thrownTypes]).to.deep.equal(["SyntaxError"]);
      }
    });
  });

  describe("method shapes", () => {
    it("should reject abstract methods without a source", () => {
      const Target = iface("Target", []);
      const result = resolveMapper(mapper([abstractMethod("create", undefined, Target)]));

      expect(codes(result)).to.deep.equal(["MWV1012"]);
      expect(result.diagnostics.diagnostics[0]?.message).to.equal(
        "Can't generate method 'create': a mapping method needs at least one source parameter."
      );
    });

    it("should reject container to bean methods", () => {
      const Target = iface("Target", []);
      const result = resolveMapper(
        mapper([abstractMethod("first", arrayType(stringType), Target)])
      );

      expect(codes(result)).to.deep.equal(["MWV1012"]);
    });
  });

  describe("generateMapper", () => {
    it("should fail with the collected diagnostics", () => {
      const A = iface("A", []);
      const B = iface("B", []);
      const result = generateMapper(
        mapper([abstractMethod("toBs", arrayType(A), arrayType(B))])
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
          "MWV1003",
        ]);
      }
    });

    it("should collect named types for imports", () => {
      const Source = iface("Source", [prop("name", stringType)]);
      const Target = iface("Target", [prop("name", stringType)]);
      const result = generateMapper(
        mapper([
          abstractMethod("toTargets", arrayType(Source), arrayType(Target)),
          abstractMethod("toTarget", Source, Target),
        ])
      );

      if (!result.ok) {
        throw new Error("Expected generation to succeed");
      }
      expect(result.value.generated.importTypes.map((t) => t.name)).to.deep.equal([
        "Source",
        "Target",
      ]);
    });
  });
});
