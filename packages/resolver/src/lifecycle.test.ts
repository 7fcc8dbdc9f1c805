/**
 * Tests for lifecycle callback binding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { stringType } from "@mapweave/frontend";
import { createResolutionSession } from "./session.js";
import { bindLifecycleCallbacks } from "./lifecycle.js";
import { iface, method, param, prop } from "./tests/fixtures.js";

const Person = iface("Person", [prop("name", stringType)]);
const PersonDto = iface("PersonDto", [prop("name", stringType)]);

const callback = (
  name: string,
  role: "beforeMapping" | "afterMapping",
  withTarget: boolean,
  qualifiers: readonly string[] = []
) =>
  method(name, undefined, PersonDto, {
    role,
    returnsVoid: true,
    qualifiers,
    parameters: [
      param("person", Person),
      ...(withTarget ? [param("dto", PersonDto, true)] : []),
    ],
  });

describe("Lifecycle callbacks", () => {
  const toDto = method("toDto", Person, PersonDto, { isAbstract: true });

  it("should bind sources and the target after mapping", () => {
    const audit = callback("audit", "afterMapping", true);
    const session = createResolutionSession([toDto, audit]);

    const [bound] = bindLifecycleCallbacks(session, toDto, "afterMapping");
    expect(bound?.method).to.equal(audit);
    expect(bound?.arguments.map((a) => a.kind)).to.deep.equal(["source", "target"]);
  });

  it("should not hand the target to before-mapping callbacks of creating methods", () => {
    const session = createResolutionSession([
      toDto,
      callback("prepare", "beforeMapping", true),
      callback("validate", "beforeMapping", false),
    ]);

    expect(
      bindLifecycleCallbacks(session, toDto, "beforeMapping").map((b) => b.method.name)
    ).to.deep.equal(["validate"]);
  });

  it("should bind qualified callbacks to qualified methods only", () => {
    const audited = method("toAuditedDto", Person, PersonDto, {
      isAbstract: true,
      qualifiers: ["audited"],
    });
    const session = createResolutionSession([
      toDto,
      audited,
      callback("audit", "afterMapping", false, ["audited"]),
    ]);

    expect(bindLifecycleCallbacks(session, toDto, "afterMapping")).to.deep.equal([]);
    expect(bindLifecycleCallbacks(session, audited, "afterMapping")).to.have.length(1);
  });

  it("should skip callbacks whose parameters can't be fed", () => {
    const Other = iface("Other", []);
    const session = createResolutionSession([
      toDto,
      method("onOther", undefined, PersonDto, {
        role: "afterMapping",
        returnsVoid: true,
        parameters: [param("other", Other)],
      }),
    ]);

    expect(bindLifecycleCallbacks(session, toDto, "afterMapping")).to.deep.equal([]);
  });
});
