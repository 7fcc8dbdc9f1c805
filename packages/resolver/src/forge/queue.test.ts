/**
 * Tests for the forge work queue
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { arrayType, numberType, setType, stringType } from "@mapweave/frontend";
import { ForgeEntry, createForgeQueue } from "./queue.js";
import { forgedMethod, method } from "../tests/fixtures.js";

const requester = method("mapAll", arrayType(numberType), arrayType(stringType));

const entry = (
  name: string,
  source = arrayType(numberType),
  target = arrayType(stringType)
): ForgeEntry => ({
  method: forgedMethod(name, source, target, requester),
  source,
  target,
});

describe("Forge queue", () => {
  it("should enqueue a signature once", () => {
    const queue = createForgeQueue();

    expect(queue.enqueue(entry("first"))).to.equal(true);
    expect(queue.enqueue(entry("second"))).to.equal(false);
    expect(queue.size()).to.equal(1);
  });

  it("should drain first in first out, including entries added while draining", () => {
    const queue = createForgeQueue();
    const nested = entry("nested", setType(numberType), setType(stringType));
    queue.enqueue(entry("outer"));
    queue.enqueue(entry("other", arrayType(stringType), arrayType(numberType)));

    const built: string[] = [];
    const drained = queue.drain((current) => {
      built.push(current.method.name);
      if (current.method.name === "outer") {
        queue.enqueue(nested);
      }
    });

    expect(built).to.deep.equal(["outer", "other", "nested"]);
    expect(drained).to.equal(3);
    expect(queue.size()).to.equal(0);
  });

  it("should mark entries in flight while they are built", () => {
    const queue = createForgeQueue();
    const current = entry("outer");
    queue.enqueue(current);

    const seen: boolean[] = [];
    queue.drain((e) => seen.push(queue.isInFlight(e.method)));

    expect(seen).to.deep.equal([true]);
    expect(queue.isInFlight(current.method)).to.equal(false);
  });

  it("should clear the in-flight marker when building throws", () => {
    const queue = createForgeQueue();
    const tracked = entry("outer").method;

    expect(() =>
      queue.track(tracked, () => {
        throw new Error("boom");
      })
    ).to.throw("boom");
    expect(queue.isInFlight(tracked)).to.equal(false);
  });
});
