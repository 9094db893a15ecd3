import { describe, it } from "mocha";
import { expect } from "chai";

import {
  ERROR_CODES,
  ERROR_TEXT_MAX_LENGTH,
  InvalidArgumentError,
  isInvalidArgumentError,
  normaliseErrorMessage,
} from "../src/types.js";

describe("error helpers", () => {
  it("flattens the catalogue into family-prefixed keys", () => {
    expect(ERROR_CODES.GRAPH_SELF_LOOP).to.equal("E-GRAPH-SELF-LOOP");
    expect(ERROR_CODES.QUEUE_CAPACITY).to.equal("E-QUEUE-CAPACITY");
    expect(ERROR_CODES.PATH_NODE_RANGE).to.equal("E-PATH-NODE-RANGE");
    expect(Object.isFrozen(ERROR_CODES)).to.equal(true);
  });

  it("collapses whitespace and enforces the maximum length on messages", () => {
    expect(normaliseErrorMessage("  multi\nline\tmessage  ")).to.equal("multi line message");
    expect(normaliseErrorMessage("   ")).to.equal("unexpected error");

    const truncated = normaliseErrorMessage("W".repeat(ERROR_TEXT_MAX_LENGTH + 10));
    expect(truncated.length).to.equal(ERROR_TEXT_MAX_LENGTH);
    expect(truncated.endsWith("…")).to.equal(true);
  });

  it("carries a code, an optional hint and details", () => {
    const error = new InvalidArgumentError(ERROR_CODES.GRAPH_WEIGHT, "Weight  must be\nnon-negative", {
      hint: "use a weight >= 0",
      details: { weight: -2 },
    });
    expect(error).to.be.instanceOf(Error);
    expect(error.name).to.equal("InvalidArgumentError");
    expect(error.message).to.equal("Weight must be non-negative");
    expect(error.code).to.equal("E-GRAPH-WEIGHT");
    expect(error.hint).to.equal("use a weight >= 0");
    expect(error.details).to.deep.equal({ weight: -2 });

    const bare = new InvalidArgumentError(ERROR_CODES.QUEUE_ELEMENT, "absent");
    expect(bare.hint).to.equal(undefined);
    expect(bare.details).to.equal(undefined);
  });

  it("recognises invalid argument errors", () => {
    expect(isInvalidArgumentError(new InvalidArgumentError(ERROR_CODES.GRAPH_NODE_COUNT, "bad"))).to.equal(true);
    expect(isInvalidArgumentError(new RangeError("bad"))).to.equal(false);
    expect(isInvalidArgumentError("bad")).to.equal(false);
  });
});
