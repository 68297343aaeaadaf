import { expect } from "chai";
import { initLogLevel, isLevelEnabled } from "../../src";

describe("log level", () => {
  afterEach(() => initLogLevel("warn"));

  it("accepts levels in any casing", () => {
    initLogLevel("INFO");
    expect(isLevelEnabled("debug")).to.be.eq(false);
    expect(isLevelEnabled("info")).to.be.eq(true);
    expect(isLevelEnabled("error")).to.be.eq(true);
  });

  it("silences everything", () => {
    initLogLevel("silent");
    expect(isLevelEnabled("error")).to.be.eq(false);
  });

  it("rejects unknown levels", () => {
    expect(() => initLogLevel("verbose")).to.throw(RangeError, 'unknown log level "verbose"');
  });
});
