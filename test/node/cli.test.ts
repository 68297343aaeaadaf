import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ZodError } from "zod";
import { parseInputs, runCli } from "../../src/cli";

describe("inputs file", () => {
  it("defaults to an empty key", () => {
    expect(parseInputs('{"in":"00ff","output_size":32}')).to.be.deep.eq({
      in: "00ff",
      key: "",
      output_size: 32,
    });
  });

  it("rejects malformed inputs", () => {
    expect(() => parseInputs('{"in":"0","output_size":32}')).to.throw(ZodError);
    expect(() => parseInputs('{"in":"zz","output_size":32}')).to.throw(ZodError);
    expect(() => parseInputs('{"in":"","output_size":65}')).to.throw(ZodError);
    expect(() => parseInputs('{"in":"","key":"00"}')).to.throw(ZodError);
  });
});

describe("runCli", function () {
  this.timeout(120000);

  let dir = "";
  let inputsPath = "";

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "blake2b-circuit-"));
    inputsPath = join(dir, "inputs.json");
    writeFileSync(inputsPath, JSON.stringify({ in: "000102030405060708090a0b0c0d0e0f", key: "0a0b", output_size: 32 }));
  });

  after(() => rmSync(dir, { recursive: true, force: true }));

  it("proves the inputs of a file", () => {
    expect(runCli([inputsPath, "--optimization", "spread"])).to.be.eq(0);
  });

  it("prints its version", () => {
    expect(runCli(["--version"])).to.be.eq(0);
  });

  it("rejects unknown optimizations and a missing inputs path", () => {
    expect(runCli([inputsPath, "-o", "fastest"])).to.be.eq(2);
    expect(runCli([])).to.be.eq(2);
  });

  it("rejects unknown flags as a usage error", () => {
    expect(runCli([inputsPath, "--fastest"])).to.be.eq(2);
    expect(runCli([inputsPath, "--optimization"])).to.be.eq(2);
    expect(runCli([inputsPath, "--log-level", "loud"])).to.be.eq(2);
  });
});
