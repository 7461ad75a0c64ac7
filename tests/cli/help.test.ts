import { describe, expect, it } from "vitest";
import { createProgram } from "../../src/cli/program";

describe("cli", () => {
  it("prints help", async () => {
    let out = "";
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeOut: (s) => (out += s) });

    await expect(program.parseAsync(["node", "hours", "--help"])).rejects.toMatchObject({
      code: "commander.helpDisplayed",
    });
    expect(out).toContain("Usage: hours");
    expect(out).toContain("pray");
    expect(out).toContain("extract");
    expect(out).toContain("days");
  });
});
