import { parseCliArguments } from "../src/conversion/cli-arguments";
import { CliUsageError } from "../src/conversion/errors";

describe("parseCliArguments", () => {
  it("should ask for help when no arguments are given", () => {
    expect(parseCliArguments([])).toEqual({ kind: "help" });
  });

  it("should derive a convert command from a single image path", () => {
    expect(parseCliArguments(["disc.img"])).toEqual({
      kind: "convert",
      imagePath: "disc.img",
      force: false,
    });
  });

  it("should accept an output path and the force flag in any position", () => {
    expect(parseCliArguments(["disc.img", "--force", "out.iso"])).toEqual({
      kind: "convert",
      imagePath: "disc.img",
      isoPath: "out.iso",
      force: true,
    });
  });

  it.each(["-?", "-h", "--help"])("should return help for %s", (flag) => {
    expect(parseCliArguments(["disc.img", flag])).toEqual({ kind: "help" });
  });

  it.each(["-v", "--version"])("should return version for %s", (flag) => {
    expect(parseCliArguments([flag])).toEqual({ kind: "version" });
  });

  it("should treat arguments after -- as paths", () => {
    expect(parseCliArguments(["--", "-odd.img"])).toEqual({
      kind: "convert",
      imagePath: "-odd.img",
      force: false,
    });
  });

  it("should reject unknown options", () => {
    expect(() => parseCliArguments(["-x", "disc.img"])).toThrow(
      new CliUsageError("unrecognized arguments: -x"),
    );
  });

  it("should require an image path", () => {
    expect(() => parseCliArguments(["-f"])).toThrow(
      "the following arguments are required: img",
    );
  });

  it("should reject more than two paths", () => {
    expect(() => parseCliArguments(["a.img", "a.iso", "b", "c"])).toThrow(
      "unrecognized arguments: b c",
    );
  });
});
