import {
  ExecutableNotFoundError,
  toCliError,
} from "../../src/cli/errors.js";
import { runWhichCommand } from "../../src/cli/which.js";
import { FeatureProbe } from "../../src/probe/feature-probe.js";
import { ValidationError } from "../../src/utils/errors.js";
import { FakeHost } from "../support/fake-host.js";

function createProbe(pathValue: string | undefined): FeatureProbe {
  return new FeatureProbe({
    host: new FakeHost({
      env: { PATH: pathValue },
      files: ["/usr/local/bin/gifsicle"],
    }),
  });
}

describe("runWhichCommand", () => {
  it("returns the resolved path", () => {
    expect(
      runWhichCommand({
        name: "gifsicle",
        probe: createProbe("/usr/bin:/usr/local/bin"),
      }),
    ).toEqual({ path: "/usr/local/bin/gifsicle" });
  });

  it("names the searched PATH when nothing is found", () => {
    let caught: unknown;
    try {
      runWhichCommand({ name: "convert", probe: createProbe("/usr/bin") });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExecutableNotFoundError);
    const cliError = toCliError(caught);
    expect(cliError.headline).toBe("Executable `convert` not found.");
    expect(cliError.detailLines).toEqual(["Searched PATH: /usr/bin"]);
  });

  it("says when PATH is unset", () => {
    expect(() =>
      runWhichCommand({ name: "convert", probe: createProbe(undefined) }),
    ).toThrow(new ExecutableNotFoundError("convert", undefined));

    const error = new ExecutableNotFoundError("convert", undefined);
    expect(error.detailLines).toEqual(["PATH is not set."]);
  });

  it("rejects names containing path separators", () => {
    expect(() =>
      runWhichCommand({ name: "bin/convert", probe: createProbe("/usr/bin") }),
    ).toThrow(ValidationError);
  });
});
