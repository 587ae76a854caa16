import {
  ExtensionNotLoadedError,
  ExtensionVersionError,
} from "../../src/cli/errors.js";
import { runExtensionCommand } from "../../src/cli/extension.js";
import { FeatureProbe } from "../../src/probe/feature-probe.js";
import { FakeHost } from "../support/fake-host.js";

const probe = new FeatureProbe({
  host: new FakeHost({ components: { zlib: "1.3.0.1" } }),
});

describe("runExtensionCommand", () => {
  it("prints the loaded version", () => {
    expect(runExtensionCommand({ name: "zlib", probe })).toEqual({
      name: "zlib",
      version: "1.3.0.1",
      body: "zlib 1.3.0.1",
    });
  });

  it("includes a satisfied floor", () => {
    expect(
      runExtensionCommand({ name: "zlib", minVersion: "1.2", probe }).body,
    ).toBe("zlib 1.3.0.1 (>= 1.2)");
  });

  it("fails when the loaded version is below the floor", () => {
    expect(() =>
      runExtensionCommand({ name: "zlib", minVersion: "2", probe }),
    ).toThrow(ExtensionVersionError);
    expect(() =>
      runExtensionCommand({ name: "zlib", minVersion: "2", probe }),
    ).toThrow("Runtime component `zlib` 1.3.0.1 is older than 2.");
  });

  it("fails when the component is not loaded", () => {
    expect(() => runExtensionCommand({ name: "brotli", probe })).toThrow(
      ExtensionNotLoadedError,
    );
    expect(() =>
      runExtensionCommand({ name: "brotli", minVersion: "1.0", probe }),
    ).toThrow("Runtime component `brotli` is not loaded.");
  });
});
