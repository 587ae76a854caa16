import { vol } from "memfs";

import { runCheckCommand } from "../../src/cli/check.js";
import { RequirementsConfigError } from "../../src/configs/requirements/errors.js";
import { FeatureProbe } from "../../src/probe/feature-probe.js";
import { stripAnsi } from "../support/ansi.js";
import { FakeHost } from "../support/fake-host.js";

function readFromVolume(path: string): string {
  return vol.readFileSync(path, "utf8").toString();
}

function createProbe(): FeatureProbe {
  return new FeatureProbe({
    host: new FakeHost({
      env: { PATH: "/usr/bin" },
      files: ["/usr/bin/convert"],
      components: { openssl: "3.0.13+quic" },
      callables: ["fs.symlink"],
    }),
  });
}

describe("runCheckCommand", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("passes when every requirement is met", () => {
    vol.fromJSON({
      "/repo/hostprobe.yaml": [
        "extensions:",
        "  - name: openssl",
        '    minVersion: "3.0.13"',
        "features:",
        "  - symLink",
        "  - imageConvert",
        "",
      ].join("\n"),
    });

    const result = runCheckCommand({
      root: "/repo",
      readFile: readFromVolume,
      probe: createProbe(),
    });

    expect(result.satisfied).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(stripAnsi(result.body).split("\n").at(-1)).toBe(
      "All 3 requirements met.",
    );
  });

  it("fails when a requirement is unmet", () => {
    vol.fromJSON({
      "/repo/ci/probe.yaml": "executables:\n  - identify\n",
    });

    const result = runCheckCommand({
      root: "/repo",
      configPath: "ci/probe.yaml",
      readFile: readFromVolume,
      probe: createProbe(),
    });

    expect(result.satisfied).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(stripAnsi(result.body).split("\n")).toEqual([
      "Config: /repo/ci/probe.yaml",
      "",
      "KIND        REQUIREMENT  STATUS   DETAIL",
      "executable  identify     missing  not found on PATH",
      "",
      "1 of 1 requirements unmet.",
    ]);
  });

  it("reports a missing requirements file as empty", () => {
    const result = runCheckCommand({
      root: "/repo",
      readFile: readFromVolume,
      probe: createProbe(),
    });

    expect(result).toEqual({
      body: "No requirements declared in /repo/hostprobe.yaml.",
      satisfied: true,
      exitCode: 0,
    });
  });

  it("surfaces invalid requirements files", () => {
    vol.fromJSON({ "/repo/hostprobe.yaml": "features: symLink\n" });

    expect(() =>
      runCheckCommand({
        root: "/repo",
        readFile: readFromVolume,
        probe: createProbe(),
      }),
    ).toThrow(RequirementsConfigError);
  });
});
