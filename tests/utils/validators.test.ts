import { ValidationError } from "../../src/utils/errors.js";
import {
  parseExecutableName,
  parseVersionString,
} from "../../src/utils/validators.js";

describe("parseVersionString", () => {
  it("trims and accepts dotted versions", () => {
    expect(parseVersionString(" 1.2.13 ", "bad")).toBe("1.2.13");
    expect(parseVersionString("3.0.13+quic", "bad")).toBe("3.0.13+quic");
  });

  it("rejects values without a digit or with stray characters", () => {
    expect(() => parseVersionString("latest", "bad version")).toThrow(
      new ValidationError("bad version"),
    );
    expect(() => parseVersionString("1.0 beta", "bad")).toThrow(
      ValidationError,
    );
    expect(() => parseVersionString(undefined, "bad")).toThrow(
      ValidationError,
    );
  });
});

describe("parseExecutableName", () => {
  it("accepts bare file names", () => {
    expect(parseExecutableName("convert", "bad")).toBe("convert");
  });

  it("rejects paths and list delimiters", () => {
    for (const value of ["", "bin/convert", "bin\\convert", "a:b", "a;b"]) {
      expect(() => parseExecutableName(value, "bad")).toThrow(ValidationError);
    }
  });
});
