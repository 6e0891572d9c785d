import { describe, expect, it } from "vitest";
import { parseThetaRho } from "./pattern";

describe("parseThetaRho", () => {
  it("keeps valid pairs and drops comments, blanks and bad lines", () => {
    const result = parseThetaRho("# comment\n\n1.0 2.0\nbad line\n3.0 4.0\n");

    expect(result.coordinates).toEqual([
      { theta: 1, rho: 2 },
      { theta: 3, rho: 4 },
    ]);
    expect(result.skipped).toEqual([{ lineNumber: 4, text: "bad line" }]);
  });

  it("accepts tabs, repeated spaces, signs and exponents", () => {
    const { coordinates } = parseThetaRho(["  -1.5\t\t0.25  ", "+2 1e-3", ".5 3."]);

    expect(coordinates).toEqual([
      { theta: -1.5, rho: 0.25 },
      { theta: 2, rho: 0.001 },
      { theta: 0.5, rho: 3 },
    ]);
  });

  it("skips lines without exactly two numeric tokens", () => {
    const { coordinates, skipped } = parseThetaRho([
      "1.0",
      "1.0 2.0 3.0",
      "nan 1.0",
      "inf 2",
      "0x10 1",
      "1,0 2",
      "4 5",
    ]);

    expect(coordinates).toEqual([{ theta: 4, rho: 5 }]);
    expect(skipped.map((line) => line.lineNumber)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("handles CRLF line endings", () => {
    const { coordinates } = parseThetaRho("0 0\r\n1 1\r\n");

    expect(coordinates).toEqual([
      { theta: 0, rho: 0 },
      { theta: 1, rho: 1 },
    ]);
  });

  it("returns nothing for a source with no valid lines", () => {
    expect(parseThetaRho("").coordinates).toEqual([]);
    expect(parseThetaRho("# only a header\n").coordinates).toEqual([]);
  });
});
