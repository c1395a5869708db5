import { describe, expect, test } from "vitest";
import { filterByMarkers, matchesMarkers, preferMarkers } from "../../src/match/markers";

describe("filterByMarkers", () => {
  test("matches anywhere by default", () => {
    expect(filterByMarkers(["foo", "bar", "baz"], { markers: ["a"] })).toEqual(["bar", "baz"]);
  });

  test("honors the marker position", () => {
    expect(filterByMarkers(["asdfoo123"], { markers: ["foo"], position: "start" })).toEqual([]);
    expect(filterByMarkers(["asdfoo123"], { markers: ["asd"], position: "start" })).toEqual(["asdfoo123"]);
    expect(filterByMarkers(["asdfoo123"], { markers: ["123"], position: "end" })).toEqual(["asdfoo123"]);
    expect(filterByMarkers(["asdfoo123"], { markers: ["foo"], position: "end" })).toEqual([]);
  });

  test("combines markers with any or all", () => {
    const list = ["12", "13", "23", "34", "21"];
    expect(filterByMarkers(list, { markers: ["1", "2"], combination: "any" })).toEqual(["12", "13", "23", "21"]);
    expect(filterByMarkers(list, { markers: ["1", "2"], combination: "all" })).toEqual(["12", "21"]);
  });

  test("ignores case unless asked not to", () => {
    expect(filterByMarkers(["App.EXE"], { markers: [".exe"], position: "end" })).toEqual(["App.EXE"]);
    expect(filterByMarkers(["App.EXE"], { markers: [".exe"], position: "end", caseSensitive: true })).toEqual([]);
  });

  test("treats an empty marker list as none for any and all for all", () => {
    expect(filterByMarkers(["a", "b"], { markers: [] })).toEqual([]);
    expect(filterByMarkers(["a", "b"], { markers: [], combination: "all" })).toEqual(["a", "b"]);
  });
});

describe("preferMarkers", () => {
  test("moves matching candidates first and keeps relative order", () => {
    expect(preferMarkers(["foo", "bar", "baz"], { markers: ["a"] })).toEqual(["bar", "baz", "foo"]);
    expect(preferMarkers(["x.zip", "y.tar.gz", "z.zip"], { markers: [".tar.gz"], position: "end" })).toEqual([
      "y.tar.gz",
      "x.zip",
      "z.zip"
    ]);
  });
});

describe("matchesMarkers", () => {
  test("tests a single candidate", () => {
    expect(matchesMarkers("tool-linux-x64", { markers: ["tool"], position: "start" })).toBe(true);
    expect(matchesMarkers("tool-linux-x64", { markers: ["linux", "arm64"], combination: "all" })).toBe(false);
  });
});
