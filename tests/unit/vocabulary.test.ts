import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { buildVocabulary, loadVocabulary, parseVocabulary, parseVocabularyFile } from "../../src/config/vocabulary";
import { DEFAULT_VOCABULARY, mergeVocabulary } from "../../src/match/vocabulary";

describe("mergeVocabulary", () => {
  test("adds normalized aliases without dropping defaults", () => {
    const merged = mergeVocabulary(DEFAULT_VOCABULARY, {
      os: { linux: [" MUSL ", "linux"] },
      arch: { arm64: ["apple-silicon"] },
      auxiliarySuffixes: [".SBOM.JSON"]
    });

    expect(merged.os.linux).toEqual(["linux", "musl"]);
    expect(merged.os.windows).toEqual(["windows", "win32", "win64"]);
    expect(merged.arch.arm64).toEqual(["arm64", "aarch64", "armv8", "apple-silicon"]);
    expect(merged.auxiliarySuffixes.at(-1)).toBe(".sbom.json");
    expect(DEFAULT_VOCABULARY.os.linux).toEqual(["linux"]);
  });
});

describe("parseVocabulary", () => {
  test("maps file keys onto an extension", () => {
    expect(
      parseVocabulary({
        version: "v1",
        os: { linux: ["musl"] },
        os_suffixes: { macos: [".dmg"] },
        arch: { x64: ["x86-64"] },
        auxiliary_suffixes: [".intoto.jsonl"]
      })
    ).toEqual({
      os: { linux: ["musl"] },
      osSuffixes: { macos: [".dmg"] },
      arch: { x64: ["x86-64"] },
      auxiliarySuffixes: [".intoto.jsonl"]
    });
  });

  test("rejects an unsupported version", () => {
    expect(() => parseVocabulary({ version: "v2" })).toThrow("invalid vocabulary: /version must be equal to constant");
  });

  test("rejects unknown keys and kinds", () => {
    expect(() => parseVocabulary({ version: "v1", extra: true })).toThrow(
      "invalid vocabulary: / must NOT have additional properties"
    );
    expect(() => parseVocabulary({ version: "v1", os: { plan9: ["p9"] } })).toThrow(
      "invalid vocabulary: /os must NOT have additional properties"
    );
  });

  test("rejects empty aliases", () => {
    expect(() => parseVocabulary({ version: "v1", arch: { x64: [""] } })).toThrow(
      "invalid vocabulary: /arch/x64/0 must NOT have fewer than 1 characters"
    );
  });
});

describe("buildVocabulary", () => {
  test("rejects an alias claimed by two kinds", () => {
    expect(() => buildVocabulary({ arch: { x64: ["linux"] } })).toThrow(
      "invalid vocabulary: alias 'linux' is listed under both os.linux and arch.x64"
    );
  });
});

describe("vocabulary files", () => {
  let originalHome: string | undefined;
  let tempHome: string;

  beforeEach(async () => {
    originalHome = process.env.HOME;
    tempHome = await mkdtemp(path.join(tmpdir(), "archpick-home-"));
    process.env.HOME = tempHome;
  });

  afterEach(async () => {
    if (originalHome === undefined) {
      delete process.env.HOME;
    } else {
      process.env.HOME = originalHome;
    }
    await rm(tempHome, { recursive: true, force: true });
  });

  test("falls back to the built-in vocabulary when no home file exists", async () => {
    expect(await loadVocabulary()).toBe(DEFAULT_VOCABULARY);
  });

  test("loads the home vocabulary file when present", async () => {
    await mkdir(path.join(tempHome, ".archpick"), { recursive: true });
    await writeFile(
      path.join(tempHome, ".archpick", "vocabulary.json"),
      JSON.stringify({ version: "v1", os: { linux: ["musl"] } }),
      "utf8"
    );

    const vocabulary = await loadVocabulary();
    expect(vocabulary.os.linux).toEqual(["linux", "musl"]);
  });

  test("loads the home YAML vocabulary when no JSON file exists", async () => {
    await mkdir(path.join(tempHome, ".archpick"), { recursive: true });
    await writeFile(path.join(tempHome, ".archpick", "vocabulary.yaml"), "version: v1\nos:\n  linux:\n    - musl\n", "utf8");

    const vocabulary = await loadVocabulary();
    expect(vocabulary.os.linux).toEqual(["linux", "musl"]);
  });

  test("prefers the home JSON vocabulary over YAML", async () => {
    await mkdir(path.join(tempHome, ".archpick"), { recursive: true });
    await writeFile(
      path.join(tempHome, ".archpick", "vocabulary.json"),
      JSON.stringify({ version: "v1", os: { linux: ["musl"] } }),
      "utf8"
    );
    await writeFile(path.join(tempHome, ".archpick", "vocabulary.yaml"), "version: v1\nos:\n  linux:\n    - glibc\n", "utf8");

    const vocabulary = await loadVocabulary();
    expect(vocabulary.os.linux).toEqual(["linux", "musl"]);
  });

  test("reads YAML files", async () => {
    const filePath = path.join(tempHome, "vocabulary.yaml");
    await writeFile(filePath, "version: v1\narch:\n  arm64:\n    - apple-silicon\n", "utf8");

    const vocabulary = await loadVocabulary(filePath);
    expect(vocabulary.arch.arm64).toContain("apple-silicon");
  });

  test("requires an explicit file to exist", async () => {
    const filePath = path.join(tempHome, "missing.json");
    await expect(parseVocabularyFile(filePath)).rejects.toThrow(`invalid vocabulary: failed to read ${filePath}`);
  });

  test("reports unparsable JSON", async () => {
    const filePath = path.join(tempHome, "broken.json");
    await writeFile(filePath, "{", "utf8");
    await expect(parseVocabularyFile(filePath)).rejects.toThrow("invalid vocabulary: failed to parse JSON");
  });
});
