import { readFile } from "node:fs/promises";
import { ArchpickError } from "../util/errors";

export async function readCandidateFile(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ArchpickError(`failed to read candidates from ${filePath}: ${(error as Error).message}`);
  }
  return parseCandidateList(raw);
}

/**
 * Accepts a newline-separated list (blank lines and `#` comments skipped), a
 * JSON array of names, or a release object `{ "assets": [{ "name": ... }] }`.
 */
export function parseCandidateList(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed.startsWith("[") || trimmed.startsWith("{")) {
    return parseCandidateJson(trimmed);
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

function parseCandidateJson(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ArchpickError(`candidate list is not valid JSON: ${(error as Error).message}`);
  }

  if (Array.isArray(parsed)) {
    return parsed.map((value, idx) => {
      if (typeof value !== "string") {
        throw new ArchpickError(`candidate list [${idx}] must be a string`);
      }
      return value;
    });
  }

  if (parsed && typeof parsed === "object" && "assets" in parsed && Array.isArray(parsed.assets)) {
    return parsed.assets.map((asset: unknown, idx: number) => {
      if (!asset || typeof asset !== "object" || !("name" in asset) || typeof asset.name !== "string") {
        throw new ArchpickError(`assets[${idx}].name must be a string`);
      }
      return asset.name;
    });
  }

  throw new ArchpickError("candidate JSON must be an array of names or an object with an assets array");
}
