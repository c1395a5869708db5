import { homedir } from "node:os";
import path from "node:path";

export function archpickHome(): string {
  return path.join(homedir(), ".archpick");
}

export function vocabularyPath(): string {
  return path.join(archpickHome(), "vocabulary.json");
}

export function vocabularyYamlPath(): string {
  return path.join(archpickHome(), "vocabulary.yaml");
}
