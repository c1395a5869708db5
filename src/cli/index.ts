#!/usr/bin/env node
import { Command } from "commander";
import pino from "pino";
import { loadVocabulary } from "../config/vocabulary";
import { readLogLevel, readPlatformOverride, readVocabularyPathOverride } from "../config/env";
import { readCandidateFile } from "../input/candidates";
import { filterByMarkers, preferMarkers } from "../match/markers";
import { compileVocabulary, extractTokens } from "../match/normalize";
import { explainSelection } from "../match/select";
import { PlatformIdentity, Vocabulary } from "../types";
import { ArchpickError } from "../util/errors";
import { detectHostPlatform, formatPlatform, parseArch, parseOs, parsePlatform } from "../util/platform";

interface PlatformOptions {
  platform?: string;
  os?: string;
  arch?: string;
  vocabulary?: string;
}

interface SelectCommandOptions extends PlatformOptions {
  file?: string;
  require: string[];
  prefer: string[];
  first?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("archpick")
    .description("Pick the release assets built for this OS and CPU architecture")
    .showHelpAfterError(true);

  program
    .command("select")
    .description("Print the candidates matching the target platform, best first")
    .argument("[names...]", "Candidate asset names")
    .option("-f, --file <path>", "Read candidates from a file (lines, JSON array, or release JSON)")
    .option("--platform <os/arch>", "Target platform instead of the host")
    .option("--os <os>", "Target OS instead of the host's")
    .option("--arch <arch>", "Target architecture instead of the host's")
    .option("--vocabulary <path>", "Vocabulary file extending the built-in aliases")
    .option("--require <marker>", "Keep only candidates containing marker (repeatable)", collect, [])
    .option("--prefer <marker>", "Move candidates containing marker to the front (repeatable)", collect, [])
    .option("--first", "Print only the best match")
    .option("--json", "Print JSON")
    .option("-v, --verbose", "Log every candidate verdict")
    .action(async (names: string[], options: SelectCommandOptions) => {
      const level = options.verbose ? "debug" : readLogLevel();
      const logger = pino({ name: "archpick", level }, pino.destination({ fd: 2, sync: true }));
      const vocabulary = await resolveVocabulary(options);
      const platform = resolvePlatform(options, vocabulary);

      let candidates = [...names];
      if (options.file) {
        candidates.push(...(await readCandidateFile(options.file)));
      }
      if (options.require.length > 0) {
        candidates = filterByMarkers(candidates, { markers: options.require, combination: "all" });
      }

      const explanation = explainSelection(candidates, { platform, vocabulary });
      logger.debug({ platform: formatPlatform(platform), candidates: candidates.length }, "selecting");
      for (const candidate of explanation.candidates) {
        logger.debug(candidate, "candidate");
      }

      let selected = explanation.selected;
      if (options.prefer.length > 0) {
        selected = preferMarkers(selected, { markers: options.prefer });
      }
      if (selected.length === 0) {
        throw new ArchpickError(`no compatible asset found for ${formatPlatform(platform)}`);
      }

      const output = options.first ? selected.slice(0, 1) : selected;
      if (options.json) {
        process.stdout.write(`${JSON.stringify(options.first ? output[0] : output)}\n`);
        return;
      }
      for (const name of output) {
        process.stdout.write(`${name}\n`);
      }
    });

  program
    .command("platform")
    .description("Print the target platform")
    .option("--platform <os/arch>", "Target platform instead of the host")
    .option("--os <os>", "Target OS instead of the host's")
    .option("--arch <arch>", "Target architecture instead of the host's")
    .option("--vocabulary <path>", "Vocabulary file extending the built-in aliases")
    .option("--json", "Print as JSON")
    .action(async (options: PlatformOptions & { json?: boolean }) => {
      const vocabulary = await resolveVocabulary(options);
      const platform = resolvePlatform(options, vocabulary);
      if (options.json) {
        process.stdout.write(`${JSON.stringify(platform)}\n`);
        return;
      }
      process.stdout.write(`${formatPlatform(platform)}\n`);
    });

  program
    .command("tokens")
    .description("Show the OS and architecture tokens recognized in names")
    .argument("<names...>", "Names to inspect")
    .option("--vocabulary <path>", "Vocabulary file extending the built-in aliases")
    .action(async (names: string[], options: { vocabulary?: string }) => {
      const compiled = compileVocabulary(await resolveVocabulary(options));
      process.stdout.write("name\tos\tarch\tkind\n");
      for (const name of names) {
        const tokens = extractTokens(name, compiled);
        const os = [...tokens.os].join(",") || "-";
        const arch = [...tokens.arch].join(",") || "-";
        process.stdout.write(`${name}\t${os}\t${arch}\t${tokens.auxiliary ? "auxiliary" : "primary"}\n`);
      }
    });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    return 1;
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function resolveVocabulary(options: { vocabulary?: string }): Promise<Vocabulary> {
  return loadVocabulary(options.vocabulary ?? readVocabularyPathOverride());
}

function resolvePlatform(options: PlatformOptions, vocabulary: Vocabulary): PlatformIdentity {
  const base = options.platform
    ? parsePlatform(options.platform, vocabulary)
    : (readPlatformOverride(process.env, vocabulary) ?? detectHostPlatform());

  return {
    os: options.os ? parseOs(options.os, vocabulary) : base.os,
    arch: options.arch ? parseArch(options.arch, vocabulary) : base.arch
  };
}

if (require.main === module) {
  runCli().then((code) => {
    process.exitCode = code;
  });
}
