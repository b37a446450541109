/**
 * CLI引数定義
 */

import minimist from "minimist";
import type {
  CliOptions,
  Dialect,
  ParsedArgs,
  SniffMode,
} from "../types/mod.js";
import { showVersion } from "../ui/banner.js";
import { CONFIG, OUTPUT } from "../utils/constants.js";

const HELP_TEXT = `
Usage: artifact [options] [source_dir] [config_file]
       artifact clear [options]
       artifact help

Collect files matching the patterns in a config file into a flat artifacts
directory, with provenance recorded in metadata.json.

Arguments:
  source_dir               Directory to scan (default: .)
  config_file              Pattern file (default: ${CONFIG.DEFAULT_FILE})

Commands:
  clear                    Remove the output directory
  help                     Show this help

Options:
  -o, --output <dir>       Output directory (default: ${OUTPUT.DEFAULT_DIR})
  -c, --clear              Empty the output directory before collecting
  -f, --force              Allow an existing output directory
  -d, --dry-run            Show what would be copied without writing anything
      --dialect <mode>     Pattern dialect: auto, glob, simple (default: auto)
      --sniff <mode>       Content detection: none, content, file (default: content)
  -v, --verbose            Log every rule decision
  -q, --quiet              Only print warnings and errors
  -l, --log-file <path>    Also write the log to a file
  -V, --version            Show version
  -h, --help               Show this help

Config file format (one pattern per line):
  src/main.js              Specific path
  README.md                File name at any depth
  app/*.php                Glob pattern
  docs/**/*.md             Recursive glob
  !vendor                  Exclude (always wins over includes)
  # comment                Ignored

  With --dialect auto, a file that has any line with ** or with / plus a
  wildcard is read as glob: there *.json matches only at the top level.
  Otherwise *.json matches at any depth. Set --dialect to pin the meaning.

Examples:
  artifact                                 Collect from . using ${CONFIG.DEFAULT_FILE}
  artifact --force --clear                 Rebuild an existing output directory
  artifact -d ./project                    Preview a run against ./project
  artifact -o build/out src patterns.txt   Custom output and config file
  artifact clear                           Remove ${OUTPUT.DEFAULT_DIR}/
`.trim();

/** 有効な書式 */
const VALID_DIALECTS: readonly (Dialect | "auto")[] = ["auto", "glob", "simple"];

/** 有効なコンテンツ判定方式 */
const VALID_SNIFF_MODES: readonly SniffMode[] = ["none", "content", "file"];

/** 値を取るオプション */
const STRING_OPTIONS = ["output", "dialect", "sniff", "log-file"] as const;

/** 引数エラー */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * ヘルプを表示
 */
export function showHelp(): void {
  console.log(HELP_TEXT);
}

/**
 * 文字列オプションの値を取り出す
 *
 * 同じオプションが複数回指定された場合は最後の値を使う
 */
function readString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return readString(value[value.length - 1]);
  }
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}

/**
 * 値の必須な文字列オプションを取り出す
 *
 * @throws UsageError 値が空の場合
 */
function requireValue(name: string, value: unknown): string | undefined {
  const str = readString(value);
  if (str === "") {
    throw new UsageError(`Option --${name} requires a value`);
  }
  return str;
}

/**
 * 列挙値オプションを検証する
 */
function parseChoice<T extends string>(
  name: string,
  value: string,
  choices: readonly T[],
): T {
  const choice = choices.find((c) => c === value.toLowerCase());
  if (choice === undefined) {
    throw new UsageError(
      `Invalid --${name} value "${value}" (expected ${choices.join(", ")})`,
    );
  }
  return choice;
}

/**
 * CLI引数をパース
 *
 * @returns ヘルプ・バージョン表示時は null
 * @throws UsageError 不明なオプション、引数過多、不正な値
 */
export function parseArgs(args: string[]): ParsedArgs | null {
  const unknownOptions: string[] = [];

  const parsed = minimist(args, {
    string: ["_", ...STRING_OPTIONS],
    boolean: [
      "help",
      "version",
      "verbose",
      "quiet",
      "clear",
      "dry-run",
      "force",
    ],
    default: {
      help: false,
      version: false,
      verbose: false,
      quiet: false,
      clear: false,
      "dry-run": false,
      force: false,
    },
    alias: {
      h: "help",
      V: "version",
      v: "verbose",
      q: "quiet",
      c: "clear",
      d: "dry-run",
      f: "force",
      o: "output",
      l: "log-file",
    },
    unknown: (arg) => {
      if (arg.startsWith("-") && arg !== "-") {
        unknownOptions.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknownOptions.length > 0) {
    throw new UsageError(`Unknown option: ${unknownOptions[0]}`);
  }

  // ヘルプ表示
  if (parsed.help === true) {
    showHelp();
    return null;
  }

  // バージョン表示
  if (parsed.version === true) {
    showVersion();
    return null;
  }

  const positionals = parsed._.map(String);
  if (positionals[0] === "help") {
    showHelp();
    return null;
  }

  const output = requireValue("output", parsed.output) ?? OUTPUT.DEFAULT_DIR;
  const dialectValue = requireValue("dialect", parsed.dialect);
  const sniffValue = requireValue("sniff", parsed.sniff);
  const logFile = requireValue("log-file", parsed["log-file"]);

  const options: CliOptions = {
    output,
    verbose: parsed.verbose === true,
    quiet: parsed.quiet === true,
    dryRun: parsed["dry-run"] === true,
    force: parsed.force === true,
    clear: parsed.clear === true,
    dialect: dialectValue
      ? parseChoice("dialect", dialectValue, VALID_DIALECTS)
      : "auto",
    sniff: sniffValue
      ? parseChoice("sniff", sniffValue, VALID_SNIFF_MODES)
      : "content",
    logFile,
  };

  if (positionals[0] === "clear") {
    if (positionals.length > 1) {
      throw new UsageError(
        `Unexpected argument for clear: ${positionals[1]}`,
      );
    }
    return { command: "clear", ...options };
  }

  if (positionals.length > 2) {
    throw new UsageError(`Too many arguments: ${positionals.slice(2).join(" ")}`);
  }

  return {
    command: "collect",
    sourceDir: positionals[0] ?? ".",
    configFile: positionals[1] ?? CONFIG.DEFAULT_FILE,
    ...options,
  };
}
