/**
 * CLI Argument Parsing
 */

import { InvalidInputError, type InputIssue } from "@trend-evidence/core";
import type { StudyCounts } from "@trend-evidence/scoring";

export const COMMANDS = ["score", "file", "grade", "claim", "trend", "help"] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  /** Print the report as JSON instead of text */
  json: boolean;
  /** Also write the report JSON to this path */
  out?: string;
  verbose: boolean;
  dryRun: boolean;
  concurrency?: number;
  /** Year treated as "now" for recency */
  year?: number;
  replication?: number;
}

export interface CliArgs {
  command: Command;
  /** File path, score, claim id or trend slug, depending on the command */
  target?: string;
  counts: StudyCounts;
  options: CliOptions;
}

/** Count flags of the score command → StudyCounts fields */
const COUNT_FLAGS = {
  "--rcts": "humanRcts",
  "--meta": "metaAnalyses",
  "--other": "humanOther",
  "--animal": "animalStudies",
  "--in-vitro": "inVitroStudies",
  "--sample": "avgSampleSize",
  "--years": "yearsSinceLast",
  "--contradicting": "contradicting",
} as const satisfies Record<string, keyof StudyCounts>;

type CountFlag = keyof typeof COUNT_FLAGS;

/** Commands that need a positional target */
const TARGET_NAMES: Partial<Record<Command, string>> = {
  file: "<path>",
  grade: "<score>",
  claim: "<id>",
  trend: "<slug>",
};

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const issues: InputIssue[] = [];

  const result: CliArgs = {
    command: "help",
    counts: { humanRcts: 0, metaAnalyses: 0, humanOther: 0 },
    options: { json: false, verbose: false, dryRun: false },
  };
  let commandSeen = false;
  let countsSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (isCountFlag(arg)) {
      countsSeen = true;
      const value = readNumber(arg, argv[++i], issues);
      if (value !== undefined) {
        result.counts[COUNT_FLAGS[arg]] = value;
      }
    } else if (arg === "--replication") {
      result.options.replication = readNumber(arg, argv[++i], issues);
    } else if (arg === "--year") {
      result.options.year = readNumber(arg, argv[++i], issues);
    } else if (arg === "--concurrency" || arg === "-c") {
      result.options.concurrency = readNumber(arg, argv[++i], issues);
    } else if (arg === "--out" || arg === "-o") {
      const value = argv[++i];
      if (value === undefined || value.startsWith("-")) {
        issues.push({ path: arg, message: "expected a file path" });
      } else {
        result.options.out = value;
      }
    } else if (arg === "--json") {
      result.options.json = true;
    } else if (arg === "--dry-run") {
      result.options.dryRun = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      result.command = "help";
      commandSeen = true;
    } else if (arg.startsWith("-") && !isNumeric(arg)) {
      issues.push({ path: arg, message: "unknown option" });
    } else if (!commandSeen && isCommand(arg)) {
      result.command = arg;
      commandSeen = true;
    } else if (result.target === undefined) {
      result.target = arg;
    } else {
      issues.push({ path: arg, message: "unexpected argument" });
    }
  }

  if (!commandSeen && countsSeen) {
    // Bare count flags mean "score"
    result.command = "score";
  }

  const targetName = TARGET_NAMES[result.command];
  if (targetName && result.target === undefined) {
    issues.push({ path: targetName, message: `the ${result.command} command needs ${targetName}` });
  }

  // The replication flag applies to both count and file scoring
  if (result.options.replication !== undefined) {
    result.counts.replicationScore = result.options.replication;
  }

  if (issues.length > 0) {
    throw InvalidInputError.fromIssues("command line", issues);
  }

  return result;
}

/**
 * Parse a claim id argument
 */
export function parseClaimId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) {
    throw InvalidInputError.fromIssues("command line", [
      { path: "<id>", message: `expected a positive integer claim id, received "${value}"` },
    ]);
  }
  return id;
}

/**
 * Parse a score argument
 */
export function parseScore(value: string): number {
  const score = Number(value);
  if (value.trim() === "" || !Number.isFinite(score)) {
    throw InvalidInputError.fromIssues("command line", [
      { path: "<score>", message: `expected a number, received "${value}"` },
    ]);
  }
  return score;
}

function readNumber(flag: string, raw: string | undefined, issues: InputIssue[]): number | undefined {
  if (raw === undefined) {
    issues.push({ path: flag, message: "expected a number" });
    return undefined;
  }

  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    issues.push({ path: flag, message: `expected a number, received "${raw}"` });
    return undefined;
  }
  return value;
}

function isCountFlag(arg: string): arg is CountFlag {
  return Object.hasOwn(COUNT_FLAGS, arg);
}

function isCommand(arg: string): arg is Command {
  return COMMANDS.some((command) => command === arg);
}

function isNumeric(arg: string): boolean {
  return arg.trim() !== "" && Number.isFinite(Number(arg));
}
