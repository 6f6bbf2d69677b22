#!/usr/bin/env node
/**
 * Trend Evidence CLI - Entry Point
 * Scores the scientific evidence behind health-trend claims
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (getBaseConfig)
 * 4. Branch based on command:
 *    - "score" → scoreFromCounts() - manual tallies, no database
 *    - "file"  → aggregateStudies() + score - study records from a JSON file
 *    - "grade" → gradeForScore() - letter grade for a stored score
 *    - "claim" → ScoringPipeline.scoreClaim() - re-score one claim in the database
 *    - "trend" → ScoringPipeline.scoreTrend() - re-score every claim of a trend
 * 5. Display results to console (text or --json), optionally write --out
 *
 * USAGE:
 *   npm run score -- --rcts 5 --meta 1 --other 3 --sample 60 --years 2
 *   npm run score -- file studies.json --year 2025
 *   npm run score -- trend magnesium-glycinate --dry-run
 */

// ============================================================
// STEP 1: Load environment variables from .env file
// ============================================================
import "dotenv/config";

import fs from "fs/promises";
import { getBaseConfig, logger, wrapError } from "@trend-evidence/core";
import { isSupabaseConfigured } from "@trend-evidence/db";
import {
  aggregateStudies,
  createScorer,
  evidenceStrength,
  formatScoreReport,
  gradeForScore,
  scoreFromCounts,
  summarizeEvidence,
  type ScoreReport,
} from "@trend-evidence/scoring";
import { parseArgs, parseClaimId, parseScore, type CliArgs } from "./cli/args.js";
import { scoreClaim, scoreTrend, type TrendScoringResult } from "./pipeline/scoring-pipeline.js";

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Trend Evidence - Evidence scoring for health-trend claims

USAGE:
  npm run score -- [command] [options]
  npx tsx src/index.ts [command] [options]

COMMANDS:
  score               Score manually entered study counts (default with count flags)
  file <path>         Score a JSON array of study records
  grade <score>       Letter grade for a 0-10 score
  claim <id>          Re-score one claim from its linked studies (needs Supabase)
  trend <slug>        Re-score every claim of a trend and roll up (needs Supabase)
  help                Show this help message

COUNT OPTIONS (score):
      --rcts <n>           Human randomized controlled trials
      --meta <n>           Meta-analyses and systematic reviews
      --other <n>          Other human studies
      --animal <n>         Animal studies
      --in-vitro <n>       In-vitro studies
      --sample <n>         Average human sample size
      --years <n>          Years since the most recent study
      --contradicting <n>  Studies that contradict the claim
      --replication <0-3>  Replication strength (also for file)

OTHER OPTIONS:
      --year <year>        Year treated as "now" (file, claim, trend)
      --dry-run            Score without writing to the database
  -c, --concurrency <n>    Claims scored in parallel (default: 3)
      --json               Print results as JSON
  -o, --out <path>         Also write results as JSON to a file
  -v, --verbose            Enable debug logging

EXAMPLES:
  npm run score -- --rcts 5 --meta 1 --other 3 --sample 60 --years 2
  npm run score -- file ./studies.json --year 2025 --replication 2
  npm run score -- grade 7.4
  npm run score -- trend ashwagandha --dry-run --concurrency 5
`);
}

/**
 * Display a single score report
 */
function displayReport(report: ScoreReport, json: boolean, title?: string): void {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (title) console.log(`\n${title}`);
  console.log(formatScoreReport(report));
  console.log(`Summary: ${summarizeEvidence(report)}`);
}

/**
 * Format and display trend pipeline results
 */
function displayTrendResults(result: TrendScoringResult): void {
  console.log("\n" + "=".repeat(60));
  console.log("TREND SCORING RESULTS");
  console.log("=".repeat(60));

  console.log(`\nCorrelation ID: ${result.correlationId}`);
  console.log(`Trend: ${result.trend.name} (${result.trend.slug})`);
  console.log(`Mode:  ${result.dryRun ? "dry run (nothing written)" : "persisted"}`);

  console.log("\n--- Claims ---");
  for (const [claimId, entry] of result.claims) {
    if (entry instanceof Error) {
      console.log(`  #${claimId}  FAILED: ${entry.message}`);
    } else {
      const { report } = entry;
      console.log(
        `  #${claimId}  ${report.displayScore.toFixed(1)} (${report.grade})  ${entry.claimText.slice(0, 60)}`
      );
      console.log(`        ${entry.summary}`);
    }
  }

  console.log("\n--- Summary ---");
  console.log(`Claims Found:   ${result.summary.claimsFound}`);
  console.log(`Claims Scored:  ${result.summary.claimsScored}`);
  console.log(`Claims Failed:  ${result.summary.claimsFailed}`);
  console.log(`Total Duration: ${(result.summary.totalDurationMs / 1000).toFixed(1)}s`);
  console.log(
    result.rollUp
      ? `Trend Score:    ${result.rollUp.displayScore.toFixed(1)} (${result.rollUp.grade}) from ${result.rollUp.claimCount} claims`
      : "Trend Score:    none (no scored claims)"
  );

  console.log("\n" + "=".repeat(60));
}

/**
 * Plain-object form of a trend result, for JSON output
 */
function trendResultToJson(result: TrendScoringResult): Record<string, unknown> {
  const claims: Record<string, unknown> = {};
  for (const [claimId, entry] of result.claims) {
    claims[claimId] = entry instanceof Error ? { error: entry.message } : entry;
  }
  return { ...result, claims };
}

async function writeOut(path: string | undefined, value: unknown): Promise<void> {
  if (!path) return;
  await fs.writeFile(path, JSON.stringify(value, null, 2) + "\n");
  console.log(`\nWrote ${path}`);
}

function requireDatabase(): void {
  if (!isSupabaseConfigured()) {
    console.error("Supabase is not configured.");
    console.error("\nMake sure you have a .env file with:");
    console.error("  SUPABASE_URL");
    console.error("  SUPABASE_KEY");
    process.exit(1);
  }
}

// ============================================================
// COMMANDS
// ============================================================

async function run(args: CliArgs): Promise<void> {
  const { command, options } = args;
  const target = args.target ?? "";

  switch (command) {
    case "help":
      printHelp();
      return;

    case "score": {
      const report = scoreFromCounts(args.counts);
      displayReport(report, options.json);
      await writeOut(options.out, report);
      return;
    }

    case "file": {
      const raw = await fs.readFile(target, "utf-8");
      const records: unknown = JSON.parse(raw);
      const aggregation = aggregateStudies(records, {
        currentYear: options.year ?? getBaseConfig().scoring.referenceYear,
        replicationScore: options.replication,
      });
      const report = createScorer().scoreAggregation(aggregation);
      displayReport(report, options.json, `${target}: ${aggregation.totalRecords} records`);
      await writeOut(options.out, report);
      return;
    }

    case "grade": {
      const score = parseScore(target);
      const grade = gradeForScore(score);
      if (options.json) {
        console.log(JSON.stringify({ score, grade, strength: evidenceStrength(score) }));
      } else {
        console.log(`${score} → ${grade} (${evidenceStrength(score)})`);
      }
      return;
    }

    case "claim": {
      requireDatabase();
      const result = await scoreClaim(parseClaimId(target), {
        dryRun: options.dryRun,
        currentYear: options.year,
      });
      displayReport(result.report, options.json, `Claim #${result.claimId}: ${result.claimText}`);
      await writeOut(options.out, result);
      return;
    }

    case "trend": {
      requireDatabase();
      const result = await scoreTrend(target, {
        dryRun: options.dryRun,
        concurrency: options.concurrency,
        currentYear: options.year,
      });
      if (options.json) {
        console.log(JSON.stringify(trendResultToJson(result), null, 2));
      } else {
        displayTrendResults(result);
      }
      await writeOut(options.out, trendResultToJson(result));
      return;
    }
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================
/**
 * Flow:
 *   parseArgs() → validate config → run command → display results
 */
async function main(): Promise<void> {
  // --------------------------------------------------------
  // STEP 2: Parse command line arguments
  // --------------------------------------------------------
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.error("\nRun with --help for usage.");
    process.exit(1);
  }

  // --------------------------------------------------------
  // STEP 3: Validate configuration
  // --------------------------------------------------------
  try {
    const config = getBaseConfig();
    logger.setLevel(args.options.verbose ? "debug" : config.env.logLevel);
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }

  // --------------------------------------------------------
  // STEP 4: Execute based on command
  // --------------------------------------------------------
  try {
    await run(args);
  } catch (error) {
    const failure = wrapError(error, "Command failed");
    console.error(`\n${failure.code}: ${failure.message}`);
    if (args.options.verbose && failure.stack) {
      console.error(failure.stack);
    }
    process.exit(1);
  }
}

// Run
main().catch(console.error);
