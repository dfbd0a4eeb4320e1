/**
 * CLI for running a provider investigation
 *
 * Usage:
 *   npm run investigate -- <npi> [--name "..."] [--address "..."] [--phone "..."]
 *   npm run investigate -- --document ./letterhead.png
 *   npm run investigate -- --first Jane --last Doe --state AL
 *
 * Example:
 *   npm run investigate -- 1234567890 --name "Providence Hospital" --phone "(251) 435-7000"
 *
 * Environment variables:
 *   GOOGLE_API_KEY, GOOGLE_CX - Google Programmable Search (optional; DuckDuckGo otherwise)
 *   GEMINI_API_KEY - Gemini API key, needed for --document
 *   NOMINATIM_USER_AGENT - identifying User-Agent for the geocoder
 *   PROVIDER_VERIFY_TIMEOUT_MS - per-request HTTP timeout
 */

import "dotenv/config";

import chalk from "chalk";
import Table from "cli-table3";
import ora from "ora";

import {
  DuckDuckGoClient,
  createGeminiClaimExtractor,
  createGooglePSEClient,
  createNominatimGeocoder,
  createNpiRegistryClient,
  PhoneValidator,
  timeoutFromEnv,
} from "@provider-verify/integrations";
import {
  ProviderInvestigator,
  WebSearchAggregator,
  displayName,
  formatPercent,
} from "@provider-verify/core";
import type { InvestigationEvent, SearchProvider } from "@provider-verify/core";
import type {
  ClaimedAttributes,
  CompletedReport,
  InvestigationReport,
  PhoneResult,
} from "@provider-verify/contracts";
import { describeError } from "@provider-verify/contracts";

// Styling helpers
const styles = {
  header: chalk.bold.cyan,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  dim: chalk.dim,
  highlight: chalk.bold.white,
  accent: chalk.magenta,
};

const boxChars = {
  top: "─", "top-mid": "┬", "top-left": "┌", "top-right": "┐",
  bottom: "─", "bottom-mid": "┴", "bottom-left": "└", "bottom-right": "┘",
  left: "│", "left-mid": "├", mid: "─", "mid-mid": "┼",
  right: "│", "right-mid": "┤", middle: "│",
};

// ============================================================================
// Arguments
// ============================================================================

interface CliOptions {
  identifier: string | null;
  claimed: ClaimedAttributes;
  document: string | null;
  first: string | null;
  last: string | null;
  state: string | null;
  json: boolean;
}

const VALUE_FLAGS = ["--name", "--address", "--phone", "--document", "--first", "--last", "--state"];

function parseArgs(argv: string[]): CliOptions {
  const values = new Map<string, string>();
  const positional: string[] = [];
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--json") {
      json = true;
    } else if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${arg} needs a value`);
      }
      values.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown flag: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  return {
    identifier: positional[0] ?? null,
    claimed: {
      name: values.get("--name"),
      address: values.get("--address"),
      phone: values.get("--phone"),
    },
    document: values.get("--document") ?? null,
    first: values.get("--first") ?? null,
    last: values.get("--last") ?? null,
    state: values.get("--state") ?? null,
    json,
  };
}

function printUsage() {
  console.log();
  console.log(styles.header("  Usage:"));
  console.log(`    npm run investigate -- ${styles.accent("<npi>")} ${styles.dim('[--name "..."] [--address "..."] [--phone "..."]')}`);
  console.log(`    npm run investigate -- ${styles.dim("--document <path>")}`);
  console.log(`    npm run investigate -- ${styles.dim("--first <first> --last <last> --state <ST>")}`);
  console.log();
  console.log(styles.header("  Flags:"));
  console.log(`    ${styles.dim("--document")}  Read the claim from an image, PDF or text file (Gemini)`);
  console.log(`    ${styles.dim("--json")}      Print the report as JSON`);
  console.log();
}

// ============================================================================
// Wiring
// ============================================================================

function createSearchProviders(): SearchProvider[] {
  const providers: SearchProvider[] = [];

  if (process.env.GOOGLE_API_KEY && process.env.GOOGLE_CX) {
    providers.push(createGooglePSEClient());
  }
  providers.push(new DuckDuckGoClient({ timeoutMs: timeoutFromEnv() }));

  return providers;
}

function renderEvent(event: InvestigationEvent) {
  switch (event.type) {
    case "status":
      console.log(`  ${styles.info("ℹ")} ${styles.dim(event.message)}`);
      break;
    case "evidence":
      console.log(`  ${styles.success("✓")} ${styles.success(event.message)}`);
      break;
    case "warning":
      console.log(`  ${styles.warning("!")} ${styles.warning(event.message)}`);
      break;
    case "skipped":
      console.log(`  ${styles.dim("-")} ${styles.dim(event.message)}`);
      break;
    case "error":
      console.log(`  ${styles.error("✗")} ${styles.error(event.message)}`);
      break;
  }
}

// ============================================================================
// Report Rendering
// ============================================================================

function describePhone(result: PhoneResult | null): string {
  if (!result) return styles.dim("-");
  if (result.valid) return styles.success(`${result.formatted} (${result.areaLocation})`);
  return styles.error(`${result.original}: ${result.error}`);
}

function printCompletedReport(report: CompletedReport) {
  const record = report.registryRecord;

  const summary = new Table({ chars: boxChars, style: { head: ["cyan"], border: ["dim"] } });
  const statusText =
    report.overallStatus === "MISMATCH_WARNING"
      ? styles.warning("MISMATCH WARNING")
      : styles.success("COMPLETE");

  summary.push(
    [styles.dim("Status"), statusText],
    [styles.dim("NPI"), styles.highlight(report.identifier)],
    [styles.dim("Registry name"), styles.highlight(displayName(record))],
    [styles.dim("Specialty"), record.specialty],
    [styles.dim("Address"), record.address ?? styles.dim("-")],
    [
      styles.dim("Name match"),
      report.matchResult
        ? (report.matchResult.isMismatch ? styles.warning : styles.success)(
            formatPercent(report.matchResult.similarity)
          )
        : styles.dim("not checked"),
    ],
    [
      styles.dim("Geocode"),
      report.geoResult
        ? `${report.geoResult.matchType} ${styles.dim(`(${report.geoResult.lat.toFixed(5)}, ${report.geoResult.lon.toFixed(5)})`)}`
        : styles.dim("-"),
    ],
    [styles.dim("Registry phone"), describePhone(report.phoneResult)],
    [styles.dim("Claimed phone"), describePhone(report.claimedPhoneResult)]
  );

  console.log(summary.toString());
  console.log();

  const footprint = report.webFootprint;
  if (footprint) {
    console.log(styles.header("┌─ Web Footprint ───────────────────────────────────────────────┐"));
    console.log();

    const footprintTable = new Table({
      head: [styles.dim("Category"), styles.dim("URL")],
      chars: boxChars,
      colWidths: [16, 64],
      wordWrap: true,
    });

    if (footprint.officialSite) {
      footprintTable.push([styles.success("Official"), footprint.officialSite]);
    }
    for (const url of footprint.socialMedia) footprintTable.push([styles.accent("Social"), url]);
    for (const url of footprint.directories) footprintTable.push([styles.info("Directory"), url]);
    for (const url of footprint.otherMentions) footprintTable.push([styles.dim("Other"), url]);

    console.log(footprintTable.toString());
    console.log();
  }

  if (report.addressConfirmationLinks) {
    console.log(styles.header("┌─ Claimed Address Links ───────────────────────────────────────┐"));
    console.log();
    for (const url of report.addressConfirmationLinks) {
      console.log(`  ${styles.info("•")} ${url}`);
    }
    console.log();
  }
}

function printReport(report: InvestigationReport) {
  console.log();
  console.log(styles.header("┌─ Report ──────────────────────────────────────────────────────┐"));
  console.log();

  if (report.status === "INVALID_IDENTIFIER") {
    console.log(`  ${styles.error("✗")} ${styles.error("Invalid or unknown NPI; investigation stopped.")}`);
    console.log();
    return;
  }

  printCompletedReport(report);
}

// ============================================================================
// Main
// ============================================================================

async function run(options: CliOptions) {
  const registry = createNpiRegistryClient();
  let identifier = options.identifier;
  const claimed: ClaimedAttributes = { ...options.claimed };

  if (options.document) {
    const spinner = ora({ text: `Extracting claim from ${options.document}...`, spinner: "dots" }).start();
    const claim = await createGeminiClaimExtractor().extractClaim(options.document);

    if (claim) {
      spinner.succeed(`Claim extracted: ${claim.name}`);
      claimed.name ??= claim.name;
      claimed.address ??= claim.address;
      claimed.phone ??= claim.phone;
      identifier ??= claim.identifier ?? null;
    } else {
      spinner.warn("No usable claim found in the document");
    }
  }

  if (!identifier && options.first && options.last && options.state) {
    const spinner = ora({
      text: `Searching registry for ${options.first} ${options.last} (${options.state})...`,
      spinner: "dots",
    }).start();
    identifier = await registry.searchByName(options.first, options.last, options.state);

    if (identifier) {
      spinner.succeed(`Resolved NPI ${identifier}`);
      claimed.name ??= `${options.first} ${options.last}`;
    } else {
      spinner.fail("No registry match for that name");
    }
  }

  if (!identifier) {
    printUsage();
    process.exit(1);
  }

  const search = new WebSearchAggregator(createSearchProviders());

  if (!options.json) {
    const configTable = new Table({ chars: boxChars, style: { head: ["cyan"], border: ["dim"] } });
    configTable.push(
      [styles.dim("NPI"), styles.highlight(identifier)],
      [styles.dim("Claimed name"), claimed.name ?? styles.dim("-")],
      [styles.dim("Claimed address"), claimed.address ?? styles.dim("-")],
      [styles.dim("Claimed phone"), claimed.phone ?? styles.dim("-")],
      [styles.dim("Search"), styles.accent(search.providerNames.join(" → "))]
    );
    console.log();
    console.log(configTable.toString());
    console.log();
    console.log(styles.header("┌─ Investigation Progress ──────────────────────────────────────┐"));
    console.log();
  }

  const investigator = new ProviderInvestigator(
    {
      registry,
      geocoder: createNominatimGeocoder(),
      phoneValidator: new PhoneValidator(),
      search,
    },
    {},
    options.json ? undefined : renderEvent
  );

  const report = await investigator.investigate(identifier, claimed);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
}

async function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.log(styles.error(`  ✗ ${describeError(error)}`));
    printUsage();
    process.exit(1);
  }

  try {
    await run(options);
  } catch (error) {
    console.log();
    console.log(styles.error("  ✗ Investigation Error:"), describeError(error));
    console.log();
    process.exit(1);
  }
}

void main();
