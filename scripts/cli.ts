#!/usr/bin/env node
/**
 * sinphase CLI. Dispatches analyze | display | init and exits with the
 * command's code. Never throws.
 */

import { runAnalyze } from "../src/cli/analyze.js";
import { getFlagValue, hasFlag } from "../src/cli/args.js";
import { isDisplayFormat, runDisplay } from "../src/cli/display.js";
import { runInit } from "../src/cli/init.js";
import { isTemplateType, TEMPLATE_TYPES } from "../src/config/templates.js";
import { DIVISIONS, isDivision, type Division } from "../src/model/divisions.js";

const VERSION = "1.0.0";

const USAGE = `Usage: sinphase <command> [options]

Commands:
  analyze   Score every repository in a GitHub organization
            --org <name> (required), --token <t>, --output/-o <path>,
            --division/-d <name>, --config <path>, --validate-only,
            --include-archived, --verbose/-v
  display   Render a cost_scores.json report
            --input/-i <path>, --division/-d <name>,
            --format/-f table|json|summary, --verbose/-v
  init      Write a starter configuration
            --template/-t ${TEMPLATE_TYPES.join("|")}, --output/-o <path>,
            --org <name>, --force

Options:
  --version  Print version
  --help     Print this message`;

function parseDivisionFlag(args: string[], command: string): Division | null | undefined {
  const value = getFlagValue(args, "--division", "-d");
  if (value === null) return null;
  if (isDivision(value)) return value;
  console.error(`sinphase ${command}: unknown division '${value}' (expected one of: ${DIVISIONS.join(", ")})`);
  return undefined;
}

async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined || command === "--help" || command === "-h") {
    console.log(USAGE);
    return command === undefined ? 2 : 0;
  }
  if (command === "--version") {
    console.log(VERSION);
    return 0;
  }

  const cwd = process.cwd();
  switch (command) {
    case "analyze": {
      const org = getFlagValue(args, "--org");
      if (!org) {
        console.error("sinphase analyze: --org is required");
        return 2;
      }
      const division = parseDivisionFlag(args, "analyze");
      if (division === undefined) return 2;
      return runAnalyze(cwd, {
        org,
        token: getFlagValue(args, "--token"),
        output: getFlagValue(args, "--output", "-o"),
        division,
        configPath: getFlagValue(args, "--config"),
        validateOnly: hasFlag(args, "--validate-only"),
        includeArchived: hasFlag(args, "--include-archived"),
        verbose: hasFlag(args, "--verbose", "-v"),
      });
    }
    case "display": {
      const division = parseDivisionFlag(args, "display");
      if (division === undefined) return 2;
      const format = getFlagValue(args, "--format", "-f") ?? "table";
      if (!isDisplayFormat(format)) {
        console.error(`sinphase display: unknown format '${format}'`);
        return 2;
      }
      return runDisplay(cwd, {
        input: getFlagValue(args, "--input", "-i"),
        division,
        format,
        verbose: hasFlag(args, "--verbose", "-v"),
      });
    }
    case "init": {
      const template = getFlagValue(args, "--template", "-t") ?? "basic";
      if (!isTemplateType(template)) {
        console.error(`sinphase init: unknown template '${template}'`);
        return 2;
      }
      return runInit(cwd, {
        template,
        output: getFlagValue(args, "--output", "-o"),
        organization: getFlagValue(args, "--org"),
        force: hasFlag(args, "--force"),
      });
    }
    default:
      console.error(`sinphase: unknown command '${command}'`);
      console.error(USAGE);
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`sinphase: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
