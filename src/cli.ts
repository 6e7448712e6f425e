import { Command, InvalidArgumentError } from "commander";

export interface CliOptions {
  newUrls: string[];
  delUrls: string[];
  timeDeltaMinutes: number;
  db: string;
  schedule?: string;
  list: boolean;
}

export interface CliDefaults {
  timeDeltaMinutes: number;
  db: string;
  schedule?: string;
}

function parseMinutes(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parseInt(value, 10);
}

export function buildProgram(defaults: CliDefaults): Command {
  return new Command()
    .name("page-sentinel")
    .description("Monitor changes in websites.")
    .option("--new-urls <urls...>", "List of new URLs to monitor.", [])
    .option("--del-urls <urls...>", "List of URLs to stop monitoring.", [])
    .option("--time-delta-minutes <minutes>", "Time window in minutes for checking updates.", parseMinutes, defaults.timeDeltaMinutes)
    .option("--db <path>", "SQLite database file.", defaults.db)
    .option("--schedule <cron>", "Keep running and re-check on this cron schedule.", defaults.schedule)
    .option("--list", "Print watched URLs and exit.", false);
}

/** Parses user arguments (without the node and script entries). */
export function parseArgs(args: string[], defaults: CliDefaults): CliOptions {
  const program = buildProgram(defaults).exitOverride();
  program.parse(args, { from: "user" });
  const opts = program.opts<CliOptions>();
  return {
    newUrls: opts.newUrls,
    delUrls: opts.delUrls,
    timeDeltaMinutes: opts.timeDeltaMinutes,
    db: opts.db,
    schedule: opts.schedule,
    list: opts.list,
  };
}
