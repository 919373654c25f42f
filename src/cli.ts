#!/usr/bin/env node
/**
 * CLI entrypoint for task-lineage.
 *
 * Usage:
 *   task-lineage --manifest tasks.json
 *   task-lineage --manifest tasks.json --on-complete
 */
import { parseArgs } from "node:util";

import { buildManager, loadConfigFromEnv } from "./config.js";
import { extractManifest, formatResult } from "./index.js";
import { getLogger } from "./logger.js";
import { readTaskManifest } from "./manifest.js";

const USAGE = `
task-lineage — lineage metadata extraction for pipeline tasks

Usage:
  task-lineage --manifest <tasks.json> [--on-complete]
  task-lineage --list

Options:
  --manifest <path>   JSON array of { operator, run? } entries
  --on-complete       Use post-completion extraction for entries with a run
  --list              Print the task types that have an extractor
  --help              Show this help

Environment:
  LINEAGE_DISABLED_TASK_TYPES, LINEAGE_EXTRACTOR_<TaskType>,
  LINEAGE_EXTRACTION_TIMEOUT_MS, LOG_LEVEL
`.trim();

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      manifest: { type: "string" },
      "on-complete": { type: "boolean", default: false },
      list: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfigFromEnv();
  const manager = buildManager(config);

  if (values.list) {
    for (const taskType of manager.taskTypes()) console.log(taskType);
    return 0;
  }

  if (!values.manifest) {
    console.error(USAGE);
    return 1;
  }

  const entries = await readTaskManifest(values.manifest);
  const results = await extractManifest(manager, entries, {
    onComplete: values["on-complete"],
  });
  for (const { taskId, result } of results) {
    console.log(formatResult(taskId, result));
  }

  getLogger().info("Extraction finished", {
    tasks: results.length,
    extracted: results.filter((r) => r.result.status === "extracted").length,
  });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    getLogger().error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
