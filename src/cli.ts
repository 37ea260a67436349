#!/usr/bin/env node
/**
 * CLI entrypoint for drive-import.
 *
 * Usage:
 *   DRIVE_ACCESS_TOKEN=... drive-import --bundle ~/export.zip
 */
import { parseArgs } from "node:util";
import { DriveImport } from "./index.js";

const USAGE = `
drive-import — import an export bundle into Google Drive

Usage:
  drive-import --bundle <path.zip> [--job-id <id>]

Options:
  --bundle <path>        Export bundle ZIP (manifest.json + content/)
  --job-id <id>          Resume or name a job       (default: new UUID)
  --storage-path <dir>   Content staging directory  (default: ./data)
  --db-path <file>       SQLite job database        (default: ./drive-import.db)
  --log-level <level>    pino log level             (default: info)
  --help                 Show this help

Environment:
  DRIVE_ACCESS_TOKEN     OAuth access token with Drive scope
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    bundle: { type: "string" },
    "job-id": { type: "string" },
    "storage-path": { type: "string", default: "./data" },
    "db-path": { type: "string", default: "./drive-import.db" },
    "log-level": { type: "string", default: "info" },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const accessToken = process.env.DRIVE_ACCESS_TOKEN;
if (!values.bundle || !accessToken) {
  console.error(USAGE);
  process.exit(1);
}

const ctx = await DriveImport.fromConfig({
  storage: { provider: "disk", config: { basePath: values["storage-path"] } },
  db: { provider: "sqlite", config: { path: values["db-path"] } },
  log: { level: values["log-level"] },
});

try {
  console.log(`Importing bundle: ${values.bundle}`);
  const job = await ctx.importBundle({ accessToken }, values.bundle, {
    jobId: values["job-id"],
  });
  console.log(
    `  Job ${job.jobId}: ${job.nodesImported} folders walked, ${job.foldersMapped} folders mapped`,
  );
  if (job.result.status === "error") {
    console.log(
      `  Failed (${job.result.kind}${job.result.retryable ? ", retryable" : ""}): ${job.result.message}`,
    );
    process.exitCode = 1;
  } else {
    console.log("\nDone!");
  }
} finally {
  await ctx.close();
}
