#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";
import {
  CliUsageError,
  USAGE,
  parseArgs,
  type ListStatus,
  type ParsedArgs,
} from "./cli/parseArgs";
import { formatRecordDetail, formatRecordLine } from "./cli/format";
import { loadConfig } from "./config";
import { createApp, type App } from "./app";
import { NotFoundError, errorMessage } from "./lib/errors";
import type { ExampleFilter } from "./store/examples";

function filterFor(status: ListStatus | undefined): ExampleFilter {
  if (status === undefined) return {};
  if (status === "approved") return { approved: true };
  return { status };
}

async function runCommand(app: App, parsed: ParsedArgs): Promise<number> {
  const { gallery } = app;

  switch (parsed.command) {
    case "upload": {
      const bytes = await fs.promises.readFile(parsed.filePath);
      const id = await gallery.uploadReceived({
        bytes,
        originalFilename: path.basename(parsed.filePath),
        uploaderId: parsed.uploadedBy,
        title: parsed.title,
        description: parsed.description,
      });
      const record = gallery.get(id);
      if (!record) throw new NotFoundError(id);
      console.log(formatRecordLine(record));
      return record.processing_error ? 2 : 0;
    }

    case "list": {
      const records = gallery.list(filterFor(parsed.status));
      if (records.length === 0) {
        console.log("No examples.");
      }
      for (const record of records) console.log(formatRecordLine(record));
      return 0;
    }

    case "show":
    case "urls": {
      const record = gallery.get(parsed.id);
      if (!record) throw new NotFoundError(parsed.id);
      const expires = parsed.command === "urls" ? parsed.expiresSeconds : undefined;
      const urls = await gallery.mediaUrls(record, expires);
      if (parsed.command === "urls") {
        console.log(urls.fileUrl ?? "(no file)");
        console.log(urls.thumbUrl ?? "(no thumbnail)");
      } else {
        console.log(formatRecordDetail(record, urls));
      }
      return 0;
    }

    case "retry": {
      await gallery.retryRequested(parsed.id);
      const record = gallery.get(parsed.id);
      if (!record) throw new NotFoundError(parsed.id);
      console.log(formatRecordLine(record));
      return record.processing_error ? 2 : 0;
    }

    case "approve":
      console.log(formatRecordLine(gallery.approveRequested(parsed.id)));
      return 0;

    case "delete": {
      const report = await gallery.deleteRequested(parsed.id);
      console.log(`Deleted ${parsed.id}`);
      if (report.failed.length > 0) {
        console.log(`Blobs left behind: ${report.failed.join(", ")}`);
      }
      return 0;
    }

    case "reconcile": {
      const summary = await app.reconcile();
      console.log(
        `Resubmitted: ${summary.resubmitted.length}, marked failed: ${summary.failed.length}`
      );
      return 0;
    }
  }
}

// --- Main ---

async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  // .env beside the package; real environment variables win
  dotenv.config({ path: path.resolve(__dirname, "../.env"), override: false });

  const app = createApp(loadConfig(), { awaitProcessing: true });
  try {
    return await runCommand(app, parsed);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await app.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[showcase] Fatal error:", err);
    process.exitCode = 1;
  }
);
