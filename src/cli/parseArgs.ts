import * as path from "path";
import type { ExampleStatus } from "../contracts";

// --- CLI Arg Types ---

export interface UploadArgs {
  command: "upload";
  filePath: string;
  title?: string;
  description?: string;
  uploadedBy: string | null;
}

export type ListStatus = ExampleStatus | "approved";

export interface ListArgs {
  command: "list";
  status?: ListStatus;
}

export interface RecordArgs {
  command: "show" | "retry" | "approve" | "delete";
  id: string;
}

export interface UrlsArgs {
  command: "urls";
  id: string;
  expiresSeconds?: number;
}

export interface ReconcileArgs {
  command: "reconcile";
}

export type ParsedArgs = UploadArgs | ListArgs | RecordArgs | UrlsArgs | ReconcileArgs;

// --- Constants ---

const LIST_STATUSES: readonly ListStatus[] = ["pending", "failed", "processed", "approved"];
const RECORD_COMMANDS: readonly RecordArgs["command"][] = ["show", "retry", "approve", "delete"];

export const USAGE = [
  "Usage:",
  "  showcase upload <file> [--title <text>] [--description <text>] [--by <user>]",
  "  showcase list [--status pending|failed|processed|approved]",
  "  showcase show <id>",
  "  showcase retry <id>",
  "  showcase approve <id>",
  "  showcase delete <id>",
  "  showcase urls <id> [--expires <seconds>]",
  "  showcase reconcile",
].join("\n");

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// --- CLI Parsing ---

function requirePositional(args: string[], command: string, what: string): string {
  const value = args[1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`'${command}' requires ${what}.`);
  }
  return value;
}

function flagValue(args: string[], i: number): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${args[i]} requires a value`);
  }
  return value;
}

function isListStatus(value: string): value is ListStatus {
  return LIST_STATUSES.some((s) => s === value);
}

function isRecordCommand(value: string): value is RecordArgs["command"] {
  return RECORD_COMMANDS.some((c) => c === value);
}

/** Parse `process.argv`. Throws CliUsageError on anything malformed. */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    throw new CliUsageError("No command provided.");
  }

  const command = args[0];

  if (command === "upload") {
    const filePath = path.resolve(requirePositional(args, command, "a file path"));
    const parsed: UploadArgs = { command, filePath, uploadedBy: null };

    for (let i = 2; i < args.length; i++) {
      if (args[i] === "--title") {
        parsed.title = flagValue(args, i++);
      } else if (args[i] === "--description") {
        parsed.description = flagValue(args, i++);
      } else if (args[i] === "--by") {
        parsed.uploadedBy = flagValue(args, i++);
      } else {
        throw new CliUsageError(`Unknown argument "${args[i]}"`);
      }
    }
    return parsed;
  }

  if (command === "list") {
    const parsed: ListArgs = { command };
    for (let i = 1; i < args.length; i++) {
      if (args[i] === "--status") {
        const value = flagValue(args, i++);
        if (!isListStatus(value)) {
          throw new CliUsageError(`--status must be one of: ${LIST_STATUSES.join(", ")}`);
        }
        parsed.status = value;
      } else {
        throw new CliUsageError(`Unknown argument "${args[i]}"`);
      }
    }
    return parsed;
  }

  if (isRecordCommand(command)) {
    const id = requirePositional(args, command, "an example id");
    if (args.length > 2) {
      throw new CliUsageError(`'${command}' does not accept additional arguments.`);
    }
    return { command, id };
  }

  if (command === "urls") {
    const id = requirePositional(args, command, "an example id");
    const parsed: UrlsArgs = { command, id };
    for (let i = 2; i < args.length; i++) {
      if (args[i] === "--expires") {
        const raw = flagValue(args, i++);
        const seconds = Number(raw);
        if (!Number.isInteger(seconds) || seconds <= 0) {
          throw new CliUsageError(`--expires must be a positive whole number of seconds, got "${raw}"`);
        }
        parsed.expiresSeconds = seconds;
      } else {
        throw new CliUsageError(`Unknown argument "${args[i]}"`);
      }
    }
    return parsed;
  }

  if (command === "reconcile") {
    if (args.length > 1) {
      throw new CliUsageError("'reconcile' does not accept arguments.");
    }
    return { command };
  }

  if (command.startsWith("--")) {
    throw new CliUsageError(`Unknown flag "${command}"`);
  }
  throw new CliUsageError(`Unknown command "${command}"`);
}
