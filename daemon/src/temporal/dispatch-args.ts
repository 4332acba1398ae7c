/**
 * Argument parsing for the dispatch CLI.
 */

import {
  REMINDER_KINDS,
  type Asset,
  type ReminderKind,
  type ReminderPayload,
  type UpdateAssetsInput,
} from "../models/types.js";

export type DispatchCommand =
  | { command: "update-assets"; input: UpdateAssetsInput; wait: boolean }
  | { command: "fire"; payload: ReminderPayload }
  | { command: "cancel"; payload: ReminderPayload };

export const USAGE = `Usage:
  dispatch update-assets --subscription <id> --build <n> --repo <uri> --commit <sha>
                         [--asset <name>=<version>]... [--source-enabled] [--wait]
  dispatch fire <reminder-kind> <owner-key>
  dispatch cancel <reminder-kind> <owner-key>

Reminder kinds: ${REMINDER_KINDS.join(", ")}`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseKind(raw: string | undefined): ReminderKind {
  const kind = REMINDER_KINDS.find((k) => k === raw);
  if (!kind) throw new UsageError(`Unknown reminder kind: ${raw ?? "(missing)"}`);
  return kind;
}

function parseAsset(raw: string): Asset {
  const at = raw.indexOf("=");
  if (at <= 0 || at === raw.length - 1) {
    throw new UsageError(`--asset expects <name>=<version>, got "${raw}"`);
  }
  return { name: raw.slice(0, at), version: raw.slice(at + 1) };
}

function parseUpdateAssets(args: string[]): DispatchCommand {
  let subscriptionId: string | undefined;
  let buildId: number | undefined;
  let sourceRepository: string | undefined;
  let commit: string | undefined;
  let sourceEnabled = false;
  let wait = false;
  const assets: Asset[] = [];

  const value = (i: number): string => {
    const next = args[i];
    if (next === undefined) throw new UsageError(`${args[i - 1]} needs a value`);
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--subscription":
        subscriptionId = value(++i);
        break;
      case "--build":
        buildId = parseInt(value(++i), 10);
        break;
      case "--repo":
        sourceRepository = value(++i);
        break;
      case "--commit":
        commit = value(++i);
        break;
      case "--asset":
        assets.push(parseAsset(value(++i)));
        break;
      case "--source-enabled":
        sourceEnabled = true;
        break;
      case "--wait":
        wait = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${args[i]}`);
    }
  }

  if (!subscriptionId) throw new UsageError("--subscription is required");
  if (buildId === undefined || !Number.isInteger(buildId)) throw new UsageError("--build must be an integer");
  if (!sourceRepository) throw new UsageError("--repo is required");
  if (!commit) throw new UsageError("--commit is required");

  return {
    command: "update-assets",
    input: { subscriptionId, buildId, sourceRepository, commit, assets, sourceEnabled },
    wait,
  };
}

export function parseDispatchArgs(argv: string[]): DispatchCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case "update-assets":
      return parseUpdateAssets(rest);
    case "fire":
    case "cancel": {
      const kind = parseKind(rest[0]);
      const ownerKey = rest[1];
      if (!ownerKey) throw new UsageError(`${command} needs an owner key`);
      return { command, payload: { kind, ownerKey } };
    }
    default:
      throw new UsageError(command ? `Unknown command: ${command}` : "No command given");
  }
}
