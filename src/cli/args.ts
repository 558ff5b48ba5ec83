import { parseArgs } from "node:util";
import type { ConfigLayer } from "../config/index.js";

export const LIST_RESOURCES = [
  "instances",
  "instance-types",
  "images",
  "filesystems",
  "ssh-keys",
  "firewall-rulesets",
  "history",
] as const;

export type ListResource = (typeof LIST_RESOURCES)[number];

export type CliCommand =
  | { name: "up"; wait: boolean }
  | { name: "wait"; instanceId: string | null }
  | { name: "down"; instanceId: string | null }
  | { name: "ssh"; instanceId: string | null }
  | { name: "list"; resource: ListResource; availableOnly: boolean }
  | { name: "help" };

export interface ParsedArgs {
  command: CliCommand;
  configPath: string | null;
  /** Flag values as a config layer; unset flags are undefined. */
  overrides: ConfigLayer;
}

/** A user mistake on the command line or in the setup; printed without a stack. */
export class CliError extends Error {
  readonly name = "CliError" as const;
}

export const USAGE = `Usage: gpu-devbox <command> [options]

Commands:
  up                 Launch an instance (retrying while capacity is short) and wait for it
  wait [id]          Wait for a launched instance to become ready
  down [id]          Terminate an instance
  ssh [id]           Print the SSH command for an instance
  list <resource>    List ${LIST_RESOURCES.join(", ")}

Without an id, wait, down and ssh use the most recent instance launched from this machine.

Options for up:
  --region <name>          Region to launch in
  --instance-type <name>   Instance type, e.g. gpu_1x_a10
  --ssh-key <name>         SSH key registered with the account
  --filesystem <name>      Persistent filesystem to attach
  --name <name>            Instance name
  --image <id>             Image id
  --max-attempts <n>       Retries after the first capacity failure
  --no-wait                Return once the launch is accepted

Options for list:
  --available              Only show what can be launched right now

Global options:
  --config <path>          YAML config file (default: ./devbox.yaml if present)
  --log-level <level>      error, warn, info or debug
  -h, --help               Show this help
`;

const OPTIONS = {
  config: { type: "string" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
  region: { type: "string" },
  "instance-type": { type: "string" },
  "ssh-key": { type: "string" },
  filesystem: { type: "string" },
  name: { type: "string" },
  image: { type: "string" },
  "max-attempts": { type: "string" },
  "no-wait": { type: "boolean" },
  available: { type: "boolean" },
} as const;

function isListResource(value: string): value is ListResource {
  return LIST_RESOURCES.some((resource) => resource === value);
}

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true });
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const { values, positionals } = parse(argv);
  const configPath = values.config ?? null;
  const overrides: ConfigLayer = {
    logLevel: values["log-level"]?.toLowerCase(),
    retry: { maxAttempts: values["max-attempts"] },
    launch: {
      region: values.region,
      instanceType: values["instance-type"],
      sshKeyName: values["ssh-key"],
      filesystemName: values.filesystem,
      name: values.name,
      imageId: values.image,
    },
  };

  const [name, target, ...extra] = positionals;
  if (values.help || name === undefined || name === "help") {
    return { command: { name: "help" }, configPath, overrides };
  }
  if (extra.length > 0) {
    throw new CliError(`Unexpected argument: ${extra[0]}`);
  }

  switch (name) {
    case "up":
      if (target !== undefined) throw new CliError(`Unexpected argument: ${target}`);
      return { command: { name: "up", wait: !values["no-wait"] }, configPath, overrides };
    case "wait":
    case "down":
    case "ssh":
      return { command: { name, instanceId: target ?? null }, configPath, overrides };
    case "list":
      if (target === undefined) throw new CliError(`list needs a resource: ${LIST_RESOURCES.join(", ")}`);
      if (!isListResource(target)) {
        throw new CliError(`Unknown resource "${target}"; expected one of ${LIST_RESOURCES.join(", ")}`);
      }
      return {
        command: { name: "list", resource: target, availableOnly: values.available ?? false },
        configPath,
        overrides,
      };
    default:
      throw new CliError(`Unknown command "${name}". Run gpu-devbox --help for usage.`);
  }
}
