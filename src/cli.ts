import { Command, InvalidArgumentError } from "commander";
import updateNotifier from "update-notifier";
import { getPackageJson, getVersion } from "./version";

export type CliAction = "connect" | "stop" | "close" | "status";

export interface CliOptions {
  action: CliAction;
  thingName?: string;
  profile?: string;
  region?: string;
  port?: number;
  host?: string;
  service?: string;
  image?: string;
  maxLifetime?: number;
  clearHostKey: boolean;
  debug: boolean;
}

interface RawCliOptions {
  thingName?: string;
  profile?: string;
  region?: string;
  port?: number;
  host?: string;
  service?: string;
  image?: string;
  maxLifetime?: number;
  clearHostKey?: boolean;
  stop?: boolean;
  close?: boolean;
  status?: boolean;
  debug?: boolean;
}

export function checkForUpdates(): void {
  updateNotifier({ pkg: getPackageJson() }).notify();
}

function parseInteger(name: string, min: number, max: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        `${name} must be an integer between ${min} and ${max}.`,
      );
    }
    return parsed;
  };
}

function resolveAction(options: RawCliOptions): CliAction {
  const selected = (["stop", "close", "status"] as const).filter(
    (action) => options[action] === true,
  );
  if (selected.length > 1) {
    throw new InvalidArgumentError(
      `Options ${selected.map((action) => `--${action}`).join(", ")} cannot be combined.`,
    );
  }
  return selected[0] ?? "connect";
}

export function buildProgram(): Command {
  return new Command()
    .name("iot-tunnel")
    .description(
      "Open an AWS IoT secure tunnel to a thing and run the local proxy in Docker",
    )
    .version(getVersion())
    .option("-t, --thing-name <name>", "AWS IoT thing name")
    .option("-p, --profile <name>", "AWS profile to use")
    .option("-r, --region <region>", "AWS region (default: the profile's region)")
    .option(
      "-P, --port <number>",
      "Local port to bind (default: 5555)",
      parseInteger("Port", 1, 65535),
    )
    .option("--host <address>", "Local IP address to bind (default: 127.0.0.1)")
    .option("-s, --service <name>", "Destination service (default: SSH)")
    .option("--image <uri>", "Local proxy container image override")
    .option(
      "--max-lifetime <minutes>",
      "Maximum lifetime of a newly opened tunnel",
      parseInteger("Max lifetime", 1, 720),
    )
    .option(
      "--clear-host-key",
      "Remove the SSH known_hosts entry recorded for the local port",
    )
    .option("--stop", "Stop the local proxy container for the thing")
    .option("--close", "Close the thing's open tunnels and stop its proxy")
    .option("--status", "Show the thing's tunnels and local proxy")
    .option("--debug", "Enable debug logging and stack traces")
    .addHelpText(
      "after",
      `
Examples:
  $ iot-tunnel -p dev -t gateway-01                  # Open or reuse a tunnel, proxy on :5555
  $ iot-tunnel -p dev -t gateway-01 -P 2222 --clear-host-key
  $ ssh -p 5555 pi@localhost                         # Then connect through the proxy

Managing:
  $ iot-tunnel -t gateway-01 --status                # Tunnels and proxy container
  $ iot-tunnel -t gateway-01 --stop                  # Stop the proxy, keep the tunnel
  $ iot-tunnel -t gateway-01 --close                 # Close the tunnel and stop the proxy

Environment:
  AWS_PROFILE, AWS_REGION, IOT_TUNNEL_THING_NAME, IOT_TUNNEL_PORT,
  IOT_TUNNEL_HOST, IOT_TUNNEL_SERVICE, IOT_TUNNEL_IMAGE, IOT_TUNNEL_MAX_LIFETIME,
  IOT_TUNNEL_CLEAR_HOST_KEY, DOCKER_SOCKET_PATH, SSH_KNOWN_HOSTS, LOG_LEVEL
`,
    );
}

export function parseCliArgs(argv: string[] = process.argv): CliOptions {
  const program = buildProgram();

  program.parse(argv);

  const options = program.opts<RawCliOptions>();

  let action: CliAction;
  try {
    action = resolveAction(options);
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      program.error(`error: ${err.message}`);
    }
    throw err;
  }

  return {
    action,
    thingName: options.thingName,
    profile: options.profile,
    region: options.region,
    port: options.port,
    host: options.host,
    service: options.service,
    image: options.image,
    maxLifetime: options.maxLifetime,
    clearHostKey: options.clearHostKey || false,
    debug: options.debug || false,
  };
}
