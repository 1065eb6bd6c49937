import { ConfigInput } from "@/config";
import { cli } from "@/cli/cli-output";
import { TunnelSessionService, TunnelSession } from "../tunnel-session.service";
import { withApplicationContext } from "./application-context";
import { formatCommandError } from "./format-error";

/**
 * Display a simple text spinner while waiting on AWS and Docker
 * Returns a function to stop the spinner
 */
function startSpinner(message: string): () => void {
  const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let i = 0;

  // Spinner frames only make sense on a terminal
  if (!process.stdout.isTTY) {
    return () => {};
  }

  const interval = setInterval(() => {
    process.stdout.write(`\r${frames[i]} ${message}`);
    i = (i + 1) % frames.length;
  }, 80);

  return () => {
    clearInterval(interval);
    process.stdout.write("\r\x1b[K"); // Clear spinner line
  };
}

/**
 * Print the outcome of a connect
 */
export function displaySession(session: TunnelSession): void {
  if (session.reused) {
    cli.success(`Reused open tunnel ${session.tunnelId}`);
  } else {
    cli.success(`Opened new tunnel ${session.tunnelId}`);
  }
  cli.success(
    `Local proxy started (container ${session.containerId.slice(0, 12)})`,
  );
  for (const pattern of session.removedHostKeys) {
    cli.info(`Removed stale host key for ${pattern}`);
  }
  if (session.hostKeyWarning) {
    cli.warn(session.hostKeyWarning);
  }
  cli.blank();

  cli.box(
    `🔐 ${session.thingName} (${session.service})`,
    `${session.host}:${session.port}`,
  );
  cli.blank();

  if (session.service.toUpperCase() === "SSH") {
    cli.info("Connect with:");
    cli.command(`ssh -p ${session.port} <user>@${session.host}`);
    cli.blank();
  }

  cli.dim(`Region: ${session.region}`);
  cli.dim(`Image:  ${session.image}`);
  cli.dim(`Stop the proxy with: iot-tunnel -t ${session.thingName} --stop`);
}

/**
 * Handle the default command
 * Opens (or reuses) the thing's tunnel and starts the local proxy container
 *
 * Flow:
 * 1. Create NestJS application context from env + CLI config
 * 2. Acquire a source access token (reusing an OPEN tunnel when present)
 * 3. Replace the thing's proxy container
 * 4. Display the local endpoint
 *
 * The proxy container keeps running after this process exits.
 */
export async function handleConnect(
  configInput: ConfigInput,
  debug: boolean,
): Promise<void> {
  cli.blank();

  const stopSpinner = startSpinner("Opening tunnel...");
  try {
    const session = await withApplicationContext(configInput, debug, (app) =>
      app.get(TunnelSessionService).connect(),
    );
    stopSpinner();
    displaySession(session);
    cli.blank();
  } catch (error) {
    stopSpinner();
    cli.error(
      formatCommandError(error, configInput.AWS_PROFILE),
      error instanceof Error ? error : undefined,
    );
    cli.blank();
    process.exit(1);
  }
}
