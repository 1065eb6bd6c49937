import { ConfigInput } from "@/config";
import { cli } from "@/cli/cli-output";
import {
  TunnelSessionService,
  TunnelStatusReport,
} from "../tunnel-session.service";
import { withApplicationContext } from "./application-context";
import { formatCommandError } from "./format-error";

/**
 * Print tunnels (newest first) and the local proxy container of a thing
 */
export function displayStatus(report: TunnelStatusReport): void {
  cli.info(`Tunnels for ${report.thingName}:`);
  if (report.tunnels.length === 0) {
    cli.dim("  (none)");
  }

  const tunnels = [...report.tunnels].sort(
    (a, b) => (b.createdAt?.getTime() ?? 0) - (a.createdAt?.getTime() ?? 0),
  );
  for (const tunnel of tunnels) {
    const created = tunnel.createdAt ? tunnel.createdAt.toISOString() : "-";
    cli.info(
      `  ${tunnel.tunnelId ?? "-"}  ${(tunnel.status ?? "UNKNOWN").padEnd(6)}  ${created}`,
    );
  }
  cli.blank();

  const { proxy } = report;
  if (!proxy.exists) {
    cli.info(`Local proxy '${proxy.name}': not running`);
  } else {
    const state = proxy.running ? "running" : "stopped";
    cli.info(`Local proxy '${proxy.name}': ${state}`);
    if (proxy.image) {
      cli.dim(`  Image: ${proxy.image}`);
    }
  }
}

/**
 * Handle --status command
 */
export async function handleStatus(
  configInput: ConfigInput,
  debug: boolean,
): Promise<void> {
  try {
    const report = await withApplicationContext(configInput, debug, (app) =>
      app.get(TunnelSessionService).status(),
    );
    cli.blank();
    displayStatus(report);
    cli.blank();
  } catch (error) {
    cli.blank();
    cli.error(
      formatCommandError(error, configInput.AWS_PROFILE),
      error instanceof Error ? error : undefined,
    );
    process.exit(1);
  }
}
