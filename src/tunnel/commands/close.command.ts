import { ConfigInput } from "@/config";
import { cli } from "@/cli/cli-output";
import { TunnelSessionService } from "../tunnel-session.service";
import { withApplicationContext } from "./application-context";
import { formatCommandError } from "./format-error";

/**
 * Handle --close command
 * Closes every OPEN tunnel of the thing and stops its local proxy
 */
export async function handleClose(
  configInput: ConfigInput,
  debug: boolean,
): Promise<void> {
  try {
    const result = await withApplicationContext(configInput, debug, (app) =>
      app.get(TunnelSessionService).close(),
    );

    cli.blank();
    if (result.closedTunnelIds.length === 0) {
      cli.info("No open tunnel to close.");
    }
    for (const tunnelId of result.closedTunnelIds) {
      cli.success(`Closed tunnel ${tunnelId}`);
    }
    if (result.proxyStopped) {
      cli.success("Local proxy stopped");
    }
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
