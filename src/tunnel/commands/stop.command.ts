import { ConfigInput } from "@/config";
import { cli } from "@/cli/cli-output";
import { TunnelSessionService } from "../tunnel-session.service";
import { withApplicationContext } from "./application-context";
import { formatCommandError } from "./format-error";

/**
 * Handle --stop command
 *
 * Stops the thing's local proxy container. The tunnel itself stays open and
 * is reused by the next connect.
 *
 * @example
 * ```bash
 * $ iot-tunnel -t gateway-01 --stop
 * ✓ Local proxy for gateway-01 stopped.
 *
 * # If nothing is running:
 * $ iot-tunnel -t gateway-01 --stop
 * No local proxy running for gateway-01. Nothing to do.
 * ```
 */
export async function handleStop(
  configInput: ConfigInput,
  debug: boolean,
): Promise<void> {
  try {
    const stopped = await withApplicationContext(configInput, debug, (app) =>
      app.get(TunnelSessionService).stop(),
    );

    const thingName = configInput.IOT_TUNNEL_THING_NAME;
    cli.blank();
    if (stopped) {
      cli.success(`Local proxy for ${thingName} stopped.`);
    } else {
      cli.info(`No local proxy running for ${thingName}. Nothing to do.`);
    }
  } catch (error) {
    cli.blank();
    cli.error(
      formatCommandError(error, configInput.AWS_PROFILE),
      error instanceof Error ? error : undefined,
    );
    process.exit(1);
  }
}
