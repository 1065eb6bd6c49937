#!/usr/bin/env node
import "reflect-metadata";
import { parseCliArgs, checkForUpdates } from "./cli";
import { cli, setDebugMode } from "./cli/cli-output";
import { buildConfigInput } from "./config";
import {
  handleConnect,
  handleStop,
  handleClose,
  handleStatus,
} from "./tunnel";

async function bootstrap() {
  // Check for updates (non-blocking, cached)
  checkForUpdates();

  const options = parseCliArgs();

  // Set debug mode early so all error handlers can show stack traces
  setDebugMode(options.debug);

  // Build config input from env + CLI overrides (no process.env mutation)
  const configInput = buildConfigInput({
    thingName: options.thingName,
    profile: options.profile,
    region: options.region,
    port: options.port,
    host: options.host,
    service: options.service,
    image: options.image,
    maxLifetime: options.maxLifetime,
    clearHostKey: options.clearHostKey,
    debug: options.debug,
  });

  switch (options.action) {
    case "stop":
      await handleStop(configInput, options.debug);
      break;
    case "close":
      await handleClose(configInput, options.debug);
      break;
    case "status":
      await handleStatus(configInput, options.debug);
      break;
    case "connect":
      await handleConnect(configInput, options.debug);
      break;
  }
}

bootstrap().catch((err) => {
  cli.error(
    `iot-tunnel failed: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err : undefined,
  );
  process.exit(1);
});
