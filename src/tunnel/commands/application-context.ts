import { NestFactory } from "@nestjs/core";
import { INestApplicationContext, Logger } from "@nestjs/common";
import { AppModule } from "@/app.module";
import { configSchema, transformEnvToConfig, ConfigInput } from "@/config";
import { setDebugMode } from "@/cli/cli-output";
import {
  createPinoLogger,
  createLoggerService,
  LOG_DESTINATION,
} from "@/bootstrap";

/**
 * Create the NestJS application context for one command, run `fn` with it
 * and close the context afterwards
 *
 * Logs go to stderr so stdout only carries the command's own output.
 */
export async function withApplicationContext<T>(
  configInput: ConfigInput,
  debug: boolean,
  fn: (app: INestApplicationContext) => Promise<T>,
): Promise<T> {
  // Set debug mode early so all error handlers can show stack traces
  setDebugMode(debug);

  // Validate before anything uses a config value
  const config = configSchema.parse(transformEnvToConfig(configInput));

  const logLevel = debug ? "debug" : config.logLevel;
  const pinoLogger = createPinoLogger(LOG_DESTINATION.STDERR, logLevel);
  const loggerService = createLoggerService(pinoLogger);

  // Logger.overrideLogger with array sets logLevels, with object sets staticInstanceRef
  // We need BOTH: first set which levels are enabled, then set where logs go
  if (debug) {
    Logger.overrideLogger(["log", "error", "warn", "debug", "verbose"]);
  }
  Logger.overrideLogger(loggerService);

  const app = await NestFactory.createApplicationContext(
    AppModule.forConfig(config),
    { logger: loggerService },
  );

  try {
    return await fn(app);
  } finally {
    await app.close();
  }
}
