import { transformEnvToConfig, configSchema, AppConfig } from "./config.schema";

/**
 * Raw config input type (all strings, before validation)
 */
export type ConfigInput = Record<string, string | undefined>;

/**
 * CLI argument overrides that can be passed to buildConfigInput
 */
export interface CliOverrides {
  thingName?: string;
  profile?: string;
  region?: string;
  port?: number;
  host?: string;
  service?: string;
  image?: string;
  maxLifetime?: number;
  clearHostKey?: boolean;
  debug?: boolean;
}

/**
 * SINGLE SOURCE OF TRUTH for reading process.env
 *
 * This is the ONLY place in the codebase that should read process.env.*
 * CLI arguments override environment variables in memory.
 * Does NOT mutate process.env - returns merged config input.
 *
 * @param cliOverrides - Optional CLI argument overrides
 * @returns Raw config input for AppModule
 */
export function buildConfigInput(cliOverrides: CliOverrides = {}): ConfigInput {
  // Read ALL environment variables HERE and only here
  const input: ConfigInput = {
    NODE_ENV: process.env.NODE_ENV,
    AWS_PROFILE: process.env.AWS_PROFILE,
    AWS_REGION: process.env.AWS_REGION,
    IOT_TUNNEL_THING_NAME: process.env.IOT_TUNNEL_THING_NAME,
    IOT_TUNNEL_SERVICE: process.env.IOT_TUNNEL_SERVICE,
    IOT_TUNNEL_MAX_LIFETIME: process.env.IOT_TUNNEL_MAX_LIFETIME,
    IOT_TUNNEL_PORT: process.env.IOT_TUNNEL_PORT,
    IOT_TUNNEL_HOST: process.env.IOT_TUNNEL_HOST,
    IOT_TUNNEL_IMAGE: process.env.IOT_TUNNEL_IMAGE,
    IOT_TUNNEL_CLEAR_HOST_KEY: process.env.IOT_TUNNEL_CLEAR_HOST_KEY,
    DOCKER_SOCKET_PATH: process.env.DOCKER_SOCKET_PATH,
    SSH_KNOWN_HOSTS: process.env.SSH_KNOWN_HOSTS,
    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  // CLI overrides win over environment variables (in memory, no mutation)
  if (cliOverrides.thingName !== undefined) {
    input.IOT_TUNNEL_THING_NAME = cliOverrides.thingName;
  }
  if (cliOverrides.profile !== undefined) {
    input.AWS_PROFILE = cliOverrides.profile;
  }
  if (cliOverrides.region !== undefined) {
    input.AWS_REGION = cliOverrides.region;
  }
  if (cliOverrides.port !== undefined) {
    input.IOT_TUNNEL_PORT = String(cliOverrides.port);
  }
  if (cliOverrides.host !== undefined) {
    input.IOT_TUNNEL_HOST = cliOverrides.host;
  }
  if (cliOverrides.service !== undefined) {
    input.IOT_TUNNEL_SERVICE = cliOverrides.service;
  }
  if (cliOverrides.image !== undefined) {
    input.IOT_TUNNEL_IMAGE = cliOverrides.image;
  }
  if (cliOverrides.maxLifetime !== undefined) {
    input.IOT_TUNNEL_MAX_LIFETIME = String(cliOverrides.maxLifetime);
  }
  if (cliOverrides.clearHostKey) {
    input.IOT_TUNNEL_CLEAR_HOST_KEY = "true";
  }
  // CLI override for debug mode
  if (cliOverrides.debug) {
    input.LOG_LEVEL = "debug";
  }

  return input;
}

/**
 * Build and validate config in one step.
 * Use this when you need validated config outside NestJS DI.
 */
export function loadValidatedConfig(
  cliOverrides: CliOverrides = {},
): AppConfig {
  const input = buildConfigInput(cliOverrides);
  return configSchema.parse(transformEnvToConfig(input));
}
