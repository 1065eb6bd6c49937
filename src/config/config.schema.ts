import { z } from "zod";

/**
 * AWS IoT thing names: 1-128 characters of letters, digits, colon,
 * underscore and hyphen
 */
export const THING_NAME_PATTERN = /^[a-zA-Z0-9:_-]{1,128}$/;

/**
 * Zod schema for application configuration
 * Maps environment variables to a strongly-typed config object
 */
export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),

  // AWS
  aws: z.object({
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
  }),

  // Secure tunnel
  tunnel: z.object({
    thingName: z
      .string()
      .regex(THING_NAME_PATTERN, "Invalid IoT thing name")
      .optional(),
    service: z.string().min(1).default("SSH"),
    maxLifetimeMinutes: z.coerce.number().int().min(1).max(720).optional(),
  }),

  // Local proxy container
  proxy: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(5555),
    // Docker publishes ports on an IP address, not a host name
    host: z.string().ip("Bind host must be an IP address").default("127.0.0.1"),
    image: z.string().min(1).optional(),
    dockerSocketPath: z.string().min(1).optional(),
  }),

  // SSH known_hosts maintenance
  knownHosts: z.object({
    file: z.string().min(1).optional(),
    clearOnConnect: z
      .enum(["true", "false", "1", "0"])
      .transform((value) => value === "true" || value === "1")
      .default("false"),
  }),

  // Logging
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Flat environment values regrouped into the nested shape, before validation
 */
export interface RawConfig {
  nodeEnv: string | undefined;
  aws: {
    profile: string | undefined;
    region: string | undefined;
  };
  tunnel: {
    thingName: string | undefined;
    service: string | undefined;
    maxLifetimeMinutes: string | undefined;
  };
  proxy: {
    port: string | undefined;
    host: string | undefined;
    image: string | undefined;
    dockerSocketPath: string | undefined;
  };
  knownHosts: {
    file: string | undefined;
    clearOnConnect: string | undefined;
  };
  logLevel: string | undefined;
}

/**
 * Transforms flat environment variables into nested config structure
 * This function maps process.env to the shape expected by configSchema
 *
 * Empty strings are treated as unset so that `FOO=` does not defeat defaults.
 */
export function transformEnvToConfig(
  env: Record<string, string | undefined>,
): RawConfig {
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  return {
    nodeEnv: read("NODE_ENV"),
    aws: {
      profile: read("AWS_PROFILE"),
      region: read("AWS_REGION"),
    },
    tunnel: {
      thingName: read("IOT_TUNNEL_THING_NAME"),
      service: read("IOT_TUNNEL_SERVICE"),
      maxLifetimeMinutes: read("IOT_TUNNEL_MAX_LIFETIME"),
    },
    proxy: {
      port: read("IOT_TUNNEL_PORT"),
      host: read("IOT_TUNNEL_HOST"),
      image: read("IOT_TUNNEL_IMAGE"),
      dockerSocketPath: read("DOCKER_SOCKET_PATH"),
    },
    knownHosts: {
      file: read("SSH_KNOWN_HOSTS"),
      clearOnConnect: read("IOT_TUNNEL_CLEAR_HOST_KEY"),
    },
    logLevel: read("LOG_LEVEL"),
  };
}
