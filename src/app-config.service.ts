import { Inject, Injectable } from "@nestjs/common";
import { homedir } from "os";
import { join } from "path";
import { APP_CONFIG, type AppConfig } from "@/config";

/**
 * Application configuration service that provides type-safe access to all config values
 */
@Injectable()
export class AppConfigService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get nodeEnv(): "development" | "production" | "test" {
    return this.config.nodeEnv;
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === "development";
  }

  get isProduction(): boolean {
    return this.nodeEnv === "production";
  }

  get isTest(): boolean {
    return this.nodeEnv === "test";
  }

  // ===== AWS Configuration =====

  get awsProfile(): string | undefined {
    return this.config.aws.profile;
  }

  get awsRegion(): string | undefined {
    return this.config.aws.region;
  }

  // ===== Tunnel Configuration =====

  get thingName(): string | undefined {
    return this.config.tunnel.thingName;
  }

  get service(): string {
    return this.config.tunnel.service;
  }

  get maxLifetimeMinutes(): number | undefined {
    return this.config.tunnel.maxLifetimeMinutes;
  }

  // ===== Local Proxy Configuration =====

  get proxyPort(): number {
    return this.config.proxy.port;
  }

  get proxyHost(): string {
    return this.config.proxy.host;
  }

  get proxyImage(): string | undefined {
    return this.config.proxy.image;
  }

  get dockerSocketPath(): string | undefined {
    return this.config.proxy.dockerSocketPath;
  }

  // ===== SSH Configuration =====

  get knownHostsFile(): string {
    return this.config.knownHosts.file ?? join(homedir(), ".ssh", "known_hosts");
  }

  get clearHostKeyOnConnect(): boolean {
    return this.config.knownHosts.clearOnConnect;
  }

  // ===== Logging Configuration =====

  get logLevel(): "debug" | "info" | "warn" | "error" {
    return this.config.logLevel;
  }
}
