import { Injectable, Logger } from "@nestjs/common";
import { TunnelStatus, type TunnelSummary } from "@aws-sdk/client-iotsecuretunneling";
import { AppConfigService } from "@/app-config.service";
import { AwsConfigurationError, AwsProfileService } from "@/aws";
import { LocalProxyService, type LocalProxyStatus } from "@/proxy";
import {
  KnownHostsError,
  KnownHostsService,
} from "@/services/known-hosts.service";
import { SecureTunnelService } from "./secure-tunnel.service";

/**
 * Result of a successful connect
 */
export interface TunnelSession {
  thingName: string;
  region: string;
  service: string;
  tunnelId: string;
  tunnelArn?: string;
  reused: boolean;
  host: string;
  port: number;
  image: string;
  containerId: string;
  removedHostKeys: string[];
  /** Set when host key cleanup failed; the proxy is running regardless */
  hostKeyWarning?: string;
}

export interface TunnelCloseResult {
  closedTunnelIds: string[];
  proxyStopped: boolean;
}

export interface TunnelStatusReport {
  thingName: string;
  tunnels: TunnelSummary[];
  proxy: LocalProxyStatus;
}

/**
 * Orchestrates one thing's tunnel: AWS side, local proxy and known_hosts
 */
@Injectable()
export class TunnelSessionService {
  private readonly logger = new Logger(TunnelSessionService.name);

  constructor(
    private readonly config: AppConfigService,
    private readonly awsProfile: AwsProfileService,
    private readonly secureTunnel: SecureTunnelService,
    private readonly localProxy: LocalProxyService,
    private readonly knownHosts: KnownHostsService,
  ) {}

  /**
   * Open or reuse the thing's tunnel and (re)start its local proxy
   *
   * Flow:
   * 1. Resolve the AWS region
   * 2. Pick the local proxy image (fails before touching AWS on an
   *    unsupported architecture)
   * 3. Reuse the OPEN tunnel or open one, getting a source access token
   * 4. Replace the thing's proxy container with a fresh one
   * 5. Optionally forget stale host keys for the local port
   */
  async connect(): Promise<TunnelSession> {
    const thingName = this.requireThingName();
    const service = this.config.service;
    const { proxyHost: host, proxyPort: port } = this.config;

    const region = await this.awsProfile.resolveRegion();
    const image = this.localProxy.resolveImage();

    const access = await this.secureTunnel.acquireSourceToken(
      thingName,
      service,
      this.config.maxLifetimeMinutes,
    );

    const containerId = await this.localProxy.start({
      thingName,
      region,
      sourceAccessToken: access.sourceAccessToken,
      port,
      host,
      image,
    });

    let removedHostKeys: string[] = [];
    let hostKeyWarning: string | undefined;
    if (this.config.clearHostKeyOnConnect) {
      try {
        removedHostKeys = await this.knownHosts.forgetPort(port, host);
      } catch (error) {
        if (!(error instanceof KnownHostsError)) {
          throw error;
        }
        this.logger.warn(`Host key cleanup failed: ${error.message}`);
        hostKeyWarning = `Could not clear the host key for port ${port}: ${error.message}`;
      }
    }

    this.logger.log(
      `Tunnel ${access.tunnelId} to ${thingName} available on ${host}:${port}`,
    );

    return {
      thingName,
      region,
      service,
      tunnelId: access.tunnelId,
      tunnelArn: access.tunnelArn,
      reused: access.reused,
      host,
      port,
      image,
      containerId,
      removedHostKeys,
      hostKeyWarning,
    };
  }

  /**
   * Stop the thing's local proxy; the tunnel stays open
   */
  async stop(): Promise<boolean> {
    return this.localProxy.stop(this.requireThingName());
  }

  /**
   * Close every OPEN tunnel of the thing, then stop its local proxy
   */
  async close(): Promise<TunnelCloseResult> {
    const thingName = this.requireThingName();
    const tunnels = await this.secureTunnel.listTunnels(thingName);

    const closedTunnelIds: string[] = [];
    for (const tunnel of tunnels) {
      if (tunnel.status !== TunnelStatus.OPEN || !tunnel.tunnelId) {
        continue;
      }
      await this.secureTunnel.closeTunnel(tunnel.tunnelId);
      closedTunnelIds.push(tunnel.tunnelId);
    }

    const proxyStopped = await this.localProxy.stop(thingName);
    return { closedTunnelIds, proxyStopped };
  }

  async status(): Promise<TunnelStatusReport> {
    const thingName = this.requireThingName();
    const [tunnels, proxy] = await Promise.all([
      this.secureTunnel.listTunnels(thingName),
      this.localProxy.getStatus(thingName),
    ]);
    return { thingName, tunnels, proxy };
  }

  private requireThingName(): string {
    const thingName = this.config.thingName;
    if (!thingName) {
      throw new AwsConfigurationError(
        "No thing name given. Pass --thing-name or set IOT_TUNNEL_THING_NAME.",
        "missing_thing_name",
      );
    }
    return thingName;
  }
}
