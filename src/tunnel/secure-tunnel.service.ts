import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import {
  ClientMode,
  CloseTunnelCommand,
  IoTSecureTunnelingClient,
  ListTunnelsCommand,
  OpenTunnelCommand,
  RotateTunnelAccessTokenCommand,
  TunnelStatus,
  type TunnelSummary,
} from "@aws-sdk/client-iotsecuretunneling";
import { IOT_SECURE_TUNNELING_CLIENT } from "@/aws/aws.providers";

/**
 * Source side of a tunnel, as handed to the local proxy
 */
export interface SourceAccess {
  tunnelId: string;
  tunnelArn?: string;
  sourceAccessToken: string;
  /** true when an already OPEN tunnel was reused */
  reused: boolean;
}

export type SecureTunnelErrorCode =
  | "aws_error"
  | "aws_auth_error"
  | "missing_source_token"
  | "missing_tunnel_id";

/**
 * Custom error class for secure tunneling failures
 */
export class SecureTunnelError extends Error {
  constructor(
    message: string,
    public readonly code: SecureTunnelErrorCode,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "SecureTunnelError";
  }
}

const AUTH_ERROR_NAMES = new Set([
  "CredentialsProviderError",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
  "ExpiredToken",
  "ExpiredTokenException",
  "AccessDeniedException",
]);

function isAuthError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  const name: unknown = Reflect.get(error, "name");
  if (typeof name === "string" && AUTH_ERROR_NAMES.has(name)) {
    return true;
  }
  const metadata: unknown = Reflect.get(error, "$metadata");
  if (typeof metadata === "object" && metadata !== null) {
    const status: unknown = Reflect.get(metadata, "httpStatusCode");
    return status === 401 || status === 403;
  }
  return false;
}

/**
 * Rejects an absent or blank token and the literal string "null"
 */
function isUsableToken(token: string | undefined): token is string {
  return (
    token !== undefined && token.trim() !== "" && token.toLowerCase() !== "null"
  );
}

/**
 * Thin layer over the IoT Secure Tunneling API scoped to one thing at a time
 *
 * The main entry point is acquireSourceToken(), which reuses the thing's OPEN
 * tunnel when there is one so that repeated runs never leak tunnels.
 */
@Injectable()
export class SecureTunnelService implements OnModuleDestroy {
  private readonly logger = new Logger(SecureTunnelService.name);

  constructor(
    @Inject(IOT_SECURE_TUNNELING_CLIENT)
    private readonly client: IoTSecureTunnelingClient,
  ) {}

  /**
   * Release the SDK's keep-alive sockets so the CLI can exit
   */
  onModuleDestroy(): void {
    this.client.destroy();
  }

  /**
   * List every tunnel (any status) whose destination is the given thing
   */
  async listTunnels(thingName: string): Promise<TunnelSummary[]> {
    const tunnels: TunnelSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.call("ListTunnels", () =>
        this.client.send(new ListTunnelsCommand({ thingName, nextToken })),
      );
      tunnels.push(...(response.tunnelSummaries ?? []));
      nextToken = response.nextToken;
    } while (nextToken);

    this.logger.debug(`Found ${tunnels.length} tunnel(s) for ${thingName}`);
    return tunnels;
  }

  /**
   * First OPEN tunnel for the thing, or null
   */
  async findOpenTunnel(thingName: string): Promise<TunnelSummary | null> {
    const tunnels = await this.listTunnels(thingName);
    return (
      tunnels.find(
        (tunnel) => tunnel.status === TunnelStatus.OPEN && tunnel.tunnelId,
      ) ?? null
    );
  }

  async openTunnel(
    thingName: string,
    service: string,
    maxLifetimeMinutes?: number,
  ): Promise<SourceAccess> {
    this.logger.log(`Opening a new tunnel to ${thingName} (${service})`);

    const response = await this.call("OpenTunnel", () =>
      this.client.send(
        new OpenTunnelCommand({
          description: `iot-tunnel ${service} access to ${thingName}`,
          destinationConfig: { thingName, services: [service] },
          timeoutConfig:
            maxLifetimeMinutes !== undefined
              ? { maxLifetimeTimeoutMinutes: maxLifetimeMinutes }
              : undefined,
        }),
      ),
    );

    if (!response.tunnelId) {
      throw new SecureTunnelError(
        "OpenTunnel did not return a tunnel ID",
        "missing_tunnel_id",
      );
    }

    return {
      tunnelId: response.tunnelId,
      tunnelArn: response.tunnelArn,
      sourceAccessToken: this.requireToken(response.sourceAccessToken),
      reused: false,
    };
  }

  /**
   * Rotate both access tokens of an existing tunnel
   * The destination config is sent again so the device is notified with
   * its fresh destination token
   */
  async rotateAccessToken(
    tunnelId: string,
    thingName: string,
    service: string,
  ): Promise<SourceAccess> {
    this.logger.log(`Rotating access tokens for tunnel ${tunnelId}`);

    const response = await this.call("RotateTunnelAccessToken", () =>
      this.client.send(
        new RotateTunnelAccessTokenCommand({
          tunnelId,
          clientMode: ClientMode.ALL,
          destinationConfig: { thingName, services: [service] },
        }),
      ),
    );

    return {
      tunnelId,
      tunnelArn: response.tunnelArn,
      sourceAccessToken: this.requireToken(response.sourceAccessToken),
      reused: true,
    };
  }

  /**
   * Close a tunnel; the tunnel record is kept (delete: false)
   */
  async closeTunnel(tunnelId: string): Promise<void> {
    this.logger.log(`Closing tunnel ${tunnelId}`);
    await this.call("CloseTunnel", () =>
      this.client.send(new CloseTunnelCommand({ tunnelId, delete: false })),
    );
  }

  /**
   * Reuse the thing's OPEN tunnel (rotating its tokens) or open a new one
   */
  async acquireSourceToken(
    thingName: string,
    service: string,
    maxLifetimeMinutes?: number,
  ): Promise<SourceAccess> {
    const existing = await this.findOpenTunnel(thingName);

    if (existing?.tunnelId) {
      this.logger.log(`Found existing tunnel ${existing.tunnelId}`);
      return this.rotateAccessToken(existing.tunnelId, thingName, service);
    }

    this.logger.log("No open tunnel found");
    return this.openTunnel(thingName, service, maxLifetimeMinutes);
  }

  private requireToken(token: string | undefined): string {
    if (!isUsableToken(token)) {
      throw new SecureTunnelError(
        "Failed to retrieve a source access token",
        "missing_source_token",
      );
    }
    return token;
  }

  private async call<T>(operation: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      const detail =
        error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      this.logger.debug(`${operation} failed: ${detail}`);
      throw new SecureTunnelError(
        `${operation} failed: ${detail}`,
        isAuthError(error) ? "aws_auth_error" : "aws_error",
        error,
      );
    }
  }
}
