import { Inject, Injectable, Logger } from "@nestjs/common";
import Docker from "dockerode";
import { arch } from "os";
import { AppConfigService } from "@/app-config.service";
import { DOCKER_CLIENT } from "./docker.provider";
import { imageForArchitecture } from "./proxy-image";

/** Environment variable the local proxy reads its access token from */
export const ACCESS_TOKEN_ENV = "AWSIOT_TUNNEL_ACCESS_TOKEN";

/** Label set on every container this tool starts */
export const THING_LABEL = "iot-tunnel.thing";

/** CA bundle location inside the local proxy image */
const CA_CERTS_DIR = "/etc/ssl/certs";

export interface LocalProxyOptions {
  thingName: string;
  region: string;
  sourceAccessToken: string;
  port: number;
  host: string;
  image: string;
}

export interface LocalProxyStatus {
  name: string;
  exists: boolean;
  running: boolean;
  id?: string;
  image?: string;
}

export type LocalProxyErrorCode =
  | "unsupported_architecture"
  | "docker_unavailable"
  | "docker_error";

/**
 * Custom error class for local proxy container failures
 */
export class LocalProxyError extends Error {
  constructor(
    message: string,
    public readonly code: LocalProxyErrorCode,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "LocalProxyError";
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const statusCode: unknown = Reflect.get(error, "statusCode");
  return typeof statusCode === "number" ? statusCode : undefined;
}

function isDaemonUnreachable(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  const code: unknown = Reflect.get(error, "code");
  return code === "ECONNREFUSED" || code === "ENOENT" || code === "EACCES";
}

/**
 * Docker container names allow [a-zA-Z0-9][a-zA-Z0-9_.-]*; thing names may
 * also contain ':'
 */
export function containerNameFor(thingName: string): string {
  return thingName.replace(/[^a-zA-Z0-9_.-]/g, "-");
}

/**
 * Runs the AWS IoT Secure Tunneling local proxy image in source mode
 *
 * One container per thing, named after the thing. Starting a proxy for a
 * thing replaces the container already running for it.
 */
@Injectable()
export class LocalProxyService {
  private readonly logger = new Logger(LocalProxyService.name);

  constructor(
    @Inject(DOCKER_CLIENT) private readonly docker: Docker,
    private readonly config: AppConfigService,
  ) {}

  /**
   * Image for the given architecture
   * @throws {LocalProxyError} unsupported_architecture
   */
  selectImage(architecture: string = arch()): string {
    const image = imageForArchitecture(architecture);
    if (!image) {
      throw new LocalProxyError(
        `Unsupported architecture '${architecture}'. Pass --image to choose a local proxy image.`,
        "unsupported_architecture",
      );
    }
    this.logger.debug(`Selected ${image} for architecture ${architecture}`);
    return image;
  }

  /**
   * Configured image override, otherwise the image for this machine
   */
  resolveImage(architecture: string = arch()): string {
    return this.config.proxyImage ?? this.selectImage(architecture);
  }

  async getStatus(thingName: string): Promise<LocalProxyStatus> {
    const name = containerNameFor(thingName);
    const info = await this.inspect(name);
    if (!info) {
      return { name, exists: false, running: false };
    }
    return {
      name,
      exists: true,
      running: info.State.Running,
      id: info.Id,
      image: info.Config.Image,
    };
  }

  /**
   * Stop and remove the thing's proxy container
   * @returns false when there was no container
   */
  async stop(thingName: string): Promise<boolean> {
    const name = containerNameFor(thingName);
    const info = await this.inspect(name);
    if (!info) {
      this.logger.debug(`No container named ${name}`);
      return false;
    }

    const container = this.docker.getContainer(name);

    await this.dockerCall(`stop container ${name}`, async () => {
      if (info.State.Running && info.HostConfig.AutoRemove) {
        // Subscribe before stopping so the removal event is not missed
        const removed = container.wait({ condition: "removed" }).then(
          () => null,
          (error: unknown) => error,
        );
        await container.stop();
        const waitError = await removed;
        if (waitError !== null && statusCodeOf(waitError) !== 404) {
          throw waitError;
        }
        return;
      }

      await container.remove({ force: true }).catch((error: unknown) => {
        // 404: already gone, 409: removal already in progress
        const status = statusCodeOf(error);
        if (status !== 404 && status !== 409) {
          throw error;
        }
      });
    });

    this.logger.log(`Container '${name}' stopped`);
    return true;
  }

  /**
   * Pull the image unless it is present locally
   */
  async ensureImage(image: string): Promise<void> {
    const present = await this.dockerCall(`inspect image ${image}`, async () => {
      try {
        await this.docker.getImage(image).inspect();
        return true;
      } catch (error) {
        if (statusCodeOf(error) === 404) {
          return false;
        }
        throw error;
      }
    });

    if (present) {
      return;
    }

    this.logger.log(`Pulling ${image}`);
    await this.dockerCall(`pull ${image}`, async () => {
      const stream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (err: Error | null) =>
          err ? reject(err) : resolve(),
        );
      });
    });
  }

  /**
   * (Re)start the proxy for a thing
   * @returns ID of the new container
   */
  async start(options: LocalProxyOptions): Promise<string> {
    const name = containerNameFor(options.thingName);

    if (await this.stop(options.thingName)) {
      this.logger.log(`Replaced running proxy '${name}'`);
    }

    await this.ensureImage(options.image);

    const portKey = `${options.port}/tcp`;
    const container = await this.dockerCall(`create container ${name}`, () =>
      this.docker.createContainer({
        name,
        Image: options.image,
        Env: [`${ACCESS_TOKEN_ENV}=${options.sourceAccessToken}`],
        Cmd: [
          "--region",
          options.region,
          "-b",
          "0.0.0.0",
          "-s",
          String(options.port),
          "-c",
          CA_CERTS_DIR,
          "--destination-client-type",
          "V1",
        ],
        Labels: { [THING_LABEL]: options.thingName },
        ExposedPorts: { [portKey]: {} },
        HostConfig: {
          AutoRemove: true,
          PortBindings: {
            [portKey]: [{ HostIp: options.host, HostPort: String(options.port) }],
          },
        },
      }),
    );

    await this.dockerCall(`start container ${name}`, () => container.start());

    this.logger.log(
      `Container '${name}' started on ${options.host}:${options.port}`,
    );
    return container.id;
  }

  private async inspect(
    name: string,
  ): Promise<Docker.ContainerInspectInfo | null> {
    return this.dockerCall(`inspect container ${name}`, async () => {
      try {
        return await this.docker.getContainer(name).inspect();
      } catch (error) {
        if (statusCodeOf(error) === 404) {
          return null;
        }
        throw error;
      }
    });
  }

  private async dockerCall<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof LocalProxyError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      if (isDaemonUnreachable(error)) {
        throw new LocalProxyError(
          `Cannot reach the Docker daemon: ${message}`,
          "docker_unavailable",
          error,
        );
      }
      throw new LocalProxyError(
        `Failed to ${operation}: ${message}`,
        "docker_error",
        error,
      );
    }
  }
}
