import { FactoryProvider } from "@nestjs/common";
import Docker from "dockerode";
import { AppConfigService } from "@/app-config.service";

/**
 * Injection token for the dockerode client
 */
export const DOCKER_CLIENT = Symbol("DOCKER_CLIENT");

/**
 * dockerode falls back to DOCKER_HOST or the platform default socket when
 * no socket path is configured
 */
export function createDockerClient(config: AppConfigService): Docker {
  const socketPath = config.dockerSocketPath;
  return socketPath ? new Docker({ socketPath }) : new Docker();
}

export const dockerClientProvider: FactoryProvider<Docker> = {
  provide: DOCKER_CLIENT,
  useFactory: createDockerClient,
  inject: [AppConfigService],
};
