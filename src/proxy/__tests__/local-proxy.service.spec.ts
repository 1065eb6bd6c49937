import Docker from "dockerode";
import { AppConfigService } from "@/app-config.service";
import type { AppConfig } from "@/config";
import {
  ACCESS_TOKEN_ENV,
  LocalProxyError,
  LocalProxyService,
  THING_LABEL,
  containerNameFor,
} from "../local-proxy.service";
import { imageForArchitecture } from "../proxy-image";

function dockerError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe("LocalProxyService", () => {
  const container = {
    inspect: jest.fn(),
    stop: jest.fn(),
    remove: jest.fn(),
    wait: jest.fn(),
  };
  const image = { inspect: jest.fn() };
  const created = { id: "container-id-1", start: jest.fn() };
  const docker = {
    getContainer: jest.fn(() => container),
    getImage: jest.fn(() => image),
    pull: jest.fn(),
    createContainer: jest.fn(),
    modem: { followProgress: jest.fn() },
  };

  const baseConfig: AppConfig = {
    nodeEnv: "test",
    aws: {},
    tunnel: { service: "SSH" },
    proxy: { port: 5555, host: "127.0.0.1" },
    knownHosts: { clearOnConnect: false },
    logLevel: "info",
  };

  function createService(proxy: AppConfig["proxy"] = baseConfig.proxy) {
    return new LocalProxyService(
      docker as unknown as Docker,
      new AppConfigService({ ...baseConfig, proxy }),
    );
  }

  const notFound = () => dockerError("no such container", { statusCode: 404 });

  const runningInfo = {
    Id: "old-container",
    State: { Running: true },
    Config: { Image: "example/localproxy:1" },
    HostConfig: { AutoRemove: true },
  };

  beforeEach(() => {
    container.inspect.mockReset();
    container.stop.mockReset().mockResolvedValue(undefined);
    container.remove.mockReset().mockResolvedValue(undefined);
    container.wait.mockReset().mockResolvedValue({ StatusCode: 0 });
    image.inspect.mockReset().mockResolvedValue({});
    created.start.mockReset().mockResolvedValue(undefined);
    docker.pull.mockReset().mockResolvedValue("pull-stream");
    docker.createContainer.mockReset().mockResolvedValue(created);
    docker.modem.followProgress
      .mockReset()
      .mockImplementation((_stream: unknown, done: (err: Error | null) => void) =>
        done(null),
      );
  });

  describe("containerNameFor", () => {
    it("should replace characters Docker does not allow", () => {
      expect(containerNameFor("site:gateway_01.a")).toBe("site-gateway_01.a");
    });
  });

  describe("image selection", () => {
    it.each([
      ["x64", "amd64-latest"],
      ["arm64", "arm64-latest"],
      ["arm", "armv7-latest"],
    ])("should select the %s image", (arch, tag) => {
      expect(createService().selectImage(arch)).toBe(
        `public.ecr.aws/aws-iot-securetunneling-localproxy/ubuntu-bin:${tag}`,
      );
    });

    it("should not resolve object prototype keys as architectures", () => {
      expect(imageForArchitecture("constructor")).toBeNull();
      expect(imageForArchitecture("toString")).toBeNull();
    });

    it("should reject architectures without an image", () => {
      expect(() => createService().selectImage("ia32")).toThrow(
        new LocalProxyError(
          "Unsupported architecture 'ia32'. Pass --image to choose a local proxy image.",
          "unsupported_architecture",
        ),
      );
    });

    it("should prefer the configured image on any architecture", () => {
      const service = createService({
        port: 5555,
        host: "127.0.0.1",
        image: "example/localproxy:1",
      });

      expect(service.resolveImage("ia32")).toBe("example/localproxy:1");
    });
  });

  describe("getStatus", () => {
    it("should report a missing container", async () => {
      container.inspect.mockRejectedValue(notFound());

      await expect(createService().getStatus("gateway-01")).resolves.toEqual({
        name: "gateway-01",
        exists: false,
        running: false,
      });
    });

    it("should report a running container", async () => {
      container.inspect.mockResolvedValue(runningInfo);

      await expect(createService().getStatus("gateway-01")).resolves.toEqual({
        name: "gateway-01",
        exists: true,
        running: true,
        id: "old-container",
        image: "example/localproxy:1",
      });
    });

    it("should map an unreachable daemon to docker_unavailable", async () => {
      container.inspect.mockRejectedValue(
        dockerError("connect ECONNREFUSED /var/run/docker.sock", {
          code: "ECONNREFUSED",
        }),
      );

      await expect(createService().getStatus("gateway-01")).rejects.toMatchObject({
        name: "LocalProxyError",
        code: "docker_unavailable",
        message:
          "Cannot reach the Docker daemon: connect ECONNREFUSED /var/run/docker.sock",
      });
    });
  });

  describe("stop", () => {
    it("should return false when there is no container", async () => {
      container.inspect.mockRejectedValue(notFound());

      await expect(createService().stop("gateway-01")).resolves.toBe(false);
      expect(container.stop).not.toHaveBeenCalled();
      expect(container.remove).not.toHaveBeenCalled();
    });

    it("should wait for removal of an auto-removed running container", async () => {
      container.inspect.mockResolvedValue(runningInfo);

      await expect(createService().stop("gateway-01")).resolves.toBe(true);

      expect(container.wait).toHaveBeenCalledWith({ condition: "removed" });
      expect(container.wait.mock.invocationCallOrder[0]).toBeLessThan(
        container.stop.mock.invocationCallOrder[0],
      );
      expect(container.remove).not.toHaveBeenCalled();
    });

    it("should ignore a removal that already completed", async () => {
      container.inspect.mockResolvedValue(runningInfo);
      container.wait.mockRejectedValue(notFound());

      await expect(createService().stop("gateway-01")).resolves.toBe(true);
    });

    it("should force-remove a stopped container", async () => {
      container.inspect.mockResolvedValue({
        ...runningInfo,
        State: { Running: false },
      });
      container.remove.mockRejectedValue(
        dockerError("removal already in progress", { statusCode: 409 }),
      );

      await expect(createService().stop("gateway-01")).resolves.toBe(true);
      expect(container.remove).toHaveBeenCalledWith({ force: true });
      expect(container.stop).not.toHaveBeenCalled();
    });

    it("should wrap other Docker failures", async () => {
      container.inspect.mockResolvedValue({
        ...runningInfo,
        State: { Running: false },
      });
      container.remove.mockRejectedValue(
        dockerError("server error", { statusCode: 500 }),
      );

      await expect(createService().stop("gateway-01")).rejects.toMatchObject({
        code: "docker_error",
        message: "Failed to stop container gateway-01: server error",
      });
    });
  });

  describe("start", () => {
    const options = {
      thingName: "site:gateway-01",
      region: "eu-west-1",
      sourceAccessToken: "test-source-token",
      port: 5555,
      host: "127.0.0.1",
      image: "example/localproxy:1",
    };

    it("should create and start a source-mode proxy container", async () => {
      container.inspect.mockRejectedValue(notFound());

      await expect(createService().start(options)).resolves.toBe(
        "container-id-1",
      );

      expect(docker.getContainer).toHaveBeenCalledWith("site-gateway-01");
      expect(docker.pull).not.toHaveBeenCalled();
      expect(docker.createContainer).toHaveBeenCalledWith({
        name: "site-gateway-01",
        Image: "example/localproxy:1",
        Env: [`${ACCESS_TOKEN_ENV}=test-source-token`],
        Cmd: [
          "--region",
          "eu-west-1",
          "-b",
          "0.0.0.0",
          "-s",
          "5555",
          "-c",
          "/etc/ssl/certs",
          "--destination-client-type",
          "V1",
        ],
        Labels: { [THING_LABEL]: "site:gateway-01" },
        ExposedPorts: { "5555/tcp": {} },
        HostConfig: {
          AutoRemove: true,
          PortBindings: {
            "5555/tcp": [{ HostIp: "127.0.0.1", HostPort: "5555" }],
          },
        },
      });
      expect(created.start).toHaveBeenCalledTimes(1);
    });

    it("should replace an existing container first", async () => {
      container.inspect.mockResolvedValue(runningInfo);

      await createService().start(options);

      expect(container.stop.mock.invocationCallOrder[0]).toBeLessThan(
        docker.createContainer.mock.invocationCallOrder[0],
      );
    });

    it("should pull the image when it is not present", async () => {
      container.inspect.mockRejectedValue(notFound());
      image.inspect.mockRejectedValue(
        dockerError("no such image", { statusCode: 404 }),
      );

      await createService().start(options);

      expect(docker.pull).toHaveBeenCalledWith("example/localproxy:1");
      expect(docker.modem.followProgress).toHaveBeenCalledWith(
        "pull-stream",
        expect.any(Function),
      );
    });

    it("should fail when the pull fails", async () => {
      container.inspect.mockRejectedValue(notFound());
      image.inspect.mockRejectedValue(
        dockerError("no such image", { statusCode: 404 }),
      );
      docker.modem.followProgress.mockImplementation(
        (_stream: unknown, done: (err: Error | null) => void) =>
          done(new Error("manifest unknown")),
      );

      await expect(createService().start(options)).rejects.toMatchObject({
        code: "docker_error",
        message: "Failed to pull example/localproxy:1: manifest unknown",
      });
      expect(docker.createContainer).not.toHaveBeenCalled();
    });
  });
});
