import { loadSharedConfigFiles } from "@smithy/shared-ini-file-loader";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { AppConfigService } from "@/app-config.service";
import type { AppConfig } from "@/config";
import {
  AwsConfigurationError,
  AwsProfileService,
} from "../aws-profile.service";

jest.mock("@smithy/shared-ini-file-loader", () => ({
  loadSharedConfigFiles: jest.fn(),
}));

jest.mock("@aws-sdk/credential-providers", () => ({
  fromNodeProviderChain: jest.fn(() => jest.fn()),
}));

const mockLoadSharedConfigFiles = jest.mocked(loadSharedConfigFiles);
const mockFromNodeProviderChain = jest.mocked(fromNodeProviderChain);

describe("AwsProfileService", () => {
  function createService(aws: AppConfig["aws"] = {}): AwsProfileService {
    const config = new AppConfigService({
      nodeEnv: "test",
      aws,
      tunnel: { service: "SSH" },
      proxy: { port: 5555, host: "127.0.0.1" },
      knownHosts: { clearOnConnect: false },
      logLevel: "info",
    });
    return new AwsProfileService(config);
  }

  function sharedFiles(
    configFile: Record<string, Record<string, string>>,
    credentialsFile: Record<string, Record<string, string>> = {},
  ) {
    mockLoadSharedConfigFiles.mockResolvedValue({ configFile, credentialsFile });
  }

  describe("profileName", () => {
    it("should fall back to the default profile", () => {
      expect(createService().profileName).toBe("default");
    });

    it("should return the selected profile", () => {
      expect(createService({ profile: "dev" }).profileName).toBe("dev");
    });
  });

  describe("resolveRegion", () => {
    it("should prefer the configured region without reading files", async () => {
      const service = createService({ profile: "dev", region: "ap-south-1" });

      await expect(service.resolveRegion()).resolves.toBe("ap-south-1");
      expect(mockLoadSharedConfigFiles).not.toHaveBeenCalled();
    });

    it("should read the region of the selected profile", async () => {
      sharedFiles({
        default: { region: "us-east-1" },
        dev: { region: "eu-west-1" },
      });

      await expect(createService({ profile: "dev" }).resolveRegion()).resolves.toBe(
        "eu-west-1",
      );
    });

    it("should read the default profile when none is selected", async () => {
      sharedFiles({ default: { region: "us-east-1" } });

      await expect(createService().resolveRegion()).resolves.toBe("us-east-1");
    });

    it("should fail for a selected profile that exists in neither file", async () => {
      sharedFiles({ default: { region: "us-east-1" } });

      await expect(
        createService({ profile: "missing" }).resolveRegion(),
      ).rejects.toMatchObject({
        name: "AwsConfigurationError",
        code: "unknown_profile",
        message:
          'AWS profile "missing" was not found in the shared config or credentials file',
      });
    });

    it("should fail with missing_region for a credentials-only profile", async () => {
      sharedFiles({}, { ci: { aws_access_key_id: "test-key-id" } });

      await expect(
        createService({ profile: "ci" }).resolveRegion(),
      ).rejects.toMatchObject({
        code: "missing_region",
        message:
          'No region configured for AWS profile "ci". Pass --region or set AWS_REGION.',
      });
    });

    it("should fail with missing_region when nothing is configured", async () => {
      sharedFiles({});

      await expect(createService().resolveRegion()).rejects.toBeInstanceOf(
        AwsConfigurationError,
      );
    });

    it("should wrap shared config read failures", async () => {
      mockLoadSharedConfigFiles.mockRejectedValue(new Error("EACCES"));

      await expect(createService().resolveRegion()).rejects.toMatchObject({
        code: "config_unreadable",
        message: "Failed to read the AWS shared config files: EACCES",
      });
    });

    it("should look the region up only once", async () => {
      sharedFiles({ default: { region: "us-east-1" } });
      const service = createService();

      await service.resolveRegion();
      await service.resolveRegion();

      expect(mockLoadSharedConfigFiles).toHaveBeenCalledTimes(1);
    });

    it("should retry after a failed lookup", async () => {
      mockLoadSharedConfigFiles
        .mockResolvedValueOnce({ configFile: {}, credentialsFile: {} })
        .mockResolvedValueOnce({
          configFile: { default: { region: "us-east-1" } },
          credentialsFile: {},
        });
      const service = createService();

      await expect(service.resolveRegion()).rejects.toMatchObject({
        code: "missing_region",
      });
      await expect(service.resolveRegion()).resolves.toBe("us-east-1");
    });
  });

  describe("credentials", () => {
    it("should build the provider chain for the selected profile", () => {
      createService({ profile: "dev" }).credentials();

      expect(mockFromNodeProviderChain).toHaveBeenCalledWith({ profile: "dev" });
    });

    it("should use the SDK defaults without a profile", () => {
      createService().credentials();

      expect(mockFromNodeProviderChain).toHaveBeenCalledWith({});
    });
  });
});
