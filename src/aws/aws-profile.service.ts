import { Injectable, Logger } from "@nestjs/common";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { loadSharedConfigFiles } from "@smithy/shared-ini-file-loader";
import { AppConfigService } from "@/app-config.service";

export type AwsCredentialsProvider = ReturnType<typeof fromNodeProviderChain>;

/**
 * Error raised when the AWS side cannot be configured from the given
 * profile, region and thing name
 */
export class AwsConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "missing_region"
      | "unknown_profile"
      | "missing_thing_name"
      | "config_unreadable",
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "AwsConfigurationError";
  }
}

/**
 * Resolves the AWS profile, region and credentials the tunnel runs under
 *
 * Region precedence: --region / AWS_REGION, then the `region` entry of the
 * selected profile in the shared config file (~/.aws/config, or
 * AWS_CONFIG_FILE). Credentials come from the SDK's node provider chain for
 * the same profile.
 */
@Injectable()
export class AwsProfileService {
  private readonly logger = new Logger(AwsProfileService.name);
  private regionPromise: Promise<string> | null = null;

  constructor(private readonly config: AppConfigService) {}

  /**
   * Profile name used for shared config lookups
   */
  get profileName(): string {
    return this.config.awsProfile ?? "default";
  }

  /**
   * Resolve the region once; later calls share the same result
   */
  resolveRegion(): Promise<string> {
    if (!this.regionPromise) {
      this.regionPromise = this.loadRegion().catch((error: unknown) => {
        // Let a failed lookup be retried
        this.regionPromise = null;
        throw error;
      });
    }
    return this.regionPromise;
  }

  /**
   * Credential provider for the selected profile
   */
  credentials(): AwsCredentialsProvider {
    const profile = this.config.awsProfile;
    return fromNodeProviderChain(profile ? { profile } : {});
  }

  private async loadRegion(): Promise<string> {
    const configured = this.config.awsRegion;
    if (configured) {
      this.logger.debug(`Using configured region ${configured}`);
      return configured;
    }

    const profile = this.profileName;
    let files: Awaited<ReturnType<typeof loadSharedConfigFiles>>;
    try {
      files = await loadSharedConfigFiles();
    } catch (error) {
      throw new AwsConfigurationError(
        `Failed to read the AWS shared config files: ${error instanceof Error ? error.message : String(error)}`,
        "config_unreadable",
        error,
      );
    }

    const profileConfig = files.configFile[profile];
    const profileCredentials = files.credentialsFile[profile];

    if (this.config.awsProfile && !profileConfig && !profileCredentials) {
      throw new AwsConfigurationError(
        `AWS profile "${profile}" was not found in the shared config or credentials file`,
        "unknown_profile",
      );
    }

    const region = profileConfig?.region;
    if (!region) {
      throw new AwsConfigurationError(
        `No region configured for AWS profile "${profile}". Pass --region or set AWS_REGION.`,
        "missing_region",
      );
    }

    this.logger.debug(`Using region ${region} from profile ${profile}`);
    return region;
  }
}
