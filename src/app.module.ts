import { DynamicModule, Module } from "@nestjs/common";
import { AppConfigService } from "./app-config.service";
import { AwsProfileService, iotSecureTunnelingClientProvider } from "./aws";
import { LocalProxyService, dockerClientProvider } from "./proxy";
import { KnownHostsService } from "./services/known-hosts.service";
import { SecureTunnelService } from "./tunnel/secure-tunnel.service";
import { TunnelSessionService } from "./tunnel/tunnel-session.service";
import {
  configSchema,
  transformEnvToConfig,
  ConfigInput,
  APP_CONFIG,
  type AppConfig,
} from "@/config";

@Module({})
export class AppModule {
  /**
   * Creates AppModule for one CLI invocation
   * @param configInput - Raw config input (merged env + CLI overrides)
   */
  static forCli(configInput: ConfigInput): DynamicModule {
    return AppModule.forConfig(
      configSchema.parse(transformEnvToConfig(configInput)),
    );
  }

  /**
   * Creates AppModule from config that has already been validated
   */
  static forConfig(validatedConfig: AppConfig): DynamicModule {
    return {
      module: AppModule,
      providers: [
        // Provide validated config for type-safe injection
        {
          provide: APP_CONFIG,
          useValue: validatedConfig,
        },
        AppConfigService,
        // AWS
        AwsProfileService,
        iotSecureTunnelingClientProvider,
        SecureTunnelService,
        // Docker
        dockerClientProvider,
        LocalProxyService,
        // SSH
        KnownHostsService,
        TunnelSessionService,
      ],
      exports: [APP_CONFIG, AppConfigService, TunnelSessionService],
    };
  }
}
