import { FactoryProvider } from "@nestjs/common";
import { IoTSecureTunnelingClient } from "@aws-sdk/client-iotsecuretunneling";
import { AwsProfileService } from "./aws-profile.service";

/**
 * Injection token for the IoT Secure Tunneling SDK client
 */
export const IOT_SECURE_TUNNELING_CLIENT = Symbol("IOT_SECURE_TUNNELING_CLIENT");

/**
 * Build an IoT Secure Tunneling client for the selected profile
 *
 * The region is passed as a provider so that commands which never call AWS
 * (e.g. --stop) do not need one.
 */
export function createIoTSecureTunnelingClient(
  profile: AwsProfileService,
): IoTSecureTunnelingClient {
  return new IoTSecureTunnelingClient({
    region: () => profile.resolveRegion(),
    credentials: profile.credentials(),
  });
}

export const iotSecureTunnelingClientProvider: FactoryProvider<IoTSecureTunnelingClient> =
  {
    provide: IOT_SECURE_TUNNELING_CLIENT,
    useFactory: createIoTSecureTunnelingClient,
    inject: [AwsProfileService],
  };
