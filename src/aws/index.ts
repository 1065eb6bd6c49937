export {
  AwsProfileService,
  AwsConfigurationError,
  type AwsCredentialsProvider,
} from "./aws-profile.service";
export {
  IOT_SECURE_TUNNELING_CLIENT,
  createIoTSecureTunnelingClient,
  iotSecureTunnelingClientProvider,
} from "./aws.providers";
