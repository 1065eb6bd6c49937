export {
  LocalProxyService,
  LocalProxyError,
  containerNameFor,
  ACCESS_TOKEN_ENV,
  THING_LABEL,
  type LocalProxyOptions,
  type LocalProxyStatus,
  type LocalProxyErrorCode,
} from "./local-proxy.service";
export {
  DOCKER_CLIENT,
  createDockerClient,
  dockerClientProvider,
} from "./docker.provider";
export {
  LOCAL_PROXY_REPOSITORY,
  LOCAL_PROXY_TAGS,
  imageForArchitecture,
} from "./proxy-image";
