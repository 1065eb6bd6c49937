/**
 * Public ECR repository of the prebuilt AWS IoT Secure Tunneling local proxy
 */
export const LOCAL_PROXY_REPOSITORY =
  "public.ecr.aws/aws-iot-securetunneling-localproxy/ubuntu-bin";

/**
 * Image tag per Node.js process.arch value
 */
export const LOCAL_PROXY_TAGS: ReadonlyMap<string, string> = new Map([
  ["x64", "amd64-latest"],
  ["arm64", "arm64-latest"],
  ["arm", "armv7-latest"],
]);

/**
 * Local proxy image for the given CPU architecture, or null when no image
 * is published for it
 */
export function imageForArchitecture(arch: string): string | null {
  const tag = LOCAL_PROXY_TAGS.get(arch);
  return tag ? `${LOCAL_PROXY_REPOSITORY}:${tag}` : null;
}
