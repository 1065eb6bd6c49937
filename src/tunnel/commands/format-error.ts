import { ZodError } from "zod";
import { AwsConfigurationError } from "@/aws";
import { LocalProxyError } from "@/proxy";
import { KnownHostsError } from "@/services/known-hosts.service";
import { SecureTunnelError } from "../secure-tunnel.service";

/**
 * Turn a failure from any command into a user-facing message
 */
export function formatCommandError(error: unknown, profile?: string): string {
  if (error instanceof ZodError) {
    const issues = error.issues
      .map((issue) => `   ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    return `Invalid configuration\n${issues}`;
  }

  if (error instanceof AwsConfigurationError) {
    return error.message;
  }

  if (error instanceof SecureTunnelError) {
    switch (error.code) {
      case "aws_auth_error": {
        const login = profile
          ? `aws sso login --profile ${profile}`
          : "aws sso login";
        return `AWS rejected the credentials: ${error.message}
   Check the profile's credentials, e.g. with: ${login}`;
      }
      case "missing_source_token":
        return "Failed to retrieve a source access token for the tunnel.";
      default:
        return error.message;
    }
  }

  if (error instanceof LocalProxyError) {
    if (error.code === "docker_unavailable") {
      return `${error.message}
   Make sure Docker is installed and running.`;
    }
    return error.message;
  }

  if (error instanceof KnownHostsError) {
    return `Failed to update known_hosts: ${error.message}`;
  }

  const message = error instanceof Error ? error.message : String(error);
  return `Unexpected error: ${message}`;
}
