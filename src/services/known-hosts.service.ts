import { Injectable, Logger } from "@nestjs/common";
import { execFile } from "child_process";
import { access } from "fs/promises";
import { constants } from "fs";
import { AppConfigService } from "@/app-config.service";

/**
 * Error raised when ssh-keygen cannot update known_hosts
 */
export class KnownHostsError extends Error {
  constructor(
    message: string,
    public readonly code: "ssh_keygen_missing" | "ssh_keygen_failed",
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "KnownHostsError";
  }
}

/**
 * known_hosts pattern for a host and port
 * Port 22 is recorded without brackets, any other port as [host]:port
 */
export function hostPattern(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}

/**
 * Removes stale SSH host keys for the local proxy port
 *
 * Every tunnel reuses the same local port, so the key recorded for
 * localhost:<port> belongs to whichever device was reached last. ssh-keygen
 * does the editing so hashed entries are matched too.
 */
@Injectable()
export class KnownHostsService {
  private readonly logger = new Logger(KnownHostsService.name);

  constructor(private readonly config: AppConfigService) {}

  getKnownHostsPath(): string {
    return this.config.knownHostsFile;
  }

  /**
   * Forget every host key recorded for the local port
   *
   * @param port - Local proxy port
   * @param host - Address the port is bound to
   * @returns Patterns that had an entry removed
   */
  async forgetPort(port: number, host: string): Promise<string[]> {
    const file = this.getKnownHostsPath();

    if (!(await this.exists(file))) {
      this.logger.debug(`${file} does not exist, nothing to remove`);
      return [];
    }

    const patterns = [
      ...new Set(
        ["localhost", "127.0.0.1", host].map((name) => hostPattern(name, port)),
      ),
    ];

    const removed: string[] = [];
    for (const pattern of patterns) {
      const { stdout } = await this.sshKeygen(["-R", pattern, "-f", file]);
      if (stdout.includes(`# Host ${pattern} found`)) {
        this.logger.log(`Removed host key for ${pattern} from ${file}`);
        removed.push(pattern);
      }
    }

    return removed;
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await access(file, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  private sshKeygen(args: string[]): Promise<{ stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      execFile("ssh-keygen", args, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        if (error.code === "ENOENT") {
          reject(
            new KnownHostsError(
              "ssh-keygen was not found on PATH",
              "ssh_keygen_missing",
              error,
            ),
          );
          return;
        }
        reject(
          new KnownHostsError(
            `ssh-keygen ${args.join(" ")} failed: ${stderr.trim() || error.message}`,
            "ssh_keygen_failed",
            error,
          ),
        );
      });
    });
  }
}
