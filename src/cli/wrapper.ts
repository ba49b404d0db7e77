/**
 * Azure CLI Wrapper
 *
 * Wraps the `az` CLI for the identity lookups that have no management SDK:
 * the active account and the signed-in user.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { readErrorField } from "../retry.js";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

export type AzureCLIOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  /** Timeout in ms. */
  timeoutMs?: number;
};

export type AzureCLIResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
};

// =============================================================================
// AzureCLIWrapper
// =============================================================================

export class AzureCLIWrapper {
  private azPath: string;
  private timeoutMs: number;

  constructor(options?: AzureCLIOptions) {
    this.azPath = options?.azPath ?? "az";
    this.timeoutMs = options?.timeoutMs ?? 60_000;
  }

  /**
   * Execute an az CLI command with JSON output. Never throws; failures come
   * back with `success: false` and the CLI's stderr.
   */
  async execute(args: string[]): Promise<AzureCLIResult> {
    const fullArgs = [...args, "--output", "json"];

    try {
      const { stdout, stderr } = await execFileAsync(this.azPath, fullArgs, {
        timeout: this.timeoutMs,
        env: process.env,
      });

      let parsed: unknown;
      try {
        parsed = JSON.parse(stdout);
      } catch {
        parsed = undefined;
      }

      return { success: true, stdout, stderr, exitCode: 0, parsed };
    } catch (error) {
      const stderr = readErrorField(error, "stderr");
      const message = readErrorField(error, "message");
      const code = readErrorField(error, "code");
      return {
        success: false,
        stdout: "",
        stderr: (typeof stderr === "string" && stderr) || (typeof message === "string" && message) || "Unknown error",
        exitCode: typeof code === "number" ? code : 1,
      };
    }
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.execute(["version"]);
    return result.success;
  }

  /** `az account show`: active subscription and tenant. */
  async getAccount(): Promise<AzureCLIResult> {
    return this.execute(["account", "show"]);
  }

  /** `az ad signed-in-user show`: object ID and UPN of the logged-in user. */
  async getSignedInUser(): Promise<AzureCLIResult> {
    return this.execute(["ad", "signed-in-user", "show"]);
  }
}

export function createCLIWrapper(options?: AzureCLIOptions): AzureCLIWrapper {
  return new AzureCLIWrapper(options);
}
