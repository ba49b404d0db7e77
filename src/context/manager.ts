/**
 * Azure Context Manager — resolves the subscription and signed-in identity
 * once, so everything downstream receives them explicitly.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AzureCLIWrapper } from "../cli/wrapper.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { InvalidConfigurationError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import type { AmbientContext, AzurePrincipal } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type ContextResolveOptions = {
  subscriptionId?: string;
  tenantId?: string;
  /** Explicit principal; skips the signed-in user lookup. */
  principalId?: string;
  principalName?: string;
  principalType?: AzurePrincipal["type"];
  /** Look up the signed-in user when no principal is given. */
  resolvePrincipal?: boolean;
};

const AccountSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  tenantId: Type.Optional(Type.String()),
  user: Type.Optional(Type.Object({ name: Type.String(), type: Type.String() })),
});

const SignedInUserSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  userPrincipalName: Type.Optional(Type.String()),
});

// =============================================================================
// Context Manager
// =============================================================================

export class AzureContextManager {
  private current: AmbientContext | null = null;

  constructor(
    private credentialsManager: AzureCredentialsManager,
    private cli: AzureCLIWrapper,
    private logger: Logger = createSilentLogger(),
  ) {}

  /**
   * Resolve the ambient context: explicit options first, then configuration
   * and environment, then the `az` login.
   */
  async resolve(options: ContextResolveOptions = {}): Promise<AmbientContext> {
    let subscriptionId = options.subscriptionId ?? this.credentialsManager.getSubscriptionId();
    let tenantId = options.tenantId ?? this.credentialsManager.getTenantId();

    if (!subscriptionId) {
      const account = await this.cli.getAccount();
      if (account.success && Value.Check(AccountSchema, account.parsed)) {
        subscriptionId = account.parsed.id;
        tenantId ??= account.parsed.tenantId;
        this.logger.debug(`Using subscription ${subscriptionId} from the az login`);
      }
    }
    if (!subscriptionId) {
      throw new InvalidConfigurationError(
        "No subscription: set AZURE_SUBSCRIPTION_ID, pass --subscription, or run `az login`",
      );
    }

    const principal = await this.resolvePrincipal(options);
    this.current = { subscriptionId, tenantId, principal };
    return this.current;
  }

  getContext(): AmbientContext | null {
    return this.current;
  }

  private async resolvePrincipal(options: ContextResolveOptions): Promise<AzurePrincipal | undefined> {
    if (options.principalId) {
      return {
        id: options.principalId,
        displayName: options.principalName,
        type: options.principalType ?? "User",
      };
    }
    if (!options.resolvePrincipal) return undefined;

    const user = await this.cli.getSignedInUser();
    if (user.success && Value.Check(SignedInUserSchema, user.parsed)) {
      return { id: user.parsed.id, displayName: user.parsed.userPrincipalName, type: "User" };
    }
    this.logger.warn(`Could not determine the signed-in user: ${user.stderr.trim() || "unexpected az output"}`);
    return undefined;
  }
}

export function createContextManager(
  credentialsManager: AzureCredentialsManager,
  cli: AzureCLIWrapper,
  logger?: Logger,
): AzureContextManager {
  return new AzureContextManager(credentialsManager, cli, logger);
}
