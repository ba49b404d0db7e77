/**
 * Azure IAM / RBAC Manager
 *
 * Role assignments via @azure/arm-authorization.
 */

import type { RoleAssignment } from "@azure/arm-authorization";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { PrincipalType } from "../declaration/types.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { collectAll, resourceGroupFromId } from "../pagination.js";
import type { DesiredRoleAssignment, ObservedResource } from "../platform/types.js";
import { isNotFoundError, readErrorField, withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export type RoleAssignmentResult = {
  observed: ObservedResource;
  /** False when the grant already existed (possibly under another name). */
  created: boolean;
};

export class AzureIAMManager {
  constructor(
    private credentialsManager: AzureCredentialsManager,
    private subscriptionId: string,
    private retryOptions?: AzureRetryOptions,
  ) {}

  private async getAuthClient() {
    const { AuthorizationManagementClient } = await import("@azure/arm-authorization");
    const { credential } = await this.credentialsManager.getCredential();
    return new AuthorizationManagementClient(credential, this.subscriptionId);
  }

  private run<T>(operation: string, scope: string, fn: () => Promise<T>): Promise<T> {
    return withAzureRetry(
      () => instrumentedAzureCall("authorization", operation, fn, resourceGroupFromId(scope) || undefined),
      this.retryOptions,
    );
  }

  async getRoleAssignment(scope: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getAuthClient();
    return this.run("roleAssignments.get", scope, async () => {
      try {
        return toObserved(await client.roleAssignments.get(scope, name), scope);
      } catch (e) {
        if (isNotFoundError(e) || readErrorField(e, "code") === "RoleAssignmentNotFound") return null;
        throw e;
      }
    });
  }

  /**
   * Create the assignment under its deterministic name. When the same
   * principal already holds the role on the scope under another name, the
   * platform answers 409 RoleAssignmentExists; that assignment is returned.
   */
  async createRoleAssignment(desired: DesiredRoleAssignment): Promise<RoleAssignmentResult> {
    const client = await this.getAuthClient();
    return this.run("roleAssignments.create", desired.scope, async () => {
      try {
        const result = await client.roleAssignments.create(desired.scope, desired.name, {
          roleDefinitionId: desired.roleDefinitionId,
          principalId: desired.principalId,
          principalType: desired.principalType,
        });
        return { observed: toObserved(result, desired.scope), created: true };
      } catch (e) {
        if (readErrorField(e, "code") !== "RoleAssignmentExists") throw e;
        const existing = await this.findAssignment(desired);
        if (!existing) throw e;
        return { observed: existing, created: false };
      }
    });
  }

  private async findAssignment(desired: DesiredRoleAssignment): Promise<ObservedResource | undefined> {
    const client = await this.getAuthClient();
    const matches = await collectAll(
      client.roleAssignments.listForScope(desired.scope, { filter: `principalId eq '${desired.principalId}'` }),
      (ra: RoleAssignment) => ra,
      (ra) =>
        (ra.roleDefinitionId ?? "").toLowerCase() === desired.roleDefinitionId.toLowerCase() &&
        (ra.scope ?? "").toLowerCase() === desired.scope.toLowerCase(),
    );
    return matches.length > 0 ? toObserved(matches[0], desired.scope) : undefined;
  }
}

function toPrincipalType(value: string | undefined): PrincipalType {
  if (value === "User" || value === "Group") return value;
  return "ServicePrincipal";
}

function toObserved(ra: RoleAssignment, scope: string): ObservedResource {
  return {
    id: ra.id ?? "",
    state: {
      kind: "RoleAssignment",
      resourceGroup: resourceGroupFromId(ra.scope ?? scope),
      name: ra.name ?? "",
      scope: ra.scope ?? scope,
      principalId: ra.principalId ?? "",
      principalType: toPrincipalType(ra.principalType),
      roleDefinitionId: ra.roleDefinitionId ?? "",
    },
  };
}
