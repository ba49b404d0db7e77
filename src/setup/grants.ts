/**
 * Keyless-mode role grants for the invoking principal.
 *
 * Every grant is attempted independently. A failed grant, or a principal
 * that could not be determined, yields a warning outcome with the `az`
 * command that performs the grant by hand.
 */

import { withDiagnosticStep } from "../diagnostics.js";
import { resolveRoleDefinitionId, roleAssignmentName, type BuiltinRoleName } from "../iam/roles.js";
import type { Logger } from "../logger.js";
import type { DesiredRoleAssignment, DiscoveredResource, ResourcePlatform } from "../platform/types.js";
import { formatErrorMessage, withDeadline } from "../retry.js";
import type { AzurePrincipal, StepOutcome } from "../types.js";

export type GrantTarget = {
  role: BuiltinRoleName;
  /** Resource the role is granted on; the resource group when it has no id. */
  resource: DiscoveredResource;
};

export type GrantContext = {
  subscriptionId: string;
  resourceGroup: string;
  principal?: AzurePrincipal;
  callTimeoutMs?: number;
  /** Aborts the remaining grants. */
  signal?: AbortSignal;
};

/** Grants issued in keyless mode, in the order they are attempted. */
export function keylessGrantTargets(resources: {
  search: DiscoveredResource;
  openai: DiscoveredResource;
  aiServices: DiscoveredResource;
  storage: DiscoveredResource;
}): GrantTarget[] {
  return [
    { role: "Search Index Data Contributor", resource: resources.search },
    { role: "Search Service Contributor", resource: resources.search },
    { role: "Cognitive Services User", resource: resources.openai },
    { role: "Cognitive Services User", resource: resources.aiServices },
    { role: "Storage Blob Data Contributor", resource: resources.storage },
  ];
}

export function remediationCommand(assignee: string, role: string, scope: string): string {
  return `az role assignment create --assignee ${assignee} --role "${role}" --scope ${scope}`;
}

export async function grantAccess(
  platform: ResourcePlatform,
  context: GrantContext,
  targets: readonly GrantTarget[],
  logger: Logger,
): Promise<StepOutcome[]> {
  const outcomes: StepOutcome[] = [];
  const { principal } = context;

  for (const target of targets) {
    const scope = target.resource.id || platform.scopeId(context.resourceGroup);
    const step = `grant ${target.role} on ${target.resource.name}`;

    if (!principal) {
      const hint = remediationCommand("<your-user-principal-name>", target.role, scope);
      logger.warn(`Could not determine the current user; ${step} skipped`);
      outcomes.push({ step, status: "warning", detail: "principal could not be determined", hint });
      continue;
    }

    const assignee = principal.displayName ?? principal.id;
    const roleDefinitionId = resolveRoleDefinitionId(target.role, context.subscriptionId);
    const grant: DesiredRoleAssignment = {
      kind: "RoleAssignment",
      name: roleAssignmentName(scope, principal.id, roleDefinitionId),
      resourceGroup: context.resourceGroup,
      scope,
      principalId: principal.id,
      principalType: principal.type,
      roleDefinitionId,
    };

    try {
      const result = await withDeadline(
        withDiagnosticStep(step, () => platform.grantRole(grant)),
        context.callTimeoutMs ?? 0,
        step,
        context.signal,
      );
      const detail = result.created ? `granted to ${assignee}` : `already granted to ${assignee}`;
      logger.info(`✓ ${target.role} on ${target.resource.name}: ${detail}`);
      outcomes.push({ step, status: "succeeded", detail });
    } catch (error) {
      const message = formatErrorMessage(error);
      const hint = remediationCommand(assignee, target.role, scope);
      logger.warn(`Failed to ${step} for ${assignee}: ${message}`);
      logger.warn(`  Run manually: ${hint}`);
      outcomes.push({ step, status: "warning", detail: message, hint });
    }
  }

  return outcomes;
}
