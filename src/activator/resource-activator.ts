import { v4 as uuidv4 } from 'uuid';
import { ARM_API_VERSION, ARM_BASE, requestJson } from '../azure/http.js';
import type { AuthenticatedSession } from '../azure/session.js';
import type { AttemptResult, ResourceEligibleRole } from '../shared/types.js';
import { classifyActivationError, classifyRequestStatus } from './error-classifier.js';
import type { RoleDefinitionResolver } from './role-definitions.js';
import { isoDuration, type ActivationRequest, type RoleActivator } from './types.js';

interface ArmScheduleRequestResponse {
  name?: string;
  properties?: { status?: string };
}

export function buildResourceRequestBody(
  principalId: string,
  roleDefinitionId: string,
  req: ActivationRequest<ResourceEligibleRole>,
): Record<string, unknown> {
  return {
    properties: {
      principalId,
      roleDefinitionId,
      requestType: 'SelfActivate',
      justification: req.justification,
      scheduleInfo: {
        startDateTime: req.now.toISOString(),
        expiration: { type: 'AfterDuration', duration: isoDuration(req.durationHours) },
      },
    },
  };
}

export class ResourceRoleActivator implements RoleActivator<ResourceEligibleRole> {
  constructor(
    private readonly session: AuthenticatedSession,
    private readonly definitions: RoleDefinitionResolver,
    private readonly newRequestName: () => string = uuidv4,
  ) {}

  async attempt(req: ActivationRequest<ResourceEligibleRole>): Promise<AttemptResult> {
    try {
      const roleDefinitionId = await this.definitions.resolve(req.role);
      const url = `${ARM_BASE}${req.role.scope}/providers/Microsoft.Authorization/roleAssignmentScheduleRequests/${this.newRequestName()}?api-version=${ARM_API_VERSION}`;
      const response = await requestJson<ArmScheduleRequestResponse>(url, this.session.armToken, {
        method: 'PUT',
        body: buildResourceRequestBody(this.session.principalId, roleDefinitionId, req),
      });
      return classifyRequestStatus(response.properties?.status);
    } catch (err) {
      return classifyActivationError(err);
    }
  }
}
