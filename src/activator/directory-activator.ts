import type { AuthenticatedSession } from '../azure/session.js';
import { GRAPH_BASE, requestJson } from '../azure/http.js';
import type { AttemptResult, DirectoryEligibleRole } from '../shared/types.js';
import { classifyActivationError, classifyRequestStatus } from './error-classifier.js';
import { isoDuration, type ActivationRequest, type RoleActivator } from './types.js';

interface ScheduleRequestResponse {
  id?: string;
  status?: string;
}

export function buildDirectoryRequestBody(
  principalId: string,
  req: ActivationRequest<DirectoryEligibleRole>,
): Record<string, unknown> {
  return {
    action: 'selfActivate',
    principalId,
    roleDefinitionId: req.role.roleDefinitionId,
    directoryScopeId: req.role.directoryScopeId,
    justification: req.justification,
    scheduleInfo: {
      startDateTime: req.now.toISOString(),
      expiration: { type: 'afterDuration', duration: isoDuration(req.durationHours) },
    },
  };
}

export class DirectoryRoleActivator implements RoleActivator<DirectoryEligibleRole> {
  constructor(private readonly session: AuthenticatedSession) {}

  async attempt(req: ActivationRequest<DirectoryEligibleRole>): Promise<AttemptResult> {
    try {
      const response = await requestJson<ScheduleRequestResponse>(
        `${GRAPH_BASE}/roleManagement/directory/roleAssignmentScheduleRequests`,
        this.session.graphToken,
        { method: 'POST', body: buildDirectoryRequestBody(this.session.principalId, req) },
      );
      return classifyRequestStatus(response.status);
    } catch (err) {
      return classifyActivationError(err);
    }
  }
}
