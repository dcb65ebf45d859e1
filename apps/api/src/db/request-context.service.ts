import { ForbiddenException, Injectable } from '@nestjs/common';
import { actorFromClaims, type JwtClaims } from '@fmops/auth';
import type { RequestDbContext } from '@fmops/db';
import type { WorkOrderContext } from '@fmops/work-orders';

export interface RequestScope {
  db: RequestDbContext;
  workOrders: WorkOrderContext;
}

@Injectable()
export class RequestContextService {
  scopeFor(claims: JwtClaims, requestId: string): RequestScope {
    const { tenantId, userId } = actorFromClaims(claims);
    if (!tenantId) {
      throw new ForbiddenException('TENANT_REQUIRED');
    }

    return {
      db: { tenantId, userId, aud: claims.aud },
      workOrders: { tenantId, actorUserId: userId, requestId }
    };
  }
}
