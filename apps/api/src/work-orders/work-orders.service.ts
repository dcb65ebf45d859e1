import { Inject, Injectable } from '@nestjs/common';
import type { JwtClaims } from '@fmops/auth';
import type { RequestDbContext } from '@fmops/db';
import type { WorkOrderContext, WorkOrderEngine } from '@fmops/work-orders';
import { RequestContextService } from '../db/request-context.service.js';

export const WORK_ORDER_ENGINE_FACTORY = 'WORK_ORDER_ENGINE_FACTORY';

/** Builds an engine whose adapters run under the caller's RLS context. */
export type WorkOrderEngineFactory = (db: RequestDbContext) => WorkOrderEngine;

export interface BoundEngine {
  engine: WorkOrderEngine;
  ctx: WorkOrderContext;
}

@Injectable()
export class WorkOrdersService {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(WORK_ORDER_ENGINE_FACTORY) private readonly engineFor: WorkOrderEngineFactory
  ) {}

  forRequest(claims: JwtClaims, requestId: string): BoundEngine {
    const scope = this.requestContext.scopeFor(claims, requestId);
    return { engine: this.engineFor(scope.db), ctx: scope.workOrders };
  }
}
