import type { Logger, TaskService } from '@taskd/core';
import type { Router } from './router.js';

export interface RouteContext {
  service: TaskService;
  logger: Logger;
}

export type RouteRegisterFunction = (router: Router, ctx: RouteContext) => void;
