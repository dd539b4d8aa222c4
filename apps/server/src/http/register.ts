import type { RouteContext } from './types.js';
import { Router } from './router.js';
import { tasksRegister } from './tasks.js';

export default function registerRoutes(router: Router, ctx: RouteContext): Router {
  [tasksRegister].forEach((fn) => fn(router, ctx));
  return router;
}

export function createRouter(ctx: RouteContext): Router {
  return registerRoutes(new Router(), ctx);
}
