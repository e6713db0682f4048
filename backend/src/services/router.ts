import { Router } from 'express';
import { baseRouter, type BaseRouterDeps } from './base.routes';

export type ApiRouterDeps = BaseRouterDeps;

// Mounts every v1 router. New routers get registered here.
export function apiRouter(deps: ApiRouterDeps): Router {
  const router = Router();
  router.use(baseRouter(deps));
  return router;
}
