import { Router } from 'express';
import { ProxyController } from '../controllers/ProxyController';

/**
 * Creates the catch-all proxy route
 */
export function createProxyRoutes(proxyController: ProxyController): Router {
  const router = Router();

  // Every method and target is proxied; announces are rewritten on the way
  router.use((req, res, next) => {
    proxyController.handle(req, res).catch(next);
  });

  return router;
}
