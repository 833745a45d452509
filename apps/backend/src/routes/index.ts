import { Router, type Express } from 'express';
import type { AppContext } from '../context.js';
import { createAdminController } from '../controllers/adminController.js';
import { createAllocationController } from '../controllers/allocationController.js';
import { requireAdminToken } from '../middleware/adminAuth.js';
import { route } from '../shared/route.js';
import { metricsRegistry } from '../utils/metrics.js';
import { lifecycleState } from '../utils/lifecycle.js';

export function setupRoutes(app: Express, ctx: AppContext) {
  const allocation = createAllocationController(ctx.services.allocations);
  const admin = createAdminController(ctx.services, ctx.repos.allocations);

  // Load balancers stop routing here as soon as a drain begins.
  app.get('/health', (_req, res) => {
    const { phase, since } = lifecycleState();
    if (phase !== 'running') {
      res.status(503).json({ status: 'shutting_down', phase, since });
      return;
    }
    res.json({ status: 'ok' });
  });

  app.get(
    '/metrics',
    route(async (_req, res) => {
      const registry = metricsRegistry();
      res.setHeader('Content-Type', registry.contentType);
      return res.send(await registry.metrics());
    })
  );

  const allocations = Router();
  allocations.post('/', allocation.create);
  allocations.post('/batch', allocation.createBatch);
  allocations.get('/:fingerprint', allocation.get);
  allocations.get('/:fingerprint/history', allocation.history);
  allocations.patch('/:fingerprint/upload', allocation.updateUpload);
  allocations.post('/:fingerprint/archive', allocation.archive);
  allocations.delete('/:fingerprint', allocation.remove);
  app.use('/allocations', allocations);

  app.get('/s/:identifier', allocation.resolve);

  const adminRoutes = Router();
  adminRoutes.use(requireAdminToken(ctx.config.adminToken));
  adminRoutes.get('/keyspace', admin.keyspace);
  adminRoutes.get('/reserved', admin.listReserved);
  adminRoutes.post('/reserved', admin.addReserved);
  adminRoutes.post('/reserved/reload', admin.reloadReserved);
  adminRoutes.post('/migrations/assign-missing', admin.assignMissing);
  app.use('/admin', adminRoutes);
}
