import type { Express } from 'express';
import { ConsumerRuntime, createServer, errorHandler, notFoundHandler } from 'saga-messaging';
import { Orchestrator } from './saga/orchestrator';
import type { SagaStateRepository } from './saga/sagaStateRepo';
import type { DecideOptions } from './saga/transitions';

export function createOrchestratorApp(serviceName: string, readiness?: () => Promise<boolean>): Express {
  const app = createServer(serviceName, async () => true, readiness);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function registerOrchestrator(runtime: ConsumerRuntime, sagas: SagaStateRepository, options: DecideOptions): Orchestrator {
  const orchestrator = new Orchestrator(sagas, options);
  orchestrator.register(runtime);
  return orchestrator;
}
