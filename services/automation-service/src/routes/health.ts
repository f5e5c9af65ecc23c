import type { AutomationService } from '../app';

export function healthHandler(service: AutomationService) {
  return {
    status: service.tasks.isRunning ? 'healthy' : 'stopped',
    service: 'automation-service',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    backend: service.interpreter.backendName,
    pending_confirmations: service.gate.listPending().length,
  };
}
