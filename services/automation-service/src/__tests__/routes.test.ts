import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { Hono } from 'hono';
import { createAutomationService, type AutomationService } from '../app';
import { createRoutes } from '../routes';
import { FakeBrowserDriver, FakeSystemDriver, ScriptedBackend, testConfig } from './fakes';

const OPEN_AND_NAVIGATE =
  '[{"kind": "open_browser", "parameters": {}}, {"kind": "navigate", "parameters": {"url": "google.com"}}]';

function post(app: Hono, path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('routes', () => {
  let backend: ScriptedBackend;
  let service: AutomationService;
  let app: Hono;

  function setup(replies: ConstructorParameters<typeof ScriptedBackend>[0]) {
    backend = new ScriptedBackend(replies);
    service = createAutomationService(testConfig(), {
      browser: new FakeBrowserDriver(),
      system: new FakeSystemDriver(),
      backends: { backend },
    });
    service.start();
    app = createRoutes(service);
  }

  beforeEach(() => {
    setup([OPEN_AND_NAVIGATE]);
  });

  afterEach(async () => {
    await service.stop();
  });

  describe('GET /health', () => {
    it('should report the service state', async () => {
      const res = await app.request('/health');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        service: 'automation-service',
        backend: 'scripted',
        pending_confirmations: 0,
      });
    });
  });

  describe('POST /api/commands', () => {
    it('should accept a command and return its task id', async () => {
      const res = await post(app, '/api/commands', { command: 'open chrome and go to google.com' });
      const body = await res.json();

      expect(res.status).toBe(202);
      expect(body.success).toBe(true);
      expect(body.data.status).toBe('interpreting');

      const task = await service.tasks.waitFor(body.data.task_id);
      expect(task.status).toBe('completed');
    });

    it('should return the finished task when asked to wait', async () => {
      const res = await post(app, '/api/commands', { command: 'open chrome and go to google.com', wait: true });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.data.status).toBe('completed');
      expect(body.data.results).toHaveLength(2);
    });

    it('should reject an empty command', async () => {
      const res = await post(app, '/api/commands', { command: '   ' });
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toMatchObject({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body: command: command must not be empty' },
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await post(app, '/api/commands', '{not json');
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('Request body must be valid JSON');
    });

    it('should answer 503 once the service is stopped', async () => {
      await service.stop();

      const res = await post(app, '/api/commands', { command: 'open chrome' });
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body.error.code).toBe('SERVICE_UNAVAILABLE');
    });
  });

  describe('POST /api/parse', () => {
    it('should return the plan without executing it', async () => {
      const res = await post(app, '/api/parse', { command: 'open chrome and go to google.com' });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.data.plan).toEqual([
        { kind: 'open_browser', parameters: {} },
        { kind: 'navigate', parameters: { url: 'google.com' } },
      ]);
      expect(service.tasks.list()).toEqual([]);
    });

    it('should answer 422 when nothing can be done', async () => {
      await service.stop();
      setup(['[]']);

      const res = await post(app, '/api/parse', { command: 'asdkjasd' });
      const body = await res.json();

      expect(res.status).toBe(422);
      expect(body.error.code).toBe('NO_ACTIONABLE_INTENT');
    });
  });

  describe('/api/tasks', () => {
    it('should list and fetch tasks', async () => {
      const taskId = service.tasks.submit('open chrome and go to google.com');
      await service.tasks.waitFor(taskId);

      const list = await (await app.request('/api/tasks')).json();
      expect(list.data).toHaveLength(1);
      expect(list.data[0]).toMatchObject({ id: taskId, status: 'completed', actions: 2 });

      const detail = await (await app.request(`/api/tasks/${taskId}`)).json();
      expect(detail.data.command).toBe('open chrome and go to google.com');
    });

    it('should answer 404 for an unknown task', async () => {
      const res = await app.request('/api/tasks/missing');
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error).toEqual({ code: 'TASK_NOT_FOUND', message: 'Task not found: missing', details: { taskId: 'missing' } });
    });

    it('should acknowledge cancelling a finished task without effect', async () => {
      const taskId = service.tasks.submit('open chrome and go to google.com');
      await service.tasks.waitFor(taskId);

      const res = await app.request(`/api/tasks/${taskId}/cancel`, { method: 'POST' });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.data).toEqual({ task_id: taskId, status: 'completed', cancelled: false });
    });
  });

  describe('/api/confirmations', () => {
    it('should list and approve a pending confirmation', async () => {
      await service.stop();
      setup(['[{"kind": "type_text", "parameters": {"text": "hello"}}]']);
      const requested = new Promise<string>(resolve => {
        service.events.subscribe('confirmation_required', event => resolve(event.confirmation_id));
      });

      const taskId = service.tasks.submit('type hello', { requireConfirmation: true });
      const confirmationId = await requested;

      const pending = await (await app.request('/api/confirmations')).json();
      expect(pending.data).toHaveLength(1);
      expect(pending.data[0]).toMatchObject({ id: confirmationId, task_id: taskId, action_index: 0 });

      const res = await post(app, `/api/confirmations/${confirmationId}`, { approved: true });
      expect(res.status).toBe(200);
      expect((await res.json()).data).toEqual({ confirmation_id: confirmationId, approved: true });

      const task = await service.tasks.waitFor(taskId);
      expect(task.results[0].status).toBe('succeeded');
    });

    it('should answer 404 for an unknown confirmation', async () => {
      const res = await post(app, '/api/confirmations/missing', { approved: false });

      expect(res.status).toBe(404);
      expect((await res.json()).error.code).toBe('CONFIRMATION_NOT_FOUND');
    });
  });

  describe('other routes', () => {
    it('should list the action schema', async () => {
      const body = await (await app.request('/api/actions')).json();

      expect(body.data).toHaveLength(12);
      expect(body.data[0].kind).toBe('open_browser');
    });

    it('should serve no front page at the root', async () => {
      const res = await app.request('/');

      expect(res.status).toBe(404);
      expect((await res.json()).error).toEqual({ code: 'NOT_FOUND', message: 'No route for GET /' });
    });

    it('should answer 404 with the error envelope for unknown routes', async () => {
      const res = await app.request('/api/nothing');
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'No route for GET /api/nothing' } });
    });
  });
});
