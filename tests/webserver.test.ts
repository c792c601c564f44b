import request from 'supertest';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { TECHNICAL_PROBLEM_REPLY } from '../src/application/services/IntentService.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { FakeAssistantClient, functionCall } from './helpers/FakeAssistantClient.js';
import { buildIntentService } from './helpers/stack.js';

const VALID_BODY = { message: 'Hola', history: [], session_id: 'session-a', metadata: {} };

function buildApp(client = new FakeAssistantClient()) {
  const server = new WebServer(buildIntentService(client), createSilentLogger(), {
    port: 0,
    storeBackend: 'sqlite',
  });
  return server.getApp();
}

describe('WebServer', () => {
  describe('Intent endpoints', () => {
    test('POST /intake should answer with the assistant reply', async () => {
      const client = new FakeAssistantClient().scriptRuns({ steps: [{ status: 'completed' }], reply: 'Bienvenido' });

      const res = await request(buildApp(client)).post('/intake').send(VALID_BODY);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
      expect(res.body).toEqual({ reply: 'Bienvenido', end_chat: false });
    });

    test('POST /needs_more_data should include the structured fields', async () => {
      const client = new FakeAssistantClient().scriptRuns({
        steps: [
          { status: 'requires_action', toolCalls: [functionCall('call_1', 'needs_more_data', '{"need":"yes"}')] },
          { status: 'completed' },
        ],
        reply: '¿Qué edad tienes?',
      });

      const res = await request(buildApp(client)).post('/needs_more_data').send(VALID_BODY);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ reply: '¿Qué edad tienes?', end_chat: false, need: 'yes', back_to_intake: true });
    });

    test('POST /give_advice should return 500 with the apology when the assistant keeps failing', async () => {
      const failed = { steps: [{ status: 'failed' as const, lastError: { code: 'server_error', message: 'boom' } }] };
      const client = new FakeAssistantClient().scriptRuns(failed, failed);

      const res = await request(buildApp(client)).post('/give_advice').send(VALID_BODY);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ reply: TECHNICAL_PROBLEM_REPLY, end_chat: false });
    });
  });

  describe('Validation', () => {
    test('should report a missing field', async () => {
      const { history: _history, ...body } = VALID_BODY;

      const res = await request(buildApp()).post('/intake').send(body);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing required field: history' });
    });

    test('should report a mistyped field', async () => {
      const res = await request(buildApp())
        .post('/intake')
        .send({ ...VALID_BODY, message: 42 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Message must be a string' });
    });

    test('should reject an empty session id without calling the assistant', async () => {
      const client = new FakeAssistantClient();

      const res = await request(buildApp(client))
        .post('/intake')
        .send({ ...VALID_BODY, session_id: '' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Session ID must not be empty' });
      expect(client.calls).toHaveLength(0);
    });

    test('should report an empty body', async () => {
      const res = await request(buildApp()).post('/give_advice').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'No JSON data provided' });
    });

    test('should report malformed JSON', async () => {
      const res = await request(buildApp())
        .post('/intake')
        .set('Content-Type', 'application/json')
        .send('{"message": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'No JSON data provided' });
    });

    test('should answer 413 for a body over the size limit', async () => {
      const res = await request(buildApp())
        .post('/intake')
        .send({ ...VALID_BODY, message: 'x'.repeat(200_000) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'request entity too large' });
    });

    test('should answer 415 for an unsupported charset', async () => {
      const res = await request(buildApp())
        .post('/intake')
        .set('Content-Type', 'application/json; charset=klingon')
        .send(JSON.stringify(VALID_BODY));

      expect(res.status).toBe(415);
      expect(res.body).toEqual({ error: 'unsupported charset "KLINGON"' });
    });

    test('should not call the assistant for invalid requests', async () => {
      const client = new FakeAssistantClient();

      await request(buildApp(client)).post('/intake').send({ message: 'Hola' });

      expect(client.calls).toHaveLength(0);
    });
  });

  describe('Routing', () => {
    test('GET on an intent endpoint should be 405', async () => {
      const res = await request(buildApp()).get('/intake');

      expect(res.status).toBe(405);
      expect(res.body).toEqual({ error: 'Method not allowed' });
    });

    test('unknown paths should be 404', async () => {
      const res = await request(buildApp()).post('/unknown').send(VALID_BODY);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Endpoint not found' });
    });

    test('GET /health should report the store backend', async () => {
      const res = await request(buildApp()).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', store: 'sqlite' });
    });
  });
});
