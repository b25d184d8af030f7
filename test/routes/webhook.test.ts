import Database from 'better-sqlite3';
import * as crypto from 'crypto';
import request from 'supertest';
import { Express } from 'express';
import { buildWebhookPayload } from '../../src/dev-test';
import { LOCATION_REQUEST_TEXT, MessageRouter } from '../../src/handlers/messageRouter';
import { openDatabase } from '../../src/memory/database';
import { SqliteProfileStore } from '../../src/memory/ProfileStore';
import { AdminRoutes } from '../../src/routes/admin';
import { toInboundMessage, WebhookRoutes } from '../../src/routes/webhook';
import { createServer } from '../../src/server';
import { ProcessedMessageService } from '../../src/services/processedMessageService';
import {
  fakeClassifier,
  fakeDialogueModel,
  fakeForecastProvider,
  fakeMediaSource,
  fakeTransport
} from '../helpers/fakes';

describe('Webhook routes', () => {
  let db: Database.Database;
  let store: SqliteProfileStore;
  let webhookRoutes: WebhookRoutes;
  let transport: ReturnType<typeof fakeTransport>;
  let dialogue: ReturnType<typeof fakeDialogueModel>;
  let app: Express;

  const buildApp = (appSecret: string = '', devMode: boolean = false): void => {
    db = openDatabase();
    store = new SqliteProfileStore(db);
    const processedMessages = new ProcessedMessageService(db);
    transport = fakeTransport();
    dialogue = fakeDialogueModel('Hello farmer');

    const messageRouter = new MessageRouter({
      profileStore: store,
      dialogueModel: dialogue.model,
      imageClassifier: fakeClassifier([{ label: 'Common_Rust', score: 0.88 }]).classifier,
      mediaSource: fakeMediaSource().source,
      forecastProvider: fakeForecastProvider().provider
    });

    webhookRoutes = new WebhookRoutes({
      messageRouter,
      transport: transport.transport,
      processedMessages,
      verifyToken: 'test-verify-token',
      appSecret,
      devMode
    });
    const adminRoutes = new AdminRoutes({ profileStore: store, processedMessages, transport: transport.transport });
    app = createServer({ webhookRoutes, adminRoutes, devMode });
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    db.close();
    jest.restoreAllMocks();
  });

  describe('GET /webhook', () => {
    beforeEach(() => buildApp());

    test('echoes the challenge for a valid token', async () => {
      const response = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '1158201444' });

      expect(response.status).toBe(200);
      expect(response.text).toBe('1158201444');
    });

    test('rejects a wrong token', async () => {
      const response = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '1' });

      expect(response.status).toBe(403);
    });

    test('requires mode and token', async () => {
      const response = await request(app).get('/webhook');
      expect(response.status).toBe(400);
    });
  });

  describe('POST /webhook', () => {
    beforeEach(() => buildApp());

    test('acknowledges and answers a text message', async () => {
      const response = await request(app).post('/webhook').send(buildWebhookPayload('254700000001', 'When do I plant?'));
      await webhookRoutes.drain();

      expect(response.status).toBe(200);
      expect(transport.markMessageAsRead).toHaveBeenCalledTimes(1);
      expect(transport.sendMessage).toHaveBeenCalledWith('254700000001', 'Hello farmer');

      const [turn] = await store.recentTurns('254700000001', 5);
      expect(turn.userMessage).toBe('When do I plant?');
    });

    test('answers a redelivered message once', async () => {
      const payload = buildWebhookPayload('254700000001', 'hello');

      await request(app).post('/webhook').send(payload);
      await request(app).post('/webhook').send(payload);
      await webhookRoutes.drain();

      expect(transport.sendMessage).toHaveBeenCalledTimes(1);
    });

    test('runs image messages through the disease path', async () => {
      await request(app).post('/webhook').send(buildWebhookPayload('254700000001', '', 'media-9'));
      await webhookRoutes.drain();

      const [, text] = transport.sendMessage.mock.calls[0];
      expect(text.startsWith('🔍 *Disease Detection Results*\n\n✅ *Most Likely: Common Rust*\n')).toBe(true);
      expect(text.endsWith('\n\nHello farmer')).toBe(true);

      const [turn] = await store.recentTurns('254700000001', 5);
      expect(turn.messageType).toBe('image');
      expect(turn.userMessage).toBe('Image uploaded');
    });

    test('ignores unsupported message kinds and malformed bodies', async () => {
      const payload = buildWebhookPayload('254700000001', 'hello');
      payload.entry[0].changes[0].value.messages = [
        { from: '254700000001', id: 'wamid.audio', timestamp: '1772352000', type: 'audio' }
      ];

      const audio = await request(app).post('/webhook').send(payload);
      const malformed = await request(app).post('/webhook').send({ object: 'whatsapp_business_account' });
      await webhookRoutes.drain();

      expect(audio.status).toBe(200);
      expect(malformed.status).toBe(200);
      expect(transport.sendMessage).not.toHaveBeenCalled();
    });
  });

  describe('signature verification', () => {
    const appSecret = 'test-app-secret';

    beforeEach(() => buildApp(appSecret));

    test('accepts a correctly signed body', async () => {
      const body = JSON.stringify(buildWebhookPayload('254700000001', 'hello'));
      const signature = crypto.createHmac('sha256', appSecret).update(body, 'utf8').digest('hex');

      const response = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('x-hub-signature-256', `sha256=${signature}`)
        .send(body);
      await webhookRoutes.drain();

      expect(response.status).toBe(200);
      expect(transport.sendMessage).toHaveBeenCalledTimes(1);
    });

    test('rejects a missing signature', async () => {
      const response = await request(app).post('/webhook').send(buildWebhookPayload('254700000001', 'hello'));
      await webhookRoutes.drain();

      expect(response.status).toBe(401);
      expect(transport.sendMessage).not.toHaveBeenCalled();
    });
  });

  describe('POST /dev/message', () => {
    test('returns the reply inline in dev mode', async () => {
      buildApp('', true);

      const response = await request(app).post('/dev/message').send({ message: 'Will it rain?', from: '254711111111' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        message: 'Will it rain?',
        reply: LOCATION_REQUEST_TEXT,
        path: 'weather',
        persisted: true,
        from: '254711111111'
      });
      expect(transport.sendMessage).not.toHaveBeenCalled();
    });

    test('requires a message or media id', async () => {
      buildApp('', true);

      const response = await request(app).post('/dev/message').send({});

      expect(response.status).toBe(400);
    });

    test('is not mounted outside dev mode', async () => {
      buildApp();

      const response = await request(app).post('/dev/message').send({ message: 'hi' });

      expect(response.status).toBe(404);
    });
  });

  test('reports health', async () => {
    buildApp('', true);

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.mode).toBe('development');
  });
});

describe('toInboundMessage', () => {
  test('maps an image caption to the message body', () => {
    expect(toInboundMessage({
      from: '254700000001',
      id: 'wamid.1',
      timestamp: '1772352000',
      type: 'image',
      image: { id: 'media-1', mime_type: 'image/jpeg', sha256: 'abc', caption: 'spots on leaves' }
    })).toEqual({
      from: 'whatsapp:254700000001',
      body: 'spots on leaves',
      media: [{ id: 'media-1', mimeType: 'image/jpeg', sha256: 'abc', caption: 'spots on leaves' }],
      messageId: 'wamid.1'
    });
  });

  test('returns null for other kinds', () => {
    expect(toInboundMessage({ from: '254700000001', id: 'wamid.2', timestamp: '1772352000', type: 'sticker' })).toBeNull();
  });
});
