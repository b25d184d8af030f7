import { Router, Request, Response } from 'express';
import { MessageRouter, toContactKey } from '../handlers/messageRouter';
import { ProcessedMessageService } from '../services/processedMessageService';
import { ChatTransport } from '../types/collaborators';
import { InboundMessage, WhatsAppInboundMessage, WhatsAppMessage } from '../types/whatsapp';
import { CryptoUtils } from '../utils/crypto';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { rawBodyOf } from './rawBody';

export interface WebhookRoutesOptions {
  messageRouter: MessageRouter;
  transport: ChatTransport;
  processedMessages: ProcessedMessageService;
  verifyToken: string;
  appSecret: string;
  devMode?: boolean;
}

/**
 * Lifts a Cloud API message into the router's shape. Returns null for kinds
 * the assistant does not handle (audio, stickers, reactions...).
 */
export function toInboundMessage(message: WhatsAppInboundMessage): InboundMessage | null {
  const from = `whatsapp:${message.from}`;

  if (message.type === 'text' && message.text) {
    return { from, body: message.text.body, media: [], messageId: message.id };
  }

  if (message.type === 'image' && message.image) {
    return {
      from,
      body: message.image.caption,
      media: [{
        id: message.image.id,
        mimeType: message.image.mime_type,
        sha256: message.image.sha256,
        caption: message.image.caption
      }],
      messageId: message.id
    };
  }

  return null;
}

export class WebhookRoutes {
  private router: Router;
  private messageRouter: MessageRouter;
  private transport: ChatTransport;
  private processedMessages: ProcessedMessageService;
  private verifyToken: string;
  private appSecret: string;
  private inFlight = new Set<Promise<void>>();

  constructor(options: WebhookRoutesOptions) {
    this.router = Router();
    this.messageRouter = options.messageRouter;
    this.transport = options.transport;
    this.processedMessages = options.processedMessages;
    this.verifyToken = options.verifyToken;
    this.appSecret = options.appSecret;
    this.setupRoutes(options.devMode ?? false);
  }

  private setupRoutes(devMode: boolean): void {
    this.router.get('/webhook', (req: Request, res: Response) => {
      this.handleWebhookVerification(req, res);
    });

    this.router.post('/webhook', (req: Request, res: Response) => {
      this.handleWebhookMessage(req, res).catch(error => {
        logger.logError('Error processing webhook', describeError(error));
        if (!res.headersSent) res.sendStatus(500);
      });
    });

    if (devMode) {
      this.router.post('/dev/message', (req: Request, res: Response) => {
        this.handleDevMessage(req, res).catch(error => {
          logger.logError('Error processing dev message', describeError(error));
          res.status(500).json({ error: 'Internal server error', message: describeError(error) });
        });
      });
    }
  }

  private handleWebhookVerification(req: Request, res: Response): void {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (!mode || !token) {
      res.sendStatus(400);
      return;
    }

    if (mode === 'subscribe' && token === this.verifyToken) {
      console.log('✅ Webhook verified successfully!');
      // WhatsApp expects the challenge string directly, not JSON
      res.status(200).send(typeof challenge === 'string' ? challenge : '');
    } else {
      console.warn('❌ Webhook verification failed! Token mismatch.');
      res.sendStatus(403);
    }
  }

  private async handleWebhookMessage(req: Request, res: Response): Promise<void> {
    if (this.appSecret) {
      const signature = req.header('x-hub-signature-256');
      const rawBody = rawBodyOf(req)?.toString('utf8') ?? JSON.stringify(req.body);

      if (!CryptoUtils.verifySignature(this.appSecret, rawBody, signature)) {
        console.warn('Invalid webhook signature');
        res.sendStatus(401);
        return;
      }
    }

    const data: WhatsAppMessage = req.body;
    const accepted: InboundMessage[] = [];

    for (const entry of Array.isArray(data?.entry) ? data.entry : []) {
      for (const change of entry.changes ?? []) {
        if (change.field !== 'messages') continue;

        for (const message of change.value.messages ?? []) {
          const isNew = await this.processedMessages.markIfNew(message.id, message.from, message.type);
          if (!isNew) continue;

          const inbound = toInboundMessage(message);
          if (!inbound) {
            console.log(`Unsupported message type: ${message.type}`);
            continue;
          }
          accepted.push(inbound);
        }
      }
    }

    // Acknowledge first: Meta redelivers webhooks that are slow to answer
    res.sendStatus(200);

    for (const inbound of accepted) {
      this.track(this.answer(inbound));
    }
  }

  private async answer(inbound: InboundMessage): Promise<void> {
    const to = toContactKey(inbound.from);
    await this.transport.markMessageAsRead(inbound.messageId);
    const reply = await this.messageRouter.handleMessage(inbound);
    const sent = await this.transport.sendMessage(to, reply.text);
    if (!sent) {
      logger.logError(`Reply to ${to} for message ${inbound.messageId} was not delivered`);
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch(error => logger.logError('Background message processing failed', describeError(error)))
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  /**
   * Resolves once every message accepted so far has been answered. Used on
   * shutdown and by tests.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  private async handleDevMessage(req: Request, res: Response): Promise<void> {
    const { message, from = 'dev-user', mediaId, mimeType = 'image/jpeg' } = req.body ?? {};

    if (typeof message !== 'string' && typeof mediaId !== 'string') {
      res.status(400).json({ error: 'message or mediaId is required' });
      return;
    }

    const inbound: InboundMessage = {
      from: `whatsapp:${String(from)}`,
      body: typeof message === 'string' ? message : undefined,
      media: typeof mediaId === 'string' ? [{ id: mediaId, mimeType: String(mimeType) }] : [],
      messageId: `dev-${Date.now()}`
    };

    console.log(`📱 [DEV API] Received message from ${from}: "${inbound.body ?? '[image]'}"`);
    const reply = await this.messageRouter.handleMessage(inbound);

    res.status(200).json({
      success: reply.path !== 'error',
      message: inbound.body ?? null,
      reply: reply.text,
      path: reply.path,
      persisted: reply.persisted,
      from,
      timestamp: new Date().toISOString()
    });
  }

  getRouter(): Router {
    return this.router;
  }
}
