import { Router, Request, Response } from 'express';
import { getPlantingRecommendation, supportedCrops } from '../advisory/seasonAdvisor';
import { SqliteProfileStore } from '../memory/ProfileStore';
import { ProcessedMessageService } from '../services/processedMessageService';
import { ChatTransport } from '../types/collaborators';
import { FarmerUpdate } from '../types/conversation';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AdminRoutesOptions {
  profileStore: SqliteProfileStore;
  processedMessages: ProcessedMessageService;
  transport: ChatTransport;
  now?: () => Date;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Picks the editable profile fields out of a request body. Returns an error
 * message instead when a field has the wrong shape.
 */
export function parseFarmerUpdate(body: unknown): FarmerUpdate | string {
  if (typeof body !== 'object' || body === null) {
    return 'Request body must be a JSON object';
  }

  const update: FarmerUpdate = {};
  const fields: Record<string, unknown> = { ...body };

  for (const key of ['name', 'location', 'language'] as const) {
    if (fields[key] === undefined) continue;
    const value = optionalString(fields[key]);
    if (value === undefined) return `${key} must be a non-empty string`;
    update[key] = value;
  }

  if (fields.crops !== undefined) {
    const crops = fields.crops;
    if (!Array.isArray(crops) || !crops.every((c): c is string => typeof c === 'string')) {
      return 'crops must be an array of strings';
    }
    update.crops = crops;
  }

  if (fields.active !== undefined) {
    if (typeof fields.active !== 'boolean') return 'active must be a boolean';
    update.active = fields.active;
  }

  return update;
}

/**
 * Operator endpoints: usage stats, conversation search, profile edits,
 * planting calendar lookups and a manual outbound message.
 */
export class AdminRoutes {
  private router: Router;
  private profileStore: SqliteProfileStore;
  private processedMessages: ProcessedMessageService;
  private transport: ChatTransport;
  private now: () => Date;

  constructor(options: AdminRoutesOptions) {
    this.router = Router();
    this.profileStore = options.profileStore;
    this.processedMessages = options.processedMessages;
    this.transport = options.transport;
    this.now = options.now ?? (() => new Date());
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.router.get('/stats', (req: Request, res: Response) => {
      this.handleStats(res).catch(error => this.fail(res, 'Error getting stats', error));
    });

    this.router.get('/conversations/search', (req: Request, res: Response) => {
      this.handleSearch(req, res).catch(error => this.fail(res, 'Error searching conversations', error));
    });

    this.router.patch('/farmers/:phone', (req: Request, res: Response) => {
      this.handleFarmerUpdate(req, res).catch(error => this.fail(res, 'Error updating farmer', error));
    });

    this.router.get('/advice/planting', (req: Request, res: Response) => {
      this.handlePlantingAdvice(req, res);
    });

    this.router.post('/test/send-message', (req: Request, res: Response) => {
      this.handleSendMessage(req, res).catch(error => this.fail(res, 'Error sending test message', error));
    });
  }

  private fail(res: Response, context: string, error: unknown): void {
    logger.logError(context, describeError(error));
    res.status(500).json({ detail: describeError(error) });
  }

  private async handleStats(res: Response): Promise<void> {
    const stats = await this.profileStore.getStats();
    res.json({ ...stats, webhookMessages: this.processedMessages.getStats() });
  }

  private async handleSearch(req: Request, res: Response): Promise<void> {
    const query = optionalString(req.query.q);
    if (!query) {
      res.status(400).json({ detail: 'q is required' });
      return;
    }

    const limit = parseInt(String(req.query.limit ?? '20'), 10);
    const results = await this.profileStore.searchConversations(query, Number.isNaN(limit) ? 20 : limit);
    res.json({ query, results });
  }

  private async handleFarmerUpdate(req: Request, res: Response): Promise<void> {
    const update = parseFarmerUpdate(req.body);
    if (typeof update === 'string') {
      res.status(400).json({ detail: update });
      return;
    }

    const phone = req.params.phone;
    const updated = await this.profileStore.updateFarmer(phone, update);
    if (!updated) {
      res.status(404).json({ detail: `Farmer ${phone} not found` });
      return;
    }

    res.json(await this.profileStore.getFarmer(phone));
  }

  private handlePlantingAdvice(req: Request, res: Response): void {
    const crop = optionalString(req.query.crop);
    const month = req.query.month === undefined ? this.now().getMonth() + 1 : Number(req.query.month);

    if (!crop) {
      res.status(400).json({ detail: 'crop is required', supportedCrops: supportedCrops() });
      return;
    }

    try {
      res.json({ crop, month, advice: getPlantingRecommendation(crop, month) });
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      res.status(400).json({ detail: error.message });
    }
  }

  private async handleSendMessage(req: Request, res: Response): Promise<void> {
    const to = optionalString(req.body?.to);
    const message = optionalString(req.body?.message);
    if (!to || !message) {
      res.status(400).json({ detail: 'to and message are required' });
      return;
    }

    const sent = await this.transport.sendMessage(to, message);
    if (!sent) {
      res.status(500).json({ detail: `Failed to send message to ${to}` });
      return;
    }
    res.json({ status: 'sent', to });
  }

  getRouter(): Router {
    return this.router;
  }
}
