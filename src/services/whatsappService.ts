import axios from 'axios';
import { ChatTransport } from '../types/collaborators';
import { WhatsAppResponse, WhatsAppAPIConfig } from '../types/whatsapp';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { splitMessage } from '../utils/splitMessage';

const SEND_TIMEOUT_MS = 15000;

export class WhatsAppService implements ChatTransport {
  private config: WhatsAppAPIConfig;
  private devMode: boolean;

  constructor(config: WhatsAppAPIConfig, devMode: boolean = false) {
    this.config = config;
    this.devMode = devMode;
  }

  private get messagesUrl(): string {
    return `https://graph.facebook.com/${this.config.apiVersion}/${this.config.phoneNumberId}/messages`;
  }

  private get headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.config.accessToken}`,
      'Content-Type': 'application/json'
    };
  }

  /**
   * Sends a reply, split into several WhatsApp messages when it is longer
   * than one text body allows. Returns false if any part failed.
   */
  async sendMessage(to: string, message: string): Promise<boolean> {
    const chunks = splitMessage(message);

    if (this.devMode) {
      console.log(`📱 [DEV MODE] Message would be sent to ${to} (${chunks.length} part(s)):`);
      console.log(`💬 ${message}`);
      console.log('---');
      return true;
    }

    try {
      for (const chunk of chunks) {
        const payload: WhatsAppResponse = {
          messaging_product: 'whatsapp',
          to,
          text: {
            body: chunk
          }
        };
        await axios.post(this.messagesUrl, payload, { headers: this.headers, timeout: SEND_TIMEOUT_MS });
      }

      console.log(`Message sent successfully to ${to}`);
      return true;
    } catch (error) {
      logger.logError(`Error sending message to ${to}`, describeError(error));
      return false;
    }
  }

  async markMessageAsRead(messageId: string): Promise<boolean> {
    if (this.devMode) {
      console.log(`📱 [DEV MODE] Message ${messageId} would be marked as read`);
      return true;
    }

    try {
      await axios.post(this.messagesUrl, {
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId
      }, { headers: this.headers, timeout: SEND_TIMEOUT_MS });
      return true;
    } catch (error) {
      logger.logError(`Error marking message ${messageId} as read`, describeError(error));
      return false;
    }
  }
}
