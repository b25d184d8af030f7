import axios from 'axios';
import { MediaSource } from '../types/collaborators';
import { MediaReference, WhatsAppAPIConfig } from '../types/whatsapp';
import { describeError } from '../utils/errors';

interface MediaUrlResponse {
  url: string;
  mime_type?: string;
  file_size?: number;
}

/**
 * Fetches the bytes behind a WhatsApp Cloud media id. The Graph API first
 * hands out a short-lived URL, which needs the same bearer token.
 */
export class MediaService implements MediaSource {
  private config: WhatsAppAPIConfig;
  private timeoutMs: number;

  constructor(config: WhatsAppAPIConfig, timeoutMs: number = 30000) {
    this.config = config;
    this.timeoutMs = timeoutMs;
  }

  async downloadMedia(media: MediaReference): Promise<Buffer> {
    const headers = { 'Authorization': `Bearer ${this.config.accessToken}` };

    try {
      const mediaUrl = `https://graph.facebook.com/${this.config.apiVersion}/${media.id}`;
      const response = await axios.get<MediaUrlResponse>(mediaUrl, { headers, timeout: this.timeoutMs });

      const mediaResponse = await axios.get<ArrayBuffer>(response.data.url, {
        responseType: 'arraybuffer',
        headers,
        timeout: this.timeoutMs
      });

      return Buffer.from(mediaResponse.data);
    } catch (error) {
      throw new Error(`Failed to download media ${media.id}: ${describeError(error)}`);
    }
  }
}
