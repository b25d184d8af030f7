export interface WhatsAppMessage {
  object: string;
  entry: Array<{
    id: string;
    changes: Array<{
      value: {
        messaging_product: string;
        metadata: {
          display_phone_number: string;
          phone_number_id: string;
        };
        contacts?: Array<{
          profile: {
            name: string;
          };
          wa_id: string;
        }>;
        messages?: WhatsAppInboundMessage[];
      };
      field: string;
    }>;
  }>;
}

export interface WhatsAppInboundMessage {
  from: string;
  id: string;
  timestamp: string;
  text?: {
    body: string;
  };
  image?: {
    id: string;
    mime_type: string;
    sha256: string;
    caption?: string;
  };
  type: string;
}

export interface WhatsAppResponse {
  messaging_product: string;
  to: string;
  text: {
    body: string;
  };
}

export interface WhatsAppAPIConfig {
  accessToken: string;
  phoneNumberId: string;
  apiVersion: string;
}

export interface MediaReference {
  id: string;
  mimeType: string;
  sha256?: string;
  caption?: string;
}

/**
 * A chat message after it has been lifted out of the provider's webhook
 * envelope. `from` keeps its channel prefix (e.g. `whatsapp:+254700000001`).
 */
export interface InboundMessage {
  from: string;
  body?: string;
  media: MediaReference[];
  messageId: string;
}
