#!/usr/bin/env node

import axios from 'axios';
import { Command } from 'commander';
import * as readline from 'readline';
import { WhatsAppMessage, WhatsAppInboundMessage } from './types/whatsapp';
import { describeError } from './utils/errors';

interface SendOptions {
  port: string;
  from: string;
  image?: string;
}

interface InteractiveOptions {
  port: string;
  from: string;
}

interface DevReply {
  reply: string;
  path: string;
  persisted: boolean;
}

/**
 * Wraps a text message, or an image with an optional caption, in the same
 * envelope the WhatsApp Cloud API posts to the webhook.
 */
export function buildWebhookPayload(from: string, text: string, imageId?: string): WhatsAppMessage {
  const base = {
    from,
    id: `test-message-${Date.now()}`,
    timestamp: `${Math.floor(Date.now() / 1000)}`
  };

  const message: WhatsAppInboundMessage = imageId
    ? {
        ...base,
        type: 'image',
        image: { id: imageId, mime_type: 'image/jpeg', sha256: 'dev', caption: text || undefined }
      }
    : { ...base, type: 'text', text: { body: text } };

  return {
    object: 'whatsapp_business_account',
    entry: [
      {
        id: 'test-entry-id',
        changes: [
          {
            value: {
              messaging_product: 'whatsapp',
              metadata: {
                display_phone_number: '1234567890',
                phone_number_id: 'test-phone-id'
              },
              messages: [message]
            },
            field: 'messages'
          }
        ]
      }
    ]
  };
}

function reportError(error: unknown, port: string): void {
  if (axios.isAxiosError(error) && error.response) {
    console.error('❌ Server error:', error.response.status, error.response.statusText);
    console.error('📋 Response data:', error.response.data);
  } else if (axios.isAxiosError(error) && error.request) {
    console.error('❌ Network error: Could not connect to server');
    console.error('💡 Make sure the dev server is running on port', port);
  } else {
    console.error('❌ Error:', describeError(error));
  }
}

const program = new Command();

program
  .name('farm-advisor-dev')
  .description('CLI tool to send test messages to the farm advisor dev server')
  .version('1.0.0');

program
  .command('send')
  .description('Post a test message to the webhook, as WhatsApp would')
  .argument('[message]', 'Message text, or the caption when --image is given', '')
  .option('-p, --port <port>', 'Server port', process.env.PORT || '3000')
  .option('-f, --from <number>', 'Sender phone number', '254700000001')
  .option('-i, --image <mediaId>', 'Send an image message with this WhatsApp media id')
  .action(async (message: string, options: SendOptions) => {
    const webhookUrl = `http://localhost:${options.port}/webhook`;
    try {
      console.log(`📤 Sending ${options.image ? 'image' : 'text'} message to ${webhookUrl} from ${options.from}`);
      const response = await axios.post(webhookUrl, buildWebhookPayload(options.from, message, options.image), {
        headers: { 'Content-Type': 'application/json', 'User-Agent': 'Dev-Test-CLI/1.0.0' }
      });
      console.log(`✅ Accepted: ${response.status} ${response.statusText}`);
    } catch (error) {
      reportError(error, options.port);
      process.exitCode = 1;
    }
  });

program
  .command('interactive')
  .description('Chat with the dev server; replies are printed inline (requires DEV_MODE=true)')
  .option('-p, --port <port>', 'Server port', process.env.PORT || '3000')
  .option('-f, --from <number>', 'Sender phone number', '254700000001')
  .action((options: InteractiveOptions) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout
    });
    const devUrl = `http://localhost:${options.port}/dev/message`;

    console.log('💬 Interactive mode started');
    console.log(`📞 Sender: ${options.from}`);
    console.log('📝 Type your messages (type "exit" or "quit" to end):');
    console.log('---');

    const ask = async (message: string): Promise<void> => {
      if (message.toLowerCase() === 'exit' || message.toLowerCase() === 'quit') {
        rl.close();
        return;
      }

      try {
        const response = await axios.post<DevReply>(devUrl, { message, from: options.from });
        console.log(`🧭 [${response.data.path}${response.data.persisted ? '' : ', not stored'}]`);
        console.log(`🤖 ${response.data.reply}\n`);
      } catch (error) {
        reportError(error, options.port);
      }

      rl.question('💬 Next message: ', answer => {
        ask(answer).catch(error => reportError(error, options.port));
      });
    };

    rl.question('💬 Message: ', answer => {
      ask(answer).catch(error => reportError(error, options.port));
    });
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    console.error('❌ Error:', describeError(error));
    process.exit(1);
  });
}
