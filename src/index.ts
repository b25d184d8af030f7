import dotenv from 'dotenv';
import { loadAppConfig } from './config/appConfig';
import { MessageRouter } from './handlers/messageRouter';
import { openDatabase } from './memory/database';
import { SqliteProfileStore } from './memory/ProfileStore';
import { AdminRoutes } from './routes/admin';
import { WebhookRoutes } from './routes/webhook';
import { createServer } from './server';
import { MediaService } from './services/mediaService';
import { createOpenAIServiceFromConfig } from './services/openaiService';
import { ProcessedMessageService } from './services/processedMessageService';
import { VisionService } from './services/visionService';
import { WeatherService } from './services/weatherService';
import { WhatsAppService } from './services/whatsappService';
import { describeError } from './utils/errors';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
  const config = loadAppConfig();

  if (!config.devMode && (!config.whatsapp.accessToken || !config.whatsapp.phoneNumberId)) {
    console.error('Missing required environment variables: WHATSAPP_ACCESS_TOKEN or WHATSAPP_PHONE_NUMBER_ID');
    process.exit(1);
  }

  const db = openDatabase(config.databasePath);
  const profileStore = new SqliteProfileStore(db);
  const processedMessages = new ProcessedMessageService(db);
  processedMessages.cleanupOldEntries(30);

  const whatsappService = new WhatsAppService(config.whatsapp, config.devMode);

  const messageRouter = new MessageRouter({
    profileStore,
    dialogueModel: createOpenAIServiceFromConfig(config.chatbotName),
    imageClassifier: new VisionService(config.vision),
    mediaSource: new MediaService(config.whatsapp, config.vision.timeoutMs),
    forecastProvider: new WeatherService(config.weather)
  });

  const webhookRoutes = new WebhookRoutes({
    messageRouter,
    transport: whatsappService,
    processedMessages,
    verifyToken: config.whatsapp.verifyToken,
    appSecret: config.whatsapp.appSecret,
    devMode: config.devMode
  });

  const app = createServer({
    webhookRoutes,
    adminRoutes: new AdminRoutes({ profileStore, processedMessages, transport: whatsappService }),
    devMode: config.devMode
  });

  const server = app.listen(config.port, config.host, () => {
    console.log('\n' + '='.repeat(60));
    console.log('🌱 Farm Advisor Bot Started');
    console.log('='.repeat(60));
    console.log(`📍 Host: ${config.host}`);
    console.log(`📍 Port: ${config.port}`);

    if (config.devMode) {
      console.log('\n💡 DEVELOPMENT MODE ACTIVATED');
      console.log('📱 Messages will be printed to console');
      console.log('🚫 No messages will be sent to WhatsApp');
      console.log('\n Usage: npm run dev:test -- send "Your message"');
    } else {
      console.log('\n⚡ Production Mode - Messages will be sent to WhatsApp');
    }

    console.log(`\n🌐 Webhook URL: http://localhost:${config.port}/webhook`);
    console.log(`❤️  Health check: http://localhost:${config.port}/health`);
    console.log('='.repeat(60) + '\n');
  });

  const shutdown = (): void => {
    console.log('🛑 Stopping server, finishing in-flight messages...');
    server.close();
    webhookRoutes.drain()
      .catch(error => console.error('Error while draining messages:', describeError(error)))
      .finally(() => {
        db.close();
        process.exit(0);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('❌ Failed to start server:', describeError(error));
  process.exit(1);
});
