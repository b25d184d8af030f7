import { extractDiseaseInfo, formatDiseaseResult } from '../advisory/diseaseFormatter';
import { getPlantingRecommendation, supportedCrops } from '../advisory/seasonAdvisor';
import { formatWeatherReport } from '../advisory/weatherFormatter';
import { assembleDialogueContext, HISTORY_TURN_LIMIT } from '../memory/ContextAssembler';
import { ClassificationResult } from '../types/advisory';
import {
  DialogueModel,
  ForecastProvider,
  ImageClassifier,
  MediaSource,
  ProfileStore
} from '../types/collaborators';
import { ConversationTurn, FarmerProfile, NewConversationTurn } from '../types/conversation';
import { InboundMessage, MediaReference } from '../types/whatsapp';
import { DialogueModelError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { MessagePath, PathRule, selectMessagePath } from './messagePath';
import { buildDiseasePrompt, buildWeatherPrompt, DEFAULT_IMAGE_QUESTION } from './prompts';

export const LOCATION_REQUEST_TEXT =
  "To provide weather information, I need to know your location. Please tell me which town or region you're in. For example: 'I'm in Nairobi' or 'I'm near Kigali'";

export const DIALOGUE_APOLOGY_TEXT =
  "I apologize, but I'm having trouble connecting to my knowledge base right now. Please try again in a moment.";

export const ERROR_REPLY_TEXT =
  'Sorry, I encountered an error processing your message. Please try again in a moment. If the problem persists, contact support.';

export const IMAGE_ONLY_USER_MESSAGE = 'Image uploaded';

export interface MessageRouterDeps {
  profileStore: ProfileStore;
  dialogueModel: DialogueModel;
  imageClassifier: ImageClassifier;
  mediaSource: MediaSource;
  forecastProvider: ForecastProvider;
  pathRules?: PathRule[];
  now?: () => Date;
}

export interface RouterReply {
  text: string;
  path: MessagePath['kind'] | 'error';
  /** Whether a conversation turn was stored for this message. */
  persisted: boolean;
}

interface PathContext {
  contactKey: string;
  body: string;
  profile: FarmerProfile;
  history: ConversationTurn[];
}

interface PathOutcome {
  text: string;
  turn: NewConversationTurn | null;
}

interface ModelAnswer {
  reply: string;
  failed: boolean;
}

export function toContactKey(from: string): string {
  return from.replace(/^whatsapp:/, '');
}

/**
 * Picks one handling path per inbound message, drives the collaborators for
 * it in sequence and decides what is stored. Always resolves with a reply;
 * nothing is thrown back to the transport.
 *
 * Attempts whose dialogue call failed are answered but not stored, so the
 * history replayed to the model only contains real answers.
 */
export class MessageRouter {
  private profileStore: ProfileStore;
  private dialogueModel: DialogueModel;
  private imageClassifier: ImageClassifier;
  private mediaSource: MediaSource;
  private forecastProvider: ForecastProvider;
  private pathRules?: PathRule[];
  private now: () => Date;

  constructor(deps: MessageRouterDeps) {
    this.profileStore = deps.profileStore;
    this.dialogueModel = deps.dialogueModel;
    this.imageClassifier = deps.imageClassifier;
    this.mediaSource = deps.mediaSource;
    this.forecastProvider = deps.forecastProvider;
    this.pathRules = deps.pathRules;
    this.now = deps.now ?? (() => new Date());
  }

  async handleMessage(message: InboundMessage): Promise<RouterReply> {
    const contactKey = toContactKey(message.from);
    const body = message.body ?? '';

    try {
      const profile = await this.profileStore.getOrCreate(contactKey);
      await this.profileStore.touch(contactKey);
      const history = await this.profileStore.recentTurns(contactKey, HISTORY_TURN_LIMIT);

      const path = selectMessagePath(message, this.pathRules);
      logger.logRoute(`Message ${message.messageId} from ${contactKey} -> ${path.kind} path`, {
        historyTurns: history.length,
        mediaCount: message.media.length
      });

      const context: PathContext = { contactKey, body, profile, history };
      const outcome = await this.runPath(path, context);

      if (outcome.turn) {
        await this.profileStore.appendTurn(outcome.turn);
      }

      return { text: outcome.text, path: path.kind, persisted: outcome.turn !== null };
    } catch (error) {
      logger.logError(`Error processing message ${message.messageId} from ${contactKey}`, describeError(error));
      return { text: ERROR_REPLY_TEXT, path: 'error', persisted: false };
    }
  }

  private runPath(path: MessagePath, context: PathContext): Promise<PathOutcome> {
    switch (path.kind) {
      case 'image':
        return this.handleImage(path.media, context);
      case 'weather':
        return this.handleWeather(context);
      case 'conversation':
        return this.handleConversation(context);
    }
  }

  private async handleImage(media: MediaReference, context: PathContext): Promise<PathOutcome> {
    const predictions = await this.classifyMedia(media, context.profile);
    logger.logVision(`Classified media ${media.id}`, extractDiseaseInfo(predictions));
    const diseaseBlock = formatDiseaseResult(predictions);

    const prompt = buildDiseasePrompt(diseaseBlock, context.body || DEFAULT_IMAGE_QUESTION);
    const answer = await this.askModel(prompt, context.history);

    return {
      text: `${diseaseBlock}\n\n${answer.reply}`,
      turn: answer.failed ? null : {
        farmerPhone: context.contactKey,
        messageType: 'image',
        userMessage: context.body || IMAGE_ONLY_USER_MESSAGE,
        aiResponse: answer.reply,
        metadata: { kind: 'image', predictions, mediaId: media.id }
      }
    };
  }

  private async handleWeather(context: PathContext): Promise<PathOutcome> {
    const { location } = context.profile;

    if (!location) {
      return {
        text: LOCATION_REQUEST_TEXT,
        turn: {
          farmerPhone: context.contactKey,
          messageType: 'text',
          userMessage: context.body,
          aiResponse: LOCATION_REQUEST_TEXT
        }
      };
    }

    const snapshot = await this.forecastProvider.forecast(location);
    const report = formatWeatherReport(snapshot);

    const prompt = buildWeatherPrompt(context.body, location, report, this.plantingNotes(context.profile));
    const answer = await this.askModel(prompt, context.history);

    return {
      text: `${report}\n\n${answer.reply}`,
      turn: answer.failed ? null : {
        farmerPhone: context.contactKey,
        messageType: 'text',
        userMessage: context.body,
        aiResponse: answer.reply,
        metadata: { kind: 'weather', location, forecast: snapshot }
      }
    };
  }

  private async handleConversation(context: PathContext): Promise<PathOutcome> {
    const answer = await this.askModel(context.body, context.history);

    return {
      text: answer.reply,
      turn: answer.failed ? null : {
        farmerPhone: context.contactKey,
        messageType: 'text',
        userMessage: context.body,
        aiResponse: answer.reply
      }
    };
  }

  // A media download failure is reported to the farmer like an unavailable classifier
  private async classifyMedia(media: MediaReference, profile: FarmerProfile): Promise<ClassificationResult> {
    let image: Buffer;
    try {
      image = await this.mediaSource.downloadMedia(media);
    } catch (error) {
      logger.logError(`Could not download media ${media.id}`, describeError(error));
      return [];
    }

    // A single recorded crop selects a crop-specific model where one exists
    const cropHint = profile.crops.length === 1 ? profile.crops[0] : undefined;
    return this.imageClassifier.classify(image, cropHint);
  }

  private async askModel(prompt: string, history: ConversationTurn[]): Promise<ModelAnswer> {
    try {
      const reply = await this.dialogueModel.respond(assembleDialogueContext(history, prompt));
      return { reply, failed: false };
    } catch (error) {
      if (!(error instanceof DialogueModelError)) {
        throw error;
      }
      logger.logError('Dialogue model unavailable, answering with apology', error.message);
      return { reply: DIALOGUE_APOLOGY_TEXT, failed: true };
    }
  }

  private plantingNotes(profile: FarmerProfile): string[] {
    const month = this.now().getMonth() + 1;
    const known = supportedCrops();
    return profile.crops
      .filter(crop => known.includes(crop.toLowerCase()))
      .map(crop => `- ${crop}: ${getPlantingRecommendation(crop, month)}`);
  }
}
