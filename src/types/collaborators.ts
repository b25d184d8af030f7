import { ClassificationResult, ForecastSnapshot } from './advisory';
import {
  ConversationTurn,
  DialogueTurn,
  FarmerProfile,
  NewConversationTurn
} from './conversation';
import { MediaReference } from './whatsapp';

/**
 * The seams the message router drives. Production adapters live in
 * `src/services` and `src/memory`; tests substitute in-process fakes.
 */

export interface ChatTransport {
  sendMessage(to: string, message: string): Promise<boolean>;
  markMessageAsRead(messageId: string): Promise<boolean>;
}

export interface DialogueModel {
  /**
   * `turns` alternate user/assistant and end with the user turn holding the
   * current prompt. Throws `DialogueModelError` when the provider cannot
   * answer.
   */
  respond(turns: DialogueTurn[]): Promise<string>;
}

export interface ImageClassifier {
  classify(image: Buffer, cropHint?: string): Promise<ClassificationResult>;
}

export interface MediaSource {
  downloadMedia(media: MediaReference): Promise<Buffer>;
}

export interface ForecastProvider {
  forecast(placeName: string): Promise<ForecastSnapshot | null>;
}

export interface ProfileStore {
  getOrCreate(contactKey: string): Promise<FarmerProfile>;
  touch(contactKey: string): Promise<void>;
  appendTurn(turn: NewConversationTurn): Promise<ConversationTurn>;
  /** Most recent `limit` turns, returned oldest first. */
  recentTurns(contactKey: string, limit: number): Promise<ConversationTurn[]>;
}
