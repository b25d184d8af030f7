import { ClassificationResult, ForecastSnapshot } from '../../src/types/advisory';
import {
  ChatTransport,
  DialogueModel,
  ForecastProvider,
  ImageClassifier,
  MediaSource,
  ProfileStore
} from '../../src/types/collaborators';
import {
  ConversationTurn,
  DialogueTurn,
  FarmerProfile,
  NewConversationTurn
} from '../../src/types/conversation';
import { MediaReference } from '../../src/types/whatsapp';

/**
 * In-memory ProfileStore that counts writes so tests can assert the
 * one-touch/one-append contract.
 */
export class FakeProfileStore implements ProfileStore {
  profiles = new Map<string, FarmerProfile>();
  turns: ConversationTurn[] = [];
  touches: string[] = [];
  appended: NewConversationTurn[] = [];
  recentTurnsCalls: Array<{ contactKey: string; limit: number }> = [];

  seedProfile(phoneNumber: string, overrides: Partial<FarmerProfile> = {}): FarmerProfile {
    const profile: FarmerProfile = {
      id: this.profiles.size + 1,
      phoneNumber,
      crops: [],
      language: 'en',
      active: true,
      createdAt: '2026-01-01T00:00:00.000Z',
      lastActive: '2026-01-01T00:00:00.000Z',
      ...overrides
    };
    this.profiles.set(phoneNumber, profile);
    return profile;
  }

  seedTurn(turn: Omit<ConversationTurn, 'createdAt'>): void {
    this.turns.push({ ...turn, createdAt: `2026-01-01T00:00:${String(this.turns.length).padStart(2, '0')}.000Z` });
  }

  async getOrCreate(contactKey: string): Promise<FarmerProfile> {
    return this.profiles.get(contactKey) ?? this.seedProfile(contactKey);
  }

  async touch(contactKey: string): Promise<void> {
    this.touches.push(contactKey);
  }

  async appendTurn(turn: NewConversationTurn): Promise<ConversationTurn> {
    this.appended.push(turn);
    const stored = { ...turn, createdAt: new Date().toISOString() };
    this.turns.push(stored);
    return stored;
  }

  async recentTurns(contactKey: string, limit: number): Promise<ConversationTurn[]> {
    this.recentTurnsCalls.push({ contactKey, limit });
    return this.turns.filter(t => t.farmerPhone === contactKey).slice(-limit);
  }
}

export function fakeDialogueModel(reply: string = 'Here is some advice.') {
  const respond = jest.fn<Promise<string>, [DialogueTurn[]]>().mockResolvedValue(reply);
  const model: DialogueModel = { respond };
  return { model, respond };
}

export function fakeClassifier(result: ClassificationResult = []) {
  const classify = jest.fn<Promise<ClassificationResult>, [Buffer, string | undefined]>().mockResolvedValue(result);
  const classifier: ImageClassifier = { classify };
  return { classifier, classify };
}

export function fakeMediaSource(bytes: Buffer = Buffer.from('fake-jpeg-bytes')) {
  const downloadMedia = jest.fn<Promise<Buffer>, [MediaReference]>().mockResolvedValue(bytes);
  const source: MediaSource = { downloadMedia };
  return { source, downloadMedia };
}

export function fakeForecastProvider(snapshot: ForecastSnapshot | null = null) {
  const forecast = jest.fn<Promise<ForecastSnapshot | null>, [string]>().mockResolvedValue(snapshot);
  const provider: ForecastProvider = { forecast };
  return { provider, forecast };
}

export function fakeTransport() {
  const sendMessage = jest.fn<Promise<boolean>, [string, string]>().mockResolvedValue(true);
  const markMessageAsRead = jest.fn<Promise<boolean>, [string]>().mockResolvedValue(true);
  const transport: ChatTransport = { sendMessage, markMessageAsRead };
  return { transport, sendMessage, markMessageAsRead };
}

export function makeSnapshot(overrides: Partial<ForecastSnapshot> = {}): ForecastSnapshot {
  return {
    location: 'Nakuru',
    country: 'KE',
    coordinates: { lat: -0.3031, lon: 36.08 },
    current: {
      temperature: 24.3,
      feelsLike: 24.1,
      humidity: 55,
      windSpeed: 5,
      description: 'scattered clouds'
    },
    forecast: Array.from({ length: 8 }, (_, i) => ({ timestamp: 1772352000 + i * 10800, temperature: 24 })),
    ...overrides
  };
}
