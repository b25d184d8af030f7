import { Prediction, ForecastSnapshot } from './advisory';

export type MessageType = 'text' | 'image' | 'voice';

export interface FarmerProfile {
  id: number;
  phoneNumber: string;
  name?: string;
  location?: string;
  crops: string[];
  language: string;
  active: boolean;
  createdAt: string;
  lastActive: string;
}

export interface FarmerUpdate {
  name?: string;
  location?: string;
  crops?: string[];
  language?: string;
  active?: boolean;
}

export type TurnMetadata =
  | { kind: 'image'; predictions: Prediction[]; mediaId: string }
  | { kind: 'weather'; location: string; forecast: ForecastSnapshot | null };

export interface ConversationTurn {
  farmerPhone: string;
  messageType: MessageType;
  userMessage: string;
  aiResponse: string;
  metadata?: TurnMetadata;
  createdAt: string;
}

export type NewConversationTurn = Omit<ConversationTurn, 'createdAt'>;

export interface DialogueTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface UsageStats {
  totalFarmers: number;
  activeFarmers: number;
  totalConversations: number;
  messages24h: number;
  activeFarmers24h: number;
}

export interface ConversationSearchHit {
  farmerPhone: string;
  userMessage: string;
  aiResponse: string;
  createdAt: string;
}
