import { InboundMessage, MediaReference } from '../types/whatsapp';

export type MessagePath =
  | { kind: 'image'; media: MediaReference }
  | { kind: 'weather' }
  | { kind: 'conversation' };

export type PathRule = (message: InboundMessage) => MessagePath | null;

export const WEATHER_KEYWORDS = ['weather', 'rain', 'forecast', 'temperature'];

export const imageRule: PathRule = message => {
  const [media] = message.media;
  return media ? { kind: 'image', media } : null;
};

export const weatherRule: PathRule = message => {
  const body = (message.body ?? '').toLowerCase();
  return WEATHER_KEYWORDS.some(keyword => body.includes(keyword)) ? { kind: 'weather' } : null;
};

// Checked in order; the first rule that matches decides the path
export const DEFAULT_PATH_RULES: PathRule[] = [imageRule, weatherRule];

export function selectMessagePath(
  message: InboundMessage,
  rules: PathRule[] = DEFAULT_PATH_RULES
): MessagePath {
  for (const rule of rules) {
    const path = rule(message);
    if (path) return path;
  }
  return { kind: 'conversation' };
}
