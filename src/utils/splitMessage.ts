/**
 * WhatsApp rejects text bodies longer than 4096 characters. Disease and
 * weather blocks plus a model reply can pass that, so replies are cut at
 * newline boundaries where possible and hard-split otherwise.
 */

const WHATSAPP_MAX_LENGTH = 4096;

export function splitMessage(
  text: string,
  maxLength: number = WHATSAPP_MAX_LENGTH
): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    // Count code points so emoji markers are never cut in half
    const codePoints = Array.from(remaining);
    if (codePoints.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    const window = codePoints.slice(0, maxLength).join('');
    const lastNewline = window.lastIndexOf('\n');

    if (lastNewline > 0) {
      chunks.push(window.slice(0, lastNewline + 1));
      remaining = remaining.slice(lastNewline + 1);
    } else {
      chunks.push(window);
      remaining = remaining.slice(window.length);
    }
  }

  return chunks;
}
