/**
 * Model replies are written in Markdown, but WhatsApp has its own markup:
 * single `*` for bold, `_` for italics and no headings.
 */

const REASONING_BLOCK = /\s*<think>[\s\S]*?<\/think>\s*/gi;

export function stripReasoning(reply: string): string {
  return reply.replace(REASONING_BLOCK, ' ').trim();
}

export function toWhatsAppMarkup(reply: string): string {
  return reply
    .replace(/^#{1,6}\s+(.+?)\s*#*$/gm, '*$1*')
    .replace(/\*\*(.+?)\*\*/g, '*$1*')
    .replace(/__(.+?)__/g, '_$1_');
}

/**
 * Blank-line runs collapse to one blank line; single line breaks are kept so
 * numbered treatment steps survive.
 */
export function cleanModelReply(reply: string): string {
  if (!reply) return '';

  return toWhatsAppMarkup(stripReasoning(reply))
    .replace(/\n\s*\n\s*\n/g, '\n\n')
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}
