/**
 * Text preprocessing for confirmation email bodies.
 * Turns HTML or plain-text bodies into trimmed, line-oriented text so that the
 * label anchors of each provider can rely on line boundaries.
 */

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  middot: '·',
  bull: '•',
  rarr: '→',
  ndash: '–',
  mdash: '—'
};

// Header block a mail client puts above a forwarded message
const FORWARDED_HEADER =
  /^(?:-{2,} ?Forwarded message ?-{2,}|Begin forwarded message:)\n(?:(?:From|Date|Sent|Subject|To|Cc):[^\n]*\n)*/gim;

export function cleanEmailBody(body: string): string {
  let cleaned = body;

  // 1. Normalize line endings
  cleaned = cleaned.replace(/\r\n?/g, '\n');

  // 2. Strip markup, keeping block boundaries as line breaks
  cleaned = cleaned.replace(/<(style|script)\b[^>]*>[\s\S]*?<\/\1>/gi, '');
  cleaned = cleaned.replace(/<br\s*\/?>/gi, '\n');
  cleaned = cleaned.replace(/<\/(?:p|div|tr|li|table|h[1-6])>/gi, '\n');
  cleaned = cleaned.replace(/<\/t[dh]>/gi, ' ');
  cleaned = cleaned.replace(/<[^>]+>/g, '');

  // 3. Decode entities left behind by HTML mailers
  cleaned = decodeEntities(cleaned);

  // 4. Collapse horizontal whitespace and trim every line
  cleaned = cleaned.replace(/[ \t\u00a0]+/g, ' ');
  cleaned = cleaned
    .split('\n')
    .map(line => line.trim())
    .join('\n');

  // 5. Drop forwarded-message headers so their From/To/Date lines never reach the anchors
  cleaned = cleaned.replace(FORWARDED_HEADER, '');

  // 6. Limit runs of blank lines
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

  return cleaned.trim();
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#')) {
      const isHex = entity[1].toLowerCase() === 'x';
      const code = isHex ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}
