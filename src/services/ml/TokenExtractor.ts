import { getOwn } from '../../models/records';
import { AddressEntry, BodyPart, ClassifiableDocument, Token } from '../../types/models';

export const HTML_MARKER_TOKEN = 'html:marker';

export type TokenContext = 'from' | 'to' | 'subject' | 'agent' | 'body' | 'url' | 'color' | 'lang';

const MAX_WORD_LENGTH = 40;

const HAS_LETTER_OR_NUMBER = /[\p{L}\p{N}]/u;
const WORD_BOUNDARY = /[\s\p{Cc}]+/u;
const EDGE_PUNCTUATION = /^[.,;:!?'"()[\]{}<>]+|[.,;:!?'"()[\]{}<>]+$/g;

const LINK_TARGET = /\b(?:href|src)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;
const COLOR_ATTRIBUTE = /\b(?:color|bgcolor)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;
const CSS_COLOR = /(?:^|[\s;"'{])(?:background-)?color\s*:\s*([^;"'}<>]+)/gi;
const LANG_ATTRIBUTE = /\blang\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  copy: '©',
  reg: '®',
  trade: '™',
  euro: '€',
  pound: '£',
  yen: '¥',
  cent: '¢',
  hellip: '…',
  mdash: '\u2014',
  ndash: '\u2013',
  laquo: '«',
  raquo: '»'
};

/**
 * Turns a structured document into a deduplicated set of context-tagged
 * tokens. Presence only: the same word seen twice yields one token.
 */
export class TokenExtractor {
  private readonly ignored: Set<string>;

  constructor(ignoredTokens: string[] = []) {
    this.ignored = new Set(ignoredTokens.map(token => token.toLowerCase()));
  }

  extract(document: ClassifiableDocument): Set<Token> {
    const tokens = new Set<Token>();

    this.addAddresses(tokens, 'from', document.senders);
    this.addAddresses(tokens, 'to', document.recipients);
    this.addWords(tokens, 'subject', document.subject);
    this.addWords(tokens, 'agent', document.agent);

    for (const part of document.parts) {
      this.addBodyPart(tokens, part);
    }

    return tokens;
  }

  private addAddresses(tokens: Set<Token>, context: TokenContext, entries: AddressEntry[]): void {
    for (const entry of entries) {
      if (entry.address) {
        this.addToken(tokens, context, entry.address.trim().toLowerCase());
      }
      if (entry.name) {
        this.addWords(tokens, context, entry.name);
      }
    }
  }

  private addBodyPart(tokens: Set<Token>, part: BodyPart): void {
    const mediaType = part.mediaType.toLowerCase();
    if (!mediaType.startsWith('text/')) return;

    if (mediaType === 'text/html') {
      tokens.add(HTML_MARKER_TOKEN);
      this.addStructuralTokens(tokens, part.text);
      this.addWords(tokens, 'body', stripMarkup(part.text));
    } else {
      this.addWords(tokens, 'body', part.text);
    }
  }

  /**
   * Hosts, colours and languages come out of the markup before it is stripped
   */
  private addStructuralTokens(tokens: Set<Token>, html: string): void {
    for (const target of matchAll(html, LINK_TARGET)) {
      const host = extractLinkHost(decodeEntities(target));
      if (host) {
        this.addToken(tokens, 'url', host);
      }
    }

    for (const color of [...matchAll(html, COLOR_ATTRIBUTE), ...matchAll(html, CSS_COLOR)]) {
      this.addToken(tokens, 'color', color.trim().toLowerCase().replace(/\s+/g, ''));
    }

    for (const lang of matchAll(html, LANG_ATTRIBUTE)) {
      this.addToken(tokens, 'lang', lang.trim().toLowerCase());
    }
  }

  private addWords(tokens: Set<Token>, context: TokenContext, text: string): void {
    if (!text) return;
    for (const raw of text.split(WORD_BOUNDARY)) {
      this.addToken(tokens, context, raw.replace(EDGE_PUNCTUATION, ''));
    }
  }

  private addToken(tokens: Set<Token>, context: TokenContext, word: string): void {
    if (!isUsableWord(word)) return;
    if (this.ignored.has(word.toLowerCase())) return;
    tokens.add(`${context}:${word}`);
  }
}

export function isUsableWord(word: string): boolean {
  return word.length > 1 && word.length <= MAX_WORD_LENGTH && HAS_LETTER_OR_NUMBER.test(word);
}

/**
 * Host name of a link target, or the address of a mailto: link
 */
export function extractLinkHost(target: string): string | undefined {
  const trimmed = target.trim();

  const mailto = trimmed.match(/^mailto:([^?\s]+)/i);
  if (mailto) {
    return mailto[1].toLowerCase();
  }

  const url = trimmed.match(/^(?:[a-z][a-z0-9+.-]*:)?\/\/(?:[^@/?#\s]*@)?([^/:?#\s]+)/i);
  return url ? url[1].toLowerCase() : undefined;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z][a-z0-9]*);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return getOwn(NAMED_ENTITIES, body.toLowerCase()) ?? entity;
  });
}

/**
 * Drops comments, scripts, styles and tags, then decodes entities
 */
export function stripMarkup(html: string): string {
  const withoutTags = html
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<\/?(h[1-6]|p|div|br|li|tr|td|table)[^>]*>/gi, ' ') // Add space for block elements
    .replace(/<[^>]*>/g, '');

  return decodeEntities(withoutTags);
}

function matchAll(text: string, pattern: RegExp): string[] {
  const values: string[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = match.slice(1).find(group => group !== undefined);
    if (value) {
      values.push(value);
    }
  }
  return values;
}
