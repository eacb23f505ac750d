import { ClassifiableDocument, ClassifierOptions } from '../types/models';
import { resolveClassifierOptions } from '../config/classifier';

let counter = 0;

/**
 * Plain-text message with the given body
 */
export function textDocument(body: string, overrides: Partial<ClassifiableDocument> = {}): ClassifiableDocument {
  counter++;
  return {
    id: `test-${counter}`,
    senders: [],
    recipients: [],
    subject: '',
    agent: '',
    parts: [{ mediaType: 'text/plain', text: body }],
    ...overrides
  };
}

/**
 * Message with only an attachment, which text models cannot learn from
 */
export function attachmentOnlyDocument(): ClassifiableDocument {
  return textDocument('', { parts: [{ mediaType: 'application/pdf', text: '' }] });
}

export function repeat(body: string, times: number): ClassifiableDocument[] {
  return Array.from({ length: times }, () => textDocument(body));
}

/**
 * Options resolved without looking at the process environment
 */
export function testOptions(overrides: Partial<ClassifierOptions> = {}): ClassifierOptions {
  return resolveClassifierOptions(overrides, {});
}
