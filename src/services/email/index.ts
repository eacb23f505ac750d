/**
 * Email services exports
 */

export { DocumentSource, InMemoryDocumentSource } from './DocumentSource';
export { EmailParser } from './EmailParser';
export { JsonFileDocumentSource } from './JsonFileDocumentSource';
