import { ResourceError } from '../../models/validation';
import { ClassifiableDocument } from '../../types/models';

/**
 * Opens a named source (a mailbox, corpus file, ...) as a list of documents
 */
export interface DocumentSource {
  open(name: string): Promise<ClassifiableDocument[]>;
}

/**
 * Source backed by documents registered in memory
 */
export class InMemoryDocumentSource implements DocumentSource {
  private sources = new Map<string, ClassifiableDocument[]>();

  constructor(initial: Record<string, ClassifiableDocument[]> = {}) {
    for (const [name, documents] of Object.entries(initial)) {
      this.add(name, documents);
    }
  }

  add(name: string, documents: ClassifiableDocument[]): void {
    this.sources.set(name, [...documents]);
  }

  async open(name: string): Promise<ClassifiableDocument[]> {
    const documents = this.sources.get(name);
    if (!documents) {
      throw new ResourceError(`Couldn't open source ${name}`, name);
    }
    return [...documents];
  }
}
