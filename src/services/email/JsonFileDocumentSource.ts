import { promises as fs } from 'fs';
import path from 'path';
import { mailboxFileSchema, ResourceError } from '../../models/validation';
import { ClassifiableDocument } from '../../types/models';
import { DocumentSource } from './DocumentSource';
import { EmailParser } from './EmailParser';

/**
 * Reads JSON mailbox files of Gmail-API-shaped messages, either a bare
 * array or `{ "messages": [...] }`. Relative names resolve against baseDir.
 */
export class JsonFileDocumentSource implements DocumentSource {
  private parser = new EmailParser();

  constructor(private readonly baseDir: string = process.cwd()) {}

  async open(name: string): Promise<ClassifiableDocument[]> {
    const filename = path.resolve(this.baseDir, name);

    try {
      const contents = await fs.readFile(filename, 'utf-8');
      const { error, value } = mailboxFileSchema.validate(JSON.parse(contents));
      if (error) {
        throw error;
      }

      const messages = Array.isArray(value) ? value : value.messages;
      return messages.map(message => this.parser.parseEmail(message));
    } catch (error) {
      console.error(`❌ Couldn't open mailbox ${filename}:`, error);
      throw new ResourceError(`Couldn't open mailbox ${name}`, name, error);
    }
  }
}
