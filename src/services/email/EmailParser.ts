/**
 * EmailParser to turn Gmail-API-shaped raw messages into classifiable documents
 */

import { v4 as uuidv4 } from 'uuid';
import { AddressEntry, BodyPart, ClassifiableDocument, RawEmailData, RawMessagePart } from '../../types/models';

export class EmailParser {
  /**
   * Parses raw message data into a classifiable document. Messages without
   * an id get a generated one.
   */
  parseEmail(rawEmail: RawEmailData): ClassifiableDocument {
    const headers = this.extractHeaders(rawEmail.payload);

    return {
      id: rawEmail.id || uuidv4(),
      senders: this.parseMultipleEmailAddresses(this.getHeader(headers, 'From') || ''),
      recipients: this.parseRecipients(headers),
      subject: this.getHeader(headers, 'Subject') || '',
      agent: this.getHeader(headers, 'X-Mailer') || this.getHeader(headers, 'User-Agent') || '',
      parts: this.extractParts(rawEmail.payload)
    };
  }

  private extractHeaders(payload: RawMessagePart): Map<string, string> {
    const headers = new Map<string, string>();

    if (payload.headers) {
      for (const header of payload.headers) {
        if (header.name && header.value) {
          headers.set(header.name.toLowerCase(), header.value);
        }
      }
    }

    return headers;
  }

  private getHeader(headers: Map<string, string>, name: string): string | undefined {
    return headers.get(name.toLowerCase());
  }

  /**
   * Flattens the MIME tree into its leaf parts, in document order. Leaves
   * without inline data (attachments fetched separately) keep their media
   * type with empty text.
   */
  private extractParts(payload: RawMessagePart): BodyPart[] {
    const result: BodyPart[] = [];
    this.extractBodyFromParts([payload], result);
    return result;
  }

  private extractBodyFromParts(parts: RawMessagePart[], result: BodyPart[]): void {
    for (const part of parts) {
      if (part.parts && part.parts.length > 0) {
        // Recursively process nested parts
        this.extractBodyFromParts(part.parts, result);
        continue;
      }

      result.push({
        mediaType: this.normalizeMediaType(part.mimeType),
        text: part.body?.data ? this.decodeBase64Url(part.body.data) : ''
      });
    }
  }

  private normalizeMediaType(mimeType: string | null | undefined): string {
    const [type] = (mimeType || 'text/plain').split(';');
    return type.trim().toLowerCase();
  }

  /**
   * Decodes base64url encoded data
   */
  decodeBase64Url(data: string): string {
    // Convert base64url to base64
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/').replace(/\s+/g, '');
    // Add padding if needed
    const padded = base64 + '='.repeat((4 - base64.length % 4) % 4);

    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
      throw new Error('Invalid base64 format');
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }

  /**
   * Parses one address from a header value such as "Name <email@domain.com>"
   */
  private parseEmailAddress(addressHeader: string): AddressEntry {
    const emailMatch = addressHeader.match(/^(.*)<([^>]+)>/);
    if (emailMatch) {
      const name = emailMatch[1].trim().replace(/^["']|["']$/g, '').trim();
      return name ? { address: emailMatch[2].trim(), name } : { address: emailMatch[2].trim() };
    }

    // If no angle brackets, assume the whole string is the email
    return { address: addressHeader.trim().replace(/^["']|["']$/g, '') };
  }

  private parseRecipients(headers: Map<string, string>): AddressEntry[] {
    const recipients: AddressEntry[] = [];
    const seen = new Set<string>();

    for (const name of ['To', 'Cc', 'Bcc']) {
      const header = this.getHeader(headers, name);
      if (!header) continue;

      for (const entry of this.parseMultipleEmailAddresses(header)) {
        const key = entry.address.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        recipients.push(entry);
      }
    }

    return recipients;
  }

  /**
   * Splits a comma-separated address list, ignoring commas inside quoted
   * names and angle brackets
   */
  parseMultipleEmailAddresses(addressesHeader: string): AddressEntry[] {
    const addresses: AddressEntry[] = [];
    let current = '';
    let inQuotes = false;
    let inAngleBrackets = false;

    for (const char of addressesHeader) {
      if (char === '"' && !inAngleBrackets) {
        inQuotes = !inQuotes;
      } else if (char === '<' && !inQuotes) {
        inAngleBrackets = true;
      } else if (char === '>' && !inQuotes) {
        inAngleBrackets = false;
      } else if (char === ',' && !inQuotes && !inAngleBrackets) {
        if (current.trim()) {
          addresses.push(this.parseEmailAddress(current.trim()));
        }
        current = '';
        continue;
      }

      current += char;
    }

    if (current.trim()) {
      addresses.push(this.parseEmailAddress(current.trim()));
    }

    return addresses.filter(entry => entry.address.includes('@'));
  }
}
