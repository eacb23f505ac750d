/**
 * Tests for EmailParser with mock Gmail message formats
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { EmailParser } from '../../../services/email/EmailParser';
import { RawEmailData } from '../../../types/models';

function encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

describe('EmailParser', () => {
  let emailParser: EmailParser;

  beforeEach(() => {
    emailParser = new EmailParser();
  });

  describe('parseEmail', () => {
    it('should parse a simple text email', () => {
      const rawEmail: RawEmailData = {
        id: 'msg123',
        threadId: 'thread123',
        payload: {
          headers: [
            { name: 'Subject', value: 'Test Subject' },
            { name: 'From', value: 'sender@example.com' },
            { name: 'To', value: 'recipient@example.org' },
            { name: 'X-Mailer', value: 'Test Mailer 2.1' }
          ],
          mimeType: 'text/plain',
          body: {
            data: 'VGhpcyBpcyBhIHRlc3QgZW1haWwgY29udGVudA==' // Base64: "This is a test email content"
          }
        }
      };

      expect(emailParser.parseEmail(rawEmail)).toEqual({
        id: 'msg123',
        senders: [{ address: 'sender@example.com' }],
        recipients: [{ address: 'recipient@example.org' }],
        subject: 'Test Subject',
        agent: 'Test Mailer 2.1',
        parts: [{ mediaType: 'text/plain', text: 'This is a test email content' }]
      });
    });

    it('should flatten nested multipart messages in order', () => {
      const rawEmail: RawEmailData = {
        id: 'msg124',
        payload: {
          mimeType: 'multipart/mixed',
          parts: [
            {
              mimeType: 'multipart/alternative',
              parts: [
                { mimeType: 'text/plain; charset="UTF-8"', body: { data: encode('Plain body') } },
                { mimeType: 'TEXT/HTML', body: { data: encode('<p>Rich body</p>') } }
              ]
            },
            {
              mimeType: 'application/pdf',
              filename: 'report.pdf',
              body: { attachmentId: 'att1', size: 2048 }
            }
          ]
        }
      };

      expect(emailParser.parseEmail(rawEmail).parts).toEqual([
        { mediaType: 'text/plain', text: 'Plain body' },
        { mediaType: 'text/html', text: '<p>Rich body</p>' },
        { mediaType: 'application/pdf', text: '' }
      ]);
    });

    it('should treat a part without a media type as plain text', () => {
      const rawEmail: RawEmailData = {
        id: 'msg125',
        payload: { body: { data: encode('untyped') } }
      };

      expect(emailParser.parseEmail(rawEmail).parts).toEqual([{ mediaType: 'text/plain', text: 'untyped' }]);
    });

    it('should collect recipients from To, Cc and Bcc without duplicates', () => {
      const rawEmail: RawEmailData = {
        id: 'msg126',
        payload: {
          headers: [
            { name: 'To', value: 'Alex Doe <alex@example.org>, team@example.org' },
            { name: 'cc', value: 'ALEX@example.org, "Ops, Night Shift" <ops@example.org>' },
            { name: 'Bcc', value: 'undisclosed-recipients' }
          ],
          mimeType: 'text/plain'
        }
      };

      expect(emailParser.parseEmail(rawEmail).recipients).toEqual([
        { address: 'alex@example.org', name: 'Alex Doe' },
        { address: 'team@example.org' },
        { address: 'ops@example.org', name: 'Ops, Night Shift' }
      ]);
    });

    it('should fall back to User-Agent for the agent', () => {
      const rawEmail: RawEmailData = {
        id: 'msg127',
        payload: {
          headers: [{ name: 'User-Agent', value: 'Example Mail 3' }],
          mimeType: 'text/plain'
        }
      };

      expect(emailParser.parseEmail(rawEmail).agent).toBe('Example Mail 3');
    });

    it('should generate an id for messages without one', () => {
      const first = emailParser.parseEmail({ payload: { mimeType: 'text/plain' } });
      const second = emailParser.parseEmail({ payload: { mimeType: 'text/plain' } });

      expect(first.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(first.id).not.toBe(second.id);
    });

    it('should leave missing headers empty', () => {
      const result = emailParser.parseEmail({ id: 'msg128', payload: { mimeType: 'text/plain' } });

      expect(result.senders).toEqual([]);
      expect(result.recipients).toEqual([]);
      expect(result.subject).toBe('');
      expect(result.agent).toBe('');
      expect(result.parts).toEqual([{ mediaType: 'text/plain', text: '' }]);
    });
  });

  describe('decodeBase64Url', () => {
    it('should decode unpadded base64url', () => {
      expect(emailParser.decodeBase64Url(encode('Ünïcode ~~ ??'))).toBe('Ünïcode ~~ ??');
    });

    it('should reject characters outside the alphabet', () => {
      expect(() => emailParser.decodeBase64Url('abc$')).toThrow('Invalid base64 format');
    });
  });

  describe('parseMultipleEmailAddresses', () => {
    it('should keep commas inside quoted names', () => {
      expect(emailParser.parseMultipleEmailAddresses('"Doe, Alex" <alex@example.org>, sam@example.org')).toEqual([
        { address: 'alex@example.org', name: 'Doe, Alex' },
        { address: 'sam@example.org' }
      ]);
    });

    it('should drop entries that are not addresses', () => {
      expect(emailParser.parseMultipleEmailAddresses('nobody, , someone@example.org')).toEqual([
        { address: 'someone@example.org' }
      ]);
    });
  });
});
