import Imap from 'imap';
import { simpleParser, ParsedMail } from 'mailparser';
import { MailboxConfig } from '../types/config';
import { MailMessage, MailboxConnector, MailboxSession, SearchCriteria } from '../types/email';
import { MailboxError, describeError } from '../types/errors';
import { withTimeout } from '../utils/timing';
import { createLogger } from '../utils/logger';

const logger = createLogger('ImapMailbox');

const SEEN_FLAG = '\\Seen';

export function toMailMessage(uid: number, mail: ParsedMail, flags: readonly string[] = []): MailMessage {
  return {
    uid,
    from: mail.from?.text ?? '',
    subject: mail.subject ?? '',
    text: mail.text ?? '',
    seen: flags.includes(SEEN_FLAG)
  };
}

class ImapMailboxSession implements MailboxSession {
  constructor(
    private readonly imap: Imap,
    private readonly operationTimeoutMs: number
  ) {}

  async search(criteria: SearchCriteria): Promise<number[]> {
    const uids = await this.run<number[]>('IMAP search', (resolve, reject) => {
      this.imap.search([...criteria], (error, found) => (error ? reject(error) : resolve(found)));
    });
    return [...uids].sort((a, b) => a - b);
  }

  async fetchMessage(uid: number): Promise<MailMessage | null> {
    const fetched = await this.run<{ body: Promise<Buffer>; flags: string[] } | null>('IMAP fetch', (resolve, reject) => {
      let body: Promise<Buffer> | null = null;
      let flags: string[] = [];

      // markSeen: false fetches BODY.PEEK[], which leaves the flags untouched
      const request = this.imap.fetch(uid, { bodies: '', markSeen: false });

      request.on('message', message => {
        message.on('body', stream => {
          body = new Promise<Buffer>((resolveBody, rejectBody) => {
            const chunks: Buffer[] = [];
            stream.on('data', (chunk: Buffer | string) => {
              chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            });
            stream.once('end', () => resolveBody(Buffer.concat(chunks)));
            stream.once('error', rejectBody);
          });
        });
        message.once('attributes', attrs => {
          flags = attrs.flags;
        });
      });

      request.once('error', reject);
      request.once('end', () => resolve(body ? { body, flags } : null));
    });

    if (!fetched) {
      return null;
    }

    const source = await fetched.body;
    const parsed = await simpleParser(source);
    return toMailMessage(uid, parsed, fetched.flags);
  }

  async markSeen(uid: number): Promise<void> {
    await this.run<void>('IMAP store', (resolve, reject) => {
      this.imap.addFlags(uid, [SEEN_FLAG], error => (error ? reject(error) : resolve()));
    });
  }

  async close(): Promise<void> {
    this.imap.end();
  }

  private async run<T>(
    label: string,
    executor: (resolve: (value: T) => void, reject: (reason: unknown) => void) => void
  ): Promise<T> {
    try {
      return await withTimeout(new Promise<T>(executor), this.operationTimeoutMs, label);
    } catch (error) {
      throw new MailboxError(`${label} failed: ${describeError(error)}`);
    }
  }
}

/**
 * Opens a fresh IMAP session on INBOX (read-write, so \Seen can be stored)
 * for every poll or sweep.
 */
export class ImapMailboxConnector implements MailboxConnector {
  constructor(private readonly config: MailboxConfig) {}

  async open(): Promise<MailboxSession> {
    const imap = new Imap({
      host: this.config.host,
      port: this.config.port,
      tls: true,
      user: this.config.user,
      password: this.config.password,
      connTimeout: this.config.connTimeoutMs,
      authTimeout: this.config.authTimeoutMs,
      tlsOptions: { servername: this.config.host }
    });

    // Late socket errors must not surface as unhandled 'error' events
    imap.on('error', (error: Error) => {
      logger.debug({ error: describeError(error) }, 'IMAP connection error');
    });

    try {
      await withTimeout(
        new Promise<void>((resolve, reject) => {
          imap.once('ready', () => resolve());
          imap.once('error', reject);
          imap.connect();
        }),
        this.config.connTimeoutMs + this.config.authTimeoutMs,
        'IMAP connect'
      );

      await withTimeout(
        new Promise<void>((resolve, reject) => {
          imap.openBox('INBOX', false, error => (error ? reject(error) : resolve()));
        }),
        this.config.operationTimeoutMs,
        'IMAP select'
      );
    } catch (error) {
      imap.end();
      throw new MailboxError(describeError(error));
    }

    logger.debug({ host: this.config.host }, 'IMAP session opened');
    return new ImapMailboxSession(imap, this.config.operationTimeoutMs);
  }
}
