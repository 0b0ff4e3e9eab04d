import { MailMessage, MailboxConnector, MailboxSession, SearchCriteria } from '../../types/email';
import { MailboxError } from '../../types/errors';

/**
 * Stand-in for an IMAP server. SEARCH semantics follow the server:
 * UNSEEN plus case-insensitive substring FROM/SUBJECT matching.
 */
export class InMemoryMailbox implements MailboxConnector {
  public readonly messages: MailMessage[] = [];
  public readonly markSeenCalls: number[] = [];
  public readonly searches: SearchCriteria[] = [];
  public readonly brokenUids = new Set<number>();
  public openCount = 0;
  public closeCount = 0;
  public failingOpens = 0;
  private nextUid = 1;

  deliver(from: string, subject: string, text: string): MailMessage {
    const message: MailMessage = { uid: this.nextUid++, from, subject, text, seen: false };
    this.messages.push(message);
    return message;
  }

  isSeen(uid: number): boolean {
    return this.messages.find(message => message.uid === uid)?.seen ?? false;
  }

  async open(): Promise<MailboxSession> {
    this.openCount++;
    if (this.failingOpens > 0) {
      this.failingOpens--;
      throw new MailboxError('connection refused');
    }
    return this.createSession();
  }

  private createSession(): MailboxSession {
    return {
      search: async (criteria: SearchCriteria) => {
        this.searches.push(criteria);
        return this.messages
          .filter(message => criteria.every(criterion => this.satisfies(message, criterion)))
          .map(message => message.uid);
      },
      fetchMessage: async (uid: number) => {
        if (this.brokenUids.has(uid)) {
          throw new MailboxError(`fetch of ${uid} failed`);
        }
        const message = this.messages.find(candidate => candidate.uid === uid);
        return message ? { ...message } : null;
      },
      markSeen: async (uid: number) => {
        this.markSeenCalls.push(uid);
        const message = this.messages.find(candidate => candidate.uid === uid);
        if (message) {
          message.seen = true;
        }
      },
      close: async () => {
        this.closeCount++;
      }
    };
  }

  private satisfies(message: MailMessage, criterion: SearchCriteria[number]): boolean {
    if (criterion === 'UNSEEN') {
      return !message.seen;
    }
    const [field, term] = criterion;
    const haystack = field === 'FROM' ? message.from : message.subject;
    return haystack.toLowerCase().includes(term.toLowerCase());
  }
}
