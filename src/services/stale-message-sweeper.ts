import { MailMessage, MailboxConnector, MailboxSession } from '../types/email';
import { MailboxError, describeError } from '../types/errors';
import { Result, err, ok } from '../types/result';
import { createLogger } from '../utils/logger';
import { FilterPolicy } from './filter-policy';

const logger = createLogger('StaleMessageSweeper');

/**
 * Marks every unread message matching the filters as \Seen before a new code
 * is requested, so the poller only ever sees mail that arrives afterwards.
 * Messages are not inspected for codes.
 */
export class StaleMessageSweeper {
  constructor(
    private readonly connector: MailboxConnector | null,
    private readonly filter: FilterPolicy
  ) {}

  async sweep(): Promise<Result<number, MailboxError>> {
    if (!this.connector) {
      return err(new MailboxError('mailbox is not configured'));
    }

    let session: MailboxSession | null = null;
    try {
      session = await this.connector.open();
      const uids = await session.search(this.filter.criteria);

      let swept = 0;
      for (const uid of uids) {
        if (this.filter.hasFilters && !(await this.shouldSweep(session, uid))) {
          continue;
        }
        await session.markSeen(uid);
        swept++;
      }

      logger.info({ swept, unread: uids.length }, 'Stale verification mail swept');
      return ok(swept);
    } catch (error) {
      return err(error instanceof MailboxError ? error : new MailboxError(describeError(error)));
    } finally {
      if (session) {
        try {
          await session.close();
        } catch (error) {
          logger.debug({ error: describeError(error) }, 'Error closing mailbox session');
        }
      }
    }
  }

  private async shouldSweep(session: MailboxSession, uid: number): Promise<boolean> {
    let message: MailMessage | null;
    try {
      message = await session.fetchMessage(uid);
    } catch (error) {
      // Server-side criteria already matched; an unreadable message is swept unchecked
      logger.warn({ uid, error: describeError(error) }, 'Failed to fetch message, sweeping it unchecked');
      return true;
    }
    return message !== null && this.filter.matches(message);
  }
}
