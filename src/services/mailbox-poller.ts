import { MailMessage, MailboxConnector, MailboxSession } from '../types/email';
import { describeError } from '../types/errors';
import { Clock, systemClock } from '../utils/timing';
import { createLogger } from '../utils/logger';
import { FilterPolicy } from './filter-policy';
import { buildSearchSurface, extractCode } from './code-extractor';

const logger = createLogger('MailboxPoller');

export interface MailboxPollerOptions {
  scanLastN?: number;
  clock?: Clock;
}

type PassOutcome =
  | { kind: 'code'; code: string; uid: number }
  | { kind: 'empty' }
  | { kind: 'unmatched'; scanned: number }
  | { kind: 'no-code'; matched: number };

/**
 * Polls the INBOX for the verification code of the most recently triggered
 * challenge. A message is flagged \Seen only once its code has been accepted;
 * everything else stays unread.
 */
export class MailboxPoller {
  private readonly scanLastN: number;
  private readonly clock: Clock;

  constructor(
    private readonly connector: MailboxConnector | null,
    private readonly filter: FilterPolicy,
    options: MailboxPollerOptions = {}
  ) {
    this.scanLastN = options.scanLastN ?? 12;
    this.clock = options.clock ?? systemClock;
  }

  async fetchCode(timeoutBudgetMs: number, pollIntervalMs: number): Promise<string | null> {
    if (!this.connector) {
      logger.warn('Mailbox is not configured, cannot fetch the verification code');
      return null;
    }

    const deadline = this.clock.now() + timeoutBudgetMs;
    let attempt = 0;

    while (this.clock.now() < deadline) {
      attempt++;
      let session: MailboxSession | null = null;

      try {
        session = await this.connector.open();
        const outcome = await this.scan(session);

        switch (outcome.kind) {
          case 'code':
            logger.info({ uid: outcome.uid, attempt }, `Verification code received: ${outcome.code}`);
            return outcome.code;
          case 'empty':
            logger.info({ attempt }, 'No unread verification mail yet, waiting');
            break;
          case 'unmatched':
            logger.info({ attempt, scanned: outcome.scanned }, 'Unread mail present but none matches the sender/subject filters, waiting');
            break;
          case 'no-code':
            logger.info({ attempt, matched: outcome.matched }, 'Matching mail found but no code could be extracted, waiting');
            break;
        }
      } catch (error) {
        logger.warn({ attempt, error: describeError(error) }, 'Mailbox poll failed, will retry');
      } finally {
        if (session) {
          await this.closeQuietly(session);
        }
      }

      await this.clock.sleep(pollIntervalMs);
    }

    logger.error({ attempts: attempt, timeoutBudgetMs }, 'Timed out waiting for the verification code');
    return null;
  }

  private async scan(session: MailboxSession): Promise<PassOutcome> {
    const uids = await session.search(this.filter.criteria);
    if (uids.length === 0) {
      return { kind: 'empty' };
    }

    // Newest first, bounded to the last N unread
    const candidates = uids.slice(-this.scanLastN).reverse();
    let matched = 0;

    for (const uid of candidates) {
      let message: MailMessage | null;
      try {
        message = await session.fetchMessage(uid);
      } catch (error) {
        logger.warn({ uid, error: describeError(error) }, 'Failed to fetch message, skipping');
        continue;
      }

      if (!message || !this.filter.matches(message)) {
        continue;
      }

      matched++;
      const code = extractCode(buildSearchSurface(message));
      if (code) {
        await session.markSeen(uid);
        return { kind: 'code', code, uid };
      }
    }

    return matched > 0
      ? { kind: 'no-code', matched }
      : { kind: 'unmatched', scanned: candidates.length };
  }

  private async closeQuietly(session: MailboxSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.debug({ error: describeError(error) }, 'Error closing mailbox session');
    }
  }
}
