import { MailFilterOptions, MailMessage, SearchCriteria, SearchCriterion } from '../types/email';
import { createLogger } from '../utils/logger';

const logger = createLogger('FilterPolicy');

// IMAP SEARCH strings without a CHARSET must stay printable ASCII
const SEARCH_SAFE = /^[\x20-\x7e]+$/;

export function isSearchSafe(term: string): boolean {
  return SEARCH_SAFE.test(term);
}

/**
 * Splits the configured sender/subject filters into server-side search
 * criteria and a client-side predicate. Terms outside printable ASCII are
 * only ever checked client-side, after the message has been fetched and its
 * headers decoded.
 */
export class FilterPolicy {
  public readonly criteria: SearchCriteria;
  private readonly fromFilter: string;
  private readonly subjectFilter: string;

  constructor(options: MailFilterOptions = {}) {
    this.fromFilter = (options.from ?? '').trim();
    this.subjectFilter = (options.subject ?? '').trim();
    this.criteria = this.buildCriteria();
  }

  get hasFilters(): boolean {
    return this.fromFilter.length > 0 || this.subjectFilter.length > 0;
  }

  matches(message: Pick<MailMessage, 'from' | 'subject'>): boolean {
    if (this.fromFilter && !message.from.toLowerCase().includes(this.fromFilter.toLowerCase())) {
      return false;
    }

    if (this.subjectFilter && !message.subject.toLowerCase().includes(this.subjectFilter.toLowerCase())) {
      return false;
    }

    return true;
  }

  private buildCriteria(): SearchCriteria {
    const criteria: SearchCriterion[] = ['UNSEEN'];

    if (this.fromFilter) {
      if (isSearchSafe(this.fromFilter)) {
        criteria.push(['FROM', this.fromFilter]);
      } else {
        logger.debug({ filter: 'from' }, 'Sender filter is not ASCII, applying it after fetch only');
      }
    }

    if (this.subjectFilter) {
      if (isSearchSafe(this.subjectFilter)) {
        criteria.push(['SUBJECT', this.subjectFilter]);
      } else {
        logger.debug({ filter: 'subject' }, 'Subject filter is not ASCII, applying it after fetch only');
      }
    }

    return Object.freeze(criteria);
  }
}
