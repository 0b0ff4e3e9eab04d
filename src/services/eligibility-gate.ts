import { IsoDate } from '../types/renewal';
import { Clock, systemClock } from '../utils/timing';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function toUtcMidnight(date: IsoDate): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new RangeError(`Expected a YYYY-MM-DD date, got "${date}"`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function fromUtcMidnight(epochMs: number): IsoDate {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Renewal opens one calendar day before expiry, counted in the panel's own
 * time zone. The panel remains the authority; this only saves navigation
 * when the window is clearly closed.
 */
export class EligibilityGate {
  private readonly formatter: Intl.DateTimeFormat;

  constructor(
    timeZone: string,
    private readonly clock: Clock = systemClock
  ) {
    // en-CA formats as YYYY-MM-DD
    this.formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    });
  }

  today(): IsoDate {
    return this.formatter.format(new Date(this.clock.now()));
  }

  windowStart(expiry: IsoDate): IsoDate {
    return fromUtcMidnight(toUtcMidnight(expiry) - DAY_MS);
  }

  isEligible(expiry: IsoDate, today: IsoDate = this.today()): boolean {
    return toUtcMidnight(today) >= toUtcMidnight(expiry) - DAY_MS;
  }
}
