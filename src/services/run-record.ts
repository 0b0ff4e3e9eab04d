import { AppError } from '../types/errors';
import { IsoDate, RenewalStatus, RunRecord } from '../types/renewal';

/**
 * Accumulates the facts of one run and accepts exactly one terminal status.
 * `toRecord()` hands out a frozen copy.
 */
export class RunRecorder {
  private status: RenewalStatus = 'Unknown';
  private concluded = false;
  private oldExpiry?: IsoDate;
  private newExpiry?: IsoDate;
  private message?: string;
  private egressIp?: string;
  private readonly startedAt: string;

  constructor(
    private readonly resourceId: string,
    private readonly runnerIp?: string,
    startedAt: Date = new Date()
  ) {
    this.startedAt = startedAt.toISOString();
  }

  get isConcluded(): boolean {
    return this.concluded;
  }

  get currentStatus(): RenewalStatus {
    return this.status;
  }

  get expiry(): IsoDate | undefined {
    return this.oldExpiry;
  }

  recordExpiry(expiry: IsoDate): void {
    this.oldExpiry = expiry;
  }

  recordEgressIp(ip: string): void {
    this.egressIp = ip;
  }

  conclude(status: RenewalStatus, message?: string, newExpiry?: IsoDate): void {
    if (this.concluded) {
      throw new AppError(
        `Run already concluded as ${this.status}, refusing ${status}`,
        'RUN_ALREADY_CONCLUDED',
        false,
        { current: this.status, attempted: status }
      );
    }

    this.status = status;
    this.message = message;
    if (status === 'Success' && newExpiry) {
      this.newExpiry = newExpiry;
    }
    this.concluded = true;
  }

  toRecord(finishedAt: Date = new Date()): Readonly<RunRecord> {
    const record: RunRecord = {
      status: this.status,
      resourceId: this.resourceId,
      startedAt: this.startedAt,
      finishedAt: finishedAt.toISOString()
    };

    if (this.oldExpiry) record.oldExpiry = this.oldExpiry;
    if (this.newExpiry) record.newExpiry = this.newExpiry;
    if (this.message) record.message = this.message;
    if (this.egressIp) record.egressIp = this.egressIp;
    if (this.runnerIp) record.runnerIp = this.runnerIp;

    return Object.freeze(record);
  }
}
