import { AppConfig } from '../types/config';
import { UiDriverFactory } from '../types/driver';
import { ExternalServiceError } from '../types/errors';
import { RenewalStatus, RunRecord } from '../types/renewal';
import { Result } from '../types/result';
import { createLogger } from '../utils/logger';
import { launchPuppeteerDriver } from './browser-driver';
import { CaptchaSolverService } from './captcha-solver';
import { EligibilityGate } from './eligibility-gate';
import { FilterPolicy } from './filter-policy';
import { ImapMailboxConnector } from './imap-mailbox';
import { MailboxPoller } from './mailbox-poller';
import { TelegramNotifier, formatOutcomeMessage } from './notifier';
import { RenewalStateMachine } from './renewal-state-machine';
import { RunStore } from './run-store';
import { StaleMessageSweeper } from './stale-message-sweeper';

const logger = createLogger('RenewalRunner');

export interface RunnerCollaborators {
  machine: { run(): Promise<Readonly<RunRecord>> };
  store: { save(record: RunRecord): Promise<boolean> };
  notifier: { notify(message: string): Promise<Result<boolean, ExternalServiceError>> };
}

export function exitCodeFor(status: RenewalStatus): number {
  return status === 'Success' || status === 'Unexpired' ? 0 : 1;
}

/**
 * One scheduled invocation: run the workflow, persist the outcome, report it.
 * Persistence and notification are best effort and never change the status.
 */
export class RenewalRunner {
  constructor(private readonly collaborators: RunnerCollaborators) {}

  async runOnce(): Promise<Readonly<RunRecord>> {
    logger.info('Renewal run started');

    const record = await this.collaborators.machine.run();
    await this.collaborators.store.save(record);

    const delivery = await this.collaborators.notifier.notify(formatOutcomeMessage(record));
    if (!delivery.ok) {
      logger.warn({ error: delivery.error.message }, 'Outcome notification was not delivered');
    }

    logger.info({ status: record.status, oldExpiry: record.oldExpiry, newExpiry: record.newExpiry }, 'Renewal run complete');
    return record;
  }
}

export function createRenewalStateMachine(
  config: Readonly<AppConfig>,
  driverFactory?: UiDriverFactory
): RenewalStateMachine {
  const filter = new FilterPolicy({
    from: config.mailbox?.fromFilter,
    subject: config.mailbox?.subjectFilter
  });
  const connector = config.mailbox ? new ImapMailboxConnector(config.mailbox) : null;

  return new RenewalStateMachine(config, {
    driverFactory: driverFactory ?? (() => launchPuppeteerDriver(config.browser, config.siteTimeZone)),
    sweeper: new StaleMessageSweeper(connector, filter),
    poller: new MailboxPoller(connector, filter, { scanLastN: config.mailbox?.scanLastN }),
    captcha: new CaptchaSolverService({
      apiUrl: config.captchaApiUrl,
      attempts: config.timing.captchaAttempts,
      retryDelayMs: config.timing.captchaRetryDelayMs,
      timeoutMs: config.timing.captchaTimeoutMs
    }),
    gate: new EligibilityGate(config.siteTimeZone)
  });
}

export function createRenewalRunner(config: Readonly<AppConfig>): RenewalRunner {
  return new RenewalRunner({
    machine: createRenewalStateMachine(config),
    store: new RunStore(config.stateFile, config.reportFile, config.siteTimeZone),
    notifier: new TelegramNotifier(config.telegram)
  });
}
