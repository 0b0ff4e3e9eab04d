import { AppConfig } from '../types/config';
import { UiDriver, UiDriverFactory } from '../types/driver';
import { StateTransitionError, describeError } from '../types/errors';
import { IsoDate, RenewalState, RenewalStatus, RunRecord } from '../types/renewal';
import { Clock, systemClock } from '../utils/timing';
import { createLogger } from '../utils/logger';
import { CaptchaSolver } from './captcha-solver';
import { EligibilityGate } from './eligibility-gate';
import { parseExpiryDate, summarizeText } from './expiry-parser';
import { MailboxPoller } from './mailbox-poller';
import { classifyPage, hasSignal } from './page-classifier';
import { PANEL_ELEMENTS } from './panel-elements';
import { RunRecorder } from './run-record';
import { StaleMessageSweeper } from './stale-message-sweeper';

const logger = createLogger('RenewalStateMachine');

export const TRANSITIONS: Readonly<Record<RenewalState, readonly RenewalState[]>> = {
  LoggedOut: ['Authenticating'],
  Authenticating: ['SecondFactorRequired', 'LoggedIn'],
  SecondFactorRequired: ['SweepAndSend'],
  SweepAndSend: ['AwaitingCode'],
  AwaitingCode: ['CodeSubmitted'],
  CodeSubmitted: ['LoggedIn'],
  LoggedIn: ['ExpiryRead'],
  ExpiryRead: ['EligibilityBlocked', 'RenewalAttempt'],
  EligibilityBlocked: [],
  RenewalAttempt: ['NavigatingRenewalPages'],
  NavigatingRenewalPages: ['AwaitingCaptchaImage'],
  AwaitingCaptchaImage: ['CaptchaSolved'],
  CaptchaSolved: ['FormSubmitted'],
  FormSubmitted: [],
  Completed: []
};

// Every state may conclude the run; nothing leaves Completed
export function canTransition(from: RenewalState, to: RenewalState): boolean {
  if (to === 'Completed') {
    return from !== 'Completed';
  }
  return TRANSITIONS[from].includes(to);
}

export function isLoginPage(location: string): boolean {
  try {
    return new URL(location).pathname.toLowerCase().includes('login');
  } catch {
    return true;
  }
}

export interface RenewalDependencies {
  driverFactory: UiDriverFactory;
  sweeper: StaleMessageSweeper;
  poller: MailboxPoller;
  captcha: CaptchaSolver;
  gate: EligibilityGate;
  clock?: Clock;
}

type ExtendPageOutcome = 'opened' | 'closed' | 'unreachable';

/**
 * Drives one renewal run through login, the optional email challenge, the
 * eligibility check and the captcha-gated renewal form. `run()` always
 * resolves with a record carrying exactly one terminal status.
 */
export class RenewalStateMachine {
  private state: RenewalState = 'LoggedOut';
  private readonly clock: Clock;
  private readonly history: RenewalState[] = [];

  constructor(
    private readonly config: Readonly<AppConfig>,
    private readonly deps: RenewalDependencies
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  get currentState(): RenewalState {
    return this.state;
  }

  get visitedStates(): readonly RenewalState[] {
    return this.history;
  }

  async run(): Promise<Readonly<RunRecord>> {
    this.state = 'LoggedOut';
    this.history.splice(0, this.history.length, 'LoggedOut');

    const recorder = new RunRecorder(
      this.config.panel.resourceId,
      this.config.runnerIp,
      new Date(this.clock.now())
    );
    let driver: UiDriver | null = null;

    try {
      try {
        driver = await this.deps.driverFactory();
      } catch (error) {
        this.finish(recorder, 'Failed', describeError(error));
        return recorder.toRecord(new Date(this.clock.now()));
      }

      await this.observeEgress(driver, recorder);
      await this.execute(driver, recorder);
    } catch (error) {
      if (recorder.isConcluded) {
        logger.error({ error: describeError(error), status: recorder.currentStatus }, 'Error after the run was concluded');
      } else {
        logger.error({ error: describeError(error), state: this.state }, 'Renewal run aborted');
        this.finish(recorder, 'Failed', `${this.state}: ${describeError(error)}`);
      }
    } finally {
      if (driver) {
        await this.closeDriver(driver);
      }
    }

    if (!recorder.isConcluded) {
      this.finish(recorder, 'Unknown', 'workflow ended without an outcome');
    }

    return recorder.toRecord(new Date(this.clock.now()));
  }

  private async execute(driver: UiDriver, recorder: RunRecorder): Promise<void> {
    if (!(await this.login(driver, recorder))) {
      return;
    }

    const expiry = await this.readExpiry(driver);
    this.transition('ExpiryRead');

    if (expiry) {
      recorder.recordExpiry(expiry);
      const today = this.deps.gate.today();
      const windowStart = this.deps.gate.windowStart(expiry);
      logger.info({ today, expiry, windowStart }, 'Expiry date read');

      if (!this.deps.gate.isEligible(expiry, today)) {
        this.transition('EligibilityBlocked');
        this.finish(recorder, 'Unexpired', `renewal opens on ${windowStart}`);
        return;
      }
    } else {
      logger.warn('Could not read the expiry date, attempting renewal anyway');
    }

    await this.renew(driver, recorder);
  }

  private async login(driver: UiDriver, recorder: RunRecorder): Promise<boolean> {
    this.transition('Authenticating');
    logger.info('Logging in');

    await driver.navigate(this.config.panel.loginUrl);
    await driver.capture('01_login');

    const loginId = await driver.locate(PANEL_ELEMENTS.loginId);
    const password = await driver.locate(PANEL_ELEMENTS.loginPassword);
    const submit = await driver.locate(PANEL_ELEMENTS.loginSubmit);
    if (!loginId || !password || !submit) {
      this.finish(recorder, 'Failed', 'login form not found');
      return false;
    }

    await loginId.fill(this.config.panel.email);
    await password.fill(this.config.panel.password);
    await submit.click();
    await this.settle();
    await driver.capture('03_after_submit');

    const pageText = await this.readTextOrEmpty(driver);
    if (hasSignal(pageText, 'ChallengeRequired')) {
      this.transition('SecondFactorRequired');
      logger.warn('New-environment login challenge detected, requesting an email code');
      return this.completeSecondFactor(driver, recorder);
    }

    const location = await driver.currentLocation();
    if (!isLoginPage(location)) {
      this.transition('LoggedIn');
      logger.info('Logged in');
      return true;
    }

    this.finish(recorder, 'Failed', `login failed: still on the login page (${location})`);
    return false;
  }

  private async completeSecondFactor(driver: UiDriver, recorder: RunRecorder): Promise<boolean> {
    this.transition('SweepAndSend');

    const swept = await this.deps.sweeper.sweep();
    if (swept.ok) {
      logger.info({ swept: swept.value }, 'Unread verification mail marked as read before sending');
    } else {
      logger.warn({ error: swept.error.message }, 'Sweep failed, a stale code may be picked up');
    }

    const send = await driver.locate(PANEL_ELEMENTS.sendCode);
    if (!send) {
      this.finish(recorder, 'NeedVerify', 'login challenge shown but the send-code button was not found');
      return false;
    }
    try {
      await send.click();
    } catch (error) {
      this.finish(recorder, 'NeedVerify', `could not click the send-code button: ${describeError(error)}`);
      return false;
    }
    await this.settle();
    await driver.capture('03c_after_send_code');

    this.transition('AwaitingCode');
    const { codeBudgetMs, codePollIntervalMs } = this.config.timing;
    const code = await this.deps.poller.fetchCode(codeBudgetMs, codePollIntervalMs);
    if (!code) {
      this.finish(
        recorder,
        'NeedVerify',
        `no verification code arrived within ${Math.round(codeBudgetMs / 1000)}s (check IMAP access, app password and mail filters)`
      );
      return false;
    }

    this.transition('CodeSubmitted');
    const input = await driver.locate(PANEL_ELEMENTS.codeInput);
    if (!input) {
      this.finish(recorder, 'NeedVerify', 'verification code input not found');
      return false;
    }
    try {
      await input.fill(code);
    } catch (error) {
      this.finish(recorder, 'NeedVerify', `could not enter the verification code: ${describeError(error)}`);
      return false;
    }

    const confirm = await driver.locate(PANEL_ELEMENTS.codeSubmit);
    if (!confirm) {
      this.finish(recorder, 'NeedVerify', 'verification code submit button not found');
      return false;
    }
    try {
      await confirm.click();
    } catch (error) {
      // The click may still have submitted; the location check decides
      logger.warn({ error: describeError(error) }, 'Verification submit click raised an error');
    }
    await this.settle();
    await driver.capture('03e_after_verify_submit');

    const location = await driver.currentLocation();
    if (!isLoginPage(location)) {
      this.transition('LoggedIn');
      logger.info('Email verification accepted, logged in');
      return true;
    }

    const hint = summarizeText(await this.readTextOrEmpty(driver));
    this.finish(
      recorder,
      'NeedVerify',
      `verification submitted but still on the login page: url=${location}, hint=${hint || 'none'}`
    );
    return false;
  }

  private async readExpiry(driver: UiDriver): Promise<IsoDate | null> {
    await driver.navigate(this.config.panel.detailUrl);
    await driver.capture('04_detail');
    return parseExpiryDate(await driver.readVisibleText());
  }

  private async renew(driver: UiDriver, recorder: RunRecorder): Promise<void> {
    this.transition('RenewalAttempt');

    const update = await driver.locate(PANEL_ELEMENTS.updateButton);
    if (update) {
      await update.click();
      await this.settle();
    } else {
      logger.info('No update control on the detail page');
    }

    this.transition('NavigatingRenewalPages');
    const opened = await this.openExtendPage(driver);
    if (opened === 'closed') {
      this.finish(recorder, 'Unexpired', 'the panel reports the renewal window is not open yet');
      return;
    }
    if (opened === 'unreachable') {
      this.finish(recorder, 'Failed', 'could not open the renewal page');
      return;
    }

    this.transition('AwaitingCaptchaImage');
    const humanCheckPassed = await driver.awaitHumanCheck(this.config.timing.humanCheckWaitMs);
    if (!humanCheckPassed) {
      logger.warn('Human-check widget did not confirm, continuing to the captcha');
    }

    const image = await driver.locate(PANEL_ELEMENTS.captchaImage);
    const imageSource = image ? await image.attribute('src') : null;
    if (!imageSource) {
      this.finish(recorder, 'Unexpired', 'captcha image not shown, the renewal window is probably closed');
      return;
    }
    await driver.capture('08_captcha_found');

    const solved = await this.deps.captcha.solve(imageSource);
    if (!solved.ok) {
      this.finish(recorder, 'Failed', 'captcha recognition failed');
      return;
    }

    this.transition('CaptchaSolved');
    const input = await driver.locate(PANEL_ELEMENTS.captchaInput);
    if (!input) {
      this.finish(recorder, 'Failed', 'captcha input not found');
      return;
    }
    await input.fill(solved.value);

    const submit = await driver.locate(PANEL_ELEMENTS.renewSubmit);
    if (!submit) {
      this.finish(recorder, 'Failed', 'renewal form submit button not found');
      return;
    }
    await submit.click();
    await this.settle();
    await driver.capture('11_after_submit');

    this.transition('FormSubmitted');
    const verdict = classifyPage(await driver.readVisibleText(), ['RenewalFailed', 'RenewalSucceeded']);

    switch (verdict) {
      case 'RenewalFailed':
        this.finish(recorder, 'Failed', 'renewal rejected: wrong captcha code or human check failed');
        return;
      case 'RenewalSucceeded': {
        const newExpiry = await this.readExpiryAfterSuccess(driver);
        this.finish(recorder, 'Success', undefined, newExpiry ?? undefined);
        return;
      }
      default:
        this.finish(
          recorder,
          'Unknown',
          'renewal result page matched neither success nor failure markers, check the panel manually'
        );
    }
  }

  private async openExtendPage(driver: UiDriver): Promise<ExtendPageOutcome> {
    const entry = await driver.locate(PANEL_ELEMENTS.extendEntry);
    if (entry) {
      await entry.click();
      await this.settle();
      await driver.capture('06_extend_page');
      return 'opened';
    }

    logger.info('Continuation control not on the detail page, opening the extend URL directly');
    await driver.navigate(this.config.panel.extendUrl);
    await driver.capture('05_extend_url');

    const direct = await driver.locate(PANEL_ELEMENTS.extendEntry);
    if (direct) {
      await direct.click();
      await this.settle();
      await driver.capture('06_extend_page');
      return 'opened';
    }

    if (await driver.locate(PANEL_ELEMENTS.captchaImage)) {
      return 'opened';
    }

    return hasSignal(await driver.readVisibleText(), 'WindowClosed') ? 'closed' : 'unreachable';
  }

  private async readExpiryAfterSuccess(driver: UiDriver): Promise<IsoDate | null> {
    try {
      return await this.readExpiry(driver);
    } catch (error) {
      logger.warn({ error: describeError(error) }, 'Renewed, but the new expiry date could not be read');
      return null;
    }
  }

  private async observeEgress(driver: UiDriver, recorder: RunRecorder): Promise<void> {
    const egressIp = await driver.lookupEgressIp();
    const runnerIp = this.config.runnerIp;

    if (egressIp) {
      recorder.recordEgressIp(egressIp);
      logger.info({ egressIp }, 'Browser egress IP');
    } else {
      logger.warn('Could not determine the browser egress IP');
    }

    if (egressIp && runnerIp && egressIp === runnerIp) {
      logger.warn({ egressIp }, 'Browser egress IP equals the runner IP, continuing without a proxy');
    }
  }

  private transition(next: RenewalState): void {
    if (!canTransition(this.state, next)) {
      throw new StateTransitionError(this.state, next);
    }
    logger.debug({ from: this.state, to: next }, 'State transition');
    this.state = next;
    this.history.push(next);
  }

  private finish(recorder: RunRecorder, status: RenewalStatus, message?: string, newExpiry?: IsoDate): void {
    recorder.conclude(status, message, newExpiry);
    this.transition('Completed');

    if (status === 'Success' || status === 'Unexpired') {
      logger.info({ status, message }, 'Renewal run finished');
    } else {
      logger.error({ status, message }, 'Renewal run finished');
    }
  }

  // A page that is navigating away can fail to report its text
  private async readTextOrEmpty(driver: UiDriver): Promise<string> {
    try {
      return await driver.readVisibleText();
    } catch (error) {
      logger.debug({ error: describeError(error) }, 'Could not read the page text');
      return '';
    }
  }

  private async settle(): Promise<void> {
    await this.clock.sleep(this.config.timing.settleMs);
  }

  private async closeDriver(driver: UiDriver): Promise<void> {
    try {
      await driver.close();
    } catch (error) {
      logger.warn({ error: describeError(error) }, 'Error closing the browser');
    }
  }
}
