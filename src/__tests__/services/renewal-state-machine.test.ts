import { EligibilityGate } from '../../services/eligibility-gate';
import { CaptchaSolver, CaptchaSolverService } from '../../services/captcha-solver';
import { FilterPolicy } from '../../services/filter-policy';
import { MailboxPoller } from '../../services/mailbox-poller';
import {
  RenewalStateMachine,
  canTransition,
  isLoginPage
} from '../../services/renewal-state-machine';
import { StaleMessageSweeper } from '../../services/stale-message-sweeper';
import { UiDriverFactory } from '../../types/driver';
import { BrowserSetupError, CaptchaServiceError } from '../../types/errors';
import { Result, ok } from '../../types/result';
import {
  CHALLENGE_URL,
  DASHBOARD_URL,
  DETAIL_URL,
  EXTEND_URL,
  LOGIN_URL,
  RESULT_URL,
  buildTestConfig
} from '../fixtures/config';
import { FakeClock } from '../fixtures/fake-clock';
import { FakeDriver } from '../fixtures/fake-driver';
import { InMemoryMailbox } from '../fixtures/in-memory-mailbox';
import { CAPTCHA_IMAGE, createPanelSite, detailPage } from '../fixtures/panel-site';

const SENDER = 'XServer <support@xserver.ne.jp>';
const SUBJECT = '【XServer】ログイン用認証コードのお知らせ';
const CHALLENGE_TEXT = '新しい環境からのログインです。認証コードを送信してください。';

describe('RenewalStateMachine', () => {
  let clock: FakeClock;
  let mailbox: InMemoryMailbox;
  let captcha: { solve: jest.Mock<Promise<Result<string, CaptchaServiceError>>, [string]> };

  beforeEach(() => {
    clock = new FakeClock();
    mailbox = new InMemoryMailbox();
    captcha = { solve: jest.fn<Promise<Result<string, CaptchaServiceError>>, [string]>(async () => ok('4821')) };
  });

  function createMachine(driver: FakeDriver | UiDriverFactory, solver: CaptchaSolver = captcha): RenewalStateMachine {
    const filter = new FilterPolicy({ from: 'support@xserver.ne.jp', subject: 'ログイン用認証コード' });
    let driverFactory: UiDriverFactory;
    if (typeof driver === 'function') {
      driverFactory = driver;
    } else {
      const fake = driver;
      driverFactory = async () => fake;
    }

    return new RenewalStateMachine(buildTestConfig(), {
      driverFactory,
      sweeper: new StaleMessageSweeper(mailbox, filter),
      poller: new MailboxPoller(mailbox, filter, { clock }),
      captcha: solver,
      gate: new EligibilityGate('Asia/Tokyo', clock),
      clock
    });
  }

  function addChallenge(driver: FakeDriver, onSend: () => void): void {
    driver.pages[LOGIN_URL].elements.loginSubmit = { onClick: d => d.goTo(CHALLENGE_URL) };
    driver.addPage({
      url: CHALLENGE_URL,
      text: CHALLENGE_TEXT,
      elements: {
        sendCode: { onClick: onSend },
        codeInput: {},
        codeSubmit: { onClick: d => d.goTo(DASHBOARD_URL) }
      }
    });
  }

  describe('eligibility', () => {
    it('should stop before the renewal window opens', async () => {
      const driver = createPanelSite({ expiry: '2025-03-10' });
      const machine = createMachine(driver);

      const record = await machine.run();

      expect(record.status).toBe('Unexpired');
      expect(record.oldExpiry).toBe('2025-03-10');
      expect(record.message).toBe('renewal opens on 2025-03-09');
      expect(record.egressIp).toBe('203.0.113.7');
      expect(machine.visitedStates).toEqual([
        'LoggedOut',
        'Authenticating',
        'LoggedIn',
        'ExpiryRead',
        'EligibilityBlocked',
        'Completed'
      ]);
      expect(driver.actions).not.toContain(`navigate:${EXTEND_URL}`);
      expect(captcha.solve).not.toHaveBeenCalled();
      expect(driver.closed).toBe(true);
    });

    it('should attempt renewal when the expiry cannot be read', async () => {
      const driver = createPanelSite();
      driver.addPage(detailPage(null));

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Success');
      expect(record.oldExpiry).toBeUndefined();
      expect(record.newExpiry).toBe('2025-03-11');
    });
  });

  describe('renewal', () => {
    it('should renew inside the window and re-read the new expiry', async () => {
      const driver = createPanelSite({ expiry: '2025-03-09', renewedExpiry: '2025-03-11' });
      const machine = createMachine(driver);

      const record = await machine.run();

      expect(record.status).toBe('Success');
      expect(record.oldExpiry).toBe('2025-03-09');
      expect(record.newExpiry).toBe('2025-03-11');
      expect(record.message).toBeUndefined();
      expect(captcha.solve).toHaveBeenCalledWith(CAPTCHA_IMAGE);
      expect(driver.filled).toEqual({
        loginId: 'owner@example.com',
        loginPassword: 'test-password',
        captchaInput: '4821'
      });
      expect(machine.visitedStates).toEqual([
        'LoggedOut',
        'Authenticating',
        'LoggedIn',
        'ExpiryRead',
        'RenewalAttempt',
        'NavigatingRenewalPages',
        'AwaitingCaptchaImage',
        'CaptchaSolved',
        'FormSubmitted',
        'Completed'
      ]);
      expect(driver.actions).toContain('humanCheck');
    });

    it('should still report success when the new expiry cannot be re-read', async () => {
      const driver = createPanelSite();
      driver.pages[EXTEND_URL].elements.renewSubmit = {
        onClick: d => {
          d.goTo(RESULT_URL);
          delete d.pages[DETAIL_URL];
        }
      };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Success');
      expect(record.oldExpiry).toBe('2025-03-09');
      expect(record.newExpiry).toBeUndefined();
    });

    it('should open the extend URL directly when the detail page has no entry', async () => {
      const driver = createPanelSite();
      driver.pages[DETAIL_URL].elements = {};

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Success');
      expect(driver.actions).toContain(`navigate:${EXTEND_URL}`);
    });

    it('should report Unexpired when the panel says the window is not open', async () => {
      const driver = createPanelSite();
      driver.pages[DETAIL_URL].elements = {};
      driver.addPage({
        url: EXTEND_URL,
        text: '延長期限: 2025年3月9日以降にお手続きいただけます',
        elements: {}
      });

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Unexpired');
      expect(record.message).toBe('the panel reports the renewal window is not open yet');
    });

    it('should fail when the renewal page cannot be reached', async () => {
      const driver = createPanelSite();
      driver.pages[DETAIL_URL].elements = {};
      driver.addPage({ url: EXTEND_URL, text: 'ページが見つかりません', elements: {} });

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe('could not open the renewal page');
    });

    it('should report Unexpired when no captcha image is shown', async () => {
      const driver = createPanelSite();
      driver.pages[EXTEND_URL].elements = { captchaInput: {}, renewSubmit: {} };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Unexpired');
      expect(record.message).toBe('captcha image not shown, the renewal window is probably closed');
      expect(captcha.solve).not.toHaveBeenCalled();
    });

    it('should fail after the OCR service keeps returning a rejected answer', async () => {
      const fetchSpy = jest.spyOn(global, 'fetch').mockImplementation(async () => new Response('111111'));
      const driver = createPanelSite();

      try {
        const solver = new CaptchaSolverService({ apiUrl: 'https://ocr.example.test/solve', clock });
        const record = await createMachine(driver, solver).run();

        expect(record.status).toBe('Failed');
        expect(record.message).toBe('captcha recognition failed');
        expect(fetchSpy).toHaveBeenCalledTimes(3);
        expect(driver.filled.captchaInput).toBeUndefined();
      } finally {
        fetchSpy.mockRestore();
      }
    });

    it('should fail when the panel rejects the captcha', async () => {
      const driver = createPanelSite({ resultText: '入力された認証コードが正しくありません' });

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe('renewal rejected: wrong captcha code or human check failed');
      expect(record.newExpiry).toBeUndefined();
    });

    it('should report Unknown when the result page is not recognised', async () => {
      const driver = createPanelSite({ resultText: 'お手続きを受け付けました' });

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Unknown');
      expect(record.oldExpiry).toBe('2025-03-09');
      expect(record.message).toBe(
        'renewal result page matched neither success nor failure markers, check the panel manually'
      );
    });

    it('should fail when the captcha input is missing', async () => {
      const driver = createPanelSite();
      driver.pages[EXTEND_URL].elements = { captchaImage: { attributes: { src: CAPTCHA_IMAGE } } };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe('captcha input not found');
    });
  });

  describe('login', () => {
    it('should fail when the login form is missing', async () => {
      const driver = createPanelSite();
      driver.pages[LOGIN_URL].elements = {};

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe('login form not found');
    });

    it('should fail when the panel keeps showing the login page', async () => {
      const driver = createPanelSite();
      driver.pages[LOGIN_URL].elements.loginSubmit = {};

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe(`login failed: still on the login page (${LOGIN_URL})`);
    });

    it('should sweep stale mail, request a code and submit the fresh one', async () => {
      const driver = createPanelSite({ expiry: '2025-03-10' });
      mailbox.deliver(SENDER, SUBJECT, '認証コード: 11111');
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });
      const machine = createMachine(driver);

      const record = await machine.run();

      expect(driver.filled.codeInput).toBe('48213');
      expect(mailbox.markSeenCalls).toEqual([1, 2]);
      expect(record.status).toBe('Unexpired');
      expect(machine.visitedStates).toEqual([
        'LoggedOut',
        'Authenticating',
        'SecondFactorRequired',
        'SweepAndSend',
        'AwaitingCode',
        'CodeSubmitted',
        'LoggedIn',
        'ExpiryRead',
        'EligibilityBlocked',
        'Completed'
      ]);
    });

    it('should need verification when no code arrives in time', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => undefined);

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe(
        'no verification code arrived within 120s (check IMAP access, app password and mail filters)'
      );
      expect(driver.filled.codeInput).toBeUndefined();
    });

    it('should need verification when the send-code button is missing', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => undefined);
      delete driver.pages[CHALLENGE_URL].elements.sendCode;

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe('login challenge shown but the send-code button was not found');
    });

    it('should request and use a code even when the sweep fails', async () => {
      const driver = createPanelSite({ expiry: '2025-03-10' });
      mailbox.failingOpens = 1;
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });

      const record = await createMachine(driver).run();

      expect(driver.actions).toContain('click:sendCode');
      expect(driver.filled.codeInput).toBe('48213');
      expect(record.status).toBe('Unexpired');
    });

    it('should need verification when the send-code click fails', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => {
        throw new Error('Node is detached from document');
      });

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe('could not click the send-code button: Node is detached from document');
      expect(driver.closed).toBe(true);
    });

    it('should need verification when the code cannot be entered', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });
      driver.pages[CHALLENGE_URL].elements.codeInput = {
        onFill: () => {
          throw new Error('Element is not a text input');
        }
      };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe('could not enter the verification code: Element is not a text input');
    });

    it('should go on when the submit click errors but the panel logged in', async () => {
      const driver = createPanelSite({ expiry: '2025-03-10' });
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });
      driver.pages[CHALLENGE_URL].elements.codeSubmit = {
        onClick: d => {
          d.goTo(DASHBOARD_URL);
          throw new Error('Execution context was destroyed');
        }
      };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Unexpired');
      expect(record.oldExpiry).toBe('2025-03-10');
    });

    it('should need verification with an empty hint when the page text cannot be read', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });
      driver.pages[CHALLENGE_URL].elements.codeSubmit = {
        onClick: d => {
          d.textReadError = 'Execution context was destroyed';
          throw new Error('Execution context was destroyed');
        }
      };

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe(`verification submitted but still on the login page: url=${CHALLENGE_URL}, hint=none`);
    });

    it('should need verification when the panel stays on the login page after the code', async () => {
      const driver = createPanelSite();
      addChallenge(driver, () => {
        mailbox.deliver(SENDER, SUBJECT, '認証コード: 48213');
      });
      driver.pages[CHALLENGE_URL].elements.codeSubmit = {};

      const record = await createMachine(driver).run();

      expect(record.status).toBe('NeedVerify');
      expect(record.message).toBe(
        `verification submitted but still on the login page: url=${CHALLENGE_URL}, hint=${CHALLENGE_TEXT}`
      );
    });
  });

  describe('failures', () => {
    it('should fail without touching the panel when the browser cannot start', async () => {
      const machine = createMachine(async () => {
        throw new BrowserSetupError('chrome not found at /usr/bin/google-chrome');
      });

      const record = await machine.run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe('Browser setup failed: chrome not found at /usr/bin/google-chrome');
      expect(machine.visitedStates).toEqual(['LoggedOut', 'Completed']);
    });

    it('should turn an unexpected error into a failure and close the browser', async () => {
      const driver = createPanelSite();
      delete driver.pages[DETAIL_URL];

      const record = await createMachine(driver).run();

      expect(record.status).toBe('Failed');
      expect(record.message).toBe(`LoggedIn: no page registered for ${DETAIL_URL}`);
      expect(driver.closed).toBe(true);
    });

    it('should start from a clean history on every run', async () => {
      const machine = createMachine(async () => createPanelSite({ expiry: '2025-03-10' }));

      await machine.run();
      const second = await machine.run();

      expect(second.status).toBe('Unexpired');
      expect(machine.visitedStates[0]).toBe('LoggedOut');
      expect(machine.visitedStates.filter(state => state === 'Completed')).toHaveLength(1);
    });
  });
});

describe('transition table', () => {
  it('should allow the documented forward moves', () => {
    expect(canTransition('LoggedOut', 'Authenticating')).toBe(true);
    expect(canTransition('Authenticating', 'SecondFactorRequired')).toBe(true);
    expect(canTransition('CodeSubmitted', 'LoggedIn')).toBe(true);
    expect(canTransition('ExpiryRead', 'EligibilityBlocked')).toBe(true);
  });

  it('should reject skipped or backward moves', () => {
    expect(canTransition('LoggedOut', 'LoggedIn')).toBe(false);
    expect(canTransition('AwaitingCode', 'LoggedIn')).toBe(false);
    expect(canTransition('FormSubmitted', 'RenewalAttempt')).toBe(false);
  });

  it('should let every state conclude exactly once', () => {
    expect(canTransition('LoggedOut', 'Completed')).toBe(true);
    expect(canTransition('FormSubmitted', 'Completed')).toBe(true);
    expect(canTransition('Completed', 'Completed')).toBe(false);
    expect(canTransition('Completed', 'LoggedOut')).toBe(false);
  });
});

describe('isLoginPage', () => {
  it('should look at the path only', () => {
    expect(isLoginPage(LOGIN_URL)).toBe(true);
    expect(isLoginPage(CHALLENGE_URL)).toBe(true);
    expect(isLoginPage(DASHBOARD_URL)).toBe(false);
    expect(isLoginPage('https://secure.xserver.ne.jp/xapanel/xvps/index?from=login')).toBe(false);
    expect(isLoginPage('not a url')).toBe(true);
  });
});
