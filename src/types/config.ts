export interface PanelConfig {
  loginUrl: string;
  detailUrl: string;
  extendUrl: string;
  email: string;
  password: string;
  resourceId: string;
}

export interface MailboxConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  fromFilter: string;
  subjectFilter: string;
  scanLastN: number;
  connTimeoutMs: number;
  authTimeoutMs: number;
  operationTimeoutMs: number;
}

export interface BrowserConfig {
  executablePath: string;
  // Read from the environment and logged; the browser always runs headful
  headlessRequested: boolean;
  defaultTimeoutMs: number;
  screenshotDir: string;
  proxyServer?: string;
}

export interface TimingConfig {
  codeBudgetMs: number;
  codePollIntervalMs: number;
  settleMs: number;
  humanCheckWaitMs: number;
  captchaAttempts: number;
  captchaRetryDelayMs: number;
  captchaTimeoutMs: number;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  panel: PanelConfig;
  mailbox: MailboxConfig | null;
  browser: BrowserConfig;
  timing: TimingConfig;
  captchaApiUrl: string;
  telegram: TelegramConfig | null;
  siteTimeZone: string;
  runnerIp?: string;
  stateFile: string;
  reportFile: string;
  statusPort: number;
}
