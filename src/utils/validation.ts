import { z } from 'zod';
import { AppConfig, MailboxConfig, TelegramConfig } from '../types/config';
import { ConfigurationError } from '../types/errors';

const PANEL_BASE_URL = 'https://secure.xserver.ne.jp/xapanel';
const DEFAULT_CAPTCHA_API_URL = 'https://captcha-120546510085.asia-northeast1.run.app';

// Unset and blank variables are treated the same
const optionalString = z
  .string()
  .optional()
  .transform(val => (val && val.trim() ? val.trim() : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform(val => (val ?? '').trim().toLowerCase() === 'true');

// Environment variables validation schema
export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Control panel
    XSERVER_EMAIL: z.string().trim().min(1, 'XSERVER_EMAIL is required'),
    XSERVER_PASSWORD: z.string().min(1, 'XSERVER_PASSWORD is required'),
    XSERVER_VPS_ID: z.string().trim().regex(/^\d+$/, 'XSERVER_VPS_ID must be numeric').default('40124478'),

    // Browser
    USE_HEADLESS: booleanFlag,
    WAIT_TIMEOUT: z.coerce.number().int().min(1000).default(30000),
    CHROME_PATH: z.string().trim().min(1).default('/usr/bin/google-chrome'),
    SCREENSHOT_DIR: z.string().trim().min(1).default('screenshots'),

    // Egress (observed only)
    PROXY_SERVER: optionalString,
    RUNNER_IP: optionalString,

    // Mailbox
    MAIL_IMAP_HOST: optionalString,
    MAIL_IMAP_PORT: z.coerce.number().int().min(1).max(65535).default(993),
    MAIL_IMAP_USER: optionalString,
    MAIL_IMAP_PASS: optionalString,
    MAIL_FROM_FILTER: optionalString,
    MAIL_SUBJECT_FILTER: optionalString,
    MAIL_CODE_TIMEOUT_SECONDS: z.coerce.number().int().min(10).default(120),
    MAIL_POLL_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(5),
    MAIL_SCAN_LAST_N: z.coerce.number().int().min(1).max(200).default(12),

    // Captcha OCR
    CAPTCHA_API_URL: z.string().trim().url().default(DEFAULT_CAPTCHA_API_URL),

    // Notifications
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHAT_ID: optionalString,

    // Persistence and status
    SITE_TIMEZONE: z.string().trim().min(1).default('Asia/Tokyo'),
    STATE_FILE: z.string().trim().min(1).default('cache.json'),
    REPORT_FILE: z.string().trim().min(1).default('STATUS.md'),
    STATUS_PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    const mailbox = [env.MAIL_IMAP_HOST, env.MAIL_IMAP_USER, env.MAIL_IMAP_PASS];
    const configured = mailbox.filter(Boolean).length;
    if (configured > 0 && configured < mailbox.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'MAIL_IMAP_HOST, MAIL_IMAP_USER and MAIL_IMAP_PASS must be set together',
        path: ['MAIL_IMAP_HOST'],
      });
    }

    try {
      new Intl.DateTimeFormat('en-CA', { timeZone: env.SITE_TIMEZONE });
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown time zone ${env.SITE_TIMEZONE}`,
        path: ['SITE_TIMEZONE'],
      });
    }
  });

export type Environment = z.infer<typeof envSchema>;

// Persisted run state, as written to STATE_FILE
export const runStateSchema = z.object({
  last_expiry: z.string().nullable(),
  new_expiry: z.string().nullable().optional(),
  status: z.enum(['Success', 'Failed', 'Unexpired', 'NeedVerify', 'Unknown']),
  message: z.string().nullable().optional(),
  last_check: z.string(),
  resource_id: z.string(),
  browser_exit_ip: z.string().nullable(),
  runner_ip: z.string().nullable(),
});

export type RunState = z.infer<typeof runStateSchema>;

function deepFreeze<T extends object>(target: T): Readonly<T> {
  const values: unknown[] = Object.values(target);
  for (const value of values) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(target);
}

export function buildConfig(env: Environment): Readonly<AppConfig> {
  const mailbox: MailboxConfig | null =
    env.MAIL_IMAP_HOST && env.MAIL_IMAP_USER && env.MAIL_IMAP_PASS
      ? {
          host: env.MAIL_IMAP_HOST,
          port: env.MAIL_IMAP_PORT,
          user: env.MAIL_IMAP_USER,
          password: env.MAIL_IMAP_PASS,
          fromFilter: env.MAIL_FROM_FILTER ?? '',
          subjectFilter: env.MAIL_SUBJECT_FILTER ?? '',
          scanLastN: env.MAIL_SCAN_LAST_N,
          connTimeoutMs: 15000,
          authTimeoutMs: 10000,
          operationTimeoutMs: 20000,
        }
      : null;

  const telegram: TelegramConfig | null =
    env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID
      ? { botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID }
      : null;

  const vpsId = env.XSERVER_VPS_ID;

  return deepFreeze<AppConfig>({
    env: env.NODE_ENV,
    panel: {
      loginUrl: `${PANEL_BASE_URL}/login/xvps/`,
      detailUrl: `${PANEL_BASE_URL}/xvps/server/detail?id=${vpsId}`,
      extendUrl: `${PANEL_BASE_URL}/xvps/server/freevps/extend/index?id_vps=${vpsId}`,
      email: env.XSERVER_EMAIL,
      password: env.XSERVER_PASSWORD,
      resourceId: vpsId,
    },
    mailbox,
    browser: {
      executablePath: env.CHROME_PATH,
      headlessRequested: env.USE_HEADLESS,
      defaultTimeoutMs: env.WAIT_TIMEOUT,
      screenshotDir: env.SCREENSHOT_DIR,
      proxyServer: env.PROXY_SERVER,
    },
    timing: {
      codeBudgetMs: env.MAIL_CODE_TIMEOUT_SECONDS * 1000,
      codePollIntervalMs: env.MAIL_POLL_INTERVAL_SECONDS * 1000,
      settleMs: 3000,
      humanCheckWaitMs: 90000,
      captchaAttempts: 3,
      captchaRetryDelayMs: 2000,
      captchaTimeoutMs: 20000,
    },
    captchaApiUrl: env.CAPTCHA_API_URL,
    telegram,
    siteTimeZone: env.SITE_TIMEZONE,
    runnerIp: env.RUNNER_IP,
    stateFile: env.STATE_FILE,
    reportFile: env.REPORT_FILE,
    statusPort: env.STATUS_PORT,
  });
}

export function loadConfig(source: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }
  return buildConfig(parsed.data);
}
