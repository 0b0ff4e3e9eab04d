export type RenewalStatus = 'Success' | 'Failed' | 'Unexpired' | 'NeedVerify' | 'Unknown';

export type RenewalState =
  | 'LoggedOut'
  | 'Authenticating'
  | 'SecondFactorRequired'
  | 'SweepAndSend'
  | 'AwaitingCode'
  | 'CodeSubmitted'
  | 'LoggedIn'
  | 'ExpiryRead'
  | 'EligibilityBlocked'
  | 'RenewalAttempt'
  | 'NavigatingRenewalPages'
  | 'AwaitingCaptchaImage'
  | 'CaptchaSolved'
  | 'FormSubmitted'
  | 'Completed';

// Calendar date formatted as YYYY-MM-DD
export type IsoDate = string;

export interface RunRecord {
  status: RenewalStatus;
  resourceId: string;
  oldExpiry?: IsoDate;
  newExpiry?: IsoDate;
  message?: string;
  egressIp?: string;
  runnerIp?: string;
  startedAt: string;
  finishedAt?: string;
}

export type PageSignal =
  | 'ChallengeRequired'
  | 'WindowClosed'
  | 'RenewalFailed'
  | 'RenewalSucceeded';

export type PageClassification = PageSignal | 'Ambiguous';

// A plain phrase, or a group of phrases that must all be present
export type KeywordRule = string | readonly string[];
