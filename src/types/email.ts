export interface MailMessage {
  uid: number;
  from: string;
  subject: string;
  text: string;
  seen: boolean;
}

export type SearchCriterion =
  | 'UNSEEN'
  | ['FROM', string]
  | ['SUBJECT', string];

// Always starts with 'UNSEEN'; every string inside is printable ASCII
export type SearchCriteria = readonly SearchCriterion[];

export interface MailFilterOptions {
  from?: string;
  subject?: string;
}

/**
 * One authenticated session against the INBOX. UIDs are returned in
 * ascending order, so the last element is the newest message.
 */
export interface MailboxSession {
  search(criteria: SearchCriteria): Promise<number[]>;
  fetchMessage(uid: number): Promise<MailMessage | null>;
  markSeen(uid: number): Promise<void>;
  close(): Promise<void>;
}

export interface MailboxConnector {
  open(): Promise<MailboxSession>;
}
