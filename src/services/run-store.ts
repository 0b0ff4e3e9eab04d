import { readFile, writeFile } from 'fs/promises';
import { describeError } from '../types/errors';
import { RunRecord } from '../types/renewal';
import { RunState, runStateSchema } from '../utils/validation';
import { createLogger } from '../utils/logger';

const logger = createLogger('RunStore');

export function toRunState(record: RunRecord, checkedAt: Date = new Date()): RunState {
  return {
    last_expiry: record.newExpiry ?? record.oldExpiry ?? null,
    new_expiry: record.newExpiry ?? null,
    status: record.status,
    message: record.message ?? null,
    last_check: record.finishedAt ?? checkedAt.toISOString(),
    resource_id: record.resourceId,
    browser_exit_ip: record.egressIp ?? null,
    runner_ip: record.runnerIp ?? null
  };
}

export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '00';
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

export function renderStatusReport(record: RunRecord, now: Date, timeZone: string): string {
  const ts = formatTimestamp(now, timeZone);
  let out = '# VPS renewal status\n\n';
  out += `**Run time**: \`${ts} (${timeZone})\`<br>\n`;
  out += `**VPS ID**: \`${record.resourceId}\`<br>\n`;
  out += `**Runner IP**: \`${record.runnerIp ?? 'unknown'}\`<br>\n`;
  out += `**Browser egress IP**: \`${record.egressIp ?? 'unknown'}\`<br>\n\n---\n\n`;

  switch (record.status) {
    case 'Success':
      out += '## ✅ Renewal succeeded\n\n';
      out += `- 🕛 **Expiry**: \`${record.newExpiry ?? record.oldExpiry ?? 'unknown'}\`\n`;
      break;
    case 'Unexpired':
      out += '## ℹ️ Renewal window not open yet\n\n';
      out += `- 🕛 **Expiry**: \`${record.oldExpiry ?? 'unknown'}\`\n`;
      break;
    case 'NeedVerify':
      out += '## 🔐 Email verification failed\n\n';
      out += `- ⚠️ **Reason**: ${record.message ?? 'unknown'}\n`;
      out += '- ✅ Check that IMAP is enabled, an app password is used and MAIL_IMAP_HOST is correct\n';
      break;
    case 'Unknown':
      out += '## ❓ Renewal result unknown\n\n';
      out += `- 🕛 **Expiry**: \`${record.oldExpiry ?? 'unknown'}\`\n`;
      out += `- ⚠️ **Details**: ${record.message ?? 'unknown'}\n`;
      break;
    default:
      out += '## ❌ Renewal failed\n\n';
      out += `- 🕛 **Expiry**: \`${record.oldExpiry ?? 'unknown'}\`\n`;
      out += `- ⚠️ **Error**: ${record.message ?? 'unknown'}\n`;
  }

  out += `\n---\n\n*Last updated: ${ts}*\n`;
  return out;
}

/**
 * Writes the run state file and the Markdown status report. Both are
 * informational; a failed write is logged and does not change the outcome.
 */
export class RunStore {
  constructor(
    private readonly stateFile: string,
    private readonly reportFile: string,
    private readonly timeZone: string
  ) {}

  async load(): Promise<RunState | null> {
    let raw: string;
    try {
      raw = await readFile(this.stateFile, 'utf-8');
    } catch (error) {
      logger.debug({ file: this.stateFile, error: describeError(error) }, 'No run state file');
      return null;
    }

    try {
      const parsed = runStateSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn({ file: this.stateFile, issues: parsed.error.issues.length }, 'Run state file has an unexpected shape');
    } catch (error) {
      logger.warn({ file: this.stateFile, error: describeError(error) }, 'Run state file is not valid JSON');
    }
    return null;
  }

  async save(record: RunRecord, now: Date = new Date()): Promise<boolean> {
    let saved = true;

    try {
      await writeFile(this.stateFile, JSON.stringify(toRunState(record, now), null, 2), 'utf-8');
    } catch (error) {
      saved = false;
      logger.error({ file: this.stateFile, error: describeError(error) }, 'Failed to save run state');
    }

    try {
      await writeFile(this.reportFile, renderStatusReport(record, now, this.timeZone), 'utf-8');
      logger.info({ file: this.reportFile }, 'Status report updated');
    } catch (error) {
      saved = false;
      logger.error({ file: this.reportFile, error: describeError(error) }, 'Failed to write status report');
    }

    return saved;
  }
}
