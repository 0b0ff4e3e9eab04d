import { KeywordRule, PageClassification, PageSignal } from '../types/renewal';

export const PAGE_KEYWORDS: Readonly<Record<PageSignal, readonly KeywordRule[]>> = {
  ChallengeRequired: [
    '新しい環境からのログイン',
    'ログイン用認証コード',
    '認証コードを送信',
    ['認証コード', '送信']
  ],
  WindowClosed: ['延長期限', '期限まで'],
  RenewalFailed: [
    '入力された認証コードが正しくありません',
    '認証コードが正しくありません',
    'エラー',
    '間違'
  ],
  RenewalSucceeded: ['完了', '継続', '完成', '更新しました']
};

function ruleMatches(text: string, rule: KeywordRule): boolean {
  return typeof rule === 'string'
    ? text.includes(rule)
    : rule.every(phrase => text.includes(phrase));
}

export function hasSignal(text: string, signal: PageSignal): boolean {
  return PAGE_KEYWORDS[signal].some(rule => ruleMatches(text, rule));
}

/**
 * Returns the first of `signals` (in the order given) whose keywords appear in
 * the page text, or 'Ambiguous'.
 */
export function classifyPage(text: string, signals: readonly PageSignal[]): PageClassification {
  for (const signal of signals) {
    if (hasSignal(text, signal)) {
      return signal;
    }
  }
  return 'Ambiguous';
}
