import { ElementDescriptor } from '../types/driver';

export type PanelElement =
  | 'loginId'
  | 'loginPassword'
  | 'loginSubmit'
  | 'sendCode'
  | 'codeInput'
  | 'codeSubmit'
  | 'updateButton'
  | 'extendEntry'
  | 'captchaImage'
  | 'captchaInput'
  | 'renewSubmit';

const EXTEND_LABEL = '引き続き無料VPSの利用を継続する';

export const PANEL_ELEMENTS: Readonly<Record<PanelElement, ElementDescriptor>> = {
  loginId: {
    name: 'loginId',
    description: 'login id input',
    selectors: ["input[name='memberid']"]
  },
  loginPassword: {
    name: 'loginPassword',
    description: 'login password input',
    selectors: ["input[name='user_password']"]
  },
  loginSubmit: {
    name: 'loginSubmit',
    description: 'login submit button',
    selectors: ["input[type='submit']", "button[type='submit']"]
  },
  sendCode: {
    name: 'sendCode',
    description: 'send verification code button',
    selectors: [
      "input[type='submit'][value*='送信']",
      'button::-p-text(送信)',
      "button[type='submit']",
      "input[type='submit']"
    ]
  },
  codeInput: {
    name: 'codeInput',
    description: 'verification code input',
    selectors: [
      "input[type='text']",
      "input[type='tel']",
      "input[name*='code']",
      "input[name*='auth']",
      "input[placeholder*='認証']"
    ]
  },
  codeSubmit: {
    name: 'codeSubmit',
    description: 'verification code submit button',
    selectors: [
      'button::-p-text(認証)',
      'button::-p-text(確認)',
      "input[type='submit']",
      "button[type='submit']"
    ]
  },
  updateButton: {
    name: 'updateButton',
    description: '"更新する" control on the detail page',
    selectors: ['a::-p-text(更新する)', 'button::-p-text(更新する)'],
    timeoutMs: 3000
  },
  extendEntry: {
    name: 'extendEntry',
    description: 'free VPS continuation control',
    selectors: [`button::-p-text(${EXTEND_LABEL})`, `a::-p-text(${EXTEND_LABEL})`],
    timeoutMs: 3000
  },
  captchaImage: {
    name: 'captchaImage',
    description: 'renewal captcha image',
    selectors: ['img[src^="data:image"]', 'img[src^="data:"]', 'img[alt="画像認証"]'],
    timeoutMs: 5000
  },
  captchaInput: {
    name: 'captchaInput',
    description: 'renewal captcha input',
    selectors: ['[placeholder*="上の画像"]', 'input[type="text"]']
  },
  renewSubmit: {
    name: 'renewSubmit',
    description: 'renewal form submit button',
    selectors: ['input[type="submit"]', 'button[type="submit"]']
  }
};
