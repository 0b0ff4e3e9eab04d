/**
 * What a workflow step is looking for on the current page. Selectors are tried
 * in order until one matches a visible element or the timeout runs out.
 */
export interface ElementDescriptor {
  name: string;
  description: string;
  selectors: readonly string[];
  timeoutMs?: number;
}

export interface UiElement {
  click(): Promise<void>;
  fill(text: string): Promise<void>;
  attribute(name: string): Promise<string | null>;
}

/**
 * Page-interaction capability used by the renewal workflow. An element that
 * cannot be found within its timeout resolves to `null`; only session-level
 * breakage (browser gone, navigation timeout) rejects.
 */
export interface UiDriver {
  navigate(url: string): Promise<void>;
  locate(descriptor: ElementDescriptor): Promise<UiElement | null>;
  readVisibleText(): Promise<string>;
  currentLocation(): Promise<string>;
  awaitHumanCheck(maxWaitMs: number): Promise<boolean>;
  capture(name: string): Promise<void>;
  lookupEgressIp(): Promise<string | null>;
  close(): Promise<void>;
}

export type UiDriverFactory = () => Promise<UiDriver>;
