/**
 * The slice of a UI-automation driver the wizard consumes. Element sets are
 * lazy, like Playwright locators: nothing is resolved until an action or a
 * query such as `count()` runs.
 */

export interface ClickOptions {
  timeout?: number;
  force?: boolean;
}

export interface ElementSet {
  count(): Promise<number>;
  first(): ElementSet;
  nth(index: number): ElementSet;
  /** Query scoped to this set. Accepts CSS and `xpath=` selectors. */
  locate(selector: string): ElementSet;

  click(options?: ClickOptions): Promise<void>;
  /** Dispatch `element.click()` from inside the page. */
  scriptClick(): Promise<void>;
  fill(text: string): Promise<void>;
  selectOption(label: string): Promise<void>;
  check(options?: ClickOptions): Promise<void>;
  uncheck(options?: ClickOptions): Promise<void>;
  isChecked(): Promise<boolean>;

  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string>;
  innerHtml(): Promise<string>;
}

export interface UiDriver {
  locate(selector: string): ElementSet;
  /** Evaluate a script expression in the page. */
  evaluate(script: string): Promise<unknown>;
  waitForTimeout(ms: number): Promise<void>;
  currentUrl(): string;
}
