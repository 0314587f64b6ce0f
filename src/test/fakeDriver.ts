import type { ClickOptions, ElementSet, UiDriver } from '../types';

export interface FakeElementInit {
  text?: string;
  html?: string;
  attrs?: Record<string, string>;
  checked?: boolean;
  children?: Record<string, FakeElement[]>;
  failClick?: boolean;
  failScriptClick?: boolean;
  failFill?: boolean;
  failCheck?: boolean;
  onClick?: () => void;
}

/** A DOM element stand-in whose scoped queries are answered from a selector map. */
export class FakeElement {
  text: string;
  html: string;
  attrs: Record<string, string>;
  checked: boolean;
  failClick: boolean;
  failScriptClick: boolean;
  failFill: boolean;
  failCheck: boolean;
  onClick?: () => void;

  clicks: Array<ClickOptions | undefined> = [];
  scriptClicks = 0;
  filled: string[] = [];
  selected: string[] = [];
  private readonly children = new Map<string, FakeElement[]>();

  constructor(init: FakeElementInit = {}) {
    this.text = init.text ?? '';
    this.html = init.html ?? `<div>${this.text}</div>`;
    this.attrs = { ...init.attrs };
    this.checked = init.checked ?? false;
    this.failClick = init.failClick ?? false;
    this.failScriptClick = init.failScriptClick ?? false;
    this.failFill = init.failFill ?? false;
    this.failCheck = init.failCheck ?? false;
    this.onClick = init.onClick;
    for (const [selector, elements] of Object.entries(init.children ?? {})) {
      this.children.set(selector, elements);
    }
  }

  setChildren(selector: string, elements: FakeElement[]): void {
    this.children.set(selector, elements);
  }

  query(selector: string): FakeElement[] {
    return this.children.get(selector) ?? [];
  }
}

export function el(init: FakeElementInit = {}): FakeElement {
  return new FakeElement(init);
}

/** Lazily resolved like a Playwright locator: every call re-reads the selector map. */
export class FakeElementSet implements ElementSet {
  constructor(private readonly resolve: () => FakeElement[]) {}

  private single(action: string): FakeElement {
    const [element] = this.resolve();
    if (!element) {
      throw new Error(`${action}: no element matches`);
    }
    return element;
  }

  async count(): Promise<number> {
    return this.resolve().length;
  }

  first(): ElementSet {
    return new FakeElementSet(() => this.resolve().slice(0, 1));
  }

  nth(index: number): ElementSet {
    return new FakeElementSet(() => this.resolve().slice(index, index + 1));
  }

  locate(selector: string): ElementSet {
    return new FakeElementSet(() => this.resolve().flatMap((element) => element.query(selector)));
  }

  async click(options?: ClickOptions): Promise<void> {
    const element = this.single('click');
    if (element.failClick) {
      throw new Error('Timeout 3000ms exceeded while clicking');
    }
    element.clicks.push(options);
    element.onClick?.();
  }

  async scriptClick(): Promise<void> {
    const element = this.single('scriptClick');
    if (element.failScriptClick) {
      throw new Error('Element is not attached to the DOM');
    }
    element.scriptClicks += 1;
    element.onClick?.();
  }

  async fill(text: string): Promise<void> {
    const element = this.single('fill');
    if (element.failFill) {
      throw new Error('Element is not an <input>');
    }
    element.filled.push(text);
  }

  async selectOption(label: string): Promise<void> {
    this.single('selectOption').selected.push(label);
  }

  async check(_options?: ClickOptions): Promise<void> {
    const element = this.single('check');
    if (element.failCheck) {
      throw new Error('Clicking the checkbox did not change its state');
    }
    element.checked = true;
  }

  async uncheck(_options?: ClickOptions): Promise<void> {
    const element = this.single('uncheck');
    if (element.failCheck) {
      throw new Error('Clicking the checkbox did not change its state');
    }
    element.checked = false;
  }

  async isChecked(): Promise<boolean> {
    return this.single('isChecked').checked;
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.single('getAttribute').attrs[name] ?? null;
  }

  async innerText(): Promise<string> {
    return this.single('innerText').text;
  }

  async innerHtml(): Promise<string> {
    return this.single('innerHtml').html;
  }
}

export function setOf(...elements: FakeElement[]): ElementSet {
  return new FakeElementSet(() => elements);
}

export class FakeDriver implements UiDriver {
  url: string;
  located: string[] = [];
  scripts: string[] = [];
  waits: number[] = [];
  evaluateResult: (script: string) => unknown = () => false;
  private readonly roots = new Map<string, FakeElement[]>();

  constructor(url = 'https://jobs.example.com/view/1') {
    this.url = url;
  }

  set(selector: string, elements: FakeElement[]): this {
    this.roots.set(selector, elements);
    return this;
  }

  locate(selector: string): ElementSet {
    this.located.push(selector);
    return new FakeElementSet(() => this.roots.get(selector) ?? []);
  }

  async evaluate(script: string): Promise<unknown> {
    this.scripts.push(script);
    return this.evaluateResult(script);
  }

  async waitForTimeout(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  currentUrl(): string {
    return this.url;
  }
}
