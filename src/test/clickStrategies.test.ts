import { describe, expect, it } from 'vitest';
import { escalatingClick, pageClickScript, textClickScript } from '../apply/clickStrategies';
import { el, FakeDriver, setOf } from './fakeDriver';

describe('escalatingClick', () => {
  it('uses a direct click when it works', async () => {
    const driver = new FakeDriver();
    const button = el();

    expect(await escalatingClick(driver, setOf(button), '#next', 'Next')).toBe('direct');
    expect(button.clicks).toEqual([{ timeout: 3000 }]);
    expect(button.scriptClicks).toBe(0);
  });

  it('falls back to a scripted click on the element', async () => {
    const driver = new FakeDriver();
    const button = el({ failClick: true });

    expect(await escalatingClick(driver, setOf(button), '#next', 'Next')).toBe('script');
    expect(button.scriptClicks).toBe(1);
    expect(driver.scripts).toEqual([]);
  });

  it('clicks through a page-level query as a last resort', async () => {
    const driver = new FakeDriver();
    driver.evaluateResult = () => true;

    const strategy = await escalatingClick(driver, setOf(el({ failClick: true, failScriptClick: true })), '#next', 'Next');

    expect(strategy).toBe('page-query');
    expect(driver.scripts).toEqual([pageClickScript('#next')]);
  });

  it('gives up when the page-level query finds nothing', async () => {
    const driver = new FakeDriver();

    expect(await escalatingClick(driver, setOf(el({ failClick: true, failScriptClick: true })), '#next', 'Next')).toBeNull();
    expect(driver.scripts).toHaveLength(1);
  });

  it('skips the page-level query when the control has none', async () => {
    const driver = new FakeDriver();
    driver.evaluateResult = () => true;

    expect(await escalatingClick(driver, setOf(el({ failClick: true, failScriptClick: true })), null, 'Next')).toBeNull();
    expect(driver.scripts).toEqual([]);
  });
});

describe('click scripts', () => {
  it('embeds the selector as a string literal', () => {
    expect(pageClickScript("button[aria-label='Done']")).toContain(`document.querySelector("button[aria-label='Done']")`);
  });

  it('matches button text case-insensitively', () => {
    expect(textClickScript('Discard')).toContain('const wanted = "discard";');
  });
});
