import { describe, expect, it } from 'vitest';
import { pageClickScript, textClickScript } from '../apply/clickStrategies';
import { EmergencyExit } from '../apply/emergencyExit';
import { DEFAULT_SELECTORS as S } from '../apply/selectors';
import { el, FakeDriver } from './fakeDriver';

describe('EmergencyExit', () => {
  it('does nothing when no form is open, however often it runs', async () => {
    const driver = new FakeDriver();
    const exit = new EmergencyExit(driver, S, 0);

    expect(await exit.run()).toBe(true);
    expect(await exit.run()).toBe(true);
    expect(driver.located).toEqual([S.modal, S.modal]);
    expect(driver.scripts).toEqual([]);
    expect(driver.waits).toEqual([]);
  });

  it('closes then discards the form', async () => {
    const driver = new FakeDriver();
    const close = el({ onClick: () => driver.set(S.discard, [discard]) });
    const discard = el({ onClick: () => driver.set(S.modal, []) });
    driver.set(S.modal, [el()]).set(S.close, [close]);

    expect(await new EmergencyExit(driver, S, 500).run()).toBe(true);
    expect(close.clicks).toEqual([{ timeout: 2000 }]);
    expect(discard.clicks).toEqual([{ timeout: 2000 }]);
    expect(driver.waits).toEqual([500, 500]);
    expect(driver.scripts).toEqual([]);
  });

  it('falls back to scripted clicks and reports a form that stays open', async () => {
    const driver = new FakeDriver();
    driver.set(S.modal, [el()]).set(S.close, [el({ failClick: true })]);
    driver.evaluateResult = () => true;

    expect(await new EmergencyExit(driver, S, 0).run()).toBe(false);
    expect(driver.scripts).toEqual([pageClickScript(S.closePageQuery), textClickScript('Discard')]);
  });

  it('treats a form closed by the Close click as success without a discard dialog', async () => {
    const driver = new FakeDriver();
    driver.set(S.modal, [el()]).set(S.close, [el({ onClick: () => driver.set(S.modal, []) })]);

    expect(await new EmergencyExit(driver, S, 0).run()).toBe(true);
    expect(driver.scripts).toEqual([]);
    expect(driver.located).not.toContain(S.discard);
    expect(driver.located).not.toContain(S.discardFallback);
  });
});
