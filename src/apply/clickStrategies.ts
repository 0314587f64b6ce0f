import { describeError } from '../errors';
import type { ElementSet, UiDriver } from '../types';
import logger from '../utils/logger';

export type ClickStrategy = 'direct' | 'script' | 'page-query';

export const DIRECT_CLICK_TIMEOUT = 3000;

/** Script that clicks the first element matching `selector` and reports whether it found one. */
export function pageClickScript(selector: string): string {
  return `(() => {
  const el = document.querySelector(${JSON.stringify(selector)});
  if (el instanceof HTMLElement) {
    el.click();
    return true;
  }
  return false;
})()`;
}

/** Script that clicks the first button whose text contains `text` (case-insensitive). */
export function textClickScript(text: string): string {
  return `(() => {
  const wanted = ${JSON.stringify(text.toLowerCase())};
  const el = Array.from(document.querySelectorAll('button')).find(
    (button) => (button.textContent || '').trim().toLowerCase().includes(wanted),
  );
  if (el) {
    el.click();
    return true;
  }
  return false;
})()`;
}

/**
 * Click with escalating strategies: a direct click with a short timeout, then
 * a scripted click on the element, then a scripted click through a page-level
 * query. Returns the strategy that worked, or null when all of them failed.
 */
export async function escalatingClick(
  driver: UiDriver,
  target: ElementSet,
  pageQuery: string | null,
  name: string,
): Promise<ClickStrategy | null> {
  try {
    await target.click({ timeout: DIRECT_CLICK_TIMEOUT });
    logger.info(`Clicked ${name} directly`);
    return 'direct';
  } catch (error) {
    logger.warn(`Direct click on ${name} failed: ${describeError(error)}. Trying scripted click.`);
  }

  try {
    await target.scriptClick();
    logger.info(`Clicked ${name} via script`);
    return 'script';
  } catch (error) {
    logger.warn(`Scripted click on ${name} failed: ${describeError(error)}`);
  }

  if (pageQuery === null) {
    return null;
  }

  try {
    const clicked = await driver.evaluate(pageClickScript(pageQuery));
    if (clicked === true) {
      logger.info(`Clicked ${name} via page-level query`);
      return 'page-query';
    }
    logger.warn(`Page-level query found no ${name}`);
  } catch (error) {
    logger.error(`Page-level click on ${name} failed: ${describeError(error)}`);
  }
  return null;
}
