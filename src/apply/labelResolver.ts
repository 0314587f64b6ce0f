import type { ElementSet, FieldKind, UiDriver } from '../types';
import logger from '../utils/logger';
import { DEFAULT_SELECTORS, type WizardSelectors } from './selectors';

export function cssString(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

async function firstText(set: ElementSet): Promise<string> {
  if ((await set.count()) === 0) {
    return '';
  }
  return (await set.first().innerText()).trim();
}

/** "…-first_name" style element ids become "First Name". */
export function labelFromFormElementId(id: string): string {
  if (!id.includes('formElement') || !id.includes('-')) {
    return '';
  }
  const tail = id.slice(id.lastIndexOf('-') + 1);
  return tail
    .replace(/[_-]+/g, ' ')
    .trim()
    .replace(/\b\w/g, (c) => c.toUpperCase());
}

/**
 * Works out the question text for a field by trying, in order: the label
 * pointing at its id, a label beside it, the fieldset legend (grouped kinds),
 * the surrounding form component, and the structured container id.
 */
export class LabelResolver {
  constructor(
    private readonly driver: UiDriver,
    private readonly selectors: WizardSelectors = DEFAULT_SELECTORS,
  ) {}

  async resolve(field: ElementSet, kind: FieldKind): Promise<string> {
    try {
      const id = await field.getAttribute('id');
      if (id) {
        const text = await firstText(this.driver.locate(`label[for=${cssString(id)}]`));
        if (text) return text;
      }

      const nearby = await firstText(field.locate('xpath=..').locate(this.selectors.labels.nearby));
      if (nearby) return nearby;

      if (kind === 'radio' || kind === 'checkbox') {
        const legend = await this.legendText(field.locate('xpath=ancestor::fieldset[1]'));
        if (legend) return legend;
      }

      const heading = await this.componentHeading(field);
      if (heading) return heading;

      const formElement = field.locate(this.selectors.labels.formElement);
      if ((await formElement.count()) > 0) {
        const fromId = labelFromFormElementId((await formElement.first().getAttribute('id')) ?? '');
        if (fromId) return fromId;
      }
    } catch (error) {
      logger.error('Error getting field label:', error);
    }

    return `Unlabeled ${kind}`;
  }

  /**
   * Question text for a radio or checkbox group. The option labels name the
   * choices, so the fieldset legend and the form component heading come first.
   */
  async resolveGroup(field: ElementSet, kind: FieldKind): Promise<string> {
    try {
      const legend = await this.legendText(field.locate('xpath=ancestor::fieldset[1]'));
      if (legend) return legend;

      const heading = await this.componentHeading(field);
      if (heading) return heading;
    } catch (error) {
      logger.error('Error getting group label:', error);
    }
    return this.resolve(field, kind);
  }

  private async componentHeading(field: ElementSet): Promise<string> {
    const component = field.locate(this.selectors.labels.formComponent);
    if ((await component.count()) === 0) {
      return '';
    }
    return (await firstText(component.locate(this.selectors.labels.container))) || (await firstText(component.locate('span span')));
  }

  /** Legend text of a fieldset, preferring its nested span. */
  async legendText(fieldset: ElementSet): Promise<string> {
    if ((await fieldset.count()) === 0) {
      return '';
    }
    const legend = fieldset.first().locate('legend');
    if ((await legend.count()) === 0) {
      return '';
    }
    return (await firstText(legend.locate('span span'))) || (await firstText(legend.locate('span'))) || (await firstText(legend));
  }
}
