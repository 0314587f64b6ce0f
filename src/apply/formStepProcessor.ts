import type { AnswerStore } from '../answers/answerStore';
import type { ChoiceHandle, ElementSet, FieldDescriptor, FieldKind, JobContext, UiDriver } from '../types';
import logger from '../utils/logger';
import type { FieldProcessorRegistry } from './fieldProcessors';
import { cssString, LabelResolver } from './labelResolver';
import { DEFAULT_SELECTORS, type WizardSelectors } from './selectors';

export interface StepProcessor {
  /** Fill every field on the current step. Resolves false if any field failed. */
  processStep(modal: ElementSet, store: AnswerStore, job: JobContext): Promise<boolean>;
}

export interface GroupKeyInfo {
  name: string | null;
  id: string | null;
  containerId: string | null;
}

/**
 * Grouping key for a loose radio or checkbox: shared name, else the id with
 * its trailing ordinal stripped, else the enclosing form component, else the
 * element on its own.
 */
export function groupKey(info: GroupKeyInfo, index: number): string {
  if (info.name) {
    return `name:${info.name}`;
  }
  if (info.id) {
    const structured = /^(.*)-(\d+)$/.exec(info.id);
    if (structured?.[1]) {
      return `id:${structured[1]}`;
    }
  }
  if (info.containerId) {
    return `container:${info.containerId}`;
  }
  return `single:${info.id ?? index}`;
}

const PLACEHOLDER_OPTION = /^select an option$/i;

export class FormStepProcessor implements StepProcessor {
  private readonly labels: LabelResolver;

  constructor(
    private readonly driver: UiDriver,
    private readonly processors: FieldProcessorRegistry,
    private readonly selectors: WizardSelectors = DEFAULT_SELECTORS,
  ) {
    this.labels = new LabelResolver(driver, selectors);
  }

  private async simpleFields(modal: ElementSet, selector: string, kind: FieldKind): Promise<FieldDescriptor[]> {
    const elements = modal.locate(selector);
    const count = await elements.count();
    const fields: FieldDescriptor[] = [];
    for (let i = 0; i < count; i++) {
      const handle = elements.nth(i);
      fields.push({ label: await this.labels.resolve(handle, kind), kind, options: [], handle });
    }
    return fields;
  }

  private async selectFields(modal: ElementSet): Promise<FieldDescriptor[]> {
    const fields = await this.simpleFields(modal, this.selectors.fields.select, 'select');
    for (const field of fields) {
      const optionElements = field.handle.locate('option');
      const count = await optionElements.count();
      for (let i = 0; i < count; i++) {
        const text = (await optionElements.nth(i).innerText()).trim();
        if (text && !PLACEHOLDER_OPTION.test(text)) {
          field.options.push(text);
        }
      }
    }
    return fields;
  }

  private async pageLabel(id: string | null): Promise<ElementSet | null> {
    if (!id) {
      return null;
    }
    const label = this.driver.locate(`label[for=${cssString(id)}]`);
    return (await label.count()) > 0 ? label.first() : null;
  }

  private async choiceHandle(input: ElementSet, index: number): Promise<ChoiceHandle> {
    const id = await input.getAttribute('id');
    const label = await this.pageLabel(id);

    if ((await input.getAttribute('role')) === 'radio') {
      const own = (await input.innerText()).trim();
      const text = own || (label ? (await label.innerText()).trim() : '');
      return { text: text || `Option ${index + 1}`, input, label: null };
    }
    if (label) {
      const text = (await label.innerText()).trim();
      return { text: text || `Option ${index + 1}`, input, label };
    }
    const value = await input.getAttribute('value');
    return { text: value?.trim() || `Option ${index + 1}`, input, label: null };
  }

  private async groupDescriptor(inputs: ElementSet[], kind: FieldKind, label?: string): Promise<FieldDescriptor | null> {
    const [first] = inputs;
    if (!first) {
      return null;
    }
    const choices: ChoiceHandle[] = [];
    for (const [index, input] of inputs.entries()) {
      choices.push(await this.choiceHandle(input, index));
    }
    return {
      label: label || (await this.labels.resolveGroup(first, kind)),
      kind,
      options: choices.map((choice) => choice.text),
      handle: first,
      choices,
    };
  }

  private async groupLoose(elements: ElementSet): Promise<ElementSet[][]> {
    const groups = new Map<string, ElementSet[]>();
    const count = await elements.count();
    for (let i = 0; i < count; i++) {
      const element = elements.nth(i);
      const container = element.locate(this.selectors.labels.formComponent);
      const key = groupKey(
        {
          name: await element.getAttribute('name'),
          id: await element.getAttribute('id'),
          containerId: (await container.count()) > 0 ? await container.first().getAttribute('id') : null,
        },
        i,
      );
      const group = groups.get(key) ?? [];
      group.push(element);
      groups.set(key, group);
    }
    return [...groups.values()];
  }

  private async radioFields(modal: ElementSet): Promise<FieldDescriptor[]> {
    const fields: FieldDescriptor[] = [];
    const fieldsets = modal.locate(this.selectors.fields.radioFieldset);
    const fieldsetCount = await fieldsets.count();

    if (fieldsetCount > 0) {
      for (let i = 0; i < fieldsetCount; i++) {
        const fieldset = fieldsets.nth(i);
        const radios = fieldset.locate(this.selectors.fields.radio);
        const inputs = Array.from({ length: await radios.count() }, (_, index) => radios.nth(index));
        const field = await this.groupDescriptor(inputs, 'radio', await this.labels.legendText(fieldset));
        if (field) fields.push(field);
      }
      return fields;
    }

    for (const group of await this.groupLoose(modal.locate(this.selectors.fields.radio))) {
      const field = await this.groupDescriptor(group, 'radio');
      if (field) fields.push(field);
    }
    return fields;
  }

  private async checkboxFields(modal: ElementSet): Promise<FieldDescriptor[]> {
    const fields: FieldDescriptor[] = [];
    for (const group of await this.groupLoose(modal.locate(this.selectors.fields.checkbox))) {
      const [first] = group;
      if (first) {
        const label = group.length > 1 ? await this.labels.resolveGroup(first, 'checkbox') : await this.labels.resolve(first, 'checkbox');
        fields.push({ label, kind: 'checkbox', options: [], handle: first });
      }
    }
    return fields;
  }

  private async resumeFields(modal: ElementSet): Promise<FieldDescriptor[]> {
    const cards = modal.locate(this.selectors.fields.resume);
    if ((await cards.count()) === 0) {
      return [];
    }
    return [{ label: 'Resume', kind: 'resume', options: [], handle: cards }];
  }

  /** Every field visible on the current step, in page order per kind. */
  async discover(modal: ElementSet): Promise<FieldDescriptor[]> {
    return [
      ...(await this.simpleFields(modal, this.selectors.fields.text, 'text')),
      ...(await this.simpleFields(modal, this.selectors.fields.textarea, 'textarea')),
      ...(await this.selectFields(modal)),
      ...(await this.radioFields(modal)),
      ...(await this.checkboxFields(modal)),
      ...(await this.resumeFields(modal)),
    ];
  }

  async processStep(modal: ElementSet, store: AnswerStore, job: JobContext): Promise<boolean> {
    let fields: FieldDescriptor[];
    try {
      fields = await this.discover(modal);
    } catch (error) {
      logger.error('Error discovering form fields:', error);
      return false;
    }
    logger.info(`Found ${fields.length} fields on this step`);

    let success = true;
    for (const field of fields) {
      try {
        if (!(await this.processors[field.kind].process(field, store, job))) {
          success = false;
          logger.warn(`Field ${field.kind} "${field.label}" was not answered`);
        }
      } catch (error) {
        success = false;
        logger.error(`Error processing ${field.kind} "${field.label}":`, error);
      }
    }
    return success;
  }
}
