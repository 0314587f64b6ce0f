import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AnswerStore } from '../answers/answerStore';
import { TemplateCoverLetterGenerator } from '../answers/coverLetterGenerator';
import type { AnswerOracle } from '../answers/answerOracle';
import { createFieldProcessors } from '../apply/fieldProcessors';
import { FormStepProcessor, groupKey } from '../apply/formStepProcessor';
import { LabelResolver, labelFromFormElementId } from '../apply/labelResolver';
import { DEFAULT_SELECTORS as S } from '../apply/selectors';
import type { JobContext } from '../types';
import { el, FakeDriver, setOf } from './fakeDriver';

const job: JobContext = {
  id: '7',
  title: 'Platform Engineer',
  company: 'Initech',
  description: 'Kubernetes',
  location: 'Berlin',
  entryAlreadyTriggered: true,
};

describe('groupKey', () => {
  it('groups by shared name first', () => {
    expect(groupKey({ name: 'contact', id: 'contact-0', containerId: 'c1' }, 0)).toBe('name:contact');
  });

  it('strips a trailing ordinal from structured ids', () => {
    expect(groupKey({ name: null, id: 'question-12-0', containerId: null }, 0)).toBe('id:question-12');
    expect(groupKey({ name: null, id: 'question-12-1', containerId: null }, 1)).toBe('id:question-12');
  });

  it('falls back to the form component, then the element itself', () => {
    expect(groupKey({ name: null, id: 'agree', containerId: 'component-3' }, 2)).toBe('container:component-3');
    expect(groupKey({ name: null, id: 'agree', containerId: null }, 2)).toBe('single:agree');
    expect(groupKey({ name: null, id: null, containerId: null }, 2)).toBe('single:2');
  });
});

describe('LabelResolver', () => {
  it('prefers the label pointing at the field id', async () => {
    const driver = new FakeDriver().set('label[for="email"]', [el({ text: ' Email address ' })]);

    expect(await new LabelResolver(driver).resolve(setOf(el({ attrs: { id: 'email' } })), 'text')).toBe('Email address');
  });

  it('reads a heading inside the surrounding form component', async () => {
    const component = el({ children: { 'span span': [el({ text: 'Salary expectations' })] } });
    const input = el({ children: { [S.labels.formComponent]: [component] } });

    expect(await new LabelResolver(new FakeDriver()).resolve(setOf(input), 'text')).toBe('Salary expectations');
  });

  it('derives a label from a structured container id', async () => {
    const container = el({ attrs: { id: 'step-formElement-first_name' } });
    const input = el({ children: { [S.labels.formElement]: [container] } });

    expect(await new LabelResolver(new FakeDriver()).resolve(setOf(input), 'text')).toBe('First Name');
    expect(labelFromFormElementId('plain-id')).toBe('');
  });

  it('names unlabeled fields by kind', async () => {
    expect(await new LabelResolver(new FakeDriver()).resolve(setOf(el()), 'textarea')).toBe('Unlabeled textarea');
  });
});

describe('FormStepProcessor', () => {
  let dir: string;
  let store: AnswerStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'step-'));
    store = new AnswerStore(path.join(dir, 'answers.json'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function stepProcessor(driver: FakeDriver, answer = '2') {
    const resolve = vi.fn<AnswerOracle['resolve']>(async () => answer);
    const processors = createFieldProcessors({ oracle: { name: 'stub', resolve }, coverLetters: new TemplateCoverLetterGenerator() });
    return { processor: new FormStepProcessor(driver, processors, S), resolve };
  }

  function contactStep(driver: FakeDriver) {
    const firstName = el({ attrs: { id: 'first-name' } });
    const select = el({
      attrs: { id: 'sponsor' },
      children: { option: [el({ text: 'Select an option' }), el({ text: 'Yes' }), el({ text: 'No' })] },
    });
    const yesLabel = el({ text: 'Yes' });
    const noLabel = el({ text: 'No' });
    const legend = el({ children: { 'span span': [el({ text: 'Are you willing to relocate?' })] } });
    const fieldset = el({
      children: {
        legend: [legend],
        [S.fields.radio]: [el({ attrs: { id: 'relocate-0' } }), el({ attrs: { id: 'relocate-1' } })],
      },
    });
    driver
      .set('label[for="first-name"]', [el({ text: 'First name' })])
      .set('label[for="sponsor"]', [el({ text: 'Will you require visa sponsorship?' })])
      .set('label[for="relocate-0"]', [yesLabel])
      .set('label[for="relocate-1"]', [noLabel]);
    const modal = el({
      children: {
        [S.fields.text]: [firstName],
        [S.fields.select]: [select],
        [S.fields.radioFieldset]: [fieldset],
        [S.fields.resume]: [el(), el()],
      },
    });
    return { modal, firstName, select, yesLabel, noLabel };
  }

  it('discovers fields with their labels and options', async () => {
    const driver = new FakeDriver();
    const { modal } = contactStep(driver);

    const fields = await stepProcessor(driver).processor.discover(setOf(modal));

    expect(fields.map(({ label, kind, options }) => ({ label, kind, options }))).toEqual([
      { label: 'First name', kind: 'text', options: [] },
      { label: 'Will you require visa sponsorship?', kind: 'select', options: ['Yes', 'No'] },
      { label: 'Are you willing to relocate?', kind: 'radio', options: ['Yes', 'No'] },
      { label: 'Resume', kind: 'resume', options: [] },
    ]);
  });

  it('fills every field of a step', async () => {
    const driver = new FakeDriver();
    const { modal, firstName, select, yesLabel, noLabel } = contactStep(driver);
    store.set('First name', 'Ada');
    const { processor, resolve } = stepProcessor(driver);

    expect(await processor.processStep(setOf(modal), store, job)).toBe(true);

    expect(firstName.filled).toEqual(['Ada']);
    expect(select.selected).toEqual(['No']);
    expect(yesLabel.clicks).toEqual([{ timeout: 3000 }]);
    expect(noLabel.clicks).toEqual([]);
    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith('Will you require visa sponsorship?\nOptions:\n1. Yes\n2. No', 'select', job);
    expect(store.get('Will you require visa sponsorship?')).toBe('No');
  });

  it('groups loose radios by name and reads option values', async () => {
    const driver = new FakeDriver();
    const parent = el({ children: { [S.labels.nearby]: [el({ text: 'Preferred contact method' })] } });
    const modal = el({
      children: {
        [S.fields.radio]: [
          el({ attrs: { name: 'contact', value: 'Email' }, children: { 'xpath=..': [parent] } }),
          el({ attrs: { name: 'contact', value: 'Phone' } }),
        ],
      },
    });

    const fields = await stepProcessor(driver).processor.discover(setOf(modal));

    expect(fields).toHaveLength(1);
    expect(fields[0]?.label).toBe('Preferred contact method');
    expect(fields[0]?.options).toEqual(['Email', 'Phone']);
    expect(fields[0]?.choices?.map((choice) => choice.label)).toEqual([null, null]);
  });

  it('names loose radio groups by their form component heading, not the option labels', async () => {
    const driver = new FakeDriver();
    const question = (id: string, text: string) => {
      const component = el({ children: { [S.labels.container]: [el({ text })] } });
      const yes = el({ text: 'Yes' });
      const no = el({ text: 'No' });
      driver.set(`label[for="${id}-0"]`, [yes]).set(`label[for="${id}-1"]`, [no]);
      const radios = [0, 1].map((n) => el({ attrs: { id: `${id}-${n}` }, children: { [S.labels.formComponent]: [component] } }));
      return { radios, no };
    };
    const sponsorship = question('sponsorship', 'Do you require visa sponsorship?');
    const former = question('former', 'Have you worked here before?');
    const modal = el({ children: { [S.fields.radio]: [...sponsorship.radios, ...former.radios] } });
    store.set('Yes', 'Yes');
    const { processor, resolve } = stepProcessor(driver);

    const fields = await processor.discover(setOf(modal));
    expect(fields.map(({ label, options }) => [label, options])).toEqual([
      ['Do you require visa sponsorship?', ['Yes', 'No']],
      ['Have you worked here before?', ['Yes', 'No']],
    ]);

    expect(await processor.processStep(setOf(modal), store, job)).toBe(true);
    expect(resolve).toHaveBeenCalledTimes(2);
    expect(resolve).toHaveBeenCalledWith('Do you require visa sponsorship?\nOptions:\n1. Yes\n2. No', 'radio', job);
    expect(resolve).toHaveBeenCalledWith('Have you worked here before?\nOptions:\n1. Yes\n2. No', 'radio', job);
    expect(sponsorship.no.clicks).toEqual([{ timeout: 3000 }]);
    expect(former.no.clicks).toEqual([{ timeout: 3000 }]);
    expect(store.get('Have you worked here before?')).toBe('No');
  });

  it('reports a step with an unanswered field', async () => {
    const driver = new FakeDriver();
    const { processor, resolve } = stepProcessor(driver);
    resolve.mockRejectedValue(new Error('offline'));
    const modal = el({ children: { [S.fields.textarea]: [el()] } });

    expect(await processor.processStep(setOf(modal), store, job)).toBe(false);
    expect(resolve).toHaveBeenCalledWith('Unlabeled textarea', 'textarea', job);
  });
});
