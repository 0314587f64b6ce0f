import type { FieldKind } from '../../types';
import type { FieldProcessor, FieldProcessorDeps } from './base';
import { CheckboxFieldProcessor } from './checkboxProcessor';
import { RadioFieldProcessor } from './radioProcessor';
import { ResumeFieldProcessor } from './resumeProcessor';
import { SelectFieldProcessor } from './selectProcessor';
import { TextFieldProcessor } from './textProcessor';

export type FieldProcessorRegistry = Readonly<Record<FieldKind, FieldProcessor>>;

export function createFieldProcessors(deps: FieldProcessorDeps): FieldProcessorRegistry {
  const text = new TextFieldProcessor(deps);
  return {
    text,
    textarea: text,
    select: new SelectFieldProcessor(deps),
    radio: new RadioFieldProcessor(deps),
    checkbox: new CheckboxFieldProcessor(deps),
    resume: new ResumeFieldProcessor(deps),
  };
}

export { ChoiceFieldProcessor, FieldProcessor } from './base';
export type { AnswerSource, FieldProcessorDeps, ResolvedAnswer } from './base';
export { CheckboxFieldProcessor, RadioFieldProcessor, ResumeFieldProcessor, SelectFieldProcessor, TextFieldProcessor };
export { matchOption, parseYesNo } from './optionMatching';
