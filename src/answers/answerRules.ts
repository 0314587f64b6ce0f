import type { FieldKind } from '../types';

/**
 * A keyword rule over question labels. Rules are checked in table order and
 * matched by case-insensitive substring.
 */
export interface AnswerRule {
  id: string;
  keywords: readonly string[];
  kinds: readonly FieldKind[];
  /** Applied before the oracle is consulted. */
  answer?: string;
  /** Critical question: stored answers and defaults are ignored, always re-resolve. */
  alwaysResolve?: boolean;
  /** Used only when the oracle is unresolved. Never persisted. */
  fallback?: string;
  /** Only applies when the options are exactly a Yes/No pair. */
  yesNoOnly?: boolean;
  /** Regenerated on every visit; the stored value is kept for reference only. */
  freshEachTime?: boolean;
}

const CHOICE_KINDS: readonly FieldKind[] = ['select', 'radio'];
const TEXT_KINDS: readonly FieldKind[] = ['text', 'textarea'];

export const ANSWER_RULES: readonly AnswerRule[] = [
  {
    id: 'critical-sponsorship',
    keywords: ['sponsor', 'visa', 'work permit'],
    kinds: CHOICE_KINDS,
    alwaysResolve: true,
    fallback: 'No',
  },
  {
    id: 'critical-work-authorization',
    keywords: [
      'authorized to work',
      'authorised to work',
      'work authorization',
      'work authorisation',
      'legally',
      'right to work',
      'eligible to work',
      'permitted to work',
      'allowed to work',
      'able to work',
      'entitled to work',
      'citizen',
    ],
    kinds: CHOICE_KINDS,
    alwaysResolve: true,
  },
  {
    id: 'cover-letter',
    keywords: ['cover letter'],
    kinds: TEXT_KINDS,
    freshEachTime: true,
  },
  {
    id: 'years-of-experience',
    keywords: ['years of experience', 'years of work experience', 'how many years'],
    kinds: TEXT_KINDS,
    answer: '2',
  },
  {
    id: 'notice-period',
    keywords: ['notice period'],
    kinds: TEXT_KINDS,
    answer: '2 weeks',
  },
  {
    id: 'salary',
    keywords: ['salary', 'compensation', 'expected pay'],
    kinds: TEXT_KINDS,
    answer: '60000',
  },
  {
    id: 'disability',
    keywords: ['disability', 'disabled'],
    kinds: CHOICE_KINDS,
    answer: 'No',
    yesNoOnly: true,
  },
  {
    id: 'commute-relocation',
    keywords: ['commut', 'relocat', 'locat', 'travel', 'on-site', 'onsite'],
    kinds: CHOICE_KINDS,
    answer: 'Yes',
    yesNoOnly: true,
  },
  {
    id: 'remote',
    keywords: ['remote', 'work from home', 'telecommut'],
    kinds: CHOICE_KINDS,
    answer: 'Yes',
    yesNoOnly: true,
  },
  {
    id: 'experience',
    keywords: ['experience', 'skill', 'qualified'],
    kinds: CHOICE_KINDS,
    answer: 'Yes',
    yesNoOnly: true,
  },
];

function matchesLabel(rule: AnswerRule, label: string, kind: FieldKind): boolean {
  if (!rule.kinds.includes(kind)) {
    return false;
  }
  const lower = label.toLowerCase();
  return rule.keywords.some((keyword) => lower.includes(keyword));
}

function isYesNoPair(options: readonly string[]): boolean {
  const lowered = options.map((option) => option.trim().toLowerCase());
  return lowered.length === 2 && lowered.includes('yes') && lowered.includes('no');
}

export class AnswerRules {
  constructor(private readonly rules: readonly AnswerRule[] = ANSWER_RULES) {}

  matching(label: string, kind: FieldKind): AnswerRule[] {
    return this.rules.filter((rule) => matchesLabel(rule, label, kind));
  }

  isCritical(label: string, kind: FieldKind): boolean {
    return this.matching(label, kind).some((rule) => rule.alwaysResolve === true);
  }

  isFreshEachTime(label: string, kind: FieldKind): boolean {
    return this.matching(label, kind).some((rule) => rule.freshEachTime === true);
  }

  /** First default answer that applies to this label, kind and option list. */
  defaultAnswer(label: string, kind: FieldKind, options: readonly string[] = []): { rule: AnswerRule; answer: string } | undefined {
    if (this.isCritical(label, kind)) {
      return undefined;
    }
    for (const rule of this.matching(label, kind)) {
      if (rule.answer === undefined) {
        continue;
      }
      if (rule.yesNoOnly && !isYesNoPair(options)) {
        continue;
      }
      return { rule, answer: rule.answer };
    }
    return undefined;
  }

  fallback(label: string, kind: FieldKind): string | undefined {
    return this.matching(label, kind).find((rule) => rule.fallback !== undefined)?.fallback;
  }
}

export const defaultAnswerRules = new AnswerRules();
