/** A control that may advance the form to its next step. */
export interface ContinueCandidate {
  name: string;
  /** Playwright selector, scoped to the form container. */
  selector: string;
  /** Plain CSS usable with document.querySelector for the scripted fallback. */
  pageQuery: string | null;
  /** Take the last match instead of the first, and only if its text matches. */
  lastMatching?: RegExp;
}

export interface WizardSelectors {
  entry: string;
  modal: string;
  submit: string;
  submitPageQuery: string;
  done: string;
  close: string;
  closeIcon: string;
  closePageQuery: string;
  discard: string;
  discardFallback: string;
  continueCandidates: readonly ContinueCandidate[];
  /** Words that mark a button as a navigation control for the alternate-control heuristic. */
  navigationWords: readonly string[];
  fields: {
    text: string;
    textarea: string;
    select: string;
    radio: string;
    radioFieldset: string;
    checkbox: string;
    resume: string;
  };
  labels: {
    nearby: string;
    container: string;
    formComponent: string;
    formElement: string;
  };
}

export const DEFAULT_SELECTORS: WizardSelectors = {
  entry: 'button.jobs-apply-button',
  modal: 'div.artdeco-modal__content.jobs-easy-apply-modal__content, div.jobs-easy-apply-content',
  submit: "button[aria-label='Submit application'], button:has-text('Submit application')",
  submitPageQuery: "button[aria-label='Submit application']",
  done: "button[aria-label='Done'], button[aria-label='Dismiss'], button:has-text('Done'), button:has-text('Dismiss')",
  close: "button[aria-label='Dismiss'], button[data-test-modal-close-btn], button.artdeco-modal__dismiss",
  closeIcon:
    "button:has(svg[data-test-icon='close-medium']), button:has(use[href='#close-medium']), button.artdeco-button--circle",
  closePageQuery: "button[data-test-modal-close-btn], button.artdeco-modal__dismiss, button[aria-label='Dismiss']",
  discard:
    "button[data-control-name='discard_application_confirm_btn'], button[data-test-dialog-secondary-btn]:has-text('Discard')",
  discardFallback: "button.artdeco-modal__confirm-dialog-btn:has-text('Discard'), button:has-text('Discard')",
  continueCandidates: [
    { name: 'next marker', selector: '[data-easy-apply-next-button]', pageQuery: '[data-easy-apply-next-button]' },
    { name: 'footer Next', selector: "footer button:has-text('Next')", pageQuery: null },
    {
      name: 'Continue to next step',
      selector: "button[aria-label='Continue to next step']",
      pageQuery: "button[aria-label='Continue to next step']",
    },
    {
      name: 'Review',
      selector: "button[aria-label='Review your application'], button:has-text('Review')",
      pageQuery: "button[aria-label='Review your application']",
    },
    { name: 'Next text', selector: "button:has-text('Next')", pageQuery: null },
    {
      name: 'styled action',
      selector: 'button.artdeco-button--primary, button.artdeco-button--secondary',
      pageQuery: null,
      lastMatching: /next|continue|proceed|submit|review/i,
    },
  ],
  navigationWords: ['next', 'continue', 'submit', 'review'],
  fields: {
    text: "input[type='text']:visible, input:not([type]):visible",
    textarea: 'textarea:visible',
    select: 'select:visible',
    radio: "input[type='radio'], div[role='radio']",
    radioFieldset: "fieldset:has(input[type='radio']), fieldset:has(div[role='radio'])",
    checkbox: "input[type='checkbox']:visible, div[role='checkbox']:visible",
    resume: '[data-test-resume-selector-resume-card]',
  },
  labels: {
    nearby: 'label, .fb-form-element__label, .fb-dash-form-element__label',
    container: 'label, .fb-form-element__label, legend, h3, h4, .fb-dash-form-element__label',
    formComponent: "xpath=ancestor::div[contains(@class, 'form-component')][1]",
    formElement: "xpath=ancestor::div[contains(@class, 'fb-dash-form-element')][1]",
  },
};
